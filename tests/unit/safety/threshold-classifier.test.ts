/**
 * Safety Threshold Classifier Tests
 */

import { describe, it, expect } from 'vitest';
import {
  classifyValue,
  classifyAgainstLimit,
  thresholdFromLimit,
  verifyThresholdTable,
  verifyLimitMonotonicity,
  SAFETY_BANDS,
} from '../../../src/safety/threshold-classifier.js';
import { getReferenceData } from '../../../src/reference/reference-loader.js';
import type { SafetyThreshold } from '../../../src/shared/types/reference.js';

const reference = getReferenceData();
const intensity = reference.safetyThresholds.frequency_intensity;
const comfort = reference.safetyThresholds.comfort_level_score;

describe('classifyValue', () => {
  it('should put boundary values in the safer band', () => {
    expect(classifyValue(0.7, intensity)).toBe('safe');
    expect(classifyValue(0.71, intensity)).toBe('warning');
    expect(classifyValue(0.85, intensity)).toBe('warning');
    expect(classifyValue(0.86, intensity)).toBe('danger');
  });

  it('should classify values above every band as danger', () => {
    expect(classifyValue(5, intensity)).toBe('danger');
    expect(classifyValue(Number.POSITIVE_INFINITY, intensity)).toBe('danger');
  });

  it('should classify NaN as danger', () => {
    expect(classifyValue(Number.NaN, intensity)).toBe('danger');
    expect(classifyValue(Number.NaN, comfort)).toBe('danger');
  });

  it('should treat descending thresholds as less safe when the value shrinks', () => {
    expect(classifyValue(0.9, comfort)).toBe('safe');
    expect(classifyValue(0.7, comfort)).toBe('safe');
    expect(classifyValue(0.5, comfort)).toBe('warning');
    expect(classifyValue(0.4, comfort)).toBe('warning');
    expect(classifyValue(0.1, comfort)).toBe('danger');
    expect(classifyValue(-3, comfort)).toBe('danger');
  });

  it('should return exactly one known band for any input', () => {
    const samples = [-1e9, -1, 0, 0.05, 0.5, 1, 59.9, 60, 61, 1e9, Number.NaN, Number.NEGATIVE_INFINITY];
    for (const threshold of Object.values(reference.safetyThresholds)) {
      for (const value of samples) {
        expect(SAFETY_BANDS).toContain(classifyValue(value, threshold));
      }
    }
  });

  it('should never call the largest representable value safe', () => {
    for (const threshold of Object.values(reference.safetyThresholds)) {
      if (threshold.direction === 'ascending') {
        expect(classifyValue(Number.MAX_VALUE, threshold)).toBe('danger');
      }
    }
  });
});

describe('classifyAgainstLimit', () => {
  const beginner = reference.neuralLoadLimits.beginner;

  it('should allow values up to and including the cap', () => {
    expect(classifyAgainstLimit(0.5, 'maxFrequencyIntensity', beginner)).toBe('safe');
    expect(classifyAgainstLimit(30, 'maxSessionDurationMinutes', beginner)).toBe('safe');
  });

  it('should classify anything over the cap as danger', () => {
    expect(classifyAgainstLimit(0.51, 'maxFrequencyIntensity', beginner)).toBe('danger');
    expect(classifyAgainstLimit(3, 'maxStateTransitions', beginner)).toBe('danger');
  });

  it('should build a two-band threshold from the cap', () => {
    const threshold = thresholdFromLimit('maxGammaExposureMinutes', beginner);
    expect(threshold.safeRange).toEqual([0, 5]);
    expect(threshold.dangerRange).toEqual([5, Number.POSITIVE_INFINITY]);
  });
});

describe('verifyThresholdTable', () => {
  it('should find no problems in the bundled thresholds', () => {
    for (const [name, threshold] of Object.entries(reference.safetyThresholds)) {
      expect(verifyThresholdTable(name, threshold)).toEqual([]);
    }
  });

  it('should report overlapping, inverted and out-of-domain bands', () => {
    const broken: SafetyThreshold = {
      ...intensity,
      safeRange: [0, 0.8],
      warningRange: [0.9, 0.7],
      dangerRange: [0.6, 1.5],
    };

    expect(verifyThresholdTable('broken', broken)).toEqual([
      'broken: band [0.9, 0.7] is inverted',
      'broken: band [0.6, 1.5] leaves domain [0, 1]',
      'broken: band ending at 0.7 overlaps band starting at 0.6',
    ]);
  });
});

describe('verifyLimitMonotonicity', () => {
  it('should hold for the bundled experience-level limits', () => {
    expect(verifyLimitMonotonicity(reference.neuralLoadLimits)).toEqual([]);
  });

  it('should report a level whose cap is below a lower level', () => {
    const limits = {
      ...reference.neuralLoadLimits,
      intermediate: { ...reference.neuralLoadLimits.intermediate, maxFrequencyIntensity: 0.4 },
    };

    expect(verifyLimitMonotonicity(limits)).toEqual([
      {
        field: 'maxFrequencyIntensity',
        lowerLevel: 'beginner',
        higherLevel: 'intermediate',
        lowerValue: 0.5,
        higherValue: 0.4,
      },
    ]);
  });

  it('should ignore the integration time multiplier', () => {
    expect(reference.neuralLoadLimits.beginner.integrationTimeMultiplier).toBeGreaterThan(
      reference.neuralLoadLimits.expert.integrationTimeMultiplier
    );
    expect(verifyLimitMonotonicity(reference.neuralLoadLimits)).toEqual([]);
  });
});
