/**
 * User Readiness Tests
 */

import { describe, it, expect } from 'vitest';
import { assessUserReadiness, READINESS_THRESHOLD } from '../../../src/safety/readiness.js';
import { createValidSessionConfig } from '../../setup.js';

const demanding = { durationMinutes: 45, frequencyIntensity: 0.9, consciousnessJourney: ['neutral', 'deep_relaxation'] };

describe('assessUserReadiness', () => {
  it('should find a rested, calm user ready for a gentle session', () => {
    const report = assessUserReadiness({ experienceLevel: 'beginner', hoursSinceLastSession: 48 }, createValidSessionConfig());

    expect(report.isReady).toBe(true);
    expect(report.readinessScore).toBe(1);
    expect(report.concerns).toEqual([]);
  });

  it('should scale the score for complexity above the level limit', () => {
    const report = assessUserReadiness({ experienceLevel: 'beginner' }, demanding);

    expect(report.sessionComplexity).toBeCloseTo(0.555, 10);
    expect(report.readinessScore).toBeCloseTo(0.7, 10);
    expect(report.isReady).toBe(true);
    expect(report.recommendedModifications).toEqual(['Reduce session complexity or gain more experience']);
  });

  it('should combine all three factors and fall below the threshold', () => {
    const report = assessUserReadiness(
      { experienceLevel: 'beginner', hoursSinceLastSession: 12, currentStressLevel: 0.8 },
      demanding
    );

    // 0.7 * 0.9 * 0.8
    expect(report.readinessScore).toBeCloseTo(0.504, 10);
    expect(report.readinessScore).toBeLessThan(READINESS_THRESHOLD);
    expect(report.isReady).toBe(false);
    expect(report.concerns).toHaveLength(3);
    expect(report.preparationsNeeded).toEqual([
      'Ensure adequate rest between sessions',
      'Consider stress reduction before session',
    ]);
  });

  it('should not penalize the demanding session for an expert', () => {
    const report = assessUserReadiness({ experienceLevel: 'expert' }, demanding);
    expect(report.readinessScore).toBe(1);
  });

  it('should hold unknown levels to beginner limits', () => {
    const report = assessUserReadiness({ experienceLevel: 'unknown' }, demanding);
    expect(report.readinessScore).toBeCloseTo(0.7, 10);
  });
});
