/**
 * Frequency & Biofield Validation Tests
 */

import { describe, it, expect } from 'vitest';
import {
  validateFrequencyValue,
  validateBiofieldCoherence,
  calculateBiofieldCoherence,
  coherenceLevelFor,
} from '../../../src/validation/frequency-validator.js';

describe('validateFrequencyValue', () => {
  it('should reject non-positive frequencies and stop', () => {
    const result = validateFrequencyValue(0, 'brainwave');

    expect(result.issues.map((i) => i.code)).toEqual(['FREQUENCY_NOT_POSITIVE']);
    expect(result.isValid).toBe(false);
  });

  it('should tag the first matching brainwave band', () => {
    const result = validateFrequencyValue(10, 'brainwave');

    expect(result.issues).toEqual([]);
    expect(result.metadata.brainwaveRange).toBe('alpha');
  });

  it('should warn for expert-only bands', () => {
    const result = validateFrequencyValue(150, 'brainwave');

    expect(result.metadata.brainwaveRange).toBe('ultra_gamma');
    expect(result.issues.map((i) => i.code)).toEqual(['BRAINWAVE_EXPERT_ONLY']);
    expect(result.isValid).toBe(true);
  });

  it('should warn when no brainwave band matches', () => {
    const result = validateFrequencyValue(500, 'brainwave');
    expect(result.issues.map((i) => i.code)).toEqual(['BRAINWAVE_RANGE_UNKNOWN']);
  });

  it('should warn on very high frequencies', () => {
    const result = validateFrequencyValue(1500, 'solfeggio');
    expect(result.issues.map((i) => i.code)).toEqual(['FREQUENCY_VERY_HIGH', 'SOLFEGGIO_NO_MATCH']);
  });

  it('should match solfeggio frequencies within one percent', () => {
    expect(validateFrequencyValue(530, 'solfeggio').metadata.solfeggioFrequency).toBe('528_hz');
    expect(validateFrequencyValue(540, 'solfeggio').hasIssue('SOLFEGGIO_NO_MATCH')).toBe(true);
  });

  it('should match Schumann modes within half a hertz', () => {
    expect(validateFrequencyValue(7.9, 'schumann').metadata.schumannMode).toBe('fundamental');
    expect(validateFrequencyValue(10, 'schumann').issues[0].severity).toBe('info');
  });

  it('should match golden ratio harmonics within a tenth of a hertz', () => {
    expect(validateFrequencyValue(1.65, 'goldenRatio').metadata.goldenRatioHarmonic).toBe('phi_1');
    expect(validateFrequencyValue(3.5, 'goldenRatio').hasIssue('GOLDEN_RATIO_NO_MATCH')).toBe(true);
  });
});

describe('coherenceLevelFor', () => {
  it('should map values to upper-inclusive bands', () => {
    expect(coherenceLevelFor(0)).toBe('chaotic');
    expect(coherenceLevelFor(0.2)).toBe('chaotic');
    expect(coherenceLevelFor(0.21)).toBe('incoherent');
    expect(coherenceLevelFor(0.6)).toBe('emerging');
    expect(coherenceLevelFor(0.7)).toBe('coherent');
    expect(coherenceLevelFor(0.95)).toBe('highly_coherent');
    expect(coherenceLevelFor(1)).toBe('unified');
  });

  it('should clamp out-of-range values and treat NaN as the lowest band', () => {
    expect(coherenceLevelFor(5)).toBe('unified');
    expect(coherenceLevelFor(-1)).toBe('chaotic');
    expect(coherenceLevelFor(Number.NaN)).toBe('chaotic');
  });
});

describe('calculateBiofieldCoherence', () => {
  it('should average the three components', () => {
    expect(calculateBiofieldCoherence(0.3, 0.6, 0.9)).toBeCloseTo(0.6, 10);
  });
});

describe('validateBiofieldCoherence', () => {
  it('should accept a complete, healthy set of readings', () => {
    const result = validateBiofieldCoherence({ schumannResonance: 0.6, solfeggioHarmonics: 0.6, goldenRatioAlignment: 0.6 });

    expect(result.issues).toEqual([]);
    expect(result.metadata.overallCoherence).toBeCloseTo(0.6, 10);
    expect(result.metadata.coherenceLevel).toBe('emerging');
  });

  it('should warn about missing components and default them to 0.5', () => {
    const result = validateBiofieldCoherence({ schumannResonance: 0.8, solfeggioHarmonics: 0.8 });

    expect(result.issues.map((i) => i.code)).toEqual(['BIOFIELD_COMPONENT_MISSING']);
    expect(result.metadata.overallCoherence).toBeCloseTo(0.7, 10);
    expect(result.metadata.coherenceLevel).toBe('coherent');
  });

  it('should reject non-numeric and out-of-range readings', () => {
    const result = validateBiofieldCoherence({
      schumannResonance: 'high',
      solfeggioHarmonics: 1.4,
      goldenRatioAlignment: 0.5,
    });

    expect(result.errors.map((i) => [i.fieldPath, i.code])).toEqual([
      ['coherence.schumannResonance', 'COHERENCE_INVALID_TYPE'],
      ['coherence.solfeggioHarmonics', 'COHERENCE_OUT_OF_RANGE'],
    ]);
    expect(result.hasIssue('COHERENCE_EXCEPTIONAL')).toBe(true);
  });

  it('should flag low and exceptional coherence', () => {
    const result = validateBiofieldCoherence({
      schumannResonance: 0.1,
      solfeggioHarmonics: 0.97,
      goldenRatioAlignment: 0.5,
    });

    expect(result.warnings.map((i) => i.code)).toEqual(['COHERENCE_LOW']);
    expect(result.infos.map((i) => i.code)).toEqual(['COHERENCE_EXCEPTIONAL']);
  });

  it('should skip the overall figure for a single reading', () => {
    const result = validateBiofieldCoherence({ schumannResonance: 0.5 });
    expect(result.metadata.overallCoherence).toBeUndefined();
  });
});
