/**
 * Frequency & Biofield Validation
 *
 * Checks single frequencies against the reference frequency tables and
 * biofield coherence readings against the coherence bands.
 */

import { getReferenceData } from '../reference/reference-loader.js';
import type { CoherenceLevel, ReferenceData } from '../shared/types/reference.js';
import { ValidationResult } from './validation-result.js';
import type { FrequencyKind } from './types.js';

const MAX_SAFE_FREQUENCY_HZ = 1000;
const SOLFEGGIO_TOLERANCE_RATIO = 0.01;
const SCHUMANN_TOLERANCE_HZ = 0.5;
const GOLDEN_RATIO_TOLERANCE_HZ = 0.1;

export const BIOFIELD_COMPONENTS = ['schumannResonance', 'solfeggioHarmonics', 'goldenRatioAlignment'] as const;

export type BiofieldComponent = (typeof BIOFIELD_COMPONENTS)[number];

/**
 * Validate one frequency value
 */
export function validateFrequencyValue(
  frequency: number,
  kind: FrequencyKind,
  reference: ReferenceData = getReferenceData()
): ValidationResult {
  const result = new ValidationResult();

  if (!Number.isFinite(frequency) || frequency <= 0) {
    return result.addIssue({
      severity: 'error',
      fieldPath: 'frequency',
      message: `Frequency must be positive: ${frequency}`,
      value: frequency,
      suggestion: 'Use a positive frequency in Hz',
      code: 'FREQUENCY_NOT_POSITIVE',
    });
  }

  if (frequency > MAX_SAFE_FREQUENCY_HZ) {
    result.addIssue({
      severity: 'warning',
      fieldPath: 'frequency',
      message: `Very high frequency detected: ${frequency} Hz`,
      value: frequency,
      suggestion: 'Consider using lower frequencies for safety',
      code: 'FREQUENCY_VERY_HIGH',
    });
  }

  switch (kind) {
    case 'brainwave':
      checkBrainwave(frequency, reference, result);
      break;
    case 'solfeggio':
      checkSolfeggio(frequency, reference, result);
      break;
    case 'schumann':
      checkSchumann(frequency, reference, result);
      break;
    case 'goldenRatio':
      checkGoldenRatio(frequency, reference, result);
      break;
  }

  return result;
}

function checkBrainwave(frequency: number, reference: ReferenceData, result: ValidationResult): void {
  const match = Object.entries(reference.brainwaveBands).find(
    ([, band]) => band.minFrequency <= frequency && frequency <= band.maxFrequency
  );

  if (!match) {
    result.addIssue({
      severity: 'warning',
      fieldPath: 'frequency',
      message: `Frequency ${frequency} Hz does not match known brainwave ranges`,
      value: frequency,
      suggestion: 'Consider using frequencies within established brainwave ranges',
      code: 'BRAINWAVE_RANGE_UNKNOWN',
    });
    return;
  }

  const [bandId, band] = match;
  result.metadata.brainwaveRange = bandId;

  for (const caution of band.cautions) {
    if (caution.includes('only') && caution.includes('expert')) {
      result.addIssue({
        severity: 'warning',
        fieldPath: 'frequency',
        message: `Frequency ${frequency} Hz is in ${bandId} range: ${caution}`,
        value: frequency,
        suggestion: 'Reserve this range for expert sessions',
        code: 'BRAINWAVE_EXPERT_ONLY',
      });
    }
  }
}

function checkSolfeggio(frequency: number, reference: ReferenceData, result: ValidationResult): void {
  let matched: string | undefined;
  let closest = Number.POSITIVE_INFINITY;

  for (const [id, entry] of Object.entries(reference.solfeggioFrequencies)) {
    const difference = Math.abs(frequency - entry.frequency);
    if (difference <= entry.frequency * SOLFEGGIO_TOLERANCE_RATIO && difference < closest) {
      matched = id;
      closest = difference;
    }
  }

  if (matched) {
    result.metadata.solfeggioFrequency = matched;
  } else {
    result.addIssue({
      severity: 'info',
      fieldPath: 'frequency',
      message: `Frequency ${frequency} Hz does not closely match known Solfeggio frequencies`,
      value: frequency,
      suggestion: 'Consider using established Solfeggio frequencies',
      code: 'SOLFEGGIO_NO_MATCH',
    });
  }
}

function checkSchumann(frequency: number, reference: ReferenceData, result: ValidationResult): void {
  const match = Object.entries(reference.schumannModes).find(
    ([, mode]) => Math.abs(frequency - mode.frequency) <= SCHUMANN_TOLERANCE_HZ
  );

  if (match) {
    result.metadata.schumannMode = match[0];
  } else {
    result.addIssue({
      severity: 'info',
      fieldPath: 'frequency',
      message: `Frequency ${frequency} Hz does not match known Schumann resonance modes`,
      value: frequency,
      suggestion: 'Consider using Schumann resonance frequencies',
      code: 'SCHUMANN_NO_MATCH',
    });
  }
}

function checkGoldenRatio(frequency: number, reference: ReferenceData, result: ValidationResult): void {
  const match = Object.entries(reference.goldenRatioHarmonics).find(
    ([, harmonic]) => Math.abs(frequency - harmonic.frequency) <= GOLDEN_RATIO_TOLERANCE_HZ
  );

  if (match) {
    result.metadata.goldenRatioHarmonic = match[0];
  } else {
    result.addIssue({
      severity: 'info',
      fieldPath: 'frequency',
      message: `Frequency ${frequency} Hz does not match golden ratio harmonics`,
      value: frequency,
      suggestion: 'Consider using golden ratio harmonic frequencies',
      code: 'GOLDEN_RATIO_NO_MATCH',
    });
  }
}

/**
 * Equal-weight mean of the three coherence components
 */
export function calculateBiofieldCoherence(schumann: number, solfeggio: number, goldenRatio: number): number {
  return Math.min(1, Math.max(0, (schumann + solfeggio + goldenRatio) / 3));
}

/**
 * Coherence band for a [0,1] value; bands are upper-inclusive, checked low to high
 */
export function coherenceLevelFor(
  coherence: number,
  levels: readonly CoherenceLevel[] = getReferenceData().coherenceLevels
): string {
  if (Number.isNaN(coherence)) return levels[0].level;
  const clamped = Math.min(1, Math.max(0, coherence));
  const match = levels.find((entry) => clamped <= entry.range[1]);
  return (match ?? levels[levels.length - 1]).level;
}

/**
 * Validate a set of biofield coherence readings
 */
export function validateBiofieldCoherence(
  readings: Readonly<Record<string, unknown>>,
  reference: ReferenceData = getReferenceData()
): ValidationResult {
  const result = new ValidationResult();

  for (const component of BIOFIELD_COMPONENTS) {
    if (!(component in readings)) {
      result.addIssue({
        severity: 'warning',
        fieldPath: 'biofieldComponents',
        message: `Missing biofield component: ${component}`,
        suggestion: `Add ${component} for complete biofield analysis`,
        code: 'BIOFIELD_COMPONENT_MISSING',
      });
    }
  }

  const numeric: Partial<Record<string, number>> = {};

  for (const [component, coherence] of Object.entries(readings)) {
    const fieldPath = `coherence.${component}`;

    if (typeof coherence !== 'number' || Number.isNaN(coherence)) {
      result.addIssue({
        severity: 'error',
        fieldPath,
        message: `Invalid coherence value type: ${typeof coherence}`,
        value: coherence,
        suggestion: 'Provide coherence as a number between 0 and 1',
        code: 'COHERENCE_INVALID_TYPE',
      });
      continue;
    }
    numeric[component] = coherence;

    if (coherence < 0 || coherence > 1) {
      result.addIssue({
        severity: 'error',
        fieldPath,
        message: `Coherence value out of range [0,1]: ${coherence}`,
        value: coherence,
        suggestion: 'Provide coherence as a number between 0 and 1',
        code: 'COHERENCE_OUT_OF_RANGE',
      });
    }

    if (coherence < 0.2) {
      result.addIssue({
        severity: 'warning',
        fieldPath,
        message: `Low coherence detected in ${component}: ${(coherence * 100).toFixed(1)}%`,
        value: coherence,
        suggestion: 'Consider focusing on stabilizing this biofield component',
        code: 'COHERENCE_LOW',
      });
    } else if (coherence > 0.95) {
      result.addIssue({
        severity: 'info',
        fieldPath,
        message: `Exceptionally high coherence in ${component}: ${(coherence * 100).toFixed(1)}%`,
        value: coherence,
        suggestion: 'Excellent biofield stability',
        code: 'COHERENCE_EXCEPTIONAL',
      });
    }
  }

  if (Object.keys(readings).length >= 2) {
    const overall = calculateBiofieldCoherence(
      numeric.schumannResonance ?? 0.5,
      numeric.solfeggioHarmonics ?? 0.5,
      numeric.goldenRatioAlignment ?? 0.5
    );
    result.metadata.overallCoherence = overall;
    result.metadata.coherenceLevel = coherenceLevelFor(overall, reference.coherenceLevels);
  }

  return result;
}
