/**
 * Safety Threshold Classifier
 *
 * Maps a scalar into safe / warning / danger. Bands are upper-inclusive and
 * evaluated safe → warning → danger, so a boundary value lands in the safer band.
 * Anything that fits no band (above every bound, NaN) is danger.
 */

import {
  EXPERIENCE_LEVELS,
  type ExperienceLevel,
  type NeuralLoadLimit,
  type SafetyThreshold,
} from '../shared/types/reference.js';

export type SafetyBand = 'safe' | 'warning' | 'danger';

export const SAFETY_BANDS: readonly SafetyBand[] = ['safe', 'warning', 'danger'];

/** NeuralLoadLimit fields that act as caps on a session value */
export type LimitField = Exclude<keyof NeuralLoadLimit, 'integrationTimeMultiplier'>;

/** Fields that must not shrink as experience grows */
export const PERMISSIVE_LIMIT_FIELDS: readonly LimitField[] = [
  'maxSessionDurationMinutes',
  'maxFrequencyIntensity',
  'maxGammaExposureMinutes',
  'maxStateTransitions',
  'maxNeuralLoad',
  'recommendedBreakIntervalMinutes',
];

export function classifyValue(value: number, threshold: SafetyThreshold): SafetyBand {
  const bands: Array<[SafetyBand, readonly [number, number]]> = [
    ['safe', threshold.safeRange],
    ['warning', threshold.warningRange],
    ['danger', threshold.dangerRange],
  ];

  for (const [band, [lower, upper]] of bands) {
    const fits = threshold.direction === 'ascending' ? value <= upper : value >= lower;
    if (fits) return band;
  }
  return 'danger';
}

/**
 * Two-band threshold built from one experience-level cap: at or under the cap is safe
 */
export function thresholdFromLimit(field: LimitField, limit: NeuralLoadLimit): SafetyThreshold {
  const cap = limit[field];
  return {
    parameterName: field,
    direction: 'ascending',
    domain: [0, Number.POSITIVE_INFINITY],
    safeRange: [0, cap],
    warningRange: [cap, cap],
    dangerRange: [cap, Number.POSITIVE_INFINITY],
    units: '',
    description: `Experience-level cap for ${field}`,
    monitoringFrequency: 'continuous',
  };
}

export function classifyAgainstLimit(value: number, field: LimitField, limit: NeuralLoadLimit): SafetyBand {
  return classifyValue(value, thresholdFromLimit(field, limit));
}

/**
 * Problems with a threshold's band layout; empty when well-formed
 */
export function verifyThresholdTable(name: string, threshold: SafetyThreshold): string[] {
  const problems: string[] = [];
  const [domainMin, domainMax] = threshold.domain;
  const ordered =
    threshold.direction === 'ascending'
      ? [threshold.safeRange, threshold.warningRange, threshold.dangerRange]
      : [threshold.dangerRange, threshold.warningRange, threshold.safeRange];

  for (const [lower, upper] of ordered) {
    if (lower > upper) {
      problems.push(`${name}: band [${lower}, ${upper}] is inverted`);
    }
    if (lower < domainMin || upper > domainMax) {
      problems.push(`${name}: band [${lower}, ${upper}] leaves domain [${domainMin}, ${domainMax}]`);
    }
  }

  for (let i = 0; i < ordered.length - 1; i++) {
    if (ordered[i][1] > ordered[i + 1][0]) {
      problems.push(`${name}: band ending at ${ordered[i][1]} overlaps band starting at ${ordered[i + 1][0]}`);
    }
  }

  return problems;
}

export interface MonotonicityViolation {
  field: LimitField;
  lowerLevel: ExperienceLevel;
  higherLevel: ExperienceLevel;
  lowerValue: number;
  higherValue: number;
}

/**
 * Every permissive cap of a higher level must be >= the same cap of every lower level
 */
export function verifyLimitMonotonicity(
  limits: Readonly<Record<ExperienceLevel, NeuralLoadLimit>>
): MonotonicityViolation[] {
  const violations: MonotonicityViolation[] = [];

  EXPERIENCE_LEVELS.forEach((lowerLevel, lowerIndex) => {
    for (const higherLevel of EXPERIENCE_LEVELS.slice(lowerIndex + 1)) {
      for (const field of PERMISSIVE_LIMIT_FIELDS) {
        const lowerValue = limits[lowerLevel][field];
        const higherValue = limits[higherLevel][field];
        if (higherValue < lowerValue) {
          violations.push({ field, lowerLevel, higherLevel, lowerValue, higherValue });
        }
      }
    }
  });

  return violations;
}
