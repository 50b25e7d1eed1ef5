/**
 * Safety Compliance
 *
 * Checks a session against the caller's experience-level limits and health
 * conditions. Limit breaches, out-of-level states and absolute contraindications
 * are critical; relative contraindications and excess neural load are warnings.
 */

import { getReferenceData } from '../reference/reference-loader.js';
import { getStateGraph, type ConsciousnessStateGraph } from '../state-graph/state-graph.js';
import { isExperienceLevel, type ReferenceData } from '../shared/types/reference.js';
import type { RiskLevel } from '../validation/types.js';
import { ValidationResult } from '../validation/validation-result.js';
import { estimateNeuralLoad, type NeuralLoadInput } from './neural-load.js';
import { classifyAgainstLimit, type LimitField } from './threshold-classifier.js';

/**
 * The slice of a user the safety checks need
 */
export interface SessionProfile {
  experienceLevel: string;
  healthConditions?: readonly string[];
  hoursSinceLastSession?: number;
  /** 0..1 */
  currentStressLevel?: number;
}

/**
 * Figures read from a session configuration; absent when missing or mistyped
 */
export interface SessionMeasures {
  durationMinutes?: number;
  frequencyIntensity?: number;
  gammaExposureMinutes?: number;
  consciousnessJourney?: readonly string[];
}

/** Structural slice of a NeuralProfile */
export interface ProfileLike {
  safetyProfile: { experienceLevel: string; healthConditions: readonly string[] };
}

export function sessionProfileOf(profile: ProfileLike): SessionProfile {
  return {
    experienceLevel: profile.safetyProfile.experienceLevel,
    healthConditions: [...profile.safetyProfile.healthConditions],
  };
}

/**
 * Missing required figures are NaN, which saturates their load factor
 */
export function neuralLoadInputOf(session: SessionMeasures): NeuralLoadInput {
  return {
    durationMinutes: session.durationMinutes ?? Number.NaN,
    frequencyIntensity: session.frequencyIntensity ?? Number.NaN,
    highExposureMinutes: session.gammaExposureMinutes ?? 0,
    transitionCount: session.consciousnessJourney?.length ?? Number.NaN,
  };
}

interface LimitCheck {
  field: LimitField;
  fieldPath: string;
  label: string;
  unit: string;
  value: number | undefined;
}

export function checkSafetyCompliance(
  session: SessionMeasures,
  profile: SessionProfile,
  reference: ReferenceData = getReferenceData(),
  graph: ConsciousnessStateGraph = getStateGraph()
): ValidationResult {
  const result = new ValidationResult();
  const level = profile.experienceLevel;

  if (!isExperienceLevel(level)) {
    result.addIssue({
      severity: 'critical',
      fieldPath: 'profile.experienceLevel',
      message: `Unknown experience level: ${level}`,
      value: level,
      suggestion: 'Use beginner, intermediate, advanced or expert',
      code: 'UNKNOWN_EXPERIENCE_LEVEL',
    });
  } else {
    const limits = reference.neuralLoadLimits[level];
    const checks: LimitCheck[] = [
      {
        field: 'maxSessionDurationMinutes',
        fieldPath: 'durationMinutes',
        label: 'Session duration',
        unit: ' minutes',
        value: session.durationMinutes,
      },
      {
        field: 'maxFrequencyIntensity',
        fieldPath: 'frequencyIntensity',
        label: 'Frequency intensity',
        unit: '',
        value: session.frequencyIntensity,
      },
      {
        field: 'maxGammaExposureMinutes',
        fieldPath: 'gammaExposureMinutes',
        label: 'Gamma exposure',
        unit: ' minutes',
        value: session.gammaExposureMinutes,
      },
      {
        field: 'maxStateTransitions',
        fieldPath: 'consciousnessJourney',
        label: 'State transitions',
        unit: '',
        value: session.consciousnessJourney?.length,
      },
    ];

    for (const check of checks) {
      if (check.value === undefined) continue;
      if (classifyAgainstLimit(check.value, check.field, limits) === 'danger') {
        const cap = limits[check.field];
        result.addIssue({
          severity: 'critical',
          fieldPath: check.fieldPath,
          message: `${check.label} (${check.value}${check.unit}) exceeds ${level} limit (${cap}${check.unit})`,
          value: check.value,
          suggestion: `Reduce ${check.label.toLowerCase()} to ${cap}${check.unit} or less`,
          code: 'EXPERIENCE_LIMIT_EXCEEDED',
        });
      }
    }

    (session.consciousnessJourney ?? []).forEach((state, index) => {
      if (graph.exceedsLevel(state, level)) {
        result.addIssue({
          severity: 'critical',
          fieldPath: `consciousnessJourney[${index}]`,
          message: `State ${state} requires ${graph.requiredLevelOf(state)} experience, profile is ${level}`,
          value: state,
          suggestion: `Choose from: ${[...graph.allowedStatesFor(level)].join(', ')}`,
          code: 'STATE_ABOVE_EXPERIENCE_LEVEL',
        });
      }
    });

    const load = estimateNeuralLoad(neuralLoadInputOf(session));
    if (load > limits.maxNeuralLoad) {
      result.addIssue({
        severity: 'warning',
        fieldPath: 'neuralLoad',
        message: `Neural load ${load.toFixed(2)} exceeds ${level} maximum ${limits.maxNeuralLoad}`,
        value: load,
        suggestion: 'Shorten the session, lower intensity or reduce state changes',
        code: 'NEURAL_LOAD_HIGH',
      });
    }

    result.metadata.recommendations = [
      `Use ${limits.recommendedBreakIntervalMinutes}-minute break intervals`,
      `Extend integration time by ${limits.integrationTimeMultiplier}x`,
    ];
  }

  for (const condition of profile.healthConditions ?? []) {
    if (reference.contraindications.absolute.includes(condition)) {
      result.addIssue({
        severity: 'critical',
        fieldPath: 'profile.healthConditions',
        message: `Absolute contraindication: ${condition}`,
        value: condition,
        suggestion: 'Do not run entrainment sessions; consult a healthcare provider',
        code: 'ABSOLUTE_CONTRAINDICATION',
      });
    } else if (reference.contraindications.relative.includes(condition)) {
      result.addIssue({
        severity: 'warning',
        fieldPath: 'profile.healthConditions',
        message: `Relative contraindication: ${condition} - proceed with caution`,
        value: condition,
        suggestion: 'Lower intensity, shorten the session and monitor comfort closely',
        code: 'RELATIVE_CONTRAINDICATION',
      });
    }
  }

  result.metadata.riskLevel = riskLevelOf(result);
  return result;
}

export function riskLevelOf(result: ValidationResult): RiskLevel {
  const counts = result.counts;
  if (counts.critical > 0) return 'high_risk';
  if (counts.error > 0) return 'moderate_risk';
  if (counts.warning > 0) return 'low_risk';
  return 'minimal_risk';
}
