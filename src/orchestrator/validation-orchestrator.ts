/**
 * Validation Orchestrator
 *
 * Runs every check over a session configuration in one pass and collects all
 * issues; nothing fails fast. Order:
 *   1. schema
 *   2. consciousness journey, pair by pair
 *   3. global safety thresholds (warning band → info, danger band → warning)
 *   4. experience-level compliance, when a profile is given
 *   5. neural load, always attached to metadata
 *
 * Inputs are read, never modified.
 *
 * Usage:
 *   const result = getValidationOrchestrator().validateSessionConfig(config, profile);
 *   if (!result.isSafe) { ... }
 */

import { VALIDATION_STRICT_MODE } from '../shared/config.js';
import { EngineLogger } from '../shared/utils/engine-logger.js';
import { getReferenceData } from '../reference/reference-loader.js';
import { createStateGraph, getStateGraph, type ConsciousnessStateGraph } from '../state-graph/state-graph.js';
import { validateJourney } from '../state-graph/transition-validator.js';
import { isExperienceLevel, type ReferenceData } from '../shared/types/reference.js';
import { estimateNeuralLoad, neuralLoadFactors } from '../safety/neural-load.js';
import { classifyValue } from '../safety/threshold-classifier.js';
import {
  checkSafetyCompliance,
  neuralLoadInputOf,
  riskLevelOf,
  sessionProfileOf,
  type SessionMeasures,
  type SessionProfile,
} from '../safety/safety-compliance.js';
import { calculateBiofieldCoherence, coherenceLevelFor } from '../validation/frequency-validator.js';
import { isPlainObject, validateAgainstSchema } from '../validation/schema-validator.js';
import { PRESET_CONFIG_SCHEMA, SESSION_CONFIG_SCHEMA } from '../validation/session-schemas.js';
import { ValidationResult } from '../validation/validation-result.js';
import type { NeuralProfile } from '../profile/profile-schema.js';

/** Journey checks without a profile use the most cautious level */
const DEFAULT_JOURNEY_LEVEL = 'beginner';
const DEFAULT_BIOFIELD_COMPONENT = 0.5;

export interface SessionValidationOptions {
  /** Upgrade journey warnings to errors; defaults to VALIDATION_STRICT_MODE */
  strictMode?: boolean;
}

interface GlobalCheck {
  threshold: string;
  fieldPath: string;
  value: number | undefined;
}

/**
 * Pull the figures the safety checks need out of an unchecked configuration
 */
export function readSessionMeasures(config: unknown): SessionMeasures {
  if (!isPlainObject(config)) return {};

  const finite = (value: unknown): number | undefined =>
    typeof value === 'number' && Number.isFinite(value) ? value : undefined;
  const journey = config.consciousnessJourney;

  return {
    durationMinutes: finite(config.durationMinutes),
    frequencyIntensity: finite(config.frequencyIntensity),
    gammaExposureMinutes: finite(config.gammaExposureMinutes),
    consciousnessJourney:
      Array.isArray(journey) && journey.every((state): state is string => typeof state === 'string')
        ? journey
        : undefined,
  };
}

export class ValidationOrchestrator {
  constructor(
    private readonly reference: ReferenceData = getReferenceData(),
    private readonly graph: ConsciousnessStateGraph = getStateGraph()
  ) {}

  validateSessionConfig(
    config: unknown,
    profile?: SessionProfile | NeuralProfile,
    options: SessionValidationOptions = {}
  ): ValidationResult {
    const result = this.runSessionChecks(config, profile, options);
    this.logResult('session', result);
    return result;
  }

  /**
   * Preset fields, then the nested session under 'baseConfiguration', then a
   * warning when the session is heavier than the preset's level allows
   */
  validatePresetConfig(preset: unknown, options: SessionValidationOptions = {}): ValidationResult {
    const result = new ValidationResult();
    result.addIssues(validateAgainstSchema(preset, PRESET_CONFIG_SCHEMA));

    if (isPlainObject(preset) && isPlainObject(preset.baseConfiguration)) {
      const base = preset.baseConfiguration;
      const session = this.runSessionChecks(base, undefined, options);
      result.merge(session, 'baseConfiguration');
      result.metadata.neuralLoad = session.metadata.neuralLoad;

      const level = preset.experienceLevel;
      const load = estimateNeuralLoad(neuralLoadInputOf(readSessionMeasures(base)));
      if (isExperienceLevel(level)) {
        const maxLoad = this.reference.neuralLoadLimits[level].maxNeuralLoad;
        if (load > maxLoad) {
          result.addIssue({
            severity: 'warning',
            fieldPath: 'experienceLevel',
            message: `Preset complexity (${load.toFixed(2)}) may be too high for ${level} users (max ${maxLoad})`,
            value: load,
            suggestion: 'Consider reducing complexity or changing experience level requirement',
            code: 'PRESET_TOO_DEMANDING',
          });
        }
      }
    }

    result.metadata.riskLevel = riskLevelOf(result);
    this.logResult('preset', result);
    return result;
  }

  private runSessionChecks(
    config: unknown,
    profile: SessionProfile | NeuralProfile | undefined,
    options: SessionValidationOptions
  ): ValidationResult {
    const strictMode = options.strictMode ?? VALIDATION_STRICT_MODE;
    const result = new ValidationResult();
    const measures = readSessionMeasures(config);
    const sessionProfile = profile === undefined ? undefined : 'safetyProfile' in profile ? sessionProfileOf(profile) : profile;

    // 1. schema
    result.addIssues(validateAgainstSchema(config, SESSION_CONFIG_SCHEMA));

    // 2. journey
    if (measures.consciousnessJourney) {
      const level =
        sessionProfile && isExperienceLevel(sessionProfile.experienceLevel)
          ? sessionProfile.experienceLevel
          : DEFAULT_JOURNEY_LEVEL;
      result.merge(validateJourney(measures.consciousnessJourney, level, { strictMode, graph: this.graph }));
    }

    // 3. global thresholds
    const loadInput = neuralLoadInputOf(measures);
    const neuralLoad = estimateNeuralLoad(loadInput);
    this.checkGlobalThresholds(result, [
      { threshold: 'session_duration', fieldPath: 'durationMinutes', value: measures.durationMinutes },
      { threshold: 'frequency_intensity', fieldPath: 'frequencyIntensity', value: measures.frequencyIntensity },
      { threshold: 'gamma_exposure_duration', fieldPath: 'gammaExposureMinutes', value: measures.gammaExposureMinutes },
      { threshold: 'state_transition_rate', fieldPath: 'consciousnessJourney', value: measures.consciousnessJourney?.length },
      { threshold: 'neural_load_index', fieldPath: 'neuralLoad', value: neuralLoad },
    ]);

    // 4. profile compliance
    if (sessionProfile) {
      const compliance = checkSafetyCompliance(measures, sessionProfile, this.reference, this.graph);
      result.merge(compliance);
      result.metadata.experienceLevel = sessionProfile.experienceLevel;
      result.metadata.recommendations = compliance.metadata.recommendations ?? [];
      this.attachProfileTags(result, config, measures, profile);
    }

    // 5. neural load
    result.metadata.neuralLoad = neuralLoad;
    result.metadata.neuralLoadFactors = neuralLoadFactors(loadInput);
    result.metadata.riskLevel = riskLevelOf(result);
    return result;
  }

  private checkGlobalThresholds(result: ValidationResult, checks: readonly GlobalCheck[]): void {
    for (const check of checks) {
      const threshold = this.reference.safetyThresholds[check.threshold];
      if (check.value === undefined || !threshold) continue;

      const band = classifyValue(check.value, threshold);
      if (band === 'safe') continue;

      result.addIssue({
        severity: band === 'danger' ? 'warning' : 'info',
        fieldPath: check.fieldPath,
        message: `${threshold.parameterName} ${check.value} ${threshold.units} is in the ${band} range`,
        value: check.value,
        suggestion: `Keep ${threshold.parameterName.toLowerCase()} within ${threshold.safeRange[0]}-${threshold.safeRange[1]} ${threshold.units}`,
        code: band === 'danger' ? 'THRESHOLD_DANGER' : 'THRESHOLD_WARNING',
      });
    }
  }

  /**
   * coherenceLevel from the biofield configuration (profile baseline when absent);
   * brainwaveRange from the journey's final state (profile pattern when absent)
   */
  private attachProfileTags(
    result: ValidationResult,
    config: unknown,
    measures: SessionMeasures,
    profile: SessionProfile | NeuralProfile | undefined
  ): void {
    const neuralProfile = profile !== undefined && 'safetyProfile' in profile ? profile : undefined;
    const biofield = isPlainObject(config) && isPlainObject(config.biofieldConfiguration) ? config.biofieldConfiguration : undefined;

    let coherence: number;
    if (biofield) {
      const component = (value: unknown): number =>
        typeof value === 'number' && Number.isFinite(value) ? value : DEFAULT_BIOFIELD_COMPONENT;
      coherence = calculateBiofieldCoherence(
        component(biofield.schumannAlignment),
        component(biofield.solfeggioIntegration),
        component(biofield.goldenRatioHarmonics)
      );
    } else {
      coherence = neuralProfile?.biofieldProfile.coherenceBaseline ?? DEFAULT_BIOFIELD_COMPONENT;
    }
    result.metadata.coherenceLevel = coherenceLevelFor(coherence, this.reference.coherenceLevels);

    const journey = measures.consciousnessJourney ?? [];
    const finalState = journey.length > 0 ? this.graph.getState(journey[journey.length - 1]) : undefined;
    const brainwaveRange = finalState?.dominantFrequency ?? neuralProfile?.dominantBrainwavePattern;
    if (brainwaveRange !== undefined) {
      result.metadata.brainwaveRange = brainwaveRange;
    }
  }

  private logResult(context: string, result: ValidationResult): void {
    for (const issue of result.criticalIssues) {
      EngineLogger.criticalIssue(issue.fieldPath, issue.code, issue.message);
    }
    EngineLogger.validationCompleted(context, {
      isValid: result.isValid,
      isSafe: result.isSafe,
      overallScore: result.overallScore,
      issueCount: result.issues.length,
    });
  }
}

// Singleton instance
let orchestratorInstance: ValidationOrchestrator | null = null;

/**
 * Get the orchestrator over the bundled reference tables
 */
export function getValidationOrchestrator(): ValidationOrchestrator {
  if (!orchestratorInstance) {
    orchestratorInstance = new ValidationOrchestrator();
  }
  return orchestratorInstance;
}

export function createValidationOrchestrator(
  reference: ReferenceData,
  graph?: ConsciousnessStateGraph
): ValidationOrchestrator {
  return new ValidationOrchestrator(reference, graph ?? createStateGraph(reference));
}

export function validateSessionConfig(
  config: unknown,
  profile?: SessionProfile | NeuralProfile,
  options?: SessionValidationOptions
): ValidationResult {
  return getValidationOrchestrator().validateSessionConfig(config, profile, options);
}

export function validatePresetConfig(preset: unknown, options?: SessionValidationOptions): ValidationResult {
  return getValidationOrchestrator().validatePresetConfig(preset, options);
}
