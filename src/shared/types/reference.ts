/**
 * Reference Data - Type Definitions
 *
 * Static tables consumed by the engine: brainwave bands, consciousness states,
 * transitions, safety thresholds and per-experience-level limits.
 * Single Source of Truth: settings/reference-data.json
 */

/** Experience levels, least permissive first */
export const EXPERIENCE_LEVELS = ['beginner', 'intermediate', 'advanced', 'expert'] as const;

export type ExperienceLevel = (typeof EXPERIENCE_LEVELS)[number];

export function isExperienceLevel(value: unknown): value is ExperienceLevel {
  return typeof value === 'string' && (EXPERIENCE_LEVELS as readonly string[]).includes(value);
}

/** Position of a level in EXPERIENCE_LEVELS, -1 when unknown */
export function experienceLevelIndex(level: string): number {
  return (EXPERIENCE_LEVELS as readonly string[]).indexOf(level);
}

export type TransitionDifficulty = 'easy' | 'moderate' | 'challenging' | 'advanced';

export type NumericRange = readonly [number, number];

export interface BrainwaveBand {
  name: string;
  minFrequency: number;
  maxFrequency: number;
  peakFrequency: number;
  description: string;
  qualities: readonly string[];
  cautions: readonly string[];
}

export interface ConsciousnessState {
  name: string;
  description: string;
  /** Brainwave band key, e.g. 'alpha' */
  dominantFrequency: string;
  frequencyRange: NumericRange;
  qualities: readonly string[];
  typicalDurationMinutes: NumericRange;
  preparationNeeded: boolean;
  integrationNeeded: boolean;
  experienceLevelRequired: ExperienceLevel;
  safetyConsiderations: readonly string[];
}

export interface DepthLevel {
  depth: number;
  name: string;
  states: readonly string[];
  safety: string;
}

export interface StateTransition {
  from: string;
  to: string;
  transitionTimeMinutes: NumericRange;
  difficulty: TransitionDifficulty;
  method: string;
  preparationNeeded: boolean;
  safetyNotes: readonly string[];
}

/**
 * Ascending thresholds get less safe as the value grows.
 * Descending ones (comfort scores) get less safe as it shrinks.
 */
export type ThresholdDirection = 'ascending' | 'descending';

export interface SafetyThreshold {
  parameterName: string;
  direction: ThresholdDirection;
  /** Global [min, max] of the parameter */
  domain: NumericRange;
  safeRange: NumericRange;
  warningRange: NumericRange;
  dangerRange: NumericRange;
  units: string;
  description: string;
  monitoringFrequency: 'continuous' | 'frequent' | 'periodic';
}

export interface NeuralLoadLimit {
  maxSessionDurationMinutes: number;
  maxFrequencyIntensity: number;
  maxGammaExposureMinutes: number;
  maxStateTransitions: number;
  maxNeuralLoad: number;
  recommendedBreakIntervalMinutes: number;
  /** Scales integration time; shrinks as experience grows */
  integrationTimeMultiplier: number;
}

export interface Contraindications {
  absolute: readonly string[];
  relative: readonly string[];
  precautions: readonly string[];
}

export interface CoherenceLevel {
  level: string;
  range: NumericRange;
}

export interface SchumannMode {
  name: string;
  frequency: number;
  modeNumber: number;
}

export interface SolfeggioFrequency {
  frequency: number;
  noteName: string;
  healingIntention: string;
}

export interface GoldenRatioHarmonic {
  name: string;
  frequency: number;
  ratioPower: number;
}

export interface ReferenceData {
  version: string;
  brainwaveBands: Readonly<Record<string, BrainwaveBand>>;
  consciousnessStates: Readonly<Record<string, ConsciousnessState>>;
  depthLevels: readonly DepthLevel[];
  experienceLevelStates: Readonly<Record<ExperienceLevel, readonly string[]>>;
  transitions: readonly StateTransition[];
  safetyThresholds: Readonly<Record<string, SafetyThreshold>>;
  neuralLoadLimits: Readonly<Record<ExperienceLevel, NeuralLoadLimit>>;
  contraindications: Contraindications;
  coherenceLevels: readonly CoherenceLevel[];
  schumannModes: Readonly<Record<string, SchumannMode>>;
  solfeggioFrequencies: Readonly<Record<string, SolfeggioFrequency>>;
  goldenRatioHarmonics: Readonly<Record<string, GoldenRatioHarmonic>>;
}
