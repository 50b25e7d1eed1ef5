/**
 * Reference Data Schemas
 *
 * zod shapes for settings/reference-data.json, checked once when the tables load.
 */

import { z } from 'zod';
import {
  EXPERIENCE_LEVELS,
  type BrainwaveBand,
  type CoherenceLevel,
  type ConsciousnessState,
  type DepthLevel,
  type NeuralLoadLimit,
  type ReferenceData,
  type SafetyThreshold,
  type StateTransition,
} from '../shared/types/reference.js';

const RangeSchema = z.tuple([z.number(), z.number()]);

export const BrainwaveBandSchema: z.ZodType<BrainwaveBand> = z.object({
  name: z.string(),
  minFrequency: z.number().nonnegative(),
  maxFrequency: z.number().positive(),
  peakFrequency: z.number().nonnegative(),
  description: z.string(),
  qualities: z.array(z.string()),
  cautions: z.array(z.string()),
});

export const ConsciousnessStateSchema: z.ZodType<ConsciousnessState> = z.object({
  name: z.string(),
  description: z.string(),
  dominantFrequency: z.string(),
  frequencyRange: RangeSchema,
  qualities: z.array(z.string()),
  typicalDurationMinutes: RangeSchema,
  preparationNeeded: z.boolean(),
  integrationNeeded: z.boolean(),
  experienceLevelRequired: z.enum(EXPERIENCE_LEVELS),
  safetyConsiderations: z.array(z.string()),
});

export const DepthLevelSchema: z.ZodType<DepthLevel> = z.object({
  depth: z.number().int().min(1).max(5),
  name: z.string(),
  states: z.array(z.string()),
  safety: z.string(),
});

export const StateTransitionSchema: z.ZodType<StateTransition> = z.object({
  from: z.string(),
  to: z.string(),
  transitionTimeMinutes: RangeSchema,
  difficulty: z.enum(['easy', 'moderate', 'challenging', 'advanced']),
  method: z.string(),
  preparationNeeded: z.boolean(),
  safetyNotes: z.array(z.string()),
});

export const SafetyThresholdSchema: z.ZodType<SafetyThreshold> = z.object({
  parameterName: z.string(),
  direction: z.enum(['ascending', 'descending']),
  domain: RangeSchema,
  safeRange: RangeSchema,
  warningRange: RangeSchema,
  dangerRange: RangeSchema,
  units: z.string(),
  description: z.string(),
  monitoringFrequency: z.enum(['continuous', 'frequent', 'periodic']),
});

export const NeuralLoadLimitSchema: z.ZodType<NeuralLoadLimit> = z.object({
  maxSessionDurationMinutes: z.number().positive(),
  maxFrequencyIntensity: z.number().min(0).max(1),
  maxGammaExposureMinutes: z.number().nonnegative(),
  maxStateTransitions: z.number().int().positive(),
  maxNeuralLoad: z.number().min(0).max(1),
  recommendedBreakIntervalMinutes: z.number().positive(),
  integrationTimeMultiplier: z.number().positive(),
});

export const CoherenceLevelSchema: z.ZodType<CoherenceLevel> = z.object({
  level: z.string(),
  range: RangeSchema,
});

const byExperienceLevel = <T>(schema: z.ZodType<T>) =>
  z.object({
    beginner: schema,
    intermediate: schema,
    advanced: schema,
    expert: schema,
  });

export const ReferenceDataSchema: z.ZodType<ReferenceData> = z.object({
  version: z.string().regex(/^\d+\.\d+\.\d+$/),
  brainwaveBands: z.record(z.string(), BrainwaveBandSchema),
  consciousnessStates: z.record(z.string(), ConsciousnessStateSchema),
  depthLevels: z.array(DepthLevelSchema),
  experienceLevelStates: byExperienceLevel(z.array(z.string())),
  transitions: z.array(StateTransitionSchema),
  safetyThresholds: z.record(z.string(), SafetyThresholdSchema),
  neuralLoadLimits: byExperienceLevel(NeuralLoadLimitSchema),
  contraindications: z.object({
    absolute: z.array(z.string()),
    relative: z.array(z.string()),
    precautions: z.array(z.string()),
  }),
  coherenceLevels: z.array(CoherenceLevelSchema).min(1),
  schumannModes: z.record(
    z.string(),
    z.object({ name: z.string(), frequency: z.number().positive(), modeNumber: z.number().int() })
  ),
  solfeggioFrequencies: z.record(
    z.string(),
    z.object({ frequency: z.number().positive(), noteName: z.string(), healingIntention: z.string() })
  ),
  goldenRatioHarmonics: z.record(
    z.string(),
    z.object({ name: z.string(), frequency: z.number().positive(), ratioPower: z.number().int() })
  ),
});

/**
 * Cross-table references the shape check cannot see
 */
export function findDanglingReferences(data: ReferenceData): string[] {
  const problems: string[] = [];
  const states = new Set(Object.keys(data.consciousnessStates));

  for (const [id, state] of Object.entries(data.consciousnessStates)) {
    if (!(state.dominantFrequency in data.brainwaveBands)) {
      problems.push(`consciousnessStates.${id}.dominantFrequency: unknown band '${state.dominantFrequency}'`);
    }
  }

  data.transitions.forEach((transition, index) => {
    for (const endpoint of [transition.from, transition.to]) {
      if (!states.has(endpoint)) {
        problems.push(`transitions[${index}]: unknown state '${endpoint}'`);
      }
    }
  });

  for (const level of EXPERIENCE_LEVELS) {
    for (const state of data.experienceLevelStates[level]) {
      if (!states.has(state)) {
        problems.push(`experienceLevelStates.${level}: unknown state '${state}'`);
      }
    }
  }

  for (const depthLevel of data.depthLevels) {
    for (const state of depthLevel.states) {
      if (!states.has(state)) {
        problems.push(`depthLevels[${depthLevel.depth}]: unknown state '${state}'`);
      }
    }
  }

  return problems;
}
