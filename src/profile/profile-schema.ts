/**
 * Neural Profile Schema
 *
 * A profile is a tagged, versioned record. Serialized profiles are checked
 * against this shape once, at import; inside the engine they are trusted.
 */

import { z } from 'zod';

export const PROFILE_KIND = 'neural-profile';
export const PROFILE_SCHEMA_VERSION = 2;

export const PROFILE_TYPES = ['beginner', 'personalized', 'therapeutic', 'advanced', 'research'] as const;
export const SENSITIVITY_LEVELS = ['very_low', 'low', 'moderate', 'high', 'very_high'] as const;
export const RESPONSE_QUALITIES = ['excellent', 'good', 'moderate', 'poor'] as const;
export const FIELD_STABILITIES = ['stable', 'variable', 'sensitive'] as const;
export const TIMES_OF_DAY = ['morning', 'afternoon', 'evening', 'night'] as const;

const UnitRange = z.tuple([z.number(), z.number()]);
const PreferenceValue = z.union([z.string(), z.number(), z.boolean()]);

export const BrainwavePreferenceSchema = z.object({
  /** Brainwave band key, e.g. 'alpha' */
  frequencyRange: z.string(),
  preferredIntensity: z.number(),
  toleranceRange: UnitRange,
  responseQuality: z.enum(RESPONSE_QUALITIES),
  notes: z.string().optional(),
});

export const ConsciousnessPreferenceSchema = z.object({
  stateName: z.string(),
  affinityLevel: z.number(),
  optimalDurationMinutes: z.number(),
  preparationTimeNeeded: z.number(),
  integrationTimeNeeded: z.number(),
  responseNotes: z.string().optional(),
});

export const BiofieldProfileSchema = z.object({
  schumannResonanceSensitivity: z.number(),
  /** Solfeggio key (e.g. '528_hz') → responsiveness 0..1 */
  solfeggioResponsiveness: z.record(z.string(), z.number()),
  goldenRatioHarmonyLevel: z.number(),
  coherenceBaseline: z.number(),
  fieldStability: z.enum(FIELD_STABILITIES),
  optimalCoherenceRange: UnitRange,
});

export const SafetyProfileSchema = z.object({
  experienceLevel: z.string(),
  healthConditions: z.array(z.string()),
  medications: z.array(z.string()),
  contraindications: z.array(z.string()),
  comfortPreferences: z.record(z.string(), PreferenceValue),
  emergencyContacts: z.array(z.record(z.string(), z.string())),
  specialConsiderations: z.array(z.string()),
});

export const SessionOutcomeRecordSchema = z.object({
  date: z.string(),
  durationMinutes: z.number(),
  comfortLevel: z.number(),
  effectiveness: z.number(),
  statesExplored: z.array(z.string()),
  notes: z.string().optional(),
});

export const SessionHistorySchema = z.object({
  totalSessions: z.number().int().nonnegative(),
  totalHours: z.number().nonnegative(),
  favoriteStates: z.array(z.string()),
  challengingStates: z.array(z.string()),
  averageComfortLevel: z.number(),
  progressMetrics: z.record(z.string(), z.number()),
  recentSessionOutcomes: z.array(SessionOutcomeRecordSchema),
});

export const NeuralProfileSchema = z.object({
  kind: z.literal(PROFILE_KIND),
  schemaVersion: z.literal(PROFILE_SCHEMA_VERSION),
  profileId: z.string(),
  name: z.string(),
  profileType: z.enum(PROFILE_TYPES),
  createdDate: z.string().datetime(),
  lastUpdated: z.string().datetime(),

  dominantBrainwavePattern: z.string(),
  brainwavePreferences: z.record(z.string(), BrainwavePreferenceSchema),
  neuralSensitivity: z.enum(SENSITIVITY_LEVELS),
  consciousnessPreferences: z.record(z.string(), ConsciousnessPreferenceSchema),

  biofieldProfile: BiofieldProfileSchema,
  safetyProfile: SafetyProfileSchema,
  sessionHistory: SessionHistorySchema,

  preferredSessionDuration: z.number(),
  optimalTimeOfDay: z.enum(TIMES_OF_DAY),
  environmentalPreferences: z.record(z.string(), PreferenceValue).optional(),
  integrationPreferences: z.record(z.string(), z.boolean()).optional(),
});

export type ProfileType = (typeof PROFILE_TYPES)[number];
export type TimeOfDay = (typeof TIMES_OF_DAY)[number];
export type BrainwavePreference = z.infer<typeof BrainwavePreferenceSchema>;
export type ConsciousnessPreference = z.infer<typeof ConsciousnessPreferenceSchema>;
export type BiofieldProfile = z.infer<typeof BiofieldProfileSchema>;
export type SafetyProfile = z.infer<typeof SafetyProfileSchema>;
export type SessionOutcomeRecord = z.infer<typeof SessionOutcomeRecordSchema>;
export type SessionHistory = z.infer<typeof SessionHistorySchema>;
export type NeuralProfile = z.infer<typeof NeuralProfileSchema>;
