/**
 * Profile Factory
 *
 * Conservative starting profiles for new users.
 */

import { createHash } from 'crypto';
import type { ExperienceLevel } from '../shared/types/reference.js';
import {
  PROFILE_KIND,
  PROFILE_SCHEMA_VERSION,
  type BrainwavePreference,
  type ConsciousnessPreference,
  type NeuralProfile,
} from './profile-schema.js';

const STARTER_BANDS = ['alpha', 'theta', 'low_beta'] as const;
const STARTER_STATES = ['neutral', 'deep_relaxation', 'meditative_awareness'] as const;

/**
 * 16 hex chars of sha256(name_timestamp)
 */
export function generateProfileId(name: string, now: Date = new Date()): string {
  return createHash('sha256').update(`${name}_${now.toISOString()}`, 'utf-8').digest('hex').slice(0, 16);
}

export function createDefaultProfile(
  name: string,
  experienceLevel: ExperienceLevel = 'beginner',
  now: Date = new Date()
): NeuralProfile {
  const timestamp = now.toISOString();

  const brainwavePreferences: Record<string, BrainwavePreference> = {};
  for (const band of STARTER_BANDS) {
    brainwavePreferences[band] = {
      frequencyRange: band,
      preferredIntensity: 0.3,
      toleranceRange: [0.1, 0.5],
      responseQuality: 'moderate',
      notes: 'Default setting - to be personalized through use',
    };
  }

  const consciousnessPreferences: Record<string, ConsciousnessPreference> = {};
  for (const state of STARTER_STATES) {
    consciousnessPreferences[state] = {
      stateName: state,
      affinityLevel: 0.7,
      optimalDurationMinutes: 15,
      preparationTimeNeeded: 5,
      integrationTimeNeeded: 10,
      responseNotes: 'Default setting',
    };
  }

  return {
    kind: PROFILE_KIND,
    schemaVersion: PROFILE_SCHEMA_VERSION,
    profileId: generateProfileId(name, now),
    name,
    profileType: 'beginner',
    createdDate: timestamp,
    lastUpdated: timestamp,

    dominantBrainwavePattern: 'alpha',
    brainwavePreferences,
    neuralSensitivity: 'moderate',
    consciousnessPreferences,

    biofieldProfile: {
      schumannResonanceSensitivity: 0.5,
      solfeggioResponsiveness: { '396_hz': 0.5, '528_hz': 0.6, '852_hz': 0.4 },
      goldenRatioHarmonyLevel: 0.5,
      coherenceBaseline: 0.5,
      fieldStability: 'stable',
      optimalCoherenceRange: [0.4, 0.7],
    },
    safetyProfile: {
      experienceLevel,
      healthConditions: [],
      medications: [],
      contraindications: [],
      comfortPreferences: { preferredVolume: 0.6, visualSensitivity: 'moderate', breakFrequency: 15 },
      emergencyContacts: [],
      specialConsiderations: [],
    },
    sessionHistory: {
      totalSessions: 0,
      totalHours: 0,
      favoriteStates: [],
      challengingStates: [],
      averageComfortLevel: 0.8,
      progressMetrics: { comfortTrend: 0, effectivenessRating: 0, sessionCompletionRate: 0 },
      recentSessionOutcomes: [],
    },

    preferredSessionDuration: 20,
    optimalTimeOfDay: 'evening',
    environmentalPreferences: {
      ambientLighting: 'dim',
      backgroundSounds: 'minimal',
      temperaturePreference: 'comfortable',
    },
    integrationPreferences: { journaling: true, meditation: true, restTime: true },
  };
}
