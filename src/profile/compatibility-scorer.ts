/**
 * Profile Compatibility Scorer
 *
 * Five sub-scores in [0,1], combined with fixed weights:
 *   brainwave preferences   0.25
 *   consciousness states    0.25
 *   biofield resonance      0.20
 *   session preferences     0.15
 *   safety compatibility    0.15
 *
 * Neither profile is modified.
 */

import { experienceLevelIndex } from '../shared/types/reference.js';
import type { NeuralProfile } from './profile-schema.js';

export const COMPATIBILITY_WEIGHTS = {
  brainwavePreferences: 0.25,
  consciousnessStates: 0.25,
  biofieldResonance: 0.2,
  sessionPreferences: 0.15,
  safetyCompatibility: 0.15,
} as const;

/** Applied to the safety sub-score when either profile carries a health condition */
export const HEALTH_CONDITION_PENALTY = 0.8;

const DURATION_SPAN_MINUTES = 60;
const LEVEL_SPAN = 4;

export interface CompatibilityBreakdown {
  overall: number;
  brainwavePreferences: number;
  consciousnessStates: number;
  biofieldResonance: number;
  sessionPreferences: number;
  safetyCompatibility: number;
}

/**
 * Mean of 1 - |a - b| over keys present in both maps; 0 when none are shared
 */
function sharedSimilarity(a: Record<string, number>, b: Record<string, number>): number {
  const shared = Object.keys(a).filter((key) => key in b);
  if (shared.length === 0) {
    return 0;
  }
  const total = shared.reduce((sum, key) => sum + (1 - Math.abs(a[key] - b[key])), 0);
  return total / shared.length;
}

function closeness(a: number, b: number): number {
  return Math.max(0, 1 - Math.abs(a - b));
}

/** A missing level sits at the bottom of the scale */
function levelIndex(level: string): number {
  return Math.max(0, experienceLevelIndex(level));
}

export class ProfileCompatibilityScorer {
  score(a: NeuralProfile, b: NeuralProfile): CompatibilityBreakdown {
    const breakdown = {
      brainwavePreferences: this.brainwaveSimilarity(a, b),
      consciousnessStates: this.stateSimilarity(a, b),
      biofieldResonance: this.biofieldSimilarity(a, b),
      sessionPreferences: this.sessionSimilarity(a, b),
      safetyCompatibility: this.safetyCompatibility(a, b),
    };

    const overall =
      COMPATIBILITY_WEIGHTS.brainwavePreferences * breakdown.brainwavePreferences +
      COMPATIBILITY_WEIGHTS.consciousnessStates * breakdown.consciousnessStates +
      COMPATIBILITY_WEIGHTS.biofieldResonance * breakdown.biofieldResonance +
      COMPATIBILITY_WEIGHTS.sessionPreferences * breakdown.sessionPreferences +
      COMPATIBILITY_WEIGHTS.safetyCompatibility * breakdown.safetyCompatibility;

    return { overall, ...breakdown };
  }

  brainwaveSimilarity(a: NeuralProfile, b: NeuralProfile): number {
    return sharedSimilarity(
      mapValues(a.brainwavePreferences, (pref) => pref.preferredIntensity),
      mapValues(b.brainwavePreferences, (pref) => pref.preferredIntensity)
    );
  }

  stateSimilarity(a: NeuralProfile, b: NeuralProfile): number {
    return sharedSimilarity(
      mapValues(a.consciousnessPreferences, (pref) => pref.affinityLevel),
      mapValues(b.consciousnessPreferences, (pref) => pref.affinityLevel)
    );
  }

  biofieldSimilarity(a: NeuralProfile, b: NeuralProfile): number {
    const fa = a.biofieldProfile;
    const fb = b.biofieldProfile;
    return (
      (closeness(fa.coherenceBaseline, fb.coherenceBaseline) +
        closeness(fa.schumannResonanceSensitivity, fb.schumannResonanceSensitivity) +
        closeness(fa.goldenRatioHarmonyLevel, fb.goldenRatioHarmonyLevel)) /
      3
    );
  }

  sessionSimilarity(a: NeuralProfile, b: NeuralProfile): number {
    const durationDiff = Math.abs(a.preferredSessionDuration - b.preferredSessionDuration);
    const durationScore = Math.max(0, 1 - durationDiff / DURATION_SPAN_MINUTES);
    const timeScore = a.optimalTimeOfDay === b.optimalTimeOfDay ? 1 : 0;
    return (durationScore + timeScore) / 2;
  }

  safetyCompatibility(a: NeuralProfile, b: NeuralProfile): number {
    const levelDiff = Math.abs(
      levelIndex(a.safetyProfile.experienceLevel) - levelIndex(b.safetyProfile.experienceLevel)
    );
    const score = Math.max(0, 1 - levelDiff / LEVEL_SPAN);
    const conditions = new Set([...a.safetyProfile.healthConditions, ...b.safetyProfile.healthConditions]);
    return conditions.size > 0 ? score * HEALTH_CONDITION_PENALTY : score;
  }
}

function mapValues<T>(record: Record<string, T>, pick: (value: T) => number): Record<string, number> {
  const out: Record<string, number> = {};
  for (const [key, value] of Object.entries(record)) {
    out[key] = pick(value);
  }
  return out;
}

// Singleton instance
let scorerInstance: ProfileCompatibilityScorer | null = null;

export function getCompatibilityScorer(): ProfileCompatibilityScorer {
  if (!scorerInstance) {
    scorerInstance = new ProfileCompatibilityScorer();
  }
  return scorerInstance;
}

export function createCompatibilityScorer(): ProfileCompatibilityScorer {
  return new ProfileCompatibilityScorer();
}

export function calculateProfileCompatibility(a: NeuralProfile, b: NeuralProfile): CompatibilityBreakdown {
  return getCompatibilityScorer().score(a, b);
}
