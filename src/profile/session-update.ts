/**
 * Session Feedback
 *
 * Folds a completed session's outcome into the profile. The update is additive:
 * counters grow, preferences drift in small steps and the bounded lists evict
 * their oldest entry once full.
 *
 * Mutates the profile in place. Callers sharing a profile must serialize updates.
 */

import { EngineLogger } from '../shared/utils/engine-logger.js';
import type { NeuralProfile, SessionOutcomeRecord } from './profile-schema.js';

export const MAX_RECENT_OUTCOMES = 10;
export const MAX_STATE_LIST_SIZE = 5;
export const PERSONALIZATION_THRESHOLD_SESSIONS = 10;

const AFFINITY_STEP = 0.05;
const INTENSITY_STEP = 0.02;
const MIN_PREFERRED_INTENSITY = 0.1;
const COHERENCE_STEP = 0.02;
const COHERENCE_TREND_THRESHOLD = 0.1;
const DEFAULT_STATE_COMFORT = 0.8;
const DEFAULT_EFFECTIVENESS = 0.5;

export interface FrequencyUsage {
  effectiveness?: number;
}

export interface SessionOutcome {
  durationMinutes: number;
  /** States entered during the session, in order */
  consciousnessStates?: string[];
  /** Per-state comfort 0..1; a state without an entry counts as 0.8 */
  stateComfortLevels?: Record<string, number>;
  /** Keyed by brainwave band */
  frequenciesUsed?: Record<string, FrequencyUsage>;
  averageCoherence?: number;
  overallComfort?: number;
  effectiveness?: number;
  notes?: string;
}

/**
 * Append to a bounded list, dropping the oldest entry when full; no-op for duplicates
 */
function pushBounded(list: string[], item: string, cap: number): void {
  if (list.includes(item)) return;
  list.push(item);
  while (list.length > cap) {
    list.shift();
  }
}

export function updateProfileFromSession(
  profile: NeuralProfile,
  outcome: SessionOutcome,
  now: Date = new Date()
): NeuralProfile {
  const history = profile.sessionHistory;
  const states = outcome.consciousnessStates ?? [];
  const comfortLevels = outcome.stateComfortLevels ?? {};

  history.totalSessions += 1;
  history.totalHours += Math.max(0, outcome.durationMinutes) / 60;

  for (const state of states) {
    const preference = profile.consciousnessPreferences[state];
    if (!preference) continue;

    const comfort = comfortLevels[state] ?? DEFAULT_STATE_COMFORT;
    if (comfort > 0.8) {
      preference.affinityLevel = Math.min(1, preference.affinityLevel + AFFINITY_STEP);
      pushBounded(history.favoriteStates, state, MAX_STATE_LIST_SIZE);
    } else if (comfort < 0.4) {
      preference.affinityLevel = Math.max(0, preference.affinityLevel - AFFINITY_STEP);
      pushBounded(history.challengingStates, state, MAX_STATE_LIST_SIZE);
    }
  }

  for (const [band, usage] of Object.entries(outcome.frequenciesUsed ?? {})) {
    const preference = profile.brainwavePreferences[band];
    if (!preference) continue;

    const effectiveness = usage.effectiveness ?? DEFAULT_EFFECTIVENESS;
    if (effectiveness > 0.8) {
      preference.preferredIntensity = Math.min(1, preference.preferredIntensity + INTENSITY_STEP);
    } else if (effectiveness < 0.3) {
      preference.preferredIntensity = Math.max(MIN_PREFERRED_INTENSITY, preference.preferredIntensity - INTENSITY_STEP);
    }
  }

  const biofield = profile.biofieldProfile;
  const trend = (outcome.averageCoherence ?? biofield.coherenceBaseline) - biofield.coherenceBaseline;
  if (trend > COHERENCE_TREND_THRESHOLD) {
    biofield.coherenceBaseline = Math.min(1, biofield.coherenceBaseline + COHERENCE_STEP);
  } else if (trend < -COHERENCE_TREND_THRESHOLD) {
    biofield.coherenceBaseline = Math.max(0, biofield.coherenceBaseline - COHERENCE_STEP);
  }

  // first session replaces the default average outright
  const sessionComfort = outcome.overallComfort ?? DEFAULT_STATE_COMFORT;
  const weight = Math.min(1, 1 / history.totalSessions);
  history.averageComfortLevel = history.averageComfortLevel * (1 - weight) + sessionComfort * weight;

  const record: SessionOutcomeRecord = {
    date: now.toISOString(),
    durationMinutes: outcome.durationMinutes,
    comfortLevel: sessionComfort,
    effectiveness: outcome.effectiveness ?? DEFAULT_EFFECTIVENESS,
    statesExplored: [...states],
    notes: outcome.notes ?? '',
  };
  history.recentSessionOutcomes.push(record);
  if (history.recentSessionOutcomes.length > MAX_RECENT_OUTCOMES) {
    history.recentSessionOutcomes.splice(0, history.recentSessionOutcomes.length - MAX_RECENT_OUTCOMES);
  }

  profile.lastUpdated = now.toISOString();
  if (profile.profileType === 'beginner' && history.totalSessions >= PERSONALIZATION_THRESHOLD_SESSIONS) {
    profile.profileType = 'personalized';
  }

  EngineLogger.profileUpdated(profile.profileId, history.totalSessions, profile.profileType);
  return profile;
}
