/**
 * Intention Optimizer
 *
 * Builds a session configuration for an intention from the profile's own
 * preferences, kept inside the experience level's limits.
 */

import { getReferenceData } from '../reference/reference-loader.js';
import { getStateGraph, type ConsciousnessStateGraph } from '../state-graph/state-graph.js';
import { isExperienceLevel, type ExperienceLevel, type ReferenceData } from '../shared/types/reference.js';
import type { SessionConfig } from '../validation/types.js';
import type { NeuralProfile } from './profile-schema.js';

export const INTENTIONS = ['healing', 'creativity', 'meditation', 'transcendence', 'learning'] as const;

export type Intention = (typeof INTENTIONS)[number];

/** Settings used for any intention not in INTENTIONS */
export const DEFAULT_INTENTION: Intention = 'meditation';

export interface IntentionSettings {
  preferredStates: readonly string[];
  /** Brainwave band whose preferred intensity seeds the session */
  frequencyFocus: string;
  biofieldEmphasis: string;
  intensityModifier: number;
  durationModifier: number;
}

export const INTENTION_SETTINGS: Readonly<Record<Intention, IntentionSettings>> = {
  healing: {
    preferredStates: ['healing_trance', 'deep_relaxation'],
    frequencyFocus: 'delta',
    biofieldEmphasis: 'solfeggio_528',
    intensityModifier: 0.8,
    durationModifier: 1.2,
  },
  creativity: {
    preferredStates: ['creative_flow', 'theta_exploration'],
    frequencyFocus: 'theta',
    biofieldEmphasis: 'golden_ratio_2',
    intensityModifier: 0.9,
    durationModifier: 1.0,
  },
  meditation: {
    preferredStates: ['meditative_awareness', 'deep_relaxation'],
    frequencyFocus: 'alpha',
    biofieldEmphasis: 'schumann_resonance',
    intensityModifier: 0.7,
    durationModifier: 1.1,
  },
  transcendence: {
    preferredStates: ['gamma_awakening', 'transcendent_unity'],
    frequencyFocus: 'gamma',
    biofieldEmphasis: 'solfeggio_963',
    intensityModifier: 0.6,
    durationModifier: 0.8,
  },
  learning: {
    preferredStates: ['learning_state', 'focused_attention'],
    frequencyFocus: 'low_beta',
    biofieldEmphasis: 'golden_ratio_1',
    intensityModifier: 0.8,
    durationModifier: 0.9,
  },
};

const BASE_STATE = 'neutral';
const FALLBACK_STATE = 'deep_relaxation';
const DEFAULT_BAND_INTENSITY = 0.5;
const MIN_INTENSITY = 0.1;
const MIN_DURATION_MINUTES = 5;

export interface IntentionPlan {
  intention: Intention;
  config: SessionConfig;
  frequencyFocus: string;
  biofieldEmphasis: string;
}

export function isIntention(value: string): value is Intention {
  return (INTENTIONS as readonly string[]).includes(value);
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Route from the journey's last state to target over safe edges, without the start state;
 * undefined when the planner finds no route within the remaining room
 */
function routeTo(
  journey: readonly string[],
  target: string,
  level: ExperienceLevel,
  maxStates: number,
  graph: ConsciousnessStateGraph
): string[] | undefined {
  const current = journey[journey.length - 1];
  const room = maxStates - journey.length;
  if (room < 1 || current === target || journey.includes(target)) return undefined;

  const path = graph.planJourney(current, target, level, room);
  return path[path.length - 1] === target ? path.slice(1) : undefined;
}

/**
 * Journey: neutral, then each intention state the profile knows and its level allows,
 * reached over safe edges; back to neutral only when a safe edge leads there
 */
function buildJourney(
  profile: NeuralProfile,
  settings: IntentionSettings,
  level: ExperienceLevel,
  maxStates: number,
  graph: ConsciousnessStateGraph
): string[] {
  const allowed = graph.allowedStatesFor(level);
  const journey = [BASE_STATE];

  for (const state of settings.preferredStates) {
    if (!(state in profile.consciousnessPreferences) || !allowed.has(state)) continue;
    const route = routeTo(journey, state, level, maxStates, graph);
    if (route) journey.push(...route);
  }

  if (journey.length === 1) {
    journey.push(...(routeTo(journey, FALLBACK_STATE, level, maxStates, graph) ?? []));
  }

  const last = journey[journey.length - 1];
  if (journey.length > 1 && journey.length < maxStates && graph.safeTargets(last, level).includes(BASE_STATE)) {
    journey.push(BASE_STATE);
  }
  return journey;
}

export function resolveIntention(value: string): Intention {
  return isIntention(value) ? value : DEFAULT_INTENTION;
}

/**
 * Unknown intentions get meditation settings
 */
export function optimizeProfileForIntention(
  profile: NeuralProfile,
  intention: string,
  reference: ReferenceData = getReferenceData(),
  graph: ConsciousnessStateGraph = getStateGraph()
): IntentionPlan {
  const resolved = resolveIntention(intention);
  const settings = INTENTION_SETTINGS[resolved];
  const declared = profile.safetyProfile.experienceLevel;
  const level: ExperienceLevel = isExperienceLevel(declared) ? declared : 'beginner';
  const limits = reference.neuralLoadLimits[level];

  const bandIntensity = profile.brainwavePreferences[settings.frequencyFocus]?.preferredIntensity ?? DEFAULT_BAND_INTENSITY;
  const intensity = Math.min(limits.maxFrequencyIntensity, Math.max(MIN_INTENSITY, bandIntensity * settings.intensityModifier));
  const duration = Math.min(
    limits.maxSessionDurationMinutes,
    Math.max(MIN_DURATION_MINUTES, Math.floor(profile.preferredSessionDuration * settings.durationModifier))
  );

  const biofield = profile.biofieldProfile;
  const solfeggio = Object.values(biofield.solfeggioResponsiveness);
  const solfeggioMean = solfeggio.length > 0 ? solfeggio.reduce((sum, v) => sum + v, 0) / solfeggio.length : 0.5;

  return {
    intention: resolved,
    frequencyFocus: settings.frequencyFocus,
    biofieldEmphasis: settings.biofieldEmphasis,
    config: {
      name: `Optimized ${resolved} session`,
      durationMinutes: duration,
      frequencyIntensity: round2(intensity),
      consciousnessJourney: buildJourney(profile, settings, level, limits.maxStateTransitions, graph),
      biofieldConfiguration: {
        schumannAlignment: round2(biofield.schumannResonanceSensitivity),
        solfeggioIntegration: round2(solfeggioMean),
        goldenRatioHarmonics: round2(biofield.goldenRatioHarmonyLevel),
      },
      safetyParameters: { comfortMonitoring: true, automaticAdjustment: true, emergencyStop: true },
    },
  };
}
