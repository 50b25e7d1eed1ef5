/**
 * Neural Load Estimator
 *
 * Weighted sum of four sub-factors, each clamped to [0,1] before weighting:
 *   duration      min(1, minutes/60)          × 0.30
 *   intensity     raw intensity               × 0.30
 *   high exposure min(1, minutes/30)          × 0.25
 *   transitions   min(1, journey entries/5)   × 0.15
 */

import type { NeuralLoadFactors } from '../validation/types.js';

export const NEURAL_LOAD_WEIGHTS = {
  duration: 0.3,
  intensity: 0.3,
  highExposure: 0.25,
  transitions: 0.15,
} as const;

const DURATION_SATURATION_MINUTES = 60;
const HIGH_EXPOSURE_SATURATION_MINUTES = 30;
const TRANSITION_SATURATION = 5;

export interface NeuralLoadInput {
  durationMinutes: number;
  frequencyIntensity: number;
  /** Minutes spent in extreme (gamma-range) frequencies */
  highExposureMinutes: number;
  /** Journey entries; each state entered counts once */
  transitionCount: number;
}

/** NaN saturates the factor */
function unitClamp(value: number): number {
  if (Number.isNaN(value)) return 1;
  return Math.min(1, Math.max(0, value));
}

export function neuralLoadFactors(input: NeuralLoadInput): NeuralLoadFactors {
  return {
    duration: unitClamp(input.durationMinutes / DURATION_SATURATION_MINUTES),
    intensity: unitClamp(input.frequencyIntensity),
    highExposure: unitClamp(input.highExposureMinutes / HIGH_EXPOSURE_SATURATION_MINUTES),
    transitions: unitClamp(input.transitionCount / TRANSITION_SATURATION),
  };
}

export function estimateNeuralLoad(input: NeuralLoadInput): number {
  const factors = neuralLoadFactors(input);
  const load =
    NEURAL_LOAD_WEIGHTS.duration * factors.duration +
    NEURAL_LOAD_WEIGHTS.intensity * factors.intensity +
    NEURAL_LOAD_WEIGHTS.highExposure * factors.highExposure +
    NEURAL_LOAD_WEIGHTS.transitions * factors.transitions;
  return Math.min(1, Math.max(0, load));
}
