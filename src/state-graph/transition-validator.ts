/**
 * Transition Validator
 *
 * Audits state-to-state moves and whole journeys against the state graph.
 * Known edges are judged by difficulty, edge-less pairs by depth difference.
 */

import type { ValidationIssue } from '../validation/types.js';
import { ValidationResult } from '../validation/validation-result.js';
import { getStateGraph, type ConsciousnessStateGraph } from './state-graph.js';

const MAX_UNGUIDED_DEPTH_CHANGE = 2;

export interface JourneyValidationOptions {
  /** Upgrade transition warnings to errors */
  strictMode?: boolean;
  graph?: ConsciousnessStateGraph;
  /** Path prefix for issues, e.g. 'consciousnessJourney' */
  fieldPath?: string;
}

export function validateStateTransition(
  from: string,
  to: string,
  level: string,
  graph: ConsciousnessStateGraph = getStateGraph()
): ValidationResult {
  const result = new ValidationResult();

  for (const [fieldPath, state] of [
    ['fromState', from],
    ['toState', to],
  ] as const) {
    if (!graph.hasState(state)) {
      result.addIssue({
        severity: 'error',
        fieldPath,
        message: `Unknown consciousness state: ${state}`,
        value: state,
        suggestion: 'Use a state from the consciousness state table',
        code: 'UNKNOWN_STATE',
      });
    }
  }
  if (!result.isValid) {
    return result;
  }

  const transition = graph.lookupTransition(from, to);
  if (transition) {
    if ((transition.difficulty === 'challenging' || transition.difficulty === 'advanced') && level === 'beginner') {
      result.addIssue({
        severity: 'warning',
        fieldPath: 'transition',
        message: `Challenging transition for ${level}: ${from} -> ${to}`,
        value: transition.difficulty,
        suggestion: 'Consider intermediate states or gain more experience',
        code: 'TRANSITION_TOO_DIFFICULT',
      });
    }
  } else {
    const fromDepth = graph.depthOf(from);
    const toDepth = graph.depthOf(to);
    if (Math.abs(toDepth - fromDepth) > MAX_UNGUIDED_DEPTH_CHANGE) {
      result.addIssue({
        severity: 'warning',
        fieldPath: 'transition',
        message: `Large consciousness depth change: ${from} (depth ${fromDepth}) -> ${to} (depth ${toDepth})`,
        value: toDepth - fromDepth,
        suggestion: 'Consider using intermediate states for smoother transition',
        code: 'DEPTH_JUMP',
      });
    }
  }

  const safeTargets = graph.safeTargets(from, level);
  if (!safeTargets.includes(to)) {
    result.addIssue({
      severity: 'warning',
      fieldPath: 'transition',
      message: `Transition ${from} -> ${to} is not in the recommended safe transitions for ${level}`,
      value: to,
      suggestion:
        safeTargets.length > 0
          ? `Recommended targets: ${safeTargets.slice(0, 3).join(', ')}`
          : `No recommended transitions leave ${from} at ${level} level`,
      code: 'TRANSITION_NOT_RECOMMENDED',
    });
  }

  return result;
}

/**
 * Validate every state and every consecutive pair of a journey
 */
export function validateJourney(
  journey: readonly string[],
  level: string,
  options: JourneyValidationOptions = {}
): ValidationResult {
  const { strictMode = false, graph = getStateGraph(), fieldPath = 'consciousnessJourney' } = options;
  const result = new ValidationResult();

  if (journey.length === 0) {
    return result.addIssue({
      severity: 'error',
      fieldPath,
      message: 'Consciousness journey cannot be empty',
      suggestion: 'Add at least one consciousness state',
      code: 'EMPTY_JOURNEY',
    });
  }

  journey.forEach((state, index) => {
    if (!graph.hasState(state)) {
      result.addIssue({
        severity: 'error',
        fieldPath: `${fieldPath}[${index}]`,
        message: `Unknown consciousness state: ${state}`,
        value: state,
        suggestion: `Valid states include: ${graph.getStateIds().slice(0, 5).join(', ')}`,
        code: 'UNKNOWN_STATE',
      });
    }
  });

  for (let i = 0; i < journey.length - 1; i++) {
    const from = journey[i];
    const to = journey[i + 1];
    // holding a state is not a transition; unknown states are already reported
    if (from === to || !graph.hasState(from) || !graph.hasState(to)) continue;

    for (const issue of validateStateTransition(from, to, level, graph).issues) {
      result.addIssue(retag(issue, `${fieldPath}[${i}->${i + 1}]`, strictMode));
    }
  }

  return result;
}

function retag(issue: ValidationIssue, fieldPath: string, strictMode: boolean): ValidationIssue {
  const severity = strictMode && issue.severity === 'warning' ? 'error' : issue.severity;
  return { ...issue, fieldPath, severity };
}
