/**
 * Consciousness State Graph
 *
 * Directed graph over consciousness states; edges are the reference transitions.
 * Built once from the frozen reference tables and never mutated.
 *
 * Usage:
 *   const graph = getStateGraph();
 *   const path = graph.planJourney('neutral', 'healing_trance', 'intermediate');
 */

import { DEFAULT_MAX_JOURNEY_HOPS } from '../shared/config.js';
import { getReferenceData } from '../reference/reference-loader.js';
import {
  EXPERIENCE_LEVELS,
  experienceLevelIndex,
  isExperienceLevel,
  type ConsciousnessState,
  type ExperienceLevel,
  type ReferenceData,
  type StateTransition,
  type TransitionDifficulty,
} from '../shared/types/reference.js';

const DEFAULT_DEPTH = 1;
const GENTLE_DIFFICULTIES: readonly TransitionDifficulty[] = ['easy', 'moderate'];

/** Integration minutes by depth before the state's own multiplier */
const BASE_INTEGRATION_MINUTES: Readonly<Record<number, number>> = { 1: 2, 2: 5, 3: 10, 4: 20, 5: 30 };

export function edgeKey(from: string, to: string): string {
  return `${from}->${to}`;
}

/**
 * Any difficulty is open to advanced and expert users; the rest get easy and moderate edges
 */
export function isDifficultyPermitted(difficulty: TransitionDifficulty, level: string): boolean {
  return GENTLE_DIFFICULTIES.includes(difficulty) || level === 'advanced' || level === 'expert';
}

export class ConsciousnessStateGraph {
  private readonly states: Map<string, ConsciousnessState>;
  private readonly edges = new Map<string, StateTransition>();
  private readonly outgoing = new Map<string, StateTransition[]>();
  private readonly depths = new Map<string, number>();
  private readonly allowedByLevel = new Map<ExperienceLevel, ReadonlySet<string>>();

  constructor(reference: ReferenceData) {
    this.states = new Map(Object.entries(reference.consciousnessStates));

    for (const transition of reference.transitions) {
      this.edges.set(edgeKey(transition.from, transition.to), transition);
      const list = this.outgoing.get(transition.from) ?? [];
      list.push(transition);
      this.outgoing.set(transition.from, list);
    }

    for (const level of reference.depthLevels) {
      for (const state of level.states) {
        this.depths.set(state, level.depth);
      }
    }

    // each level may use its own states plus those of every lower level
    const cumulative = new Set<string>();
    for (const level of EXPERIENCE_LEVELS) {
      for (const state of reference.experienceLevelStates[level]) {
        cumulative.add(state);
      }
      this.allowedByLevel.set(level, new Set(cumulative));
    }
  }

  hasState(stateId: string): boolean {
    return this.states.has(stateId);
  }

  getState(stateId: string): ConsciousnessState | undefined {
    return this.states.get(stateId);
  }

  getStateIds(): string[] {
    return Array.from(this.states.keys());
  }

  lookupTransition(from: string, to: string): StateTransition | undefined {
    return this.edges.get(edgeKey(from, to));
  }

  outgoingTransitions(from: string): readonly StateTransition[] {
    return this.outgoing.get(from) ?? [];
  }

  /**
   * Depth 1 (surface) to 5 (transcendent); unmapped states sit at the surface
   */
  depthOf(stateId: string): number {
    return this.depths.get(stateId) ?? DEFAULT_DEPTH;
  }

  /**
   * States usable at a level; empty for an unknown level
   */
  allowedStatesFor(level: string): ReadonlySet<string> {
    const allowed = isExperienceLevel(level) ? this.allowedByLevel.get(level) : undefined;
    return allowed ?? new Set<string>();
  }

  requiredLevelOf(stateId: string): ExperienceLevel | undefined {
    return this.states.get(stateId)?.experienceLevelRequired;
  }

  /**
   * True when the state's required level is above the given level
   */
  exceedsLevel(stateId: string, level: ExperienceLevel): boolean {
    const required = this.requiredLevelOf(stateId);
    return required !== undefined && experienceLevelIndex(required) > experienceLevelIndex(level);
  }

  /**
   * Single-edge targets whose difficulty the level permits and whose state the level allows,
   * in reference table order
   */
  safeTargets(from: string, level: string): string[] {
    const allowed = this.allowedStatesFor(level);
    return this.outgoingTransitions(from)
      .filter((transition) => allowed.has(transition.to) && isDifficultyPermitted(transition.difficulty, level))
      .map((transition) => transition.to);
  }

  /**
   * Greedy depth-monotonic route from start toward end.
   *
   * Returns at most maxHops + 1 states; fractional budgets round down. A result whose
   * last state is not `end` means no safe route was found.
   */
  planJourney(start: string, end: string, level: string, maxHops: number = DEFAULT_MAX_JOURNEY_HOPS): string[] {
    const path = [start];
    const hops = Math.floor(maxHops);
    if (start === end || !(hops >= 1)) {
      return path;
    }

    const direct = this.lookupTransition(start, end);
    if (direct && isDifficultyPermitted(direct.difficulty, level)) {
      return [start, end];
    }

    const targetDepth = this.depthOf(end);
    let current = start;

    for (let hop = 0; hop < hops; hop++) {
      const candidates = this.safeTargets(current, level);

      if (candidates.includes(end)) {
        path.push(end);
        break;
      }

      const currentDepth = this.depthOf(current);
      const next = candidates.find((candidate) => movesToward(currentDepth, this.depthOf(candidate), targetDepth));
      if (next === undefined) {
        break;
      }

      path.push(next);
      current = next;
    }

    return path;
  }

  /**
   * Integration minutes after a state: base by depth, doubled when the state needs integration
   */
  integrationTimeFor(stateId: string): number {
    const base = BASE_INTEGRATION_MINUTES[this.depthOf(stateId)] ?? BASE_INTEGRATION_MINUTES[DEFAULT_DEPTH];
    return this.states.get(stateId)?.integrationNeeded ? base * 2 : base;
  }
}

/**
 * next lies strictly past current and no further than target on the current→target axis
 */
function movesToward(currentDepth: number, nextDepth: number, targetDepth: number): boolean {
  if (targetDepth > currentDepth) {
    return nextDepth > currentDepth && nextDepth <= targetDepth;
  }
  if (targetDepth < currentDepth) {
    return nextDepth < currentDepth && nextDepth >= targetDepth;
  }
  return false;
}

// Singleton instance
let graphInstance: ConsciousnessStateGraph | null = null;

/**
 * Get the process-wide graph built from the bundled reference tables
 */
export function getStateGraph(): ConsciousnessStateGraph {
  if (!graphInstance) {
    graphInstance = new ConsciousnessStateGraph(getReferenceData());
  }
  return graphInstance;
}

export function createStateGraph(reference: ReferenceData): ConsciousnessStateGraph {
  return new ConsciousnessStateGraph(reference);
}
