/**
 * Consciousness State Graph Tests
 */

import { describe, it, expect } from 'vitest';
import {
  ConsciousnessStateGraph,
  createStateGraph,
  getStateGraph,
  edgeKey,
  isDifficultyPermitted,
} from '../../../src/state-graph/state-graph.js';
import { getReferenceData } from '../../../src/reference/reference-loader.js';

const graph = getStateGraph();

describe('ConsciousnessStateGraph', () => {
  describe('lookups', () => {
    it('should expose every reference state', () => {
      expect(graph.getStateIds()).toHaveLength(10);
      expect(graph.hasState('healing_trance')).toBe(true);
      expect(graph.hasState('astral_projection')).toBe(false);
      expect(graph.getState('focused_attention')?.dominantFrequency).toBe('low_beta');
    });

    it('should find edges only in their stated direction', () => {
      expect(graph.lookupTransition('neutral', 'deep_relaxation')?.difficulty).toBe('easy');
      expect(graph.lookupTransition('deep_relaxation', 'neutral')).toBeUndefined();
      expect(edgeKey('a', 'b')).toBe('a->b');
    });

    it('should place unmapped states at the surface', () => {
      expect(graph.depthOf('healing_trance')).toBe(4);
      expect(graph.depthOf('nowhere')).toBe(1);
    });
  });

  describe('experience levels', () => {
    it('should accumulate allowed states up the levels', () => {
      expect([...graph.allowedStatesFor('beginner')]).toEqual([
        'neutral',
        'deep_relaxation',
        'focused_attention',
        'learning_state',
      ]);
      expect(graph.allowedStatesFor('intermediate').size).toBe(8);
      expect(graph.allowedStatesFor('expert').size).toBe(10);
      expect(graph.allowedStatesFor('wizard').size).toBe(0);
    });

    it('should compare a state against a level', () => {
      expect(graph.requiredLevelOf('gamma_awakening')).toBe('advanced');
      expect(graph.exceedsLevel('gamma_awakening', 'intermediate')).toBe(true);
      expect(graph.exceedsLevel('gamma_awakening', 'advanced')).toBe(false);
      expect(graph.exceedsLevel('unknown_state', 'beginner')).toBe(false);
    });

    it('should open hard edges to advanced and expert users only', () => {
      expect(isDifficultyPermitted('moderate', 'beginner')).toBe(true);
      expect(isDifficultyPermitted('advanced', 'intermediate')).toBe(false);
      expect(isDifficultyPermitted('challenging', 'advanced')).toBe(true);
      expect(isDifficultyPermitted('advanced', 'expert')).toBe(true);
    });
  });

  describe('safeTargets', () => {
    it('should keep table order and drop states above the level', () => {
      expect(graph.safeTargets('neutral', 'beginner')).toEqual(['deep_relaxation', 'focused_attention']);
      expect(graph.safeTargets('neutral', 'intermediate')).toEqual([
        'deep_relaxation',
        'focused_attention',
        'meditative_awareness',
      ]);
    });

    it('should drop edges whose difficulty the level does not permit', () => {
      expect(graph.safeTargets('meditative_awareness', 'intermediate')).toEqual(['creative_flow']);
      expect(graph.safeTargets('meditative_awareness', 'advanced')).toEqual(['gamma_awakening', 'creative_flow']);
    });

    it('should return nothing for dead ends and unknown levels', () => {
      expect(graph.safeTargets('learning_state', 'expert')).toEqual([]);
      expect(graph.safeTargets('neutral', 'wizard')).toEqual([]);
    });
  });

  describe('planJourney', () => {
    it('should return the start alone when start and end match', () => {
      expect(graph.planJourney('deep_relaxation', 'deep_relaxation', 'beginner')).toEqual(['deep_relaxation']);
    });

    it('should return the start alone when no hops are allowed', () => {
      expect(graph.planJourney('neutral', 'deep_relaxation', 'beginner', 0)).toEqual(['neutral']);
    });

    it('should round a fractional hop budget down', () => {
      expect(graph.planJourney('neutral', 'healing_trance', 'intermediate', 1.5)).toEqual(['neutral', 'deep_relaxation']);
      expect(graph.planJourney('neutral', 'deep_relaxation', 'beginner', 0.5)).toEqual(['neutral']);
    });

    it('should take a permitted direct edge', () => {
      expect(graph.planJourney('neutral', 'deep_relaxation', 'beginner')).toEqual(['neutral', 'deep_relaxation']);
    });

    it('should route through intermediate depths', () => {
      expect(graph.planJourney('neutral', 'healing_trance', 'intermediate')).toEqual([
        'neutral',
        'deep_relaxation',
        'healing_trance',
      ]);
      expect(graph.planJourney('meditative_awareness', 'transcendent_unity', 'expert')).toEqual([
        'meditative_awareness',
        'gamma_awakening',
        'transcendent_unity',
      ]);
    });

    it('should stop short when the greedy route reaches a dead end', () => {
      const path = graph.planJourney('neutral', 'gamma_awakening', 'advanced');

      expect(path).toEqual(['neutral', 'deep_relaxation', 'theta_exploration']);
      expect(path[path.length - 1]).not.toBe('gamma_awakening');
    });

    it('should not take a direct edge the level may not use', () => {
      expect(graph.planJourney('meditative_awareness', 'gamma_awakening', 'beginner')).toEqual(['meditative_awareness']);
    });

    it('should never exceed maxHops + 1 states', () => {
      for (const start of graph.getStateIds()) {
        for (const end of graph.getStateIds()) {
          expect(graph.planJourney(start, end, 'expert', 2).length).toBeLessThanOrEqual(3);
        }
      }
    });
  });

  describe('integrationTimeFor', () => {
    it('should scale the depth base and double it when integration is needed', () => {
      expect(graph.integrationTimeFor('neutral')).toBe(2);
      expect(graph.integrationTimeFor('deep_relaxation')).toBe(10);
      expect(graph.integrationTimeFor('learning_state')).toBe(20);
      expect(graph.integrationTimeFor('gamma_awakening')).toBe(60);
    });
  });

  describe('singletons', () => {
    it('should return the same graph for every call', () => {
      expect(getStateGraph()).toBe(graph);
    });

    it('should build a fresh graph on request', () => {
      const fresh = createStateGraph(getReferenceData());
      expect(fresh).toBeInstanceOf(ConsciousnessStateGraph);
      expect(fresh).not.toBe(graph);
    });
  });
});
