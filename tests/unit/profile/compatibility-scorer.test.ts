/**
 * Profile Compatibility Tests
 */

import { describe, it, expect } from 'vitest';
import {
  calculateProfileCompatibility,
  createCompatibilityScorer,
  getCompatibilityScorer,
  COMPATIBILITY_WEIGHTS,
} from '../../../src/profile/compatibility-scorer.js';
import { createTestProfile } from '../../setup.js';

const scorer = createCompatibilityScorer();

describe('ProfileCompatibilityScorer', () => {
  it('should weight the sub-scores to a total of 1', () => {
    const total = Object.values(COMPATIBILITY_WEIGHTS).reduce((sum, w) => sum + w, 0);
    expect(total).toBeCloseTo(1, 10);
  });

  it('should score identical profiles as fully compatible', () => {
    const breakdown = scorer.score(createTestProfile('A'), createTestProfile('B'));

    expect(breakdown.brainwavePreferences).toBe(1);
    expect(breakdown.consciousnessStates).toBe(1);
    expect(breakdown.safetyCompatibility).toBe(1);
    expect(breakdown.overall).toBeCloseTo(1, 10);
  });

  it('should penalize safety when either profile has a health condition', () => {
    const healthy = scorer.score(createTestProfile('A'), createTestProfile('B'));
    const flagged = scorer.score(createTestProfile('A', 'beginner', ['epilepsy']), createTestProfile('B'));

    expect(flagged.safetyCompatibility).toBeCloseTo(0.8, 10);
    expect(flagged.overall).toBeCloseTo(0.97, 10);
    expect(flagged.overall).toBeLessThan(healthy.overall);
  });

  it('should scale safety by experience-level distance', () => {
    const breakdown = scorer.score(createTestProfile('A', 'beginner'), createTestProfile('B', 'expert'));
    expect(breakdown.safetyCompatibility).toBe(0.25);
  });

  it('should score preference maps with no shared keys as 0', () => {
    const b = createTestProfile('B');
    b.brainwavePreferences = {};

    expect(scorer.score(createTestProfile('A'), b).brainwavePreferences).toBe(0);
  });

  it('should average duration and time-of-day agreement', () => {
    const b = createTestProfile('B');
    b.preferredSessionDuration = 50;
    b.optimalTimeOfDay = 'morning';

    expect(scorer.score(createTestProfile('A'), b).sessionPreferences).toBe(0.25);
  });

  it('should be symmetric and leave both profiles untouched', () => {
    const a = createTestProfile('A', 'intermediate', ['sleep_disorders']);
    const b = createTestProfile('B');
    b.consciousnessPreferences.neutral.affinityLevel = 0.2;
    const before = JSON.stringify([a, b]);

    expect(scorer.score(a, b).overall).toBeCloseTo(scorer.score(b, a).overall, 10);
    expect(JSON.stringify([a, b])).toBe(before);
  });

  it('should expose a shared scorer', () => {
    const a = createTestProfile('A');
    const b = createTestProfile('B', 'advanced');

    expect(getCompatibilityScorer()).toBe(getCompatibilityScorer());
    expect(calculateProfileCompatibility(a, b)).toEqual(scorer.score(a, b));
  });
});
