/**
 * Safety Guidance Tests
 */

import { describe, it, expect } from 'vitest';
import { safetyRecommendations } from '../../../src/safety/guidance.js';

describe('safetyRecommendations', () => {
  it('should list base, level and session advice in that order', () => {
    const advice = safetyRecommendations('beginner', 'healing');

    expect(advice).toHaveLength(13);
    expect(advice[0]).toBe('Ensure comfortable, safe environment');
    expect(advice[5]).toBe('Start with shorter sessions (15-20 minutes)');
    expect(advice[12]).toBe('Have healing support resources available');
  });

  it('should fall back to base advice for unknown levels and session types', () => {
    expect(safetyRecommendations('guru', 'juggling')).toHaveLength(5);
    expect(safetyRecommendations('expert')).toHaveLength(9);
  });
});
