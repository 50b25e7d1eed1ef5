/**
 * Profile Factory Tests
 */

import { describe, it, expect } from 'vitest';
import { createDefaultProfile, generateProfileId } from '../../../src/profile/profile-factory.js';
import { NeuralProfileSchema } from '../../../src/profile/profile-schema.js';
import { FIXED_NOW } from '../../setup.js';

describe('generateProfileId', () => {
  it('should return 16 hex characters', () => {
    expect(generateProfileId('Ada', FIXED_NOW)).toMatch(/^[0-9a-f]{16}$/);
  });

  it('should depend on both name and time', () => {
    const later = new Date(FIXED_NOW.getTime() + 1000);

    expect(generateProfileId('Ada', FIXED_NOW)).toBe(generateProfileId('Ada', FIXED_NOW));
    expect(generateProfileId('Ada', FIXED_NOW)).not.toBe(generateProfileId('Grace', FIXED_NOW));
    expect(generateProfileId('Ada', FIXED_NOW)).not.toBe(generateProfileId('Ada', later));
  });
});

describe('createDefaultProfile', () => {
  it('should build a shape-valid beginner profile', () => {
    const profile = createDefaultProfile('Ada', 'beginner', FIXED_NOW);

    expect(NeuralProfileSchema.safeParse(profile).success).toBe(true);
    expect(profile.profileType).toBe('beginner');
    expect(profile.createdDate).toBe('2025-03-01T10:00:00.000Z');
    expect(profile.lastUpdated).toBe(profile.createdDate);
    expect(profile.profileId).toBe(generateProfileId('Ada', FIXED_NOW));
  });

  it('should seed conservative preferences', () => {
    const profile = createDefaultProfile('Ada', 'beginner', FIXED_NOW);

    expect(Object.keys(profile.brainwavePreferences)).toEqual(['alpha', 'theta', 'low_beta']);
    expect(profile.brainwavePreferences.alpha.preferredIntensity).toBe(0.3);
    expect(Object.keys(profile.consciousnessPreferences)).toEqual(['neutral', 'deep_relaxation', 'meditative_awareness']);
    expect(profile.preferredSessionDuration).toBe(20);
    expect(profile.sessionHistory.totalSessions).toBe(0);
  });

  it('should record the requested experience level', () => {
    expect(createDefaultProfile('Ada', 'advanced', FIXED_NOW).safetyProfile.experienceLevel).toBe('advanced');
  });

  it('should not share nested objects between profiles', () => {
    const first = createDefaultProfile('Ada', 'beginner', FIXED_NOW);
    const second = createDefaultProfile('Ada', 'beginner', FIXED_NOW);

    first.safetyProfile.healthConditions.push('sleep_disorders');
    expect(second.safetyProfile.healthConditions).toEqual([]);
  });
});
