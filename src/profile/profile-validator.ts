/**
 * Profile Validator
 *
 * Semantic checks on a shape-valid profile: ranges, known bands and states,
 * experience level and contraindications. Results carry growth recommendations
 * in metadata.
 */

import { getReferenceData } from '../reference/reference-loader.js';
import { isExperienceLevel, type ReferenceData } from '../shared/types/reference.js';
import { ValidationResult } from '../validation/validation-result.js';
import type { NeuralProfile } from './profile-schema.js';

const MIN_BRAINWAVE_PREFERENCES = 3;
const MIN_STATE_PREFERENCES = 2;
const PERSONALIZATION_SESSION_COUNT = 10;

function inUnitRange(value: number): boolean {
  return value >= 0 && value <= 1;
}

export function validateNeuralProfile(
  profile: NeuralProfile,
  reference: ReferenceData = getReferenceData()
): ValidationResult {
  const result = new ValidationResult();
  const recommendations: string[] = [];

  if (!profile.profileId) {
    result.addIssue({
      severity: 'error',
      fieldPath: 'profileId',
      message: 'Profile ID is required',
      suggestion: 'Generate a profile ID when creating the profile',
      code: 'PROFILE_ID_MISSING',
    });
  }
  if (!profile.name.trim()) {
    result.addIssue({
      severity: 'error',
      fieldPath: 'name',
      message: 'Profile name is required',
      suggestion: 'Give the profile a display name',
      code: 'PROFILE_NAME_MISSING',
    });
  }

  for (const [band, preference] of Object.entries(profile.brainwavePreferences)) {
    const path = `brainwavePreferences.${band}`;
    if (!(band in reference.brainwaveBands)) {
      result.addIssue({
        severity: 'warning',
        fieldPath: path,
        message: `Unknown brainwave band: ${band}`,
        value: band,
        suggestion: `Known bands: ${Object.keys(reference.brainwaveBands).join(', ')}`,
        code: 'UNKNOWN_BRAINWAVE_BAND',
      });
    }
    if (!inUnitRange(preference.preferredIntensity)) {
      result.addIssue({
        severity: 'error',
        fieldPath: `${path}.preferredIntensity`,
        message: `Preferred intensity must be between 0 and 1, got ${preference.preferredIntensity}`,
        value: preference.preferredIntensity,
        suggestion: 'Set intensity between 0.0 and 1.0',
        code: 'INTENSITY_OUT_OF_RANGE',
      });
    }
    const [low, high] = preference.toleranceRange;
    if (!inUnitRange(low) || !inUnitRange(high) || low > high) {
      result.addIssue({
        severity: 'error',
        fieldPath: `${path}.toleranceRange`,
        message: `Tolerance range must be an ordered pair within 0..1, got [${low}, ${high}]`,
        value: preference.toleranceRange,
        suggestion: 'Use [min, max] with 0 <= min <= max <= 1',
        code: 'TOLERANCE_RANGE_INVALID',
      });
    }
  }

  for (const [state, preference] of Object.entries(profile.consciousnessPreferences)) {
    const path = `consciousnessPreferences.${state}`;
    if (!(state in reference.consciousnessStates)) {
      result.addIssue({
        severity: 'warning',
        fieldPath: path,
        message: `Unknown consciousness state: ${state}`,
        value: state,
        suggestion: 'Use a state from the consciousness state table',
        code: 'UNKNOWN_STATE',
      });
    }
    if (!inUnitRange(preference.affinityLevel)) {
      result.addIssue({
        severity: 'error',
        fieldPath: `${path}.affinityLevel`,
        message: `Affinity must be between 0 and 1, got ${preference.affinityLevel}`,
        value: preference.affinityLevel,
        suggestion: 'Set affinity between 0.0 and 1.0',
        code: 'AFFINITY_OUT_OF_RANGE',
      });
    }
    if (preference.optimalDurationMinutes < 1 || preference.optimalDurationMinutes > 120) {
      result.addIssue({
        severity: 'warning',
        fieldPath: `${path}.optimalDurationMinutes`,
        message: `Unusual optimal duration: ${preference.optimalDurationMinutes} minutes`,
        value: preference.optimalDurationMinutes,
        suggestion: 'Consider a duration between 1 and 120 minutes',
        code: 'DURATION_UNUSUAL',
      });
    }
  }

  const biofield = profile.biofieldProfile;
  const biofieldValues = {
    coherenceBaseline: biofield.coherenceBaseline,
    schumannResonanceSensitivity: biofield.schumannResonanceSensitivity,
    goldenRatioHarmonyLevel: biofield.goldenRatioHarmonyLevel,
  };
  for (const [field, value] of Object.entries(biofieldValues)) {
    if (!inUnitRange(value)) {
      result.addIssue({
        severity: 'error',
        fieldPath: `biofieldProfile.${field}`,
        message: `${field} must be between 0 and 1, got ${value}`,
        value,
        suggestion: 'Set biofield values between 0.0 and 1.0',
        code: 'BIOFIELD_OUT_OF_RANGE',
      });
    }
  }

  const level = profile.safetyProfile.experienceLevel;
  if (!isExperienceLevel(level)) {
    result.addIssue({
      severity: 'error',
      fieldPath: 'safetyProfile.experienceLevel',
      message: `Invalid experience level: ${level}`,
      value: level,
      suggestion: 'Use beginner, intermediate, advanced or expert',
      code: 'INVALID_EXPERIENCE_LEVEL',
    });
  } else {
    const maxDuration = reference.neuralLoadLimits[level].maxSessionDurationMinutes;
    if (profile.preferredSessionDuration > maxDuration) {
      result.addIssue({
        severity: 'warning',
        fieldPath: 'preferredSessionDuration',
        message: `Preferred duration ${profile.preferredSessionDuration} exceeds the ${level} limit of ${maxDuration} minutes`,
        value: profile.preferredSessionDuration,
        suggestion: `Reduce preferred duration to ${maxDuration} minutes or less`,
        code: 'PREFERRED_DURATION_EXCEEDS_LIMIT',
      });
    }
  }

  for (const condition of profile.safetyProfile.healthConditions) {
    if (reference.contraindications.absolute.includes(condition)) {
      result.addIssue({
        severity: 'critical',
        fieldPath: 'safetyProfile.healthConditions',
        message: `Absolute contraindication: ${condition}`,
        value: condition,
        suggestion: 'Consult a healthcare provider before any entrainment session',
        code: 'ABSOLUTE_CONTRAINDICATION',
      });
    } else if (reference.contraindications.relative.includes(condition)) {
      result.addIssue({
        severity: 'warning',
        fieldPath: 'safetyProfile.healthConditions',
        message: `Relative contraindication: ${condition}`,
        value: condition,
        suggestion: 'Use reduced intensity and shorter sessions; consider medical advice',
        code: 'RELATIVE_CONTRAINDICATION',
      });
    }
  }

  const history = profile.sessionHistory;
  if (history.totalHours < 0 || history.averageComfortLevel < 0 || history.averageComfortLevel > 1) {
    result.addIssue({
      severity: 'error',
      fieldPath: 'sessionHistory',
      message: 'Session history counters are out of range',
      value: { totalHours: history.totalHours, averageComfortLevel: history.averageComfortLevel },
      suggestion: 'Rebuild the session history from recorded outcomes',
      code: 'HISTORY_OUT_OF_RANGE',
    });
  }

  if (Object.keys(profile.brainwavePreferences).length < MIN_BRAINWAVE_PREFERENCES) {
    recommendations.push('Explore more frequency ranges to build a fuller brainwave profile');
  }
  if (Object.keys(profile.consciousnessPreferences).length < MIN_STATE_PREFERENCES) {
    recommendations.push('Try more consciousness states to personalize journeys');
  }
  if (history.totalSessions > PERSONALIZATION_SESSION_COUNT && profile.profileType === 'beginner') {
    recommendations.push('Enough sessions recorded to switch to a personalized profile');
  }
  result.metadata.recommendations = recommendations;

  return result;
}
