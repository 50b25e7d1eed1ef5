/**
 * Neural Profile Module
 *
 * Profile record, import/export, validation, compatibility and session feedback.
 */

// Types
export type {
  NeuralProfile,
  ProfileType,
  TimeOfDay,
  BrainwavePreference,
  ConsciousnessPreference,
  BiofieldProfile,
  SafetyProfile,
  SessionHistory,
  SessionOutcomeRecord,
} from './profile-schema.js';
export type { ExportOptions } from './profile-codec.js';
export type { CompatibilityBreakdown } from './compatibility-scorer.js';
export type { SessionOutcome, FrequencyUsage } from './session-update.js';
export type { Intention, IntentionPlan, IntentionSettings } from './intention-optimizer.js';

// Schema
export { NeuralProfileSchema, PROFILE_KIND, PROFILE_SCHEMA_VERSION, PROFILE_TYPES, TIMES_OF_DAY } from './profile-schema.js';

// Lifecycle
export { createDefaultProfile, generateProfileId } from './profile-factory.js';
export { parseProfile, importProfile, exportProfile, serializeProfile } from './profile-codec.js';
export { validateNeuralProfile } from './profile-validator.js';
export { updateProfileFromSession, MAX_RECENT_OUTCOMES, MAX_STATE_LIST_SIZE } from './session-update.js';

// Compatibility
export {
  ProfileCompatibilityScorer,
  getCompatibilityScorer,
  createCompatibilityScorer,
  calculateProfileCompatibility,
  COMPATIBILITY_WEIGHTS,
  HEALTH_CONDITION_PENALTY,
} from './compatibility-scorer.js';

// Intentions
export {
  optimizeProfileForIntention,
  isIntention,
  resolveIntention,
  INTENTIONS,
  INTENTION_SETTINGS,
  DEFAULT_INTENTION,
} from './intention-optimizer.js';
