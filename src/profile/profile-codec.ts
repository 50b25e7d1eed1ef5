/**
 * Profile Import / Export
 *
 * The one place serialized profiles cross into the engine. Storage is the
 * caller's business; this module only checks shape and strips sensitive data.
 */

import { ProfileFormatError } from '../shared/errors.js';
import { NeuralProfileSchema, type NeuralProfile } from './profile-schema.js';

export interface ExportOptions {
  /** Keep health conditions, medications, contraindications and emergency contacts */
  includeSensitiveData?: boolean;
}

/**
 * Check an already-parsed value against the profile shape
 *
 * @throws ProfileFormatError
 */
export function parseProfile(raw: unknown): NeuralProfile {
  const parsed = NeuralProfileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ProfileFormatError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return parsed.data;
}

/**
 * Parse a JSON string into a profile
 *
 * @throws ProfileFormatError
 */
export function importProfile(json: string): NeuralProfile {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new ProfileFormatError([`not valid JSON (${error instanceof Error ? error.message : String(error)})`]);
  }
  return parseProfile(raw);
}

/**
 * Deep copy of a profile, with sensitive fields emptied unless asked for
 */
export function exportProfile(profile: NeuralProfile, options: ExportOptions = {}): NeuralProfile {
  const copy = structuredClone(profile);
  if (!options.includeSensitiveData) {
    copy.safetyProfile.healthConditions = [];
    copy.safetyProfile.medications = [];
    copy.safetyProfile.contraindications = [];
    copy.safetyProfile.emergencyContacts = [];
  }
  return copy;
}

export function serializeProfile(profile: NeuralProfile, options: ExportOptions = {}): string {
  return JSON.stringify(exportProfile(profile, options), null, 2);
}
