/**
 * Centralized Configuration
 *
 * All configuration values loaded from environment variables with sensible defaults.
 */

import * as path from 'path';
import { config as loadDotenv } from 'dotenv';

// Load .env file
loadDotenv();

export type LogLevelSetting = 'INFO' | 'DEBUG';

function parseLogLevel(raw: string | undefined): LogLevelSetting {
  return raw?.toUpperCase() === 'DEBUG' ? 'DEBUG' : 'INFO';
}

/**
 * Application Configuration
 */
export const NODE_ENV = process.env.NODE_ENV || 'development';

/**
 * Logging
 */
const TMP_DIR = process.env.TMP_DIR || '/tmp';
export const LOG_PATH = process.env.LOG_PATH || path.join(TMP_DIR, 'entrainment-policy.log');
export const LOG_LEVEL: LogLevelSetting = parseLogLevel(process.env.LOG_LEVEL);
export const SUPPRESS_TEST_LOGS =
  process.env.SUPPRESS_TEST_LOGS !== undefined
    ? process.env.SUPPRESS_TEST_LOGS === 'true'
    : NODE_ENV === 'test' || process.env.VITEST === 'true';

/**
 * Reference tables (thresholds, state graph, frequency tables)
 * Empty means the bundled settings/reference-data.json
 */
export const REFERENCE_DATA_PATH = process.env.REFERENCE_DATA_PATH || '';

/**
 * Validation
 */
export const VALIDATION_STRICT_MODE = process.env.VALIDATION_STRICT_MODE === 'true';
export const DEFAULT_MAX_JOURNEY_HOPS = parseInt(process.env.DEFAULT_MAX_JOURNEY_HOPS || '3', 10);

/**
 * Validate environment-derived settings
 */
export function validateConfig(): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (Number.isNaN(DEFAULT_MAX_JOURNEY_HOPS) || DEFAULT_MAX_JOURNEY_HOPS < 0 || DEFAULT_MAX_JOURNEY_HOPS > 8) {
    errors.push(`DEFAULT_MAX_JOURNEY_HOPS must be between 0 and 8, got ${process.env.DEFAULT_MAX_JOURNEY_HOPS}`);
  }

  if (process.env.LOG_LEVEL && !['INFO', 'DEBUG'].includes(process.env.LOG_LEVEL.toUpperCase())) {
    errors.push(`LOG_LEVEL must be 'INFO' or 'DEBUG', got '${process.env.LOG_LEVEL}'`);
  }

  if (REFERENCE_DATA_PATH && path.extname(REFERENCE_DATA_PATH) !== '.json') {
    errors.push(`REFERENCE_DATA_PATH must point to a .json file, got '${REFERENCE_DATA_PATH}'`);
  }

  return {
    valid: errors.length === 0,
    errors
  };
}
