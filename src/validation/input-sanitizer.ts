/**
 * User Input Sanitizer
 *
 * Guards raw strings before they reach the structured pipeline.
 * Unlike the validators it fails fast: anything malformed or dangerous throws.
 */

import { InputSanitizationError } from '../shared/errors.js';

export const USER_INPUT_PATTERNS = {
  name: /^[a-zA-Z\s\-'.]{1,100}$/,
  email: /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/,
  sessionName: /^[a-zA-Z0-9\s\-_.]{1,100}$/,
  presetId: /^[a-z0-9_]{3,50}$/,
  version: /^\d+\.\d+\.\d+$/,
  durationString: /^\d{1,3}(m|min|minutes?)$/,
  intensityString: /^\d{1,3}%$/,
  dateString: /^\d{4}-\d{2}-\d{2}$/,
  timeString: /^\d{2}:\d{2}(:\d{2})?$/,
} as const;

export type UserInputType = keyof typeof USER_INPUT_PATTERNS;

const DANGEROUS_PATTERNS: readonly RegExp[] = [
  /<script.*?>/i,
  /javascript:/i,
  /onload=/i,
  /onerror=/i,
  /eval\(/i,
  /exec\(/i,
  /import\s+os/i,
  /import\s+subprocess/i,
];

const ABSOLUTE_MAX_LENGTH = 10000;

export interface SanitizeOptions {
  maxLength?: number;
  allowEmpty?: boolean;
}

/**
 * Trim and check a raw string
 *
 * @param inputType - a known input format, or 'freeText' for length and security checks only
 * @throws InputSanitizationError
 */
export function sanitizeUserInput(
  value: unknown,
  inputType: UserInputType | 'freeText',
  options: SanitizeOptions = {}
): string {
  const { maxLength = 1000, allowEmpty = false } = options;

  if (typeof value !== 'string') {
    throw new InputSanitizationError(inputType, `expected string input, got ${value === null ? 'null' : typeof value}`);
  }

  const sanitized = value.trim();

  if (!sanitized) {
    if (allowEmpty) return sanitized;
    throw new InputSanitizationError(inputType, 'input cannot be empty');
  }

  if (sanitized.length > maxLength) {
    throw new InputSanitizationError(inputType, `input too long: ${sanitized.length} > ${maxLength}`);
  }

  if (inputType !== 'freeText' && !USER_INPUT_PATTERNS[inputType].test(sanitized)) {
    throw new InputSanitizationError(inputType, `invalid format: ${sanitized}`);
  }

  checkInputSecurity(inputType, sanitized);

  return sanitized;
}

function checkInputSecurity(inputType: string, input: string): void {
  for (const pattern of DANGEROUS_PATTERNS) {
    if (pattern.test(input)) {
      throw new InputSanitizationError(inputType, 'potentially dangerous content detected');
    }
  }

  if (input.length > ABSOLUTE_MAX_LENGTH) {
    throw new InputSanitizationError(inputType, 'input exceeds maximum safe length');
  }
}
