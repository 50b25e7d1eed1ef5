/**
 * User Input Sanitizer Tests
 */

import { describe, it, expect } from 'vitest';
import { sanitizeUserInput } from '../../../src/validation/input-sanitizer.js';
import { InputSanitizationError } from '../../../src/shared/errors.js';

describe('sanitizeUserInput', () => {
  it('should trim and return well-formed input', () => {
    expect(sanitizeUserInput('  Evening Calm  ', 'sessionName')).toBe('Evening Calm');
    expect(sanitizeUserInput('user@example.com', 'email')).toBe('user@example.com');
    expect(sanitizeUserInput('30min', 'durationString')).toBe('30min');
    expect(sanitizeUserInput('1.2.3', 'version')).toBe('1.2.3');
  });

  it('should reject non-string input', () => {
    expect(() => sanitizeUserInput(42, 'sessionName')).toThrow('Rejected sessionName input: expected string input, got number');
    expect(() => sanitizeUserInput(null, 'freeText')).toThrow('expected string input, got null');
  });

  it('should reject empty input unless allowed', () => {
    expect(() => sanitizeUserInput('   ', 'freeText')).toThrow('input cannot be empty');
    expect(sanitizeUserInput('   ', 'freeText', { allowEmpty: true })).toBe('');
  });

  it('should enforce the maximum length', () => {
    expect(() => sanitizeUserInput('abcdef', 'freeText', { maxLength: 5 })).toThrow('input too long: 6 > 5');
  });

  it('should enforce the input-type format', () => {
    expect(() => sanitizeUserInput('Bad Preset!', 'presetId')).toThrow('invalid format: Bad Preset!');
    expect(() => sanitizeUserInput('1.2', 'version')).toThrow(InputSanitizationError);
    expect(() => sanitizeUserInput('25:61:00x', 'timeString')).toThrow(InputSanitizationError);
  });

  it('should reject dangerous content case-insensitively', () => {
    for (const attack of ['<SCRIPT>alert(1)</script>', 'JavaScript:void(0)', 'x onerror=run', 'eval(code)', 'import os']) {
      expect(() => sanitizeUserInput(attack, 'freeText')).toThrow('potentially dangerous content detected');
    }
  });

  it('should reject anything over the absolute safe length even when allowed by options', () => {
    const huge = 'a'.repeat(10001);
    expect(() => sanitizeUserInput(huge, 'freeText', { maxLength: 20000 })).toThrow('input exceeds maximum safe length');
  });

  it('should carry the input type and reason on the error', () => {
    try {
      sanitizeUserInput('', 'email');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InputSanitizationError);
      if (error instanceof InputSanitizationError) {
        expect(error.inputType).toBe('email');
        expect(error.reason).toBe('input cannot be empty');
        expect(error.name).toBe('InputSanitizationError');
      }
    }
  });
});
