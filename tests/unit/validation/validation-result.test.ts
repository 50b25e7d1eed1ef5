/**
 * Validation Result Tests
 */

import { describe, it, expect } from 'vitest';
import { ValidationResult } from '../../../src/validation/validation-result.js';
import type { IssueSeverity, ValidationIssue } from '../../../src/validation/types.js';

function issue(severity: IssueSeverity, fieldPath = 'field', suggestion = ''): ValidationIssue {
  return { severity, fieldPath, message: `${severity} at ${fieldPath}`, suggestion, code: severity.toUpperCase() };
}

describe('ValidationResult', () => {
  it('should start valid, safe and with a perfect score', () => {
    const result = new ValidationResult();

    expect(result.isValid).toBe(true);
    expect(result.isSafe).toBe(true);
    expect(result.overallScore).toBe(1);
    expect(result.issues).toEqual([]);
  });

  it('should stay valid with only info and warning issues', () => {
    const result = new ValidationResult().addIssue(issue('info')).addIssue(issue('warning'));

    expect(result.isValid).toBe(true);
    expect(result.isSafe).toBe(true);
    expect(result.overallScore).toBeCloseTo(0.9, 10);
  });

  it('should be invalid but safe with an error', () => {
    const result = new ValidationResult().addIssue(issue('error'));

    expect(result.isValid).toBe(false);
    expect(result.isSafe).toBe(true);
    expect(result.overallScore).toBeCloseTo(0.8, 10);
  });

  it('should be invalid, unsafe and scored zero with a critical issue', () => {
    const result = new ValidationResult().addIssue(issue('warning')).addIssue(issue('critical'));

    expect(result.isValid).toBe(false);
    expect(result.isSafe).toBe(false);
    expect(result.overallScore).toBe(0);
  });

  it('should never score below zero', () => {
    const result = new ValidationResult();
    for (let i = 0; i < 6; i++) result.addIssue(issue('error'));

    expect(result.overallScore).toBe(0);
  });

  it('should combine error and warning penalties', () => {
    const result = new ValidationResult().addIssues([issue('error'), issue('error'), issue('warning')]);
    expect(result.overallScore).toBeCloseTo(0.5, 10);
  });

  it('should expose issues by severity', () => {
    const result = new ValidationResult().addIssues([
      issue('info', 'a'),
      issue('warning', 'b'),
      issue('error', 'c'),
      issue('critical', 'd'),
      issue('warning', 'e'),
    ]);

    expect(result.counts).toEqual({ info: 1, warning: 2, error: 1, critical: 1 });
    expect(result.warnings.map((i) => i.fieldPath)).toEqual(['b', 'e']);
    expect(result.errors.map((i) => i.fieldPath)).toEqual(['c']);
    expect(result.criticalIssues.map((i) => i.fieldPath)).toEqual(['d']);
    expect(result.infos.map((i) => i.fieldPath)).toEqual(['a']);
  });

  it('should merge issues under a path prefix', () => {
    const inner = new ValidationResult().addIssues([issue('error', 'durationMinutes'), issue('warning', '[0]'), issue('info', '')]);
    const outer = new ValidationResult().merge(inner, 'baseConfiguration');

    expect(outer.issues.map((i) => i.fieldPath)).toEqual([
      'baseConfiguration.durationMinutes',
      'baseConfiguration[0]',
      'baseConfiguration',
    ]);
    expect(inner.issues[0].fieldPath).toBe('durationMinutes');
  });

  it('should list distinct non-empty suggestions in order', () => {
    const result = new ValidationResult().addIssues([
      issue('warning', 'a', 'Lower intensity'),
      issue('warning', 'b', ''),
      issue('error', 'c', 'Shorten session'),
      issue('warning', 'd', 'Lower intensity'),
    ]);

    expect(result.suggestions).toEqual(['Lower intensity', 'Shorten session']);
  });

  it('should find issues by code', () => {
    const result = new ValidationResult().addIssue(issue('critical'));
    expect(result.hasIssue('CRITICAL')).toBe(true);
    expect(result.hasIssue('ERROR')).toBe(false);
  });

  it('should serialize derived fields and metadata', () => {
    const result = new ValidationResult().addIssue(issue('warning', 'x', 'Check x'));
    result.metadata.neuralLoad = 0.25;

    expect(result.toJSON()).toEqual({
      isValid: true,
      isSafe: true,
      overallScore: 0.9,
      issues: [issue('warning', 'x', 'Check x')],
      counts: { info: 0, warning: 1, error: 0, critical: 0 },
      suggestions: ['Check x'],
      metadata: { neuralLoad: 0.25 },
    });
  });

  it('should not share nested metadata with the serialized form', () => {
    const result = new ValidationResult();
    const recommendations = ['Rest before the session'];
    result.metadata.recommendations = recommendations;

    const json = result.toJSON();
    recommendations.push('Hydrate');

    expect(json.metadata.recommendations).toEqual(['Rest before the session']);
  });
});
