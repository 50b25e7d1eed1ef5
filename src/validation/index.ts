/**
 * Validation Module
 *
 * Issue model, declarative schema checks, input sanitizing and frequency checks.
 */

// Types
export type {
  IssueSeverity,
  ValidationIssue,
  IssueCounts,
  FieldType,
  FieldSchema,
  SchemaDefinition,
  RiskLevel,
  NeuralLoadFactors,
  ValidationMetadata,
  ValidationResultJSON,
  FrequencyKind,
  SessionConfig,
  BiofieldConfiguration,
  SafetyParameters,
} from './types.js';
export { SEVERITIES, FIELD_TYPES } from './types.js';

// Result
export { ValidationResult, ERROR_PENALTY, WARNING_PENALTY } from './validation-result.js';
export { createValidationReport } from './validation-report.js';
export type { ValidationReport, ValidationReportEntry } from './validation-report.js';

// Schema
export { validateAgainstSchema, assertSchemaDefinition, isPlainObject } from './schema-validator.js';
export { SESSION_CONFIG_SCHEMA, PRESET_CONFIG_SCHEMA, PRESET_CATEGORIES } from './session-schemas.js';

// Input
export { sanitizeUserInput, USER_INPUT_PATTERNS } from './input-sanitizer.js';
export type { UserInputType, SanitizeOptions } from './input-sanitizer.js';

// Frequencies
export {
  validateFrequencyValue,
  validateBiofieldCoherence,
  calculateBiofieldCoherence,
  coherenceLevelFor,
  BIOFIELD_COMPONENTS,
} from './frequency-validator.js';
export type { BiofieldComponent } from './frequency-validator.js';
