/**
 * Schema Validator
 *
 * Validates a record of fields against a declarative SchemaDefinition.
 * Pure: (data, schema) → issues. A malformed schema throws SchemaDefinitionError.
 *
 * Per field:
 * - required but absent → one error, nothing else checked
 * - wrong type → one error, range/pattern checks skipped
 * - range, length, pattern, enum and item-count checks are independent
 */

import { SchemaDefinitionError } from '../shared/errors.js';
import { FIELD_TYPES, type FieldSchema, type FieldType, type SchemaDefinition, type ValidationIssue } from './types.js';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})?)?$/;

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Validate data against schema
 *
 * @param context - path prefix for nested validation
 */
export function validateAgainstSchema(
  data: unknown,
  schema: SchemaDefinition,
  context = ''
): ValidationIssue[] {
  assertSchemaDefinition(schema, context);
  return validateObject(data, schema, context);
}

/**
 * Throw if a schema definition cannot be applied
 */
export function assertSchemaDefinition(schema: SchemaDefinition, context = ''): void {
  for (const [fieldName, fieldSchema] of Object.entries(schema)) {
    assertFieldSchema(fieldSchema, context ? `${context}.${fieldName}` : fieldName);
  }
}

function assertFieldSchema(fieldSchema: FieldSchema, fieldPath: string): void {
  if (!FIELD_TYPES.includes(fieldSchema.type)) {
    throw new SchemaDefinitionError(fieldPath, `unknown type '${String(fieldSchema.type)}'`);
  }

  const bounds: Array<[string, number | undefined, number | undefined]> = [
    ['value', fieldSchema.minValue, fieldSchema.maxValue],
    ['length', fieldSchema.minLength, fieldSchema.maxLength],
    ['items', fieldSchema.minItems, fieldSchema.maxItems],
  ];
  for (const [label, min, max] of bounds) {
    if (min !== undefined && max !== undefined && min > max) {
      throw new SchemaDefinitionError(fieldPath, `min ${label} ${min} exceeds max ${label} ${max}`);
    }
    if (label !== 'value' && ((min !== undefined && min < 0) || (max !== undefined && max < 0))) {
      throw new SchemaDefinitionError(fieldPath, `${label} bounds must be non-negative`);
    }
  }

  if (fieldSchema.pattern !== undefined) {
    try {
      new RegExp(fieldSchema.pattern);
    } catch (error) {
      throw new SchemaDefinitionError(
        fieldPath,
        `invalid pattern (${error instanceof Error ? error.message : String(error)})`
      );
    }
  }

  if (fieldSchema.items) {
    assertFieldSchema(fieldSchema.items, `${fieldPath}[]`);
  }
  if (fieldSchema.properties) {
    if (fieldSchema.type !== 'object') {
      throw new SchemaDefinitionError(fieldPath, 'properties given for a non-object field');
    }
    assertSchemaDefinition(fieldSchema.properties, fieldPath);
  }
}

function validateObject(data: unknown, schema: SchemaDefinition, context: string): ValidationIssue[] {
  if (!isPlainObject(data)) {
    const fieldPath = context || '$';
    return [
      {
        severity: 'error',
        fieldPath,
        message: `Invalid type for ${fieldPath}: expected object, got ${describeType(data)}`,
        value: data,
        suggestion: 'Provide the configuration as a key/value object',
        code: 'INVALID_TYPE',
      },
    ];
  }

  const issues: ValidationIssue[] = [];

  for (const [fieldName, fieldSchema] of Object.entries(schema)) {
    const fieldPath = context ? `${context}.${fieldName}` : fieldName;
    const value = Object.prototype.hasOwnProperty.call(data, fieldName) ? data[fieldName] : undefined;

    if (value === undefined) {
      if (fieldSchema.required) {
        issues.push({
          severity: 'error',
          fieldPath,
          message: `Required field missing: ${fieldPath}`,
          suggestion: `Add ${fieldPath} to the configuration`,
          code: 'REQUIRED_FIELD_MISSING',
        });
      }
      continue;
    }

    issues.push(...validateField(value, fieldSchema, fieldPath));
  }

  return issues;
}

function validateField(value: unknown, fieldSchema: FieldSchema, fieldPath: string): ValidationIssue[] {
  if (!matchesType(value, fieldSchema.type)) {
    return [
      {
        severity: 'error',
        fieldPath,
        message: `Invalid type for ${fieldPath}: expected ${fieldSchema.type}, got ${describeType(value)}`,
        value,
        suggestion: `Provide ${fieldPath} as ${fieldSchema.type}`,
        code: 'INVALID_TYPE',
      },
    ];
  }

  if (typeof value === 'number') {
    return checkNumber(value, fieldSchema, fieldPath);
  }
  if (typeof value === 'string' && fieldSchema.type === 'string') {
    return checkString(value, fieldSchema, fieldPath);
  }
  if (Array.isArray(value)) {
    return checkArray(value, fieldSchema, fieldPath);
  }
  if (fieldSchema.type === 'object' && fieldSchema.properties) {
    return validateObject(value, fieldSchema.properties, fieldPath);
  }
  return [];
}

function checkNumber(value: number, fieldSchema: FieldSchema, fieldPath: string): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  if (fieldSchema.minValue !== undefined && value < fieldSchema.minValue) {
    issues.push({
      severity: 'error',
      fieldPath,
      message: `${fieldPath} must be >= ${fieldSchema.minValue}, got ${value}`,
      value,
      suggestion: `Increase ${fieldPath} to at least ${fieldSchema.minValue}`,
      code: 'VALUE_BELOW_MINIMUM',
    });
  }

  if (fieldSchema.maxValue !== undefined && value > fieldSchema.maxValue) {
    issues.push({
      severity: 'error',
      fieldPath,
      message: `${fieldPath} must be <= ${fieldSchema.maxValue}, got ${value}`,
      value,
      suggestion: `Reduce ${fieldPath} to at most ${fieldSchema.maxValue}`,
      code: 'VALUE_ABOVE_MAXIMUM',
    });
  }

  return issues;
}

function checkString(value: string, fieldSchema: FieldSchema, fieldPath: string): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  if (fieldSchema.minLength !== undefined && value.length < fieldSchema.minLength) {
    issues.push({
      severity: 'error',
      fieldPath,
      message: `${fieldPath} must be at least ${fieldSchema.minLength} characters`,
      value,
      suggestion: `Lengthen ${fieldPath}`,
      code: 'STRING_TOO_SHORT',
    });
  }

  if (fieldSchema.maxLength !== undefined && value.length > fieldSchema.maxLength) {
    issues.push({
      severity: 'error',
      fieldPath,
      message: `${fieldPath} must be at most ${fieldSchema.maxLength} characters`,
      value,
      suggestion: `Shorten ${fieldPath}`,
      code: 'STRING_TOO_LONG',
    });
  }

  if (fieldSchema.pattern !== undefined && !new RegExp(fieldSchema.pattern).test(value)) {
    issues.push({
      severity: 'error',
      fieldPath,
      message: `${fieldPath} does not match the required format`,
      value,
      suggestion: `Use only the characters allowed by ${fieldSchema.pattern}`,
      code: 'PATTERN_MISMATCH',
    });
  }

  if (fieldSchema.allowedValues && !fieldSchema.allowedValues.includes(value)) {
    issues.push({
      severity: 'error',
      fieldPath,
      message: `${fieldPath} must be one of: ${fieldSchema.allowedValues.join(', ')}`,
      value,
      suggestion: `Choose one of: ${fieldSchema.allowedValues.slice(0, 5).join(', ')}`,
      code: 'VALUE_NOT_ALLOWED',
    });
  }

  return issues;
}

function checkArray(value: readonly unknown[], fieldSchema: FieldSchema, fieldPath: string): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  if (fieldSchema.minItems !== undefined && value.length < fieldSchema.minItems) {
    issues.push({
      severity: 'error',
      fieldPath,
      message: `${fieldPath} must have at least ${fieldSchema.minItems} items, got ${value.length}`,
      value,
      suggestion: `Add items to ${fieldPath}`,
      code: 'ARRAY_TOO_SHORT',
    });
  }

  if (fieldSchema.maxItems !== undefined && value.length > fieldSchema.maxItems) {
    issues.push({
      severity: 'error',
      fieldPath,
      message: `${fieldPath} must have at most ${fieldSchema.maxItems} items, got ${value.length}`,
      value,
      suggestion: `Remove items from ${fieldPath}`,
      code: 'ARRAY_TOO_LONG',
    });
  }

  const itemSchema = fieldSchema.items;
  if (itemSchema) {
    value.forEach((item, index) => {
      issues.push(...validateField(item, itemSchema, `${fieldPath}[${index}]`));
    });
  }

  return issues;
}

function matchesType(value: unknown, type: FieldType): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'float':
      return typeof value === 'number' && Number.isFinite(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'array':
      return Array.isArray(value);
    case 'object':
      return isPlainObject(value);
    case 'datetime':
      if (value instanceof Date) return !Number.isNaN(value.getTime());
      return typeof value === 'string' && ISO_DATE.test(value) && !Number.isNaN(Date.parse(value));
  }
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Date) return 'datetime';
  if (typeof value === 'number') return Number.isInteger(value) ? 'integer' : 'float';
  return typeof value;
}
