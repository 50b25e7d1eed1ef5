/**
 * Engine Error Types
 *
 * Exceptions are reserved for programmer errors and the input sanitizer.
 * Everything a user can fix is reported as a ValidationIssue instead.
 */

/**
 * Thrown when a declarative field schema is itself malformed
 */
export class SchemaDefinitionError extends Error {
  constructor(
    public readonly fieldPath: string,
    public readonly reason: string
  ) {
    super(`Invalid schema definition at '${fieldPath}': ${reason}`);
    this.name = 'SchemaDefinitionError';
  }
}

/**
 * Thrown by the user-input sanitizer on empty, oversized, malformed or dangerous input
 */
export class InputSanitizationError extends Error {
  constructor(
    public readonly inputType: string,
    public readonly reason: string
  ) {
    super(`Rejected ${inputType} input: ${reason}`);
    this.name = 'InputSanitizationError';
  }
}

/**
 * Thrown when the static reference tables are missing or fail their shape check
 */
export class ReferenceDataError extends Error {
  constructor(
    public readonly source: string,
    public readonly details: string[]
  ) {
    super(`Reference data '${source}' is invalid: ${details.join('; ')}`);
    this.name = 'ReferenceDataError';
  }
}

/**
 * Thrown when a serialized neural profile does not match the profile record shape
 */
export class ProfileFormatError extends Error {
  constructor(public readonly details: string[]) {
    super(`Profile format invalid: ${details.join('; ')}`);
    this.name = 'ProfileFormatError';
  }
}
