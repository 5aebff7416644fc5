/**
 * Error classes for caller and schema mistakes.
 *
 * Violations in candidate data come back from validate() as a ValidationErrorReport;
 * only parse() turns a report into a thrown RecordValidationError.
 */

import type { ValidationErrorReport } from './report.js';

/**
 * Thrown when validating or looking up a kind that was never defined
 */
export class UnknownRecordKindError extends Error {
  constructor(public readonly kind: string) {
    super(`Unknown record kind '${kind}'`);
    this.name = 'UnknownRecordKindError';
  }
}

/**
 * Thrown when a schema definition is malformed or redefines an existing kind
 */
export class SchemaDefinitionError extends Error {
  constructor(
    message: string,
    public readonly kind: string,
  ) {
    super(`Invalid schema '${kind}': ${message}`);
    this.name = 'SchemaDefinitionError';
  }
}

/**
 * Thrown when a typed accessor is used on a field of another type
 */
export class RecordAccessError extends Error {
  constructor(
    public readonly kind: string,
    public readonly field: string,
    public readonly expected: string,
  ) {
    super(`Field '${field}' of '${kind}' is not a ${expected}`);
    this.name = 'RecordAccessError';
  }
}

/**
 * Thrown when engine configuration from the environment is invalid
 */
export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Thrown by RecordEngine.parse; carries the full report
 */
export class RecordValidationError extends Error {
  constructor(public readonly report: ValidationErrorReport) {
    super(report.toString());
    this.name = 'RecordValidationError';
  }
}
