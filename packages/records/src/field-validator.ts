/**
 * Field phase: presence, coercion and constraint checks for every declared field.
 *
 * Exhaustive: every field is checked and every violation collected. A field whose value
 * cannot be coerced reports a single type_error and skips its constraints.
 */

import { coerceScalar } from './coercion.js';
import { checkConstraint, checkRequired, type ConstraintFailure } from './constraints.js';
import { TypedFields, ValidatedRecord } from './record.js';
import { ValidationErrorReport } from './report.js';
import { fail, ok, type Result } from './result.js';
import type {
  FieldDeclaration,
  FieldValue,
  NestedField,
  RawInput,
  RecordSchema,
  Violation,
} from './types.js';
import { appendIndex, describeValue, getType, isPlainObject } from './utils.js';

/** Runs the whole pipeline for an embedded record */
export type NestedValidator = (kind: string, raw: RawInput) => Result<ValidatedRecord>;

type FieldOutcome = { value: FieldValue; violations: Violation[] };

function at(path: string, failure: ConstraintFailure): Violation {
  return { path, ...failure };
}

export function validateFields(
  schema: RecordSchema,
  raw: RawInput,
  validateNested: NestedValidator,
): Result<TypedFields> {
  const violations: Violation[] = [];
  const values: [string, FieldValue][] = [];

  for (const field of schema.fields) {
    const rawValue = Object.prototype.hasOwnProperty.call(raw, field.name)
      ? raw[field.name]
      : undefined;

    const outcome = validateField(field, rawValue, validateNested);
    violations.push(...outcome.violations);
    values.push([field.name, outcome.value]);
  }

  if (violations.length > 0) {
    return fail(new ValidationErrorReport(schema.kind, violations));
  }
  return ok(new TypedFields(schema.kind, values));
}

function validateField(
  field: FieldDeclaration,
  rawValue: unknown,
  validateNested: NestedValidator,
): FieldOutcome {
  const path = field.name;

  if (rawValue === undefined || rawValue === null) {
    const missing = checkRequired(rawValue, field.optional === true);
    if (missing) {
      return { value: null, violations: [at(path, missing)] };
    }
    return { value: field.default ?? null, violations: [] };
  }

  switch (field.type) {
    case 'record':
      return validateEmbedded(field.of, rawValue, path, validateNested);
    case 'records':
      return validateCollection(field, rawValue, validateNested);
    default: {
      const coerced = coerceScalar(rawValue, field.type);
      if (!coerced.ok) {
        return { value: null, violations: [at(path, coerced.failure)] };
      }

      const { value } = coerced;
      const violations: Violation[] = [];
      if (!(value instanceof Date) && typeof value !== 'boolean') {
        for (const constraint of field.constraints ?? []) {
          const failure = checkConstraint(value, constraint);
          if (failure) violations.push(at(path, failure));
        }
      }
      return { value, violations };
    }
  }
}

function validateEmbedded(
  kind: string,
  rawValue: unknown,
  path: string,
  validateNested: NestedValidator,
): FieldOutcome {
  // Already validated records of the right kind are immutable, so they are taken as-is
  if (rawValue instanceof ValidatedRecord && rawValue.kind === kind) {
    return { value: rawValue, violations: [] };
  }

  if (!isPlainObject(rawValue)) {
    return {
      value: null,
      violations: [
        {
          path,
          kind: 'type_error',
          message: `Input should be a valid dictionary or ${kind} record`,
          expected: kind,
          actual: `${getType(rawValue)} ${describeValue(rawValue)}`,
        },
      ],
    };
  }

  const result = validateNested(kind, rawValue);
  if (!result.ok) {
    return { value: null, violations: result.error.prefixed(path) };
  }
  return { value: result.value, violations: [] };
}

function validateCollection(
  field: NestedField,
  rawValue: unknown,
  validateNested: NestedValidator,
): FieldOutcome {
  const path = field.name;

  if (!Array.isArray(rawValue)) {
    return {
      value: null,
      violations: [
        {
          path,
          kind: 'type_error',
          message: 'Input should be a valid list',
          expected: 'array',
          actual: `${getType(rawValue)} ${describeValue(rawValue)}`,
        },
      ],
    };
  }

  const items: readonly unknown[] = rawValue;
  const violations: Violation[] = [];
  for (const constraint of field.constraints ?? []) {
    const failure = checkConstraint(items, constraint);
    if (failure) violations.push(at(path, failure));
  }

  const records: ValidatedRecord[] = [];
  items.forEach((item, index) => {
    const outcome = validateEmbedded(field.of, item, appendIndex(path, index), validateNested);
    violations.push(...outcome.violations);
    if (outcome.value instanceof ValidatedRecord) records.push(outcome.value);
  });

  return { value: violations.length === 0 ? records : null, violations };
}
