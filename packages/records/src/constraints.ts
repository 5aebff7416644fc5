// Constraint primitives: pure checks over already-coerced values

import type {
  Constraint,
  LengthConstraint,
  MembershipConstraint,
  RangeConstraint,
  SizeConstraint,
  Violation,
} from './types.js';
import { assertNever, characterLength, describeValue, listTags } from './utils.js';

/** A violation not yet placed at a path */
export type ConstraintFailure = Omit<Violation, 'path'>;

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/**
 * Validate a number against an inclusive range
 */
export function checkRange(value: number, constraint: RangeConstraint): ConstraintFailure | null {
  if (constraint.min !== undefined && value < constraint.min) {
    return {
      kind: 'range_error',
      message: `Input should be greater than or equal to ${constraint.min}`,
      expected: `>= ${constraint.min}`,
      actual: String(value),
    };
  }

  if (constraint.max !== undefined && value > constraint.max) {
    return {
      kind: 'range_error',
      message: `Input should be less than or equal to ${constraint.max}`,
      expected: `<= ${constraint.max}`,
      actual: String(value),
    };
  }

  return null;
}

/**
 * Validate a string's character count against an inclusive range
 */
export function checkLength(value: string, constraint: LengthConstraint): ConstraintFailure | null {
  const length = characterLength(value);

  if (constraint.min !== undefined && length < constraint.min) {
    return {
      kind: 'length_error',
      message: `String should have at least ${plural(constraint.min, 'character')}`,
      expected: `length >= ${constraint.min}`,
      actual: `length = ${length}`,
    };
  }

  if (constraint.max !== undefined && length > constraint.max) {
    return {
      kind: 'length_error',
      message: `String should have at most ${plural(constraint.max, 'character')}`,
      expected: `length <= ${constraint.max}`,
      actual: `length = ${length}`,
    };
  }

  return null;
}

/**
 * Validate that a tag belongs to the allowed set
 */
export function checkMembership(
  value: string,
  constraint: MembershipConstraint,
): ConstraintFailure | null {
  if (constraint.allowed.includes(value)) {
    return null;
  }

  return {
    kind: 'enum_error',
    message: `Input should be ${listTags(constraint.allowed)}`,
    expected: `one of: ${constraint.allowed.join(', ')}`,
    actual: describeValue(value),
  };
}

/**
 * Validate a collection's element count against an inclusive range
 */
export function checkSize(count: number, constraint: SizeConstraint): ConstraintFailure | null {
  if (constraint.min !== undefined && count < constraint.min) {
    return {
      kind: 'size_error',
      message: `List should have at least ${plural(constraint.min, 'item')}, not ${count}`,
      expected: `count >= ${constraint.min}`,
      actual: `count = ${count}`,
    };
  }

  if (constraint.max !== undefined && count > constraint.max) {
    return {
      kind: 'size_error',
      message: `List should have at most ${plural(constraint.max, 'item')}, not ${count}`,
      expected: `count <= ${constraint.max}`,
      actual: `count = ${count}`,
    };
  }

  return null;
}

/**
 * Presence check run before coercion. Optional fields accept absent values.
 */
export function checkRequired(value: unknown, optional: boolean): ConstraintFailure | null {
  if (optional || (value !== undefined && value !== null)) {
    return null;
  }

  return {
    kind: 'type_error',
    message: 'Field required',
    expected: 'value',
    actual: value === null ? 'null' : 'missing',
  };
}

/** Values the primitives operate on once coercion has succeeded */
export type ConstrainedValue = string | number | readonly unknown[];

/**
 * Apply one constraint to a coerced value.
 * The registry only accepts constraints that fit the field type, so a mismatch here is a bug.
 */
export function checkConstraint(
  value: ConstrainedValue,
  constraint: Constraint,
): ConstraintFailure | null {
  switch (constraint.kind) {
    case 'range':
      if (typeof value === 'number') return checkRange(value, constraint);
      break;
    case 'length':
      if (typeof value === 'string') return checkLength(value, constraint);
      break;
    case 'membership':
      if (typeof value === 'string') return checkMembership(value, constraint);
      break;
    case 'size':
      if (Array.isArray(value)) return checkSize(value.length, constraint);
      break;
    default:
      return assertNever(constraint);
  }

  throw new TypeError(`Constraint '${constraint.kind}' cannot apply to ${describeValue(value)}`);
}

// Builders for schema declarations

export function range(min?: number, max?: number): RangeConstraint {
  return { kind: 'range', min, max };
}

export function length(min?: number, max?: number): LengthConstraint {
  return { kind: 'length', min, max };
}

export function oneOf(allowed: readonly string[]): MembershipConstraint {
  return { kind: 'membership', allowed };
}

export function size(min?: number, max?: number): SizeConstraint {
  return { kind: 'size', min, max };
}
