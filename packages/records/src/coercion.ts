// Raw value coercion to declared scalar types

import { z } from 'zod';
import type { ConstraintFailure } from './constraints.js';
import type { ScalarField } from './types.js';
import { describeValue, getType } from './utils.js';

export type Coerced<T> = { ok: true; value: T } | { ok: false; failure: ConstraintFailure };

// ISO-8601 date-time (offset optional) or a bare calendar date
const isoTimestamp = z.union([
  z.string().datetime({ offset: true, local: true }),
  z.string().date(),
]);

const INTEGER_TEXT = /^[+-]?\d+$/;
const NUMBER_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const TRUE_TEXT = new Set(['true', 't', 'yes', 'y', 'on', '1']);
const FALSE_TEXT = new Set(['false', 'f', 'no', 'n', 'off', '0']);

function typeError(expected: string, value: unknown, message?: string): Coerced<never> {
  return {
    ok: false,
    failure: {
      kind: 'type_error',
      message: message ?? `Input should be a valid ${expected}`,
      expected,
      actual: `${getType(value)} ${describeValue(value)}`,
    },
  };
}

export function coerceString(value: unknown): Coerced<string> {
  if (typeof value === 'string') return { ok: true, value };
  return typeError('string', value);
}

export function coerceInteger(value: unknown): Coerced<number> {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return typeError('integer', value);
    if (!Number.isInteger(value)) {
      return typeError(
        'integer',
        value,
        'Input should be a valid integer, got a number with a fractional part',
      );
    }
    return { ok: true, value };
  }

  if (typeof value === 'string' && INTEGER_TEXT.test(value.trim())) {
    const parsed = Number(value.trim());
    if (Number.isSafeInteger(parsed)) return { ok: true, value: parsed };
  }

  return typeError('integer', value);
}

export function coerceFloat(value: unknown): Coerced<number> {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? { ok: true, value } : typeError('number', value);
  }

  if (typeof value === 'string' && NUMBER_TEXT.test(value.trim())) {
    const parsed = Number(value.trim());
    if (Number.isFinite(parsed)) return { ok: true, value: parsed };
  }

  return typeError('number', value);
}

export function coerceBoolean(value: unknown): Coerced<boolean> {
  if (typeof value === 'boolean') return { ok: true, value };
  if (value === 0 || value === 1) return { ok: true, value: value === 1 };

  if (typeof value === 'string') {
    const text = value.trim().toLowerCase();
    if (TRUE_TEXT.has(text)) return { ok: true, value: true };
    if (FALSE_TEXT.has(text)) return { ok: true, value: false };
  }

  return typeError('boolean', value);
}

export function coerceTimestamp(value: unknown): Coerced<Date> {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? typeError('datetime', value) : { ok: true, value };
  }

  if (typeof value === 'string' && isoTimestamp.safeParse(value).success) {
    const parsed = new Date(value);
    if (!Number.isNaN(parsed.getTime())) return { ok: true, value: parsed };
  }

  return typeError('datetime', value);
}

/**
 * Coerce a present value to a scalar field's declared type
 */
export function coerceScalar(
  value: unknown,
  type: ScalarField['type'] | 'enum',
): Coerced<string | number | boolean | Date> {
  switch (type) {
    case 'string':
    case 'enum':
      return coerceString(value);
    case 'integer':
      return coerceInteger(value);
    case 'float':
      return coerceFloat(value);
    case 'boolean':
      return coerceBoolean(value);
    case 'timestamp':
      return coerceTimestamp(value);
  }
}
