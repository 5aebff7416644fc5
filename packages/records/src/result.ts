import type { ValidationErrorReport } from './report.js';

/** Outcome of a validation phase: a value, or a report. Never both. */
export type Result<T> = { ok: true; value: T } | { ok: false; error: ValidationErrorReport };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(error: ValidationErrorReport): Result<T> {
  return { ok: false, error };
}
