/** Ordered, non-empty collection of violations from one validation run */

import type { Violation } from './types.js';
import { joinPath } from './utils.js';

export class ValidationErrorReport implements Iterable<Violation> {
  readonly violations: readonly Violation[];

  constructor(
    readonly kind: string,
    violations: readonly Violation[],
  ) {
    if (violations.length === 0) {
      throw new RangeError(`A validation error report for '${kind}' needs at least one violation`);
    }
    this.violations = Object.freeze(violations.map((violation) => Object.freeze({ ...violation })));
    Object.freeze(this);
  }

  get count(): number {
    return this.violations.length;
  }

  /** First violation in production order */
  get first(): Violation {
    return this.violations[0];
  }

  [Symbol.iterator](): Iterator<Violation> {
    return this.violations[Symbol.iterator]();
  }

  /**
   * Violations relocated under a parent path, as reported by an embedding record
   */
  prefixed(parent: string): Violation[] {
    return this.violations.map((violation) => ({
      ...violation,
      path: joinPath(parent, violation.path),
    }));
  }

  /**
   * Render for logs and API responses:
   *
   * ```
   * 2 validation errors for station
   * crew_size
   *   Input should be less than or equal to 20 [range_error]
   * ```
   */
  toString(): string {
    const noun = this.count === 1 ? 'error' : 'errors';
    const lines = [`${this.count} validation ${noun} for ${this.kind}`];
    for (const violation of this.violations) {
      lines.push(violation.path === '' ? '(record)' : violation.path);
      lines.push(`  ${violation.message} [${violation.kind}]`);
    }
    return lines.join('\n');
  }

  toJSON(): { kind: string; violations: readonly Violation[] } {
    return { kind: this.kind, violations: this.violations };
  }
}
