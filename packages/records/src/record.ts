/**
 * Typed field values and the immutable validated record built from them.
 *
 * TypedFields is what the field phase produces and the rule phase reads. A ValidatedRecord
 * can only be sealed by the rule phase once every business rule has passed.
 */

import { RecordAccessError } from './errors.js';
import type { FieldValue } from './types.js';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

const SEAL = Symbol('validated-record');

function isRecordList(value: FieldValue): value is readonly ValidatedRecord[] {
  return Array.isArray(value);
}

function copyValue(value: FieldValue): FieldValue {
  return value instanceof Date ? new Date(value.getTime()) : value;
}

export class TypedFields {
  protected readonly values: ReadonlyMap<string, FieldValue>;

  constructor(
    readonly kind: string,
    values: Iterable<readonly [string, FieldValue]>,
  ) {
    const copied = new Map<string, FieldValue>();
    for (const [name, value] of values) {
      copied.set(name, isRecordList(value) ? Object.freeze([...value]) : copyValue(value));
    }
    this.values = copied;
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  fieldNames(): string[] {
    return [...this.values.keys()];
  }

  get(name: string): FieldValue {
    if (!this.values.has(name)) {
      throw new RecordAccessError(this.kind, name, 'declared field');
    }
    return copyValue(this.values.get(name) ?? null);
  }

  string(name: string): string {
    const value = this.get(name);
    if (typeof value !== 'string') throw new RecordAccessError(this.kind, name, 'string');
    return value;
  }

  optionalString(name: string): string | null {
    const value = this.get(name);
    if (value === null) return null;
    if (typeof value !== 'string') throw new RecordAccessError(this.kind, name, 'string');
    return value;
  }

  number(name: string): number {
    const value = this.get(name);
    if (typeof value !== 'number') throw new RecordAccessError(this.kind, name, 'number');
    return value;
  }

  boolean(name: string): boolean {
    const value = this.get(name);
    if (typeof value !== 'boolean') throw new RecordAccessError(this.kind, name, 'boolean');
    return value;
  }

  timestamp(name: string): Date {
    const value = this.get(name);
    if (!(value instanceof Date)) throw new RecordAccessError(this.kind, name, 'timestamp');
    return value;
  }

  record(name: string): ValidatedRecord {
    const value = this.get(name);
    if (!(value instanceof ValidatedRecord)) throw new RecordAccessError(this.kind, name, 'record');
    return value;
  }

  records(name: string): readonly ValidatedRecord[] {
    const value = this.get(name);
    if (!isRecordList(value)) throw new RecordAccessError(this.kind, name, 'record collection');
    return value;
  }
}

/**
 * A record that satisfied every field constraint and business rule when it was created.
 * Read-only: changing a value means validating a new raw input.
 */
export class ValidatedRecord extends TypedFields {
  constructor(seal: symbol, fields: TypedFields) {
    if (seal !== SEAL) {
      throw new TypeError('ValidatedRecord instances are only created by validation');
    }
    super(fields.kind, fields.fieldNames().map((name) => [name, fields.get(name)] as const));
    Object.freeze(this);
  }

  /**
   * Plain JSON view: timestamps as ISO text, nested records expanded
   */
  toJSON(): Record<string, JsonValue> {
    const json: Record<string, JsonValue> = {};
    for (const [name, value] of this.values) {
      json[name] = toJsonValue(value);
    }
    return json;
  }
}

function toJsonValue(value: FieldValue): JsonValue {
  if (value instanceof Date) return value.toISOString();
  if (value instanceof ValidatedRecord) return value.toJSON();
  if (isRecordList(value)) return value.map((item) => item.toJSON());
  return value;
}

/**
 * Seal rule-checked fields into a ValidatedRecord. Internal to the rule phase.
 */
export function sealRecord(fields: TypedFields): ValidatedRecord {
  return new ValidatedRecord(SEAL, fields);
}
