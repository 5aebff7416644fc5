// Core type definitions for record schemas, rules and violations

import type { ValidatedRecord } from './record.js';

// Semantic types a field can declare
export type FieldType =
  | 'string'
  | 'integer'
  | 'float'
  | 'boolean'
  | 'timestamp'
  | 'enum'
  | 'record'
  | 'records';

// ============================================================================
// Constraints
// ============================================================================

// Bounds are inclusive; an omitted bound is open
export type RangeConstraint = { kind: 'range'; min?: number; max?: number };
export type LengthConstraint = { kind: 'length'; min?: number; max?: number };
export type MembershipConstraint = { kind: 'membership'; allowed: readonly string[] };
export type SizeConstraint = { kind: 'size'; min?: number; max?: number };

export type Constraint = RangeConstraint | LengthConstraint | MembershipConstraint | SizeConstraint;

// ============================================================================
// Field declarations
// ============================================================================

type FieldBase = {
  name: string;
  optional?: boolean;
  /** Used when the value is absent; implies optional */
  default?: string | number | boolean;
  constraints?: readonly Constraint[];
};

export type ScalarField = FieldBase & {
  type: 'string' | 'integer' | 'float' | 'boolean' | 'timestamp';
};

export type EnumField = FieldBase & {
  type: 'enum';
  values: readonly string[];
};

export type NestedField = FieldBase & {
  type: 'record' | 'records';
  /** Kind of the embedded record(s); must already be defined */
  of: string;
};

export type FieldDeclaration = ScalarField | EnumField | NestedField;

// ============================================================================
// Business rules
// ============================================================================

export type Condition = { field: string; equals: string };

type RuleBase = {
  /** Stable identifier, e.g. 'contact_id_prefix' */
  name: string;
  /** Human-readable violation message */
  message: string;
};

export type BusinessRule =
  | (RuleBase & { kind: 'prefix'; field: string; prefix: string })
  | (RuleBase & { kind: 'flag_when'; when: Condition; flag: string })
  | (RuleBase & { kind: 'minimum_when'; when: Condition; field: string; minimum: number })
  | (RuleBase & { kind: 'text_when_above'; field: string; threshold: number; text: string })
  | (RuleBase & {
      kind: 'any_member_in';
      collection: string;
      field: string;
      allowed: readonly string[];
    })
  | (RuleBase & {
      kind: 'member_share_when';
      collection: string;
      when: { field: string; greaterThan: number };
      member: { field: string; minimum: number };
      share: number;
    })
  | (RuleBase & { kind: 'all_members'; collection: string; flag: string });

// ============================================================================
// Schemas
// ============================================================================

export type RecordSchemaDefinition = {
  kind: string;
  fields: readonly FieldDeclaration[];
  rules?: readonly BusinessRule[];
};

export type RecordSchema = {
  readonly kind: string;
  readonly fields: readonly FieldDeclaration[];
  readonly rules: readonly BusinessRule[];
};

// ============================================================================
// Values
// ============================================================================

export type RawInput = Readonly<Record<string, unknown>>;

export type FieldValue =
  | string
  | number
  | boolean
  | Date
  | null
  | ValidatedRecord
  | readonly ValidatedRecord[];

// ============================================================================
// Violations
// ============================================================================

export const VIOLATION_KINDS = [
  'type_error',
  'range_error',
  'length_error',
  'enum_error',
  'size_error',
  'business_rule_error',
] as const;

export type ViolationKind = (typeof VIOLATION_KINDS)[number];

export type Violation = {
  path: string; // e.g. "crew[2].years_experience"
  kind: ViolationKind;
  message: string;
  expected?: string;
  actual?: string;
};
