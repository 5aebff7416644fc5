/**
 * Rule phase: business rules over a field-valid record.
 *
 * Rules run in declaration order and the first failure ends the phase, so a rejected record
 * carries exactly one business_rule_error.
 */

import { sealRecord, type TypedFields, type ValidatedRecord } from './record.js';
import { ValidationErrorReport } from './report.js';
import { fail, ok, type Result } from './result.js';
import type { BusinessRule, Condition, RecordSchema, Violation } from './types.js';
import { assertNever } from './utils.js';

function numberOrNull(fields: TypedFields, name: string): number | null {
  const value = fields.get(name);
  return typeof value === 'number' ? value : null;
}

function holds(fields: TypedFields, condition: Condition): boolean {
  return fields.get(condition.field) === condition.equals;
}

/**
 * Evaluate a single rule. Returns true when the rule is satisfied.
 */
export function evaluateRule(rule: BusinessRule, fields: TypedFields): boolean {
  switch (rule.kind) {
    case 'prefix': {
      const value = fields.optionalString(rule.field);
      return value !== null && value.startsWith(rule.prefix);
    }
    case 'flag_when':
      return !holds(fields, rule.when) || fields.boolean(rule.flag);
    case 'minimum_when': {
      if (!holds(fields, rule.when)) return true;
      const value = numberOrNull(fields, rule.field);
      return value !== null && value >= rule.minimum;
    }
    case 'text_when_above': {
      const value = numberOrNull(fields, rule.field);
      if (value === null || value <= rule.threshold) return true;
      const text = fields.optionalString(rule.text);
      return text !== null && text.length > 0;
    }
    case 'any_member_in':
      return fields.records(rule.collection).some((member) => {
        const tag = member.optionalString(rule.field);
        return tag !== null && rule.allowed.includes(tag);
      });
    case 'member_share_when': {
      const trigger = numberOrNull(fields, rule.when.field);
      if (trigger === null || trigger <= rule.when.greaterThan) return true;
      const members = fields.records(rule.collection);
      const qualified = members.filter((member) => {
        const value = numberOrNull(member, rule.member.field);
        return value !== null && value >= rule.member.minimum;
      }).length;
      // Real-number comparison: 1 of 3 fails a 0.5 share, 2 of 3 passes
      return qualified >= members.length * rule.share;
    }
    case 'all_members':
      return fields.records(rule.collection).every((member) => member.boolean(rule.flag));
    default:
      return assertNever(rule);
  }
}

/**
 * The field a rule violation is reported against
 */
export function ruleField(rule: BusinessRule): string {
  switch (rule.kind) {
    case 'prefix':
    case 'minimum_when':
      return rule.field;
    case 'text_when_above':
      return rule.text;
    case 'flag_when':
      return rule.flag;
    case 'any_member_in':
    case 'member_share_when':
    case 'all_members':
      return rule.collection;
    default:
      return assertNever(rule);
  }
}

export function ruleViolation(rule: BusinessRule): Violation {
  return {
    path: ruleField(rule),
    kind: 'business_rule_error',
    message: rule.message,
    expected: rule.name,
  };
}

export function validateRules(schema: RecordSchema, fields: TypedFields): Result<ValidatedRecord> {
  for (const rule of schema.rules) {
    if (!evaluateRule(rule, fields)) {
      return fail(new ValidationErrorReport(schema.kind, [ruleViolation(rule)]));
    }
  }
  return ok(sealRecord(fields));
}
