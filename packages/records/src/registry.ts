/**
 * Schema registry: write-once store of record schemas keyed by kind.
 *
 * Populated during start-up and read-only afterwards, so one registry can back any number of
 * concurrent validations.
 */

import { SchemaDefinitionError, UnknownRecordKindError } from './errors.js';
import type {
  BusinessRule,
  Condition,
  Constraint,
  FieldDeclaration,
  FieldType,
  RecordSchema,
  RecordSchemaDefinition,
} from './types.js';
import { assertNever } from './utils.js';

// Which constraint kinds make sense on which field types
const CONSTRAINT_TARGETS: Record<Constraint['kind'], readonly FieldType[]> = {
  range: ['integer', 'float'],
  length: ['string'],
  membership: ['string', 'enum'],
  size: ['records'],
};

const NUMERIC: readonly FieldType[] = ['integer', 'float'];
const TEXTUAL: readonly FieldType[] = ['string', 'enum'];

function defaultMatches(field: FieldDeclaration, value: string | number | boolean): boolean {
  switch (field.type) {
    case 'string':
      return typeof value === 'string';
    case 'enum':
      return typeof value === 'string' && field.values.includes(value);
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'float':
      return typeof value === 'number' && Number.isFinite(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'timestamp':
    case 'record':
    case 'records':
      return false;
    default:
      return assertNever(field);
  }
}

export class SchemaRegistry {
  private schemas = new Map<string, RecordSchema>();

  /**
   * Check, freeze and store a schema. Nested kinds must be defined first.
   */
  define(definition: RecordSchemaDefinition): RecordSchema {
    const { kind } = definition;

    if (kind.trim() === '') {
      throw new SchemaDefinitionError('kind must not be empty', kind);
    }
    if (this.schemas.has(kind)) {
      throw new SchemaDefinitionError('kind is already defined', kind);
    }

    const fields = definition.fields.map((field) => this.normalizeField(kind, field));
    const byName = new Map<string, FieldDeclaration>();
    for (const field of fields) {
      if (byName.has(field.name)) {
        throw new SchemaDefinitionError(`duplicate field '${field.name}'`, kind);
      }
      byName.set(field.name, field);
    }

    const rules = (definition.rules ?? []).map((rule) => {
      this.checkRule(kind, rule, byName);
      return deepFreeze(structuredClone(rule));
    });

    const schema: RecordSchema = Object.freeze({
      kind,
      fields: Object.freeze(fields),
      rules: Object.freeze(rules),
    });
    this.schemas.set(kind, schema);
    return schema;
  }

  lookup(kind: string): RecordSchema {
    const schema = this.schemas.get(kind);
    if (!schema) {
      throw new UnknownRecordKindError(kind);
    }
    return schema;
  }

  has(kind: string): boolean {
    return this.schemas.has(kind);
  }

  kinds(): string[] {
    return [...this.schemas.keys()];
  }

  private normalizeField(kind: string, field: FieldDeclaration): FieldDeclaration {
    if (field.name.trim() === '') {
      throw new SchemaDefinitionError('field name must not be empty', kind);
    }

    for (const constraint of field.constraints ?? []) {
      if (!CONSTRAINT_TARGETS[constraint.kind].includes(field.type)) {
        throw new SchemaDefinitionError(
          `constraint '${constraint.kind}' cannot apply to ${field.type} field '${field.name}'`,
          kind,
        );
      }
    }

    if (field.default !== undefined && !defaultMatches(field, field.default)) {
      throw new SchemaDefinitionError(`default of '${field.name}' does not fit its type`, kind);
    }

    if ((field.type === 'record' || field.type === 'records') && !this.schemas.has(field.of)) {
      throw new SchemaDefinitionError(
        `field '${field.name}' embeds undefined kind '${field.of}'`,
        kind,
      );
    }

    // Enum fields check their tag set before any other constraint
    const constraints: Constraint[] =
      field.type === 'enum'
        ? [{ kind: 'membership', allowed: field.values }, ...(field.constraints ?? [])]
        : [...(field.constraints ?? [])];

    return deepFreeze(
      structuredClone({
        ...field,
        optional: field.optional === true || field.default !== undefined,
        constraints,
      }),
    );
  }

  private checkRule(
    kind: string,
    rule: BusinessRule,
    fields: ReadonlyMap<string, FieldDeclaration>,
  ): void {
    const expect = (
      scope: ReadonlyMap<string, FieldDeclaration>,
      name: string,
      types: readonly FieldType[],
    ): void => {
      const field = scope.get(name);
      if (!field || !types.includes(field.type)) {
        throw new SchemaDefinitionError(
          `rule '${rule.name}' needs a ${types.join('/')} field '${name}'`,
          kind,
        );
      }
    };

    const memberFields = (collection: string): ReadonlyMap<string, FieldDeclaration> => {
      const field = fields.get(collection);
      if (field?.type !== 'records') {
        throw new SchemaDefinitionError(
          `rule '${rule.name}' needs a records field '${collection}'`,
          kind,
        );
      }
      return new Map(this.lookup(field.of).fields.map((f) => [f.name, f]));
    };

    const expectCondition = (condition: Condition): void => {
      expect(fields, condition.field, TEXTUAL);
      const field = fields.get(condition.field);
      if (field?.type === 'enum' && !field.values.includes(condition.equals)) {
        throw new SchemaDefinitionError(
          `rule '${rule.name}' compares '${condition.field}' with unknown tag '${condition.equals}'`,
          kind,
        );
      }
    };

    switch (rule.kind) {
      case 'prefix':
        expect(fields, rule.field, ['string']);
        break;
      case 'flag_when':
        expectCondition(rule.when);
        expect(fields, rule.flag, ['boolean']);
        break;
      case 'minimum_when':
        expectCondition(rule.when);
        expect(fields, rule.field, NUMERIC);
        break;
      case 'text_when_above':
        expect(fields, rule.field, NUMERIC);
        expect(fields, rule.text, ['string']);
        break;
      case 'any_member_in':
        expect(memberFields(rule.collection), rule.field, TEXTUAL);
        break;
      case 'member_share_when':
        expect(fields, rule.when.field, NUMERIC);
        expect(memberFields(rule.collection), rule.member.field, NUMERIC);
        if (!(rule.share > 0 && rule.share <= 1)) {
          throw new SchemaDefinitionError(`rule '${rule.name}' share must be in (0, 1]`, kind);
        }
        break;
      case 'all_members':
        expect(memberFields(rule.collection), rule.flag, ['boolean']);
        break;
      default:
        assertNever(rule);
    }
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}
