import { describe, expect, it } from 'vitest';
import { createCatalogRegistry } from '../src/catalog/index.js';
import { length, range, size } from '../src/constraints.js';
import { SchemaDefinitionError, UnknownRecordKindError } from '../src/errors.js';
import { SchemaRegistry } from '../src/registry.js';
import type { RecordSchemaDefinition } from '../src/types.js';

const part: RecordSchemaDefinition = {
  kind: 'part',
  fields: [
    { name: 'code', type: 'string', constraints: [length(2, 4)] },
    { name: 'grade', type: 'enum', values: ['a', 'b'] },
    { name: 'weight', type: 'float', constraints: [range(0)] },
    { name: 'certified', type: 'boolean', default: false },
  ],
};

describe('SchemaRegistry', () => {
  it('defines and looks up a schema', () => {
    const registry = new SchemaRegistry();

    const schema = registry.define(part);

    expect(registry.lookup('part')).toBe(schema);
    expect(registry.has('part')).toBe(true);
    expect(schema.fields.map((f) => f.name)).toEqual(['code', 'grade', 'weight', 'certified']);
    expect(schema.rules).toEqual([]);
  });

  it('freezes the stored schema', () => {
    const registry = new SchemaRegistry();

    const schema = registry.define(part);

    expect(Object.isFrozen(schema)).toBe(true);
    expect(Object.isFrozen(schema.fields)).toBe(true);
    expect(Object.isFrozen(schema.fields[0])).toBe(true);
    expect(Object.isFrozen(schema.fields[0].constraints)).toBe(true);
  });

  it('does not freeze the caller definition', () => {
    const values = ['a', 'b'];
    const registry = new SchemaRegistry();

    registry.define({ kind: 'tagged', fields: [{ name: 'tag', type: 'enum', values }] });

    expect(Object.isFrozen(values)).toBe(false);
  });

  it('puts the tag set check first on enum fields', () => {
    const registry = new SchemaRegistry();

    const schema = registry.define(part);

    expect(schema.fields[1].constraints).toEqual([{ kind: 'membership', allowed: ['a', 'b'] }]);
  });

  it('marks fields with a default as optional', () => {
    const registry = new SchemaRegistry();

    const schema = registry.define(part);

    expect(schema.fields[3].optional).toBe(true);
    expect(schema.fields[0].optional).toBe(false);
  });

  it('throws for unknown kinds', () => {
    const registry = new SchemaRegistry();

    expect(() => registry.lookup('ghost')).toThrow(UnknownRecordKindError);
    expect(() => registry.lookup('ghost')).toThrow("Unknown record kind 'ghost'");
  });

  it('rejects redefinition of a kind', () => {
    const registry = new SchemaRegistry();
    registry.define(part);

    expect(() => registry.define(part)).toThrow(SchemaDefinitionError);
    expect(() => registry.define(part)).toThrow("Invalid schema 'part': kind is already defined");
  });

  it('rejects duplicate field names', () => {
    const registry = new SchemaRegistry();

    expect(() =>
      registry.define({
        kind: 'dup',
        fields: [
          { name: 'x', type: 'string' },
          { name: 'x', type: 'integer' },
        ],
      }),
    ).toThrow("Invalid schema 'dup': duplicate field 'x'");
  });

  it('rejects constraints that do not fit the field type', () => {
    const registry = new SchemaRegistry();

    expect(() =>
      registry.define({
        kind: 'bad',
        fields: [{ name: 'n', type: 'integer', constraints: [length(1, 2)] }],
      }),
    ).toThrow("constraint 'length' cannot apply to integer field 'n'");
  });

  it('rejects defaults of the wrong type', () => {
    const registry = new SchemaRegistry();

    expect(() =>
      registry.define({
        kind: 'bad',
        fields: [{ name: 'flag', type: 'boolean', default: 'yes' }],
      }),
    ).toThrow("default of 'flag' does not fit its type");
  });

  it('requires embedded kinds to be defined first', () => {
    const registry = new SchemaRegistry();

    expect(() =>
      registry.define({
        kind: 'assembly',
        fields: [{ name: 'parts', type: 'records', of: 'part', constraints: [size(1)] }],
      }),
    ).toThrow("field 'parts' embeds undefined kind 'part'");
  });

  it('rejects rules that reference missing or mistyped fields', () => {
    const registry = new SchemaRegistry();

    expect(() =>
      registry.define({
        ...part,
        rules: [{ kind: 'prefix', name: 'p', field: 'nope', prefix: 'P', message: 'm' }],
      }),
    ).toThrow("rule 'p' needs a string field 'nope'");

    expect(() =>
      registry.define({
        ...part,
        rules: [
          {
            kind: 'text_when_above',
            name: 't',
            field: 'code',
            threshold: 1,
            text: 'code',
            message: 'm',
          },
        ],
      }),
    ).toThrow("rule 't' needs a integer/float field 'code'");
  });

  it('rejects conditions on tags outside the enum', () => {
    const registry = new SchemaRegistry();

    expect(() =>
      registry.define({
        ...part,
        rules: [
          {
            kind: 'flag_when',
            name: 'r',
            when: { field: 'grade', equals: 'z' },
            flag: 'certified',
            message: 'm',
          },
        ],
      }),
    ).toThrow("rule 'r' compares 'grade' with unknown tag 'z'");
  });

  it('checks collection rules against the embedded schema', () => {
    const registry = new SchemaRegistry();
    registry.define(part);

    expect(() =>
      registry.define({
        kind: 'assembly',
        fields: [{ name: 'parts', type: 'records', of: 'part' }],
        rules: [
          { kind: 'all_members', name: 'a', collection: 'parts', flag: 'grade', message: 'm' },
        ],
      }),
    ).toThrow("rule 'a' needs a boolean field 'grade'");

    expect(() =>
      registry.define({
        kind: 'assembly',
        fields: [{ name: 'parts', type: 'records', of: 'part' }],
        rules: [
          { kind: 'all_members', name: 'a', collection: 'code', flag: 'certified', message: 'm' },
        ],
      }),
    ).toThrow("rule 'a' needs a records field 'code'");
  });

  it('lists kinds in definition order', () => {
    expect(createCatalogRegistry().kinds()).toEqual([
      'station',
      'contact_report',
      'crew_member',
      'mission',
    ]);
  });
});
