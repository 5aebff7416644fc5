import { describe, expect, it } from 'vitest';
import { createCatalogRegistry } from '../src/catalog/index.js';
import { validateRecord } from '../src/engine.js';
import { RecordAccessError } from '../src/errors.js';
import { TypedFields, ValidatedRecord } from '../src/record.js';
import { expectOk, mission, station } from './fixtures.js';

const registry = createCatalogRegistry();

describe('ValidatedRecord', () => {
  const record = expectOk(validateRecord(registry, 'station', station({ extra: 'ignored' })));

  it('exposes typed read-only accessors', () => {
    expect(record.kind).toBe('station');
    expect(record.string('station_id')).toBe('ISS001');
    expect(record.number('crew_size')).toBe(6);
    expect(record.number('power_level')).toBe(85.5);
    expect(record.boolean('is_operational')).toBe(true);
    expect(record.optionalString('notes')).toBe('All systems nominal.');
    expect(record.timestamp('last_maintenance').getTime()).toBe(
      new Date('2024-02-01T10:30:00').getTime(),
    );
  });

  it('keeps declared fields only, in declaration order', () => {
    expect(record.has('extra')).toBe(false);
    expect(record.fieldNames()).toEqual([
      'station_id',
      'name',
      'crew_size',
      'power_level',
      'oxygen_level',
      'last_maintenance',
      'is_operational',
      'notes',
    ]);
  });

  it('throws on accessor type mismatches and unknown fields', () => {
    expect(() => record.string('crew_size')).toThrow(RecordAccessError);
    expect(() => record.string('crew_size')).toThrow(
      "Field 'crew_size' of 'station' is not a string",
    );
    expect(() => record.get('extra')).toThrow(
      "Field 'extra' of 'station' is not a declared field",
    );
  });

  it('cannot be changed through returned timestamps', () => {
    const copy = record.timestamp('last_maintenance');
    copy.setUTCFullYear(1999);

    expect(record.timestamp('last_maintenance').getFullYear()).toBe(2024);
  });

  it('is frozen', () => {
    expect(Object.isFrozen(record)).toBe(true);
  });

  it('applies defaults for absent optional fields', () => {
    const minimal = station();
    delete minimal.is_operational;
    delete minimal.notes;

    const result = expectOk(validateRecord(registry, 'station', minimal));

    expect(result.boolean('is_operational')).toBe(true);
    expect(result.optionalString('notes')).toBeNull();
  });

  it('can only be created by validation', () => {
    const fields = new TypedFields('station', [['station_id', 'ISS001']]);

    expect(() => new ValidatedRecord(Symbol('validated-record'), fields)).toThrow(
      'ValidatedRecord instances are only created by validation',
    );
  });

  describe('with embedded records', () => {
    const flight = expectOk(validateRecord(registry, 'mission', mission()));

    it('returns frozen collections of validated records', () => {
      const crew = flight.records('crew');

      expect(crew).toHaveLength(2);
      expect(crew[0]).toBeInstanceOf(ValidatedRecord);
      expect(crew[0].string('rank')).toBe('commander');
      expect(Object.isFrozen(crew)).toBe(true);
    });

    it('fills the mission status default', () => {
      expect(flight.string('mission_status')).toBe('planned');
    });

    it('serializes nested records and timestamps to JSON', () => {
      expect(flight.toJSON()).toEqual({
        mission_id: 'M2026_OK',
        mission_name: 'Mars Exploration Mission',
        destination: 'Mars',
        launch_date: '2026-03-01T09:00:00.000Z',
        duration_days: 900,
        crew: [
          {
            member_id: 'C03',
            name: 'Sarah Connor',
            rank: 'commander',
            age: 45,
            specialization: 'mission command',
            years_experience: 20,
            is_active: true,
          },
          {
            member_id: 'C04',
            name: 'John Smith',
            rank: 'officer',
            age: 29,
            specialization: 'engineering',
            years_experience: 7,
            is_active: true,
          },
        ],
        mission_status: 'planned',
        budget_millions: 2500,
      });
    });
  });
});
