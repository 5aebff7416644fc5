import { length, range, size } from '../constraints.js';
import type { RecordSchemaDefinition } from '../types.js';
import { LEADERSHIP_RANKS, RANKS } from './enums.js';

export const CREW_MEMBER_KIND = 'crew_member';
export const MISSION_KIND = 'mission';

export const crewMemberSchema: RecordSchemaDefinition = {
  kind: CREW_MEMBER_KIND,
  fields: [
    { name: 'member_id', type: 'string', constraints: [length(3, 10)] },
    { name: 'name', type: 'string', constraints: [length(2, 50)] },
    { name: 'rank', type: 'enum', values: RANKS },
    { name: 'age', type: 'integer', constraints: [range(18, 80)] },
    { name: 'specialization', type: 'string', constraints: [length(3, 30)] },
    { name: 'years_experience', type: 'integer', constraints: [range(0, 50)] },
    { name: 'is_active', type: 'boolean', default: true },
  ],
};

export const missionSchema: RecordSchemaDefinition = {
  kind: MISSION_KIND,
  fields: [
    { name: 'mission_id', type: 'string', constraints: [length(5, 15)] },
    { name: 'mission_name', type: 'string', constraints: [length(3, 100)] },
    { name: 'destination', type: 'string', constraints: [length(3, 50)] },
    { name: 'launch_date', type: 'timestamp' },
    { name: 'duration_days', type: 'integer', constraints: [range(1, 3650)] },
    { name: 'crew', type: 'records', of: CREW_MEMBER_KIND, constraints: [size(1, 12)] },
    { name: 'mission_status', type: 'string', default: 'planned' },
    { name: 'budget_millions', type: 'float', constraints: [range(1, 10000)] },
  ],
  rules: [
    {
      kind: 'prefix',
      name: 'mission_id_prefix',
      field: 'mission_id',
      prefix: 'M',
      message: "Mission ID must start with 'M'",
    },
    {
      kind: 'any_member_in',
      name: 'mission_leadership',
      collection: 'crew',
      field: 'rank',
      allowed: LEADERSHIP_RANKS,
      message: 'Mission must have at least one Captain or Commander',
    },
    {
      kind: 'member_share_when',
      name: 'long_mission_experience',
      collection: 'crew',
      when: { field: 'duration_days', greaterThan: 365 },
      member: { field: 'years_experience', minimum: 5 },
      share: 0.5,
      message: 'Long missions require at least 50% experienced crew (5+ years)',
    },
    {
      kind: 'all_members',
      name: 'crew_active',
      collection: 'crew',
      flag: 'is_active',
      message: 'All crew members must be active',
    },
  ],
};
