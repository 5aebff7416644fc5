import { length, range } from '../constraints.js';
import type { RecordSchemaDefinition } from '../types.js';

export const STATION_KIND = 'station';

export const stationSchema: RecordSchemaDefinition = {
  kind: STATION_KIND,
  fields: [
    { name: 'station_id', type: 'string', constraints: [length(3, 10)] },
    { name: 'name', type: 'string', constraints: [length(1, 50)] },
    { name: 'crew_size', type: 'integer', constraints: [range(1, 20)] },
    { name: 'power_level', type: 'float', constraints: [range(0, 100)] },
    { name: 'oxygen_level', type: 'float', constraints: [range(0, 100)] },
    { name: 'last_maintenance', type: 'timestamp' },
    { name: 'is_operational', type: 'boolean', default: true },
    { name: 'notes', type: 'string', optional: true, constraints: [length(undefined, 200)] },
  ],
};
