// Built-in record kinds

import { SchemaRegistry } from '../registry.js';
import type { RecordSchemaDefinition } from '../types.js';
import { CONTACT_REPORT_KIND, contactReportSchema } from './contact.js';
import { CREW_MEMBER_KIND, MISSION_KIND, crewMemberSchema, missionSchema } from './mission.js';
import { STATION_KIND, stationSchema } from './station.js';

export * from './contact.js';
export * from './enums.js';
export * from './mission.js';
export * from './station.js';

export const CATALOG_KINDS = [
  STATION_KIND,
  CONTACT_REPORT_KIND,
  CREW_MEMBER_KIND,
  MISSION_KIND,
] as const;

export type CatalogKind = (typeof CATALOG_KINDS)[number];

// Embedded kinds come before their embedders
const CATALOG_SCHEMAS: Record<CatalogKind, RecordSchemaDefinition> = {
  station: stationSchema,
  contact_report: contactReportSchema,
  crew_member: crewMemberSchema,
  mission: missionSchema,
};

/**
 * Registry holding every built-in schema
 */
export function createCatalogRegistry(): SchemaRegistry {
  const registry = new SchemaRegistry();
  for (const kind of CATALOG_KINDS) {
    registry.define(CATALOG_SCHEMAS[kind]);
  }
  return registry;
}
