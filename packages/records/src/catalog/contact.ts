import { length, range } from '../constraints.js';
import type { Condition, RecordSchemaDefinition } from '../types.js';
import { CONTACT_TYPES, type ContactType } from './enums.js';

export const CONTACT_REPORT_KIND = 'contact_report';

const contactTypeIs = (type: ContactType): Condition => ({ field: 'contact_type', equals: type });

export const contactReportSchema: RecordSchemaDefinition = {
  kind: CONTACT_REPORT_KIND,
  fields: [
    { name: 'contact_id', type: 'string', constraints: [length(5, 15)] },
    { name: 'timestamp', type: 'timestamp' },
    { name: 'location', type: 'string', constraints: [length(3, 100)] },
    { name: 'contact_type', type: 'enum', values: CONTACT_TYPES },
    { name: 'signal_strength', type: 'float', constraints: [range(0, 10)] },
    { name: 'duration_minutes', type: 'integer', constraints: [range(1, 1440)] },
    { name: 'witness_count', type: 'integer', constraints: [range(1, 100)] },
    {
      name: 'message_received',
      type: 'string',
      optional: true,
      constraints: [length(undefined, 500)],
    },
    { name: 'is_verified', type: 'boolean', default: false },
  ],
  rules: [
    {
      kind: 'prefix',
      name: 'contact_id_prefix',
      field: 'contact_id',
      prefix: 'AC',
      message: "Contact ID must start with 'AC' (Alien Contact)",
    },
    {
      kind: 'flag_when',
      name: 'physical_contact_verified',
      when: contactTypeIs('physical'),
      flag: 'is_verified',
      message: 'Physical contact reports must be verified',
    },
    {
      kind: 'minimum_when',
      name: 'telepathic_contact_witnesses',
      when: contactTypeIs('telepathic'),
      field: 'witness_count',
      minimum: 3,
      message: 'Telepathic contact requires at least 3 witnesses',
    },
    {
      kind: 'text_when_above',
      name: 'strong_signal_message',
      field: 'signal_strength',
      threshold: 7.0,
      text: 'message_received',
      message: 'Strong signals (> 7.0) should include a received message',
    },
  ],
};
