/**
 * Validation entry points.
 *
 * raw input -> field phase (exhaustive) -> rule phase (first failure) -> ValidatedRecord
 *
 * Every call is synchronous and side-effect free apart from logging; the registry is only read.
 */

import { createLogger, type Logger } from '@recordkit/logger';
import { createCatalogRegistry } from './catalog/index.js';
import { loadEngineConfig, type EngineConfig } from './config.js';
import { RecordValidationError, UnknownRecordKindError } from './errors.js';
import { validateFields } from './field-validator.js';
import type { ValidatedRecord } from './record.js';
import { ValidationErrorReport } from './report.js';
import { fail, type Result } from './result.js';
import type { SchemaRegistry } from './registry.js';
import { validateRules } from './rules.js';
import type { RawInput } from './types.js';
import { describeValue, getType, isPlainObject } from './utils.js';

export type ValidationPhase = 'input' | 'fields' | 'rules';

type PhasedResult = { result: Result<ValidatedRecord>; phase: ValidationPhase };

function runPipeline(registry: SchemaRegistry, kind: string, raw: RawInput): PhasedResult {
  const schema = registry.lookup(kind);

  if (!isPlainObject(raw)) {
    const report = new ValidationErrorReport(kind, [
      {
        path: '',
        kind: 'type_error',
        message: 'Input should be a valid dictionary',
        expected: 'object',
        actual: `${getType(raw)} ${describeValue(raw)}`,
      },
    ]);
    return { result: fail(report), phase: 'input' };
  }

  const fields = validateFields(schema, raw, (nestedKind, nestedRaw) =>
    validateRecord(registry, nestedKind, nestedRaw),
  );
  if (!fields.ok) {
    return { result: fields, phase: 'fields' };
  }

  return { result: validateRules(schema, fields.value), phase: 'rules' };
}

/**
 * Run the full pipeline for one record kind against a registry.
 * @throws UnknownRecordKindError when the kind was never defined
 */
export function validateRecord(
  registry: SchemaRegistry,
  kind: string,
  raw: RawInput,
): Result<ValidatedRecord> {
  return runPipeline(registry, kind, raw).result;
}

export class RecordEngine {
  constructor(
    private readonly registry: SchemaRegistry,
    private readonly logger: Logger,
  ) {}

  /**
   * Validate raw input as a record of the given kind.
   * @throws UnknownRecordKindError before any field processing when the kind is not registered
   */
  validate(kind: string, raw: RawInput): Result<ValidatedRecord> {
    if (!this.registry.has(kind)) {
      this.logger.warn('unknown_record_kind', { record_kind: kind });
      throw new UnknownRecordKindError(kind);
    }

    const { result, phase } = runPipeline(this.registry, kind, raw);

    if (result.ok) {
      this.logger.debug('record_validated', { record_kind: kind });
    } else {
      this.logger.info('record_rejected', {
        record_kind: kind,
        phase,
        violation_count: result.error.count,
      });
    }

    return result;
  }

  /**
   * Validate and return the record, or throw a RecordValidationError carrying the report
   */
  parse(kind: string, raw: RawInput): ValidatedRecord {
    const result = this.validate(kind, raw);
    if (!result.ok) {
      throw new RecordValidationError(result.error);
    }
    return result.value;
  }

  kinds(): string[] {
    return this.registry.kinds();
  }
}

export interface EngineOptions {
  registry?: SchemaRegistry;
  logger?: Logger;
  config?: EngineConfig;
}

/**
 * Build an engine. Defaults to the built-in catalog and a logger configured from the environment.
 */
export function createEngine(options: EngineOptions = {}): RecordEngine {
  const registry = options.registry ?? createCatalogRegistry();
  const logger = options.logger ?? engineLogger(options.config ?? loadEngineConfig());
  return new RecordEngine(registry, logger);
}

function engineLogger(config: EngineConfig): Logger {
  return createLogger({ environment: config.environment, minLevel: config.logLevel }).child({
    component: 'record_engine',
  });
}
