// @recordkit/records - Two-phase record validation: field constraints, then business rules

// Engine
export * from './engine.js';
export * from './config.js';
export * from './errors.js';

// Phases
export { validateFields, type NestedValidator } from './field-validator.js';
export { evaluateRule, ruleField, validateRules } from './rules.js';

// Core
export * from './coercion.js';
export * from './constraints.js';
export * from './registry.js';
export { TypedFields, ValidatedRecord, type JsonValue } from './record.js';
export { ValidationErrorReport } from './report.js';
export type { Result } from './result.js';
export * from './types.js';

// Built-in schemas
export * from './catalog/index.js';
