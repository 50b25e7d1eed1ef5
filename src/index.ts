/**
 * Entrainment Policy Engine
 *
 * Validates neural-entrainment session configurations against safety policy,
 * experience-level limits and the consciousness state graph.
 */

export * from './validation/index.js';
export * from './safety/index.js';
export * from './state-graph/index.js';
export * from './profile/index.js';
export * from './reference/index.js';
export * from './orchestrator/index.js';

export { EngineLogger, EngineLogLevel } from './shared/utils/engine-logger.js';
export { SchemaDefinitionError, InputSanitizationError, ReferenceDataError, ProfileFormatError } from './shared/errors.js';
export { validateConfig } from './shared/config.js';
export { EXPERIENCE_LEVELS, isExperienceLevel, experienceLevelIndex } from './shared/types/reference.js';
export type * from './shared/types/reference.js';
