/**
 * Varloom
 *
 * Variable resolution and schema validation for workflow pipelines
 */

export {
  VariableEngine,
  type ResolutionScope,
  type NodeResolution,
  type PassSummary,
  type EngineEvents,
} from './engine.js';
export { createDefaultLogger, resolveLogLevel } from './logger.js';

export type {
  EngineConfig,
  JsonValue,
  JsonObject,
  JsonScalar,
  Logger,
  LogLevel,
} from './types.js';
export { isJsonObject } from './types.js';

// Export schema system
export * from './schema/index.js';

// Export variable system
export * from './variables/index.js';

// Export template system
export * from './template/index.js';

// Export deferred system
export * from './deferred/index.js';

// Export resolution system
export * from './resolution/index.js';

// Export node system
export * from './nodes/index.js';
