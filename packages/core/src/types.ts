/**
 * Core types for the Varloom engine
 */

import type { DeferredResolver } from './deferred/registry.js';
import type { Variable } from './variables/schema.js';

// ============================================================================
// Value Types
// ============================================================================

/**
 * Any structured value a variable can hold: a scalar, an ordered sequence,
 * or a key/value mapping.
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

export type JsonScalar = string | number | boolean | null;

// ============================================================================
// Logging
// ============================================================================

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface Logger {
  error(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  debug(message: string, meta?: unknown): void;
}

// ============================================================================
// Engine Configuration
// ============================================================================

export interface EngineConfig {
  logLevel?: LogLevel;
  logger?: Logger;
  /** Throw the first per-entry resolution error instead of collecting it */
  strict?: boolean;
  /** Register the built-in deferred resolvers (default: true) */
  builtins?: boolean;
  deferred?: Record<string, DeferredResolver>;
  /** Workflow-level variables, resolved once and shared by every pass */
  globals?: Record<string, Variable>;
  /** Environment visible to deferred resolvers (default: process.env) */
  env?: Readonly<Record<string, string | undefined>>;
  /** Clock visible to deferred resolvers (default: () => new Date()) */
  now?: () => Date;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
