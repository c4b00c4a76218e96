import type { TemplateEvalError } from '../template/errors.js';

/**
 * Base class for recoverable, per-entry resolution failures
 */
export class ResolutionError extends Error {
  /** Reference key of the entry that failed */
  public readonly key: string;

  constructor(key: string, message: string) {
    super(message);
    this.name = 'ResolutionError';
    this.key = key;
  }
}

/**
 * An entry references a key that is not in the context
 */
export class UnresolvedReferenceError extends ResolutionError {
  public readonly missingKey: string;
  public readonly requestedBy: string;

  constructor(missingKey: string, requestedBy: string) {
    super(requestedBy, `Unresolved reference '${missingKey}' requested by '${requestedBy}'`);
    this.name = 'UnresolvedReferenceError';
    this.missingKey = missingKey;
    this.requestedBy = requestedBy;
  }
}

/**
 * Entries reference each other in a loop. `cycle` starts and ends with the
 * same key.
 */
export class CyclicReferenceError extends ResolutionError {
  public readonly cycle: string[];

  constructor(cycle: string[]) {
    super(cycle[0], `Cyclic reference: ${cycle.join(' -> ')}`);
    this.name = 'CyclicReferenceError';
    this.cycle = cycle;
  }

  /** Distinct keys taking part in the cycle */
  get members(): string[] {
    return this.cycle.slice(0, -1);
  }
}

/**
 * Template substitution failed for an entry
 */
export class TemplateResolutionError extends ResolutionError {
  public override readonly cause: TemplateEvalError;

  constructor(key: string, cause: TemplateEvalError) {
    super(key, `Failed to resolve '${key}': ${cause.message}`);
    this.name = 'TemplateResolutionError';
    this.cause = cause;
  }

  get expression(): string {
    return this.cause.expression;
  }
}

/**
 * A registered deferred resolver threw while resolving an entry
 */
export class DeferredResolutionError extends ResolutionError {
  public readonly deferredType: string;
  public override readonly cause?: unknown;

  constructor(key: string, deferredType: string, cause?: unknown) {
    super(
      key,
      `Deferred resolver '${deferredType}' failed for '${key}': ${
        cause instanceof Error ? cause.message : String(cause)
      }`
    );
    this.name = 'DeferredResolutionError';
    this.deferredType = deferredType;
    this.cause = cause;
  }
}

/**
 * Custom error for a context key that is not a valid reference path
 */
export class InvalidReferenceKeyError extends Error {
  constructor(key: string) {
    super(`Invalid reference key: '${key}'`);
    this.name = 'InvalidReferenceKeyError';
  }
}

/**
 * Custom error for adding the same key to a context twice
 */
export class DuplicateReferenceKeyError extends Error {
  constructor(key: string) {
    super(`Reference key '${key}' is already defined in this context`);
    this.name = 'DuplicateReferenceKeyError';
  }
}
