import type { z } from 'zod';

/**
 * A deferred variable names a resolver that was never registered. This is a
 * configuration error and aborts the whole resolution pass.
 */
export class UnknownDeferredTypeError extends Error {
  public readonly deferredType: string;
  public readonly key?: string;

  constructor(deferredType: string, key?: string) {
    super(
      key
        ? `Unknown deferred type '${deferredType}' for variable '${key}'`
        : `Unknown deferred type: ${deferredType}`
    );
    this.name = 'UnknownDeferredTypeError';
    this.deferredType = deferredType;
    this.key = key;
  }
}

/**
 * Custom error for registering a deferred type code twice
 */
export class DuplicateDeferredTypeError extends Error {
  constructor(deferredType: string) {
    super(`Deferred type '${deferredType}' is already registered`);
    this.name = 'DuplicateDeferredTypeError';
  }
}

/**
 * Custom error for a seed a built-in resolver does not accept
 */
export class InvalidSeedError extends Error {
  constructor(
    deferredType: string,
    message: string,
    public errors?: z.ZodError
  ) {
    super(`Invalid seed for '${deferredType}': ${message}`);
    this.name = 'InvalidSeedError';
  }

  getDetails(): string {
    if (!this.errors) return this.message;

    return this.errors.errors.map((err) => `${err.path.join('.')}: ${err.message}`).join('\n');
  }
}
