import type { JsonValue, Logger } from '../types.js';
import { DuplicateDeferredTypeError, UnknownDeferredTypeError } from './errors.js';

/**
 * Read-only state a deferred resolver may consult besides its seed
 */
export interface DeferredAmbient {
  /** Reference key of the variable being resolved */
  readonly key: string;
  now(): Date;
  readonly env: Readonly<Record<string, string | undefined>>;
}

/**
 * Turns a template-resolved seed into the variable's final value. Resolvers
 * must not keep mutable state across calls.
 */
export type DeferredResolver = (seed: JsonValue, ambient: DeferredAmbient) => JsonValue;

/**
 * Deferred Registry - maps a deferred type code to its resolver
 *
 * Populated at startup. Codes are unique: registering a code twice is an
 * error, and looking up an unregistered code raises UnknownDeferredTypeError.
 *
 * @example
 * ```typescript
 * const registry = new DeferredRegistry();
 * registry.register('upper', (seed) => String(seed).toUpperCase());
 *
 * registry.resolve('upper', 'main', ambient); // 'MAIN'
 * ```
 */
export class DeferredRegistry {
  private resolvers: Map<string, DeferredResolver> = new Map();
  private logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  /**
   * Register a resolver
   *
   * @throws DuplicateDeferredTypeError if the code is already registered
   */
  register(code: string, resolver: DeferredResolver): void {
    if (!code) {
      throw new Error('Deferred type code must be a non-empty string');
    }

    if (this.resolvers.has(code)) {
      throw new DuplicateDeferredTypeError(code);
    }

    this.resolvers.set(code, resolver);
    this.logger?.debug(`Registered deferred type: ${code}`);
  }

  /**
   * Get a resolver by code
   *
   * @throws UnknownDeferredTypeError if no resolver is registered for the code
   */
  get(code: string): DeferredResolver {
    const resolver = this.resolvers.get(code);

    if (!resolver) {
      throw new UnknownDeferredTypeError(code);
    }

    return resolver;
  }

  has(code: string): boolean {
    return this.resolvers.has(code);
  }

  /**
   * Invoke the resolver registered for a code
   *
   * @throws UnknownDeferredTypeError if no resolver is registered for the code
   */
  resolve(code: string, seed: JsonValue, ambient: DeferredAmbient): JsonValue {
    const resolver = this.resolvers.get(code);

    if (!resolver) {
      throw new UnknownDeferredTypeError(code, ambient.key);
    }

    return resolver(seed, ambient);
  }

  listCodes(): string[] {
    return Array.from(this.resolvers.keys());
  }

  /**
   * Unregister a resolver
   *
   * @returns true if a resolver was removed
   */
  unregister(code: string): boolean {
    return this.resolvers.delete(code);
  }

  /**
   * Clear all resolvers (useful for testing)
   */
  clear(): void {
    this.resolvers.clear();
  }

  get size(): number {
    return this.resolvers.size;
  }
}
