import type { JsonValue, Logger } from '../types.js';
import type { Variable } from '../variables/schema.js';
import { ResolutionContext } from './context.js';
import type { ResolutionError } from './errors.js';
import type { ResolutionResult, Resolver } from './resolver.js';

/**
 * Shared Global Store - workflow-level variables resolved once and shared,
 * read-only, by every resolution pass
 *
 * The first call to `resolve()` runs the pass; every later call (from any
 * pass) sees the same values. Resolved values are deep-frozen copies, and
 * callers only ever receive copies of the result maps.
 */
export class GlobalStore {
  private variables: Readonly<Record<string, Variable>>;
  private resolver: Resolver;
  private logger?: Logger;
  private values?: Map<string, JsonValue>;
  private errors?: Map<string, ResolutionError>;

  constructor(variables: Readonly<Record<string, Variable>>, resolver: Resolver, logger?: Logger) {
    this.variables = { ...variables };
    this.resolver = resolver;
    this.logger = logger;
  }

  /**
   * Resolve the globals on first use, then return a copy of the cached result
   */
  resolve(): ResolutionResult {
    const { values, errors } = this.load();
    return { values: new Map(values), errors: new Map(errors), ok: errors.size === 0 };
  }

  get resolved(): boolean {
    return this.values !== undefined;
  }

  /**
   * Copy resolved globals (and failed ones) into a pass context, skipping keys
   * the context already defines
   */
  seed(context: ResolutionContext): void {
    const { values, errors } = this.load();

    for (const [key, value] of values) {
      if (!context.has(key)) context.addValue(key, value);
    }

    for (const [key, error] of errors) {
      if (!context.has(key)) context.addFailure(key, error);
    }
  }

  value(key: string): JsonValue | undefined {
    return this.load().values.get(key);
  }

  error(key: string): ResolutionError | undefined {
    return this.load().errors.get(key);
  }

  private load(): { values: ReadonlyMap<string, JsonValue>; errors: ReadonlyMap<string, ResolutionError> } {
    if (this.values && this.errors) {
      return { values: this.values, errors: this.errors };
    }

    const context = new ResolutionContext().addVariables(this.variables);
    const result = this.resolver.resolveAll(context);

    // Literals resolve to the caller's own objects; freeze a copy
    const values = new Map<string, JsonValue>();
    for (const [key, value] of result.values) {
      values.set(key, deepFreeze(structuredClone(value)));
    }

    this.values = values;
    this.errors = new Map(result.errors);
    this.logger?.info('Global variables resolved', {
      resolved: values.size,
      failed: this.errors.size,
    });

    return { values, errors: this.errors };
  }
}

function deepFreeze(value: JsonValue): JsonValue {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) return value;

  Object.freeze(value);
  for (const child of Object.values(value)) {
    deepFreeze(child);
  }
  return value;
}
