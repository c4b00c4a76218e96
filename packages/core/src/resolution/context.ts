import type { JsonObject, JsonValue } from '../types.js';
import { canonicalKey, formatReferenceKey } from '../template/references.js';
import type { Variable } from '../variables/schema.js';
import { DuplicateReferenceKeyError, InvalidReferenceKeyError } from './errors.js';
import type { ResolutionError } from './errors.js';

export type EntryState = 'unresolved' | 'resolving' | 'resolved' | 'failed';

export type ContextEntry =
  | { kind: 'value'; value: JsonValue }
  | { kind: 'variable'; variable: Variable }
  | { kind: 'failed'; error: ResolutionError };

/**
 * Resolution Context - every named value visible to one resolution pass
 *
 * Holds globals, parent-scope values, prior node outputs and the variables to
 * resolve. Keys are stored in canonical form (`build.url`, `items[0]`,
 * `env["my-key"]`) and are unique. A context belongs to a single pass: once
 * resolution begins it can no longer be extended.
 *
 * @example
 * ```typescript
 * const context = new ResolutionContext()
 *   .addValue('version', '1.4.0')
 *   .addVariable('tag', template('v${version}'));
 *
 * const result = new Resolver({ registry }).resolveAll(context);
 * result.values.get('tag'); // 'v1.4.0'
 * ```
 */
export class ResolutionContext {
  private entries: Map<string, ContextEntry> = new Map();
  private states: Map<string, EntryState> = new Map();
  private values: Map<string, JsonValue> = new Map();
  private failures: Map<string, ResolutionError> = new Map();
  private started = false;

  addVariable(key: string, variable: Variable): this {
    const canonical = this.insert(key, { kind: 'variable', variable });

    if (variable.kind === 'literal') {
      this.markResolved(canonical, variable.value);
    } else {
      this.states.set(canonical, 'unresolved');
    }

    return this;
  }

  addVariables(variables: Readonly<Record<string, Variable>>): this {
    for (const [key, variable] of Object.entries(variables)) {
      this.addVariable(key, variable);
    }
    return this;
  }

  /**
   * Add an already-resolved value
   */
  addValue(key: string, value: JsonValue): this {
    const canonical = this.insert(key, { kind: 'value', value });
    this.markResolved(canonical, value);
    return this;
  }

  addValues(values: Readonly<Record<string, JsonValue>>): this {
    for (const [key, value] of Object.entries(values)) {
      this.addValue(key, value);
    }
    return this;
  }

  /**
   * Add the outputs of a node that already ran, reachable as `${nodeId.output}`
   */
  addNodeOutputs(nodeId: string, outputs: JsonObject): this {
    return this.addValue(nodeId, outputs);
  }

  /**
   * Add an entry that is already known to have failed (e.g. a global that
   * failed in a shared store); dependents fail with the same error
   */
  addFailure(key: string, error: ResolutionError): this {
    const canonical = this.insert(key, { kind: 'failed', error });
    this.markFailed(canonical, error);
    return this;
  }

  has(key: string): boolean {
    return this.entries.has(normalize(key));
  }

  /** Canonical keys, in insertion order */
  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  get size(): number {
    return this.entries.size;
  }

  entry(key: string): ContextEntry | undefined {
    return this.entries.get(normalize(key));
  }

  state(key: string): EntryState | undefined {
    return this.states.get(normalize(key));
  }

  value(key: string): JsonValue | undefined {
    return this.values.get(normalize(key));
  }

  error(key: string): ResolutionError | undefined {
    return this.failures.get(normalize(key));
  }

  /** True once a resolution pass has begun */
  get inUse(): boolean {
    return this.started;
  }

  // Pass bookkeeping, driven by the Resolver

  begin(): void {
    this.started = true;
  }

  markResolving(key: string): void {
    this.states.set(key, 'resolving');
  }

  markResolved(key: string, value: JsonValue): void {
    this.states.set(key, 'resolved');
    this.values.set(key, value);
  }

  markFailed(key: string, error: ResolutionError): void {
    this.states.set(key, 'failed');
    this.failures.set(key, error);
  }

  private insert(key: string, entry: ContextEntry): string {
    if (this.started) {
      throw new Error('Resolution context is already in use by a resolution pass');
    }

    const canonical = canonicalKey(key);
    if (!canonical) {
      throw new InvalidReferenceKeyError(key);
    }

    if (this.entries.has(canonical)) {
      throw new DuplicateReferenceKeyError(canonical);
    }

    this.entries.set(canonical, entry);
    return canonical;
  }
}

function normalize(key: string): string {
  return canonicalKey(key) ?? key;
}

/**
 * Context key of a node input: `inputs.<name>`
 */
export function inputKey(name: string): string {
  return formatReferenceKey(['inputs', name]);
}
