import type { JsonValue, Logger } from '../types.js';
import { UnknownDeferredTypeError } from '../deferred/errors.js';
import type { DeferredAmbient, DeferredRegistry } from '../deferred/registry.js';
import { TemplateEngine } from '../template/engine.js';
import { TemplateEvalError } from '../template/errors.js';
import { canonicalKey } from '../template/references.js';
import type { Variable } from '../variables/schema.js';
import type { ResolutionContext } from './context.js';
import {
  CyclicReferenceError,
  DeferredResolutionError,
  ResolutionError,
  TemplateResolutionError,
  UnresolvedReferenceError,
} from './errors.js';

export interface ResolverOptions {
  registry: DeferredRegistry;
  templates?: TemplateEngine;
  logger?: Logger;
  now?: () => Date;
  env?: Readonly<Record<string, string | undefined>>;
}

export interface ResolveOptions {
  /** Throw the first per-entry error instead of collecting it */
  strict?: boolean;
  /** Resolve only these keys (and what they depend on); default: every key */
  keys?: readonly string[];
}

/**
 * Outcome of a pass: resolved values and per-entry errors, keyed by
 * canonical reference key
 */
export interface ResolutionResult {
  values: Map<string, JsonValue>;
  errors: Map<string, ResolutionError>;
  ok: boolean;
}

/**
 * Resolver - dependency-ordered, memoized, cycle-safe resolution of a context
 *
 * Literal entries resolve to their value. Template entries resolve their
 * references first (recursively), then substitute. Deferred entries do the
 * same to build a seed, then hand it to the registered resolver. Each key is
 * computed at most once per pass.
 *
 * Per-entry failures are collected; an entry that depends on a failed entry
 * fails with the same error. An unregistered deferred type aborts the pass
 * before anything resolves.
 */
export class Resolver {
  private registry: DeferredRegistry;
  private templates: TemplateEngine;
  private logger?: Logger;
  private now: () => Date;
  private env: Readonly<Record<string, string | undefined>>;

  constructor(options: ResolverOptions) {
    this.registry = options.registry;
    this.templates = options.templates ?? new TemplateEngine({ logger: options.logger });
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
    this.env = options.env ?? process.env;
  }

  /**
   * Resolve every entry of a context (or the requested subset)
   *
   * @throws UnknownDeferredTypeError if a deferred entry names an unregistered type
   * @throws ResolutionError in strict mode, for the first entry that fails
   */
  resolveAll(context: ResolutionContext, options?: ResolveOptions): ResolutionResult {
    const targets = options?.keys ? options.keys.map((key) => canonicalKey(key) ?? key) : context.keys();

    this.checkDeferredTypes(context);
    context.begin();

    this.logger?.debug('Starting resolution pass', { entries: context.size, targets: targets.length });

    const values = new Map<string, JsonValue>();
    const errors = new Map<string, ResolutionError>();

    for (const key of targets) {
      try {
        values.set(key, this.resolveEntry(context, key, []));
      } catch (error) {
        if (!(error instanceof ResolutionError)) throw error;
        if (options?.strict) throw error;

        errors.set(key, error);
        this.logger?.warn(`Failed to resolve '${key}'`, { error: error.message });
      }
    }

    this.logger?.debug('Resolution pass complete', { resolved: values.size, failed: errors.size });

    return { values, errors, ok: errors.size === 0 };
  }

  /**
   * Resolve one key of a context
   *
   * @throws ResolutionError if the entry fails
   * @throws UnknownDeferredTypeError if a deferred entry names an unregistered type
   */
  resolveKey(context: ResolutionContext, key: string): JsonValue {
    this.checkDeferredTypes(context);
    context.begin();
    return this.resolveEntry(context, canonicalKey(key) ?? key, []);
  }

  private checkDeferredTypes(context: ResolutionContext): void {
    for (const key of context.keys()) {
      const entry = context.entry(key);
      if (entry?.kind !== 'variable' || entry.variable.kind !== 'deferred') continue;

      const { deferredType } = entry.variable;
      if (!this.registry.has(deferredType)) {
        this.logger?.error(`Unknown deferred type '${deferredType}'`, { key });
        throw new UnknownDeferredTypeError(deferredType, key);
      }
    }
  }

  private resolveEntry(context: ResolutionContext, key: string, stack: string[]): JsonValue {
    const state = context.state(key);

    switch (state) {
      case 'resolved': {
        const value = context.value(key);
        if (value !== undefined) return value;
        break;
      }
      case 'failed': {
        const error = context.error(key);
        if (error) throw error;
        break;
      }
      case 'resolving': {
        const start = stack.indexOf(key);
        throw new CyclicReferenceError([...stack.slice(start), key]);
      }
      case undefined:
        throw new UnresolvedReferenceError(key, stack[stack.length - 1] ?? key);
      default:
        break;
    }

    const entry = context.entry(key);
    if (entry?.kind !== 'variable') {
      throw new UnresolvedReferenceError(key, stack[stack.length - 1] ?? key);
    }

    context.markResolving(key);
    stack.push(key);

    try {
      const value = this.evaluate(context, key, entry.variable, stack);
      context.markResolved(key, value);
      return value;
    } catch (error) {
      if (error instanceof ResolutionError) {
        context.markFailed(key, error);
      }
      throw error;
    } finally {
      stack.pop();
    }
  }

  private evaluate(
    context: ResolutionContext,
    key: string,
    variable: Variable,
    stack: string[]
  ): JsonValue {
    if (variable.kind === 'literal') return variable.value;

    const visible = new Set(context.keys());
    let dependencies: Set<string>;
    try {
      dependencies = this.templates.extractReferences(variable.value, visible);
    } catch (error) {
      throw this.wrapTemplateError(key, error);
    }

    const bindings = new Map<string, JsonValue>();
    for (const dependency of dependencies) {
      if (!visible.has(dependency)) {
        throw new UnresolvedReferenceError(dependency, key);
      }
      bindings.set(dependency, this.resolveEntry(context, dependency, stack));
    }

    let rendered: JsonValue;
    try {
      rendered = this.templates.render(variable.value, bindings);
    } catch (error) {
      throw this.wrapTemplateError(key, error);
    }

    if (variable.kind === 'template') return rendered;

    const ambient: DeferredAmbient = Object.freeze({
      key,
      now: this.now,
      env: this.env,
    });

    try {
      const value = this.registry.resolve(variable.deferredType, rendered, ambient);
      this.logger?.debug(`Resolved deferred '${key}'`, { type: variable.deferredType });
      return value;
    } catch (error) {
      if (error instanceof UnknownDeferredTypeError) throw error;
      throw new DeferredResolutionError(key, variable.deferredType, error);
    }
  }

  private wrapTemplateError(key: string, error: unknown): unknown {
    return error instanceof TemplateEvalError ? new TemplateResolutionError(key, error) : error;
  }
}
