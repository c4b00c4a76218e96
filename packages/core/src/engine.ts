import { EventEmitter } from 'eventemitter3';
import type { EngineConfig, JsonObject, JsonValue, Logger } from './types.js';
import { createDefaultLogger, resolveLogLevel } from './logger.js';
import { DeferredRegistry, type DeferredResolver } from './deferred/registry.js';
import { registerBuiltins } from './deferred/builtins.js';
import { TemplateEngine } from './template/engine.js';
import { ResolutionContext, inputKey } from './resolution/context.js';
import { Resolver, type ResolutionResult } from './resolution/resolver.js';
import { GlobalStore } from './resolution/globals.js';
import type { ResolutionError } from './resolution/errors.js';
import { validateOrReport, type ValidationReport, type Violation } from './schema/validator.js';
import type { NodeDefinition } from './nodes/schema.js';
import type { SchemaNode } from './schema/schema.js';
import type { Variable } from './variables/schema.js';

/**
 * Values visible to a pass besides the workflow globals
 */
export interface ResolutionScope {
  /** Values from the enclosing scope; they shadow globals of the same name */
  parent?: Readonly<Record<string, JsonValue>>;
  /** Outputs of nodes that already ran, keyed by node id */
  outputs?: Readonly<Record<string, JsonObject>>;
}

export interface NodeResolution {
  nodeId: string;
  /** Successfully resolved inputs, by input name */
  inputs: JsonObject;
  /** Per-input resolution errors, by input name */
  errors: Map<string, ResolutionError>;
  /** Schema violations of the resolved inputs (empty if there is no input schema) */
  violations: Violation[];
  ok: boolean;
}

export interface PassSummary {
  resolved: number;
  failed: number;
  durationMs: number;
  nodeId?: string;
}

export interface EngineEvents {
  'entry:failed': (key: string, error: ResolutionError) => void;
  'pass:complete': (summary: PassSummary) => void;
  'validation:failed': (nodeId: string, violations: Violation[]) => void;
}

/**
 * VariableEngine - Main entry point: resolves node inputs and validates them
 *
 * Owns the deferred registry, the template engine, the resolver and the
 * shared store of workflow globals. Each call to `resolve` or `resolveNode`
 * runs a fresh pass over a fresh context.
 *
 * @example
 * ```typescript
 * const engine = new VariableEngine({
 *   globals: { branch: literal('main') },
 * });
 *
 * const result = engine.resolveNode(definition, {
 *   outputs: { build: { artifact: 'app-1.4.0.tgz' } },
 * });
 *
 * if (!result.ok) {
 *   console.error(formatViolations(result.violations));
 * }
 * ```
 */
export class VariableEngine extends EventEmitter<EngineEvents> {
  readonly registry: DeferredRegistry;
  readonly templates: TemplateEngine;
  private config: EngineConfig;
  private logger: Logger;
  private resolver: Resolver;
  private globals?: GlobalStore;

  constructor(config: EngineConfig = {}) {
    super();
    this.config = config;
    this.logger = config.logger || createDefaultLogger(resolveLogLevel(config.logLevel));

    this.registry = new DeferredRegistry(this.logger);
    for (const [code, resolver] of Object.entries(config.deferred ?? {})) {
      this.registry.register(code, resolver);
    }
    if (config.builtins !== false) {
      registerBuiltins(this.registry);
    }

    this.templates = new TemplateEngine({ logger: this.logger });
    this.resolver = new Resolver({
      registry: this.registry,
      templates: this.templates,
      logger: this.logger,
      now: config.now,
      env: config.env,
    });

    if (config.globals && Object.keys(config.globals).length > 0) {
      this.globals = new GlobalStore(config.globals, this.resolver, this.logger);
    }

    this.logger.info('VariableEngine initialized', {
      deferredTypes: this.registry.listCodes(),
      globals: Object.keys(config.globals ?? {}).length,
      strict: config.strict ?? false,
    });
  }

  /**
   * Register a custom deferred resolver
   *
   * @throws DuplicateDeferredTypeError if the code is already registered
   */
  registerDeferred(code: string, resolver: DeferredResolver): void {
    this.registry.register(code, resolver);
  }

  /**
   * Build a fresh context seeded with node outputs, parent values and globals
   */
  createContext(scope?: ResolutionScope): ResolutionContext {
    const context = new ResolutionContext();

    for (const [nodeId, outputs] of Object.entries(scope?.outputs ?? {})) {
      context.addNodeOutputs(nodeId, outputs);
    }
    context.addValues(scope?.parent ?? {});
    this.globals?.seed(context);

    return context;
  }

  /**
   * Resolve a set of variables in one pass
   *
   * @returns Values and per-entry errors for the given variables
   * @throws UnknownDeferredTypeError if a deferred variable names an unregistered type
   */
  resolve(variables: Readonly<Record<string, Variable>>, scope?: ResolutionScope): ResolutionResult {
    const context = this.createContext(scope).addVariables(variables);
    const keys = Object.keys(variables);
    return this.runPass(context, keys);
  }

  /**
   * Resolve a node's inputs and validate them against its input schema
   *
   * Inputs live under `inputs.<name>` in the pass context, so one input can
   * refer to another as `${inputs.name}` while `${name}` still reaches a
   * global or parent value of the same name.
   *
   * @throws UnknownDeferredTypeError if an input names an unregistered deferred type
   */
  resolveNode(definition: NodeDefinition, scope?: ResolutionScope): NodeResolution {
    this.logger.debug(`Resolving inputs for node: ${definition.id}`);

    const context = this.createContext(scope);
    const names = Object.keys(definition.inputs);
    for (const name of names) {
      context.addVariable(inputKey(name), definition.inputs[name]);
    }

    const result = this.runPass(context, names.map(inputKey), definition.id);

    const resolved: [string, JsonValue][] = [];
    const errors = new Map<string, ResolutionError>();
    for (const name of names) {
      const key = inputKey(name);
      const value = result.values.get(key);
      const error = result.errors.get(key);

      if (value !== undefined) resolved.push([name, value]);
      if (error) errors.set(name, error);
    }

    const inputs: JsonObject = Object.fromEntries(resolved);
    const violations = definition.inputSchema
      ? this.checkSchema(definition.id, definition.inputSchema, inputs).violations
      : [];

    return {
      nodeId: definition.id,
      inputs,
      errors,
      violations,
      ok: errors.size === 0 && violations.length === 0,
    };
  }

  /**
   * Validate a node's outputs against its output schema
   */
  validateOutputs(definition: NodeDefinition, outputs: JsonValue): ValidationReport {
    if (!definition.outputSchema) {
      return { valid: true, violations: [] };
    }
    return this.checkSchema(definition.id, definition.outputSchema, outputs);
  }

  /**
   * Copy of the resolved workflow globals (computed on first access)
   */
  getGlobals(): ResolutionResult | undefined {
    return this.globals?.resolve();
  }

  getConfig(): EngineConfig {
    return this.config;
  }

  getLogger(): Logger {
    return this.logger;
  }

  private runPass(context: ResolutionContext, keys: string[], nodeId?: string): ResolutionResult {
    const startedAt = Date.now();
    const result = this.resolver.resolveAll(context, { strict: this.config.strict, keys });

    for (const [key, error] of result.errors) {
      this.emit('entry:failed', key, error);
    }

    const summary: PassSummary = {
      resolved: result.values.size,
      failed: result.errors.size,
      durationMs: Date.now() - startedAt,
      nodeId,
    };
    this.emit('pass:complete', summary);
    this.logger.debug('Resolution pass finished', summary);

    return result;
  }

  private checkSchema(nodeId: string, schema: SchemaNode, value: JsonValue): ValidationReport {
    const report = validateOrReport(schema, value);

    if (!report.valid) {
      this.logger.warn(`Schema validation failed for node ${nodeId}`, {
        violations: report.violations.length,
      });
      this.emit('validation:failed', nodeId, report.violations);
    }

    return report;
  }
}
