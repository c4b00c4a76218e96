import type { JsonObject, JsonValue, Logger } from '../types.js';
import { isJsonObject } from '../types.js';
import type { CompiledTemplate, ReferenceSegment } from './ast.js';
import { evaluate } from './evaluator.js';
import type { ReferenceScope } from './evaluator.js';
import { parseTemplate } from './parser.js';
import { collectReferencePaths, formatReferenceKey, matchReferenceKey } from './references.js';

/**
 * Values visible to a render, keyed by canonical reference key
 */
export type Bindings = ReadonlyMap<string, JsonValue> | Readonly<Record<string, JsonValue>>;

export interface TemplateEngineOptions {
  logger?: Logger;
  /** Maximum number of compiled template strings kept (default: 500) */
  cacheSize?: number;
}

const MARKER = '${';

/**
 * Template Engine - reference extraction and `${...}` substitution over
 * structured values
 *
 * Only string leaves are scanned; numbers, booleans and null pass through and
 * mapping keys are left alone. Substitution is single-pass: text produced by a
 * marker is never scanned again.
 *
 * @example
 * ```typescript
 * const engine = new TemplateEngine();
 *
 * engine.extractReferences({ url: '${host}/job/${job.name}' }, new Set(['host', 'job']));
 * // Set { 'host', 'job' }
 *
 * engine.render('release-${version + 1}', { version: 41 });
 * // 'release-42'
 * ```
 */
export class TemplateEngine {
  private logger?: Logger;
  private cache: Map<string, CompiledTemplate> = new Map();
  private cacheSize: number;

  constructor(options?: TemplateEngineOptions) {
    this.logger = options?.logger;
    this.cacheSize = options?.cacheSize ?? 500;
  }

  /**
   * Parse a template string, reusing a cached parse when available
   *
   * @throws TemplateEvalError if a marker is malformed
   */
  compile(source: string): CompiledTemplate {
    const cached = this.cache.get(source);
    if (cached) return cached;

    const compiled = parseTemplate(source);

    if (this.cache.size >= this.cacheSize) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) this.cache.delete(oldest.value);
    }
    this.cache.set(source, compiled);

    return compiled;
  }

  /**
   * Check whether any string leaf of a value contains a marker
   */
  hasMarkers(value: JsonValue): boolean {
    if (typeof value === 'string') return value.includes(MARKER);
    if (Array.isArray(value)) return value.some((item) => this.hasMarkers(item));
    if (isJsonObject(value)) return Object.values(value).some((item) => this.hasMarkers(item));
    return false;
  }

  /**
   * Collect the reference keys a value depends on
   *
   * Each reference resolves to the longest prefix of its path that is one of
   * `visibleKeys`; a reference with no visible prefix is reported by its full
   * path.
   *
   * @throws TemplateEvalError if a marker is malformed
   */
  extractReferences(value: JsonValue, visibleKeys?: ReadonlySet<string>): Set<string> {
    const paths: ReferenceSegment[][] = [];
    this.collectPaths(value, paths);

    const keys = new Set<string>();
    for (const path of paths) {
      const match = visibleKeys ? matchReferenceKey(path, (key) => visibleKeys.has(key)) : undefined;
      keys.add(match ? match.key : formatReferenceKey(path));
    }

    return keys;
  }

  /**
   * Substitute every marker in a value
   *
   * A string that is exactly one marker yields the referenced value with its
   * type intact; otherwise values are spliced into the surrounding text.
   *
   * @throws TemplateEvalError on unknown references or operator type errors
   */
  render(value: JsonValue, bindings: Bindings): JsonValue {
    const scope = createScope(toMap(bindings));
    return this.renderValue(value, scope);
  }

  /**
   * Clear compiled template cache (useful for testing)
   */
  clearCache(): void {
    this.cache.clear();
  }

  get cachedCount(): number {
    return this.cache.size;
  }

  private collectPaths(value: JsonValue, out: ReferenceSegment[][]): void {
    if (typeof value === 'string') {
      if (!value.includes(MARKER)) return;
      for (const segment of this.compile(value).segments) {
        if (segment.kind === 'expr') collectReferencePaths(segment.expr, out);
      }
    } else if (Array.isArray(value)) {
      value.forEach((item) => this.collectPaths(item, out));
    } else if (isJsonObject(value)) {
      Object.values(value).forEach((item) => this.collectPaths(item, out));
    }
  }

  private renderValue(value: JsonValue, scope: ReferenceScope): JsonValue {
    if (typeof value === 'string') {
      return value.includes(MARKER) ? this.renderString(this.compile(value), scope) : value;
    }

    if (Array.isArray(value)) {
      return value.map((item) => this.renderValue(item, scope));
    }

    if (isJsonObject(value)) {
      const out: JsonObject = {};
      for (const [key, item] of Object.entries(value)) {
        out[key] = this.renderValue(item, scope);
      }
      return out;
    }

    return value;
  }

  private renderString(compiled: CompiledTemplate, scope: ReferenceScope): JsonValue {
    if (compiled.whole) {
      const [only] = compiled.segments;
      if (only.kind === 'expr') return evaluate(only.expr, scope, only.source);
    }

    let out = '';
    for (const segment of compiled.segments) {
      out += segment.kind === 'text' ? segment.value : stringifyValue(evaluate(segment.expr, scope, segment.source));
    }

    this.logger?.debug('Rendered template', { source: compiled.source, length: out.length });
    return out;
  }
}

/**
 * Text form of a value spliced into surrounding text
 */
export function stringifyValue(value: JsonValue): string {
  if (typeof value === 'string') return value;
  if (value === null || typeof value !== 'object') return String(value);
  return JSON.stringify(value);
}

function isMap(bindings: Bindings): bindings is ReadonlyMap<string, JsonValue> {
  return bindings instanceof Map;
}

function toMap(bindings: Bindings): ReadonlyMap<string, JsonValue> {
  return isMap(bindings) ? bindings : new Map(Object.entries(bindings));
}

function createScope(bindings: ReadonlyMap<string, JsonValue>): ReferenceScope {
  return {
    lookup(path) {
      const match = matchReferenceKey(path, (key) => bindings.has(key));
      if (!match) return undefined;

      const value = bindings.get(match.key);
      return value === undefined ? undefined : { value, consumed: match.consumed };
    },
  };
}
