import type { Expr, ReferenceSegment } from './ast.js';
import { TemplateSyntaxError } from './errors.js';
import { parseExpression } from './parser.js';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

// Read as literals by the tokenizer, so never written as `.name`
const KEYWORDS = new Set(['true', 'false', 'null']);

function isIdentifier(segment: string): boolean {
  return IDENTIFIER.test(segment) && !KEYWORDS.has(segment);
}

/**
 * Reference path of an expression made only of an identifier followed by
 * `.name`, `["key"]` or `[0]` accesses; undefined for anything dynamic.
 */
export function staticPath(expr: Expr): ReferenceSegment[] | undefined {
  switch (expr.kind) {
    case 'identifier':
      return [expr.name];
    case 'member': {
      const base = staticPath(expr.object);
      return base ? [...base, expr.property] : undefined;
    }
    case 'index': {
      const base = staticPath(expr.object);
      if (!base || expr.index.kind !== 'literal') return undefined;

      const key = expr.index.value;
      if (typeof key === 'string') return [...base, key];
      if (typeof key === 'number' && Number.isInteger(key) && key >= 0) return [...base, key];
      return undefined;
    }
    default:
      return undefined;
  }
}

/**
 * Collect the longest static reference path of every reference in an expression
 */
export function collectReferencePaths(expr: Expr, out: ReferenceSegment[][] = []): ReferenceSegment[][] {
  const path = staticPath(expr);
  if (path) {
    out.push(path);
    return out;
  }

  switch (expr.kind) {
    case 'literal':
    case 'identifier':
      break;
    case 'member':
      collectReferencePaths(expr.object, out);
      break;
    case 'index':
      collectReferencePaths(expr.object, out);
      collectReferencePaths(expr.index, out);
      break;
    case 'unary':
      collectReferencePaths(expr.operand, out);
      break;
    case 'binary':
      collectReferencePaths(expr.left, out);
      collectReferencePaths(expr.right, out);
      break;
    case 'conditional':
      collectReferencePaths(expr.test, out);
      collectReferencePaths(expr.consequent, out);
      collectReferencePaths(expr.alternate, out);
      break;
    default: {
      const _exhaustive: never = expr;
      return _exhaustive;
    }
  }

  return out;
}

/**
 * Canonical key text for a path: `build.outputs[0]["odd key"]`
 */
export function formatReferenceKey(path: readonly ReferenceSegment[]): string {
  return path
    .map((segment, i) => {
      if (typeof segment === 'number') return `[${segment}]`;
      if (isIdentifier(segment)) return i === 0 ? segment : `.${segment}`;
      return `[${JSON.stringify(segment)}]`;
    })
    .join('');
}

/**
 * Parse a reference key into its path; undefined if the text is not a plain
 * reference path
 */
export function parseReferenceKey(key: string): ReferenceSegment[] | undefined {
  try {
    return staticPath(parseExpression(key));
  } catch (error) {
    if (error instanceof TemplateSyntaxError) return undefined;
    throw error;
  }
}

/**
 * Normalise a key to canonical form; undefined if it does not parse
 */
export function canonicalKey(key: string): string | undefined {
  const path = parseReferenceKey(key);
  return path ? formatReferenceKey(path) : undefined;
}

/**
 * Longest prefix of a path that names a known key
 */
export function matchReferenceKey(
  path: readonly ReferenceSegment[],
  isKnown: (key: string) => boolean
): { key: string; consumed: number } | undefined {
  for (let consumed = path.length; consumed >= 1; consumed--) {
    const key = formatReferenceKey(path.slice(0, consumed));
    if (isKnown(key)) return { key, consumed };
  }
  return undefined;
}
