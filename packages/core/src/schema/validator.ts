import { isScalarSchema } from './schema.js';
import type { ScalarSchemaNode, SchemaNode } from './schema.js';

export type PathSegment = string | number;

/**
 * A single schema mismatch. Violations are data, never thrown.
 */
export interface Violation {
  path: PathSegment[];
  /** Summary of the schema node that was not satisfied */
  expected: string;
  /** Observed type tag of the value */
  actual: string;
  message: string;
}

export interface ValidationReport {
  valid: boolean;
  violations: Violation[];
}

/**
 * Validate a value against a schema tree
 *
 * Never throws and never mutates the value.
 *
 * @example
 * ```typescript
 * const violations = validate(schema, { branch: 'master', timeout: '3600' });
 * // [{ path: ['timeout'], expected: 'int', actual: 'string', ... }]
 * ```
 */
export function validate(node: SchemaNode, value: unknown): Violation[] {
  const violations: Violation[] = [];
  walk(node, value, [], violations);
  return violations;
}

export function validateOrReport(node: SchemaNode, value: unknown): ValidationReport {
  const violations = validate(node, value);
  return { valid: violations.length === 0, violations };
}

function walk(node: SchemaNode, value: unknown, path: PathSegment[], out: Violation[]): void {
  if (isScalarSchema(node)) {
    checkScalar(node, value, path, out);
    return;
  }

  if (node.type === 'array') {
    if (!Array.isArray(value)) {
      out.push(mismatch(node, value, path));
      return;
    }
    value.forEach((item, index) => walk(node.items, item, [...path, index], out));
    return;
  }

  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    out.push(mismatch(node, value, path));
    return;
  }

  // Absent and undeclared properties are both accepted
  const present: Map<string, unknown> = new Map(Object.entries(value));
  for (const [name, child] of Object.entries(node.properties)) {
    if (present.has(name)) {
      walk(child, present.get(name), [...path, name], out);
    }
  }
}

function checkScalar(
  node: ScalarSchemaNode,
  value: unknown,
  path: PathSegment[],
  out: Violation[]
): void {
  if (!matchesScalar(node, value)) {
    out.push(mismatch(node, value, path));
    return;
  }

  if (node.enum.length > 0 && !node.enum.some((allowed) => allowed === value)) {
    out.push({
      path,
      expected: describeSchema(node),
      actual: typeTag(value),
      message: `value ${JSON.stringify(value)} is not one of ${formatEnum(node)}`,
    });
  }
}

function matchesScalar(node: ScalarSchemaNode, value: unknown): boolean {
  switch (node.type) {
    case 'string':
      return typeof value === 'string';
    case 'int':
      return typeof value === 'number' && Number.isInteger(value);
    case 'float':
      return typeof value === 'number' && Number.isFinite(value);
    case 'boolean':
      return typeof value === 'boolean';
    default: {
      const _exhaustive: never = node.type;
      return _exhaustive;
    }
  }
}

function mismatch(node: SchemaNode, value: unknown, path: PathSegment[]): Violation {
  const expected = describeSchema(node);
  const actual = typeTag(value);
  return { path, expected, actual, message: `expected ${expected}, got ${actual}` };
}

/**
 * Observed type tag of a runtime value, in schema vocabulary
 */
export function typeTag(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return 'non-finite number';
    return Number.isInteger(value) ? 'int' : 'float';
  }

  return typeof value;
}

/**
 * Short human-readable summary of a schema node
 */
export function describeSchema(node: SchemaNode): string {
  if (isScalarSchema(node)) {
    return node.enum.length > 0 ? `${node.type} enum${formatEnum(node)}` : node.type;
  }

  if (node.type === 'array') {
    return `array<${describeSchema(node.items)}>`;
  }

  return 'object';
}

function formatEnum(node: ScalarSchemaNode): string {
  return `[${node.enum.map((value) => JSON.stringify(value)).join(', ')}]`;
}

/**
 * Render a path as `$.a.b[0]["odd key"]`
 */
export function formatPath(path: readonly PathSegment[]): string {
  return path.reduce<string>((acc, segment) => {
    if (typeof segment === 'number') return `${acc}[${segment}]`;
    if (/^[A-Za-z_$][\w$]*$/.test(segment)) return `${acc}.${segment}`;
    return `${acc}[${JSON.stringify(segment)}]`;
  }, '$');
}

/**
 * Render violations as a report, one line per violation
 */
export function formatViolations(violations: readonly Violation[]): string {
  return violations.map((v) => `${formatPath(v.path)}: ${v.message}`).join('\n');
}
