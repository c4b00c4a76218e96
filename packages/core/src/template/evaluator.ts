import { isDeepStrictEqual } from 'util';
import type { JsonValue } from '../types.js';
import { isJsonObject } from '../types.js';
import type { BinaryOp, Expr, ReferenceSegment } from './ast.js';
import { TemplateEvalError } from './errors.js';
import { formatReferenceKey, staticPath } from './references.js';

/**
 * Resolves reference paths during evaluation. `consumed` is how many leading
 * segments the matched key covered; the rest are indexed into its value.
 */
export interface ReferenceScope {
  lookup(path: readonly ReferenceSegment[]): { value: JsonValue; consumed: number } | undefined;
}

/**
 * Evaluate a parsed expression
 *
 * @param source - Expression text, reported in errors
 * @throws TemplateEvalError on unknown references and operator type errors
 */
export function evaluate(expr: Expr, scope: ReferenceScope, source: string): JsonValue {
  return new Evaluator(scope, source).eval(expr);
}

export function isTruthy(value: JsonValue): boolean {
  if (value === null || value === false || value === 0 || value === '') return false;
  return !(typeof value === 'number' && Number.isNaN(value));
}

export function describeValue(value: JsonValue): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

class Evaluator {
  constructor(
    private readonly scope: ReferenceScope,
    private readonly source: string
  ) {}

  eval(expr: Expr): JsonValue {
    switch (expr.kind) {
      case 'literal':
        return expr.value;
      case 'identifier':
      case 'member':
      case 'index':
        return this.evalAccess(expr);
      case 'unary': {
        const operand = this.eval(expr.operand);
        if (expr.op === '!') return !isTruthy(operand);
        return -this.expectNumber(operand, '-');
      }
      case 'binary':
        return this.evalBinary(expr.op, expr.left, expr.right);
      case 'conditional':
        return isTruthy(this.eval(expr.test)) ? this.eval(expr.consequent) : this.eval(expr.alternate);
      default: {
        const _exhaustive: never = expr;
        return _exhaustive;
      }
    }
  }

  private evalAccess(expr: Extract<Expr, { kind: 'identifier' | 'member' | 'index' }>): JsonValue {
    const path = staticPath(expr);
    if (path) return this.resolvePath(path);

    switch (expr.kind) {
      case 'member':
        return this.index(this.eval(expr.object), expr.property);
      case 'index': {
        const target = this.eval(expr.object);
        const key = this.eval(expr.index);
        if (typeof key !== 'string' && typeof key !== 'number') {
          return this.fail(`Cannot use ${describeValue(key)} as an index`);
        }
        return this.index(target, key);
      }
      default:
        return this.fail(`Unknown reference '${expr.name}'`);
    }
  }

  private resolvePath(path: ReferenceSegment[]): JsonValue {
    const hit = this.scope.lookup(path);
    if (!hit) {
      return this.fail(`Unknown reference '${formatReferenceKey(path)}'`);
    }

    let value = hit.value;
    for (const segment of path.slice(hit.consumed)) {
      value = this.index(value, segment);
    }
    return value;
  }

  private index(target: JsonValue, key: string | number): JsonValue {
    if (Array.isArray(target)) {
      if (typeof key !== 'number' || !Number.isInteger(key)) {
        return this.fail(`Array index must be an integer, got ${JSON.stringify(key)}`);
      }
      if (key < 0 || key >= target.length) {
        return this.fail(`Index ${key} out of range for array of length ${target.length}`);
      }
      return target[key];
    }

    if (isJsonObject(target)) {
      if (typeof key !== 'string') {
        return this.fail(`Object key must be a string, got ${JSON.stringify(key)}`);
      }
      if (!Object.hasOwn(target, key)) {
        return this.fail(`Property '${key}' not found`);
      }
      return target[key];
    }

    return this.fail(`Cannot index ${describeValue(target)} with ${JSON.stringify(key)}`);
  }

  private evalBinary(op: BinaryOp, leftExpr: Expr, rightExpr: Expr): JsonValue {
    // Short-circuit operators yield an operand
    if (op === '&&') {
      const left = this.eval(leftExpr);
      return isTruthy(left) ? this.eval(rightExpr) : left;
    }
    if (op === '||') {
      const left = this.eval(leftExpr);
      return isTruthy(left) ? left : this.eval(rightExpr);
    }

    const left = this.eval(leftExpr);
    const right = this.eval(rightExpr);

    switch (op) {
      case '+':
        return this.add(left, right);
      case '-':
        return this.finite(this.expectNumber(left, op) - this.expectNumber(right, op));
      case '*':
        return this.finite(this.expectNumber(left, op) * this.expectNumber(right, op));
      case '/':
      case '%': {
        const a = this.expectNumber(left, op);
        const b = this.expectNumber(right, op);
        if (b === 0) return this.fail(op === '/' ? 'Division by zero' : 'Modulo by zero');
        return this.finite(op === '/' ? a / b : a % b);
      }
      case '<':
      case '<=':
      case '>':
      case '>=':
        return this.compare(op, left, right);
      case '==':
        return isDeepStrictEqual(left, right);
      case '!=':
        return !isDeepStrictEqual(left, right);
      default: {
        const _exhaustive: never = op;
        return _exhaustive;
      }
    }
  }

  private add(left: JsonValue, right: JsonValue): JsonValue {
    if (typeof left === 'number' && typeof right === 'number') {
      return this.finite(left + right);
    }

    if ((typeof left === 'string' || typeof right === 'string') && isScalar(left) && isScalar(right)) {
      return stringifyScalar(left) + stringifyScalar(right);
    }

    return this.fail(`Operator '+' cannot be applied to ${describeValue(left)} and ${describeValue(right)}`);
  }

  private compare(op: '<' | '<=' | '>' | '>=', left: JsonValue, right: JsonValue): boolean {
    if (typeof left === 'number' && typeof right === 'number') return ordered(op, left, right);
    if (typeof left === 'string' && typeof right === 'string') return ordered(op, left, right);

    return this.fail(`Operator '${op}' cannot compare ${describeValue(left)} and ${describeValue(right)}`);
  }

  private expectNumber(value: JsonValue, op: string): number {
    if (typeof value !== 'number') {
      return this.fail(`Operator '${op}' expects a number, got ${describeValue(value)}`);
    }
    return value;
  }

  private finite(value: number): number {
    if (!Number.isFinite(value)) return this.fail('Arithmetic result is not a finite number');
    return value;
  }

  private fail(detail: string): never {
    throw new TemplateEvalError(this.source, detail);
  }
}

function ordered<T extends string | number>(op: '<' | '<=' | '>' | '>=', a: T, b: T): boolean {
  switch (op) {
    case '<':
      return a < b;
    case '<=':
      return a <= b;
    case '>':
      return a > b;
    case '>=':
      return a >= b;
  }
}

function isScalar(value: JsonValue): value is string | number | boolean | null {
  return value === null || typeof value !== 'object';
}

function stringifyScalar(value: string | number | boolean | null): string {
  return typeof value === 'string' ? value : String(value);
}
