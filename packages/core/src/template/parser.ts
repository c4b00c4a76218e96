import type { BinaryOp, CompiledTemplate, Expr, TemplateSegment } from './ast.js';
import { TemplateEvalError, TemplateSyntaxError } from './errors.js';
import { Tokenizer } from './tokenizer.js';
import type { OperatorToken, Token } from './tokenizer.js';

/**
 * Parse one expression body (the text between `${` and `}`)
 *
 * Grammar, lowest precedence first:
 *   conditional := or ('?' conditional ':' conditional)?
 *   or          := and ('||' and)*
 *   and         := equality ('&&' equality)*
 *   equality    := comparison (('==' | '!=') comparison)*
 *   comparison  := additive (('<' | '<=' | '>' | '>=') additive)*
 *   additive    := term (('+' | '-') term)*
 *   term        := unary (('*' | '/' | '%') unary)*
 *   unary       := ('!' | '-') unary | postfix
 *   postfix     := primary ('.' identifier | '[' conditional ']')*
 *   primary     := number | string | true | false | null | identifier | '(' conditional ')'
 *
 * @throws TemplateSyntaxError on malformed input
 */
export function parseExpression(src: string): Expr {
  const t = new Tokenizer(src);
  const expr = parseConditional(t);
  const tail = t.peek();
  if (tail.type !== 'eof') {
    throw new TemplateSyntaxError(`Unexpected trailing token: ${tokenToString(tail)}`, tail.pos);
  }
  return expr;
}

/**
 * Split a template string into literal text and `${...}` markers
 *
 * `$${` is an escape for a literal `${`.
 *
 * @throws TemplateEvalError on an unterminated, empty or malformed marker
 */
export function parseTemplate(source: string): CompiledTemplate {
  const segments: TemplateSegment[] = [];
  let text = '';
  let i = 0;

  while (i < source.length) {
    if (source.startsWith('$${', i)) {
      text += '${';
      i += 3;
      continue;
    }

    if (!source.startsWith('${', i)) {
      text += source[i];
      i++;
      continue;
    }

    const end = findMarkerEnd(source, i + 2);
    if (end < 0) {
      throw new TemplateEvalError(source.slice(i), 'Unterminated template marker', i);
    }

    const body = source.slice(i + 2, end).trim();
    if (!body) {
      throw new TemplateEvalError(source.slice(i, end + 1), 'Empty template marker', i);
    }

    if (text) {
      segments.push({ kind: 'text', value: text });
      text = '';
    }

    segments.push({ kind: 'expr', source: body, expr: compileExpression(body) });
    i = end + 1;
  }

  if (text) segments.push({ kind: 'text', value: text });

  return {
    source,
    segments,
    whole: segments.length === 1 && segments[0].kind === 'expr',
  };
}

/**
 * Parse an expression body, reporting syntax errors as TemplateEvalError
 */
export function compileExpression(body: string): Expr {
  try {
    return parseExpression(body);
  } catch (error) {
    if (error instanceof TemplateSyntaxError) {
      throw new TemplateEvalError(body, `${error.message} at position ${error.position}`, error.position);
    }
    throw error;
  }
}

// Closing brace of a marker, skipping braces inside quoted strings
function findMarkerEnd(source: string, from: number): number {
  let quote: string | undefined;

  for (let i = from; i < source.length; i++) {
    const ch = source[i];

    if (quote) {
      if (ch === '\\') i++;
      else if (ch === quote) quote = undefined;
      continue;
    }

    if (ch === '"' || ch === "'") quote = ch;
    else if (ch === '}') return i;
  }

  return -1;
}

function tokenToString(tok: Token): string {
  switch (tok.type) {
    case 'eof':
      return 'end of expression';
    case 'punct':
    case 'op':
      return `'${tok.value}'`;
    case 'identifier':
      return `identifier ${tok.value}`;
    case 'number':
      return `number ${tok.value}`;
    case 'boolean':
      return `boolean ${tok.value ? 'true' : 'false'}`;
    case 'null':
      return 'null';
    case 'string':
      return `string ${JSON.stringify(tok.value)}`;
    default: {
      const _exhaustive: never = tok;
      return String(_exhaustive);
    }
  }
}

function isPunct(tok: Token, value: string): boolean {
  return tok.type === 'punct' && tok.value === value;
}

function matchOp<T extends OperatorToken>(tok: Token, ops: readonly T[]): T | undefined {
  if (tok.type !== 'op') return undefined;
  const value = tok.value;
  return ops.find((op) => op === value);
}

function parseConditional(t: Tokenizer): Expr {
  const test = parseBinary(t, 0);
  if (!isPunct(t.peek(), '?')) return test;

  t.next();
  const consequent = parseConditional(t);
  const colon = t.next();
  if (!isPunct(colon, ':')) {
    throw new TemplateSyntaxError("Expected ':' in conditional expression", colon.pos);
  }
  const alternate = parseConditional(t);
  return { kind: 'conditional', test, consequent, alternate };
}

// Binary precedence levels, loosest first
const BINARY_LEVELS: readonly (readonly BinaryOp[])[] = [
  ['||'],
  ['&&'],
  ['==', '!='],
  ['<', '<=', '>', '>='],
  ['+', '-'],
  ['*', '/', '%'],
];

function parseBinary(t: Tokenizer, level: number): Expr {
  if (level >= BINARY_LEVELS.length) return parseUnary(t);

  let left = parseBinary(t, level + 1);
  while (true) {
    const op = matchOp(t.peek(), BINARY_LEVELS[level]);
    if (!op) return left;
    t.next();
    const right = parseBinary(t, level + 1);
    left = { kind: 'binary', op, left, right };
  }
}

function parseUnary(t: Tokenizer): Expr {
  const op = matchOp(t.peek(), ['!', '-'] as const);
  if (op) {
    t.next();
    return { kind: 'unary', op, operand: parseUnary(t) };
  }
  return parsePostfix(t);
}

function parsePostfix(t: Tokenizer): Expr {
  let expr = parsePrimary(t);

  while (true) {
    const tok = t.peek();

    if (isPunct(tok, '.')) {
      t.next();
      const name = t.next();
      if (name.type !== 'identifier') {
        throw new TemplateSyntaxError(`Expected property name after '.', got ${tokenToString(name)}`, name.pos);
      }
      expr = { kind: 'member', object: expr, property: name.value };
      continue;
    }

    if (isPunct(tok, '[')) {
      t.next();
      const index = parseConditional(t);
      const close = t.next();
      if (!isPunct(close, ']')) {
        throw new TemplateSyntaxError(`Expected ']', got ${tokenToString(close)}`, close.pos);
      }
      expr = { kind: 'index', object: expr, index };
      continue;
    }

    return expr;
  }
}

function parsePrimary(t: Tokenizer): Expr {
  const tok = t.next();

  switch (tok.type) {
    case 'number':
    case 'string':
    case 'boolean':
      return { kind: 'literal', value: tok.value };
    case 'null':
      return { kind: 'literal', value: null };
    case 'identifier':
      return { kind: 'identifier', name: tok.value };
    case 'punct':
      if (tok.value === '(') {
        const inner = parseConditional(t);
        const close = t.next();
        if (!isPunct(close, ')')) {
          throw new TemplateSyntaxError(`Expected ')', got ${tokenToString(close)}`, close.pos);
        }
        return inner;
      }
      break;
    default:
      break;
  }

  throw new TemplateSyntaxError(`Unexpected ${tokenToString(tok)}`, tok.pos);
}
