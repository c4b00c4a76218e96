import type { JsonScalar } from '../types.js';

export type ReferenceSegment = string | number;

export type UnaryOp = '!' | '-';

export type BinaryOp =
  | '+'
  | '-'
  | '*'
  | '/'
  | '%'
  | '<'
  | '<='
  | '>'
  | '>='
  | '=='
  | '!='
  | '&&'
  | '||';

export type Expr =
  | { kind: 'literal'; value: JsonScalar }
  | { kind: 'identifier'; name: string }
  | { kind: 'member'; object: Expr; property: string }
  | { kind: 'index'; object: Expr; index: Expr }
  | { kind: 'unary'; op: UnaryOp; operand: Expr }
  | { kind: 'binary'; op: BinaryOp; left: Expr; right: Expr }
  | { kind: 'conditional'; test: Expr; consequent: Expr; alternate: Expr };

export type TemplateSegment =
  | { kind: 'text'; value: string }
  | { kind: 'expr'; source: string; expr: Expr };

/**
 * A parsed template string. `whole` is set when the string is exactly one
 * marker, in which case rendering keeps the value's type.
 */
export interface CompiledTemplate {
  source: string;
  segments: TemplateSegment[];
  whole: boolean;
}
