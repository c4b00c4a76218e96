/**
 * Template System - `${...}` markers, a restricted expression language and
 * reference extraction
 */

export { TemplateEngine, stringifyValue, type Bindings, type TemplateEngineOptions } from './engine.js';

export { TemplateEvalError, TemplateSyntaxError } from './errors.js';

export { parseExpression, parseTemplate, compileExpression } from './parser.js';

export { evaluate, isTruthy, type ReferenceScope } from './evaluator.js';

export {
  staticPath,
  collectReferencePaths,
  formatReferenceKey,
  parseReferenceKey,
  canonicalKey,
  matchReferenceKey,
} from './references.js';

export type {
  Expr,
  BinaryOp,
  UnaryOp,
  ReferenceSegment,
  TemplateSegment,
  CompiledTemplate,
} from './ast.js';
