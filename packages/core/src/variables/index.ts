/**
 * Variable System - literal, template and deferred variables and their wire format
 */

export {
  JsonValueSchema,
  VariableWireSchema,
  VariableDefinitionError,
  type VariableWire,
  type VariableWireType,
  type VariableKind,
  type Variable,
  type LiteralVariable,
  type TemplateVariable,
  type DeferredVariable,
} from './schema.js';

export { literal, template, deferred, isVariable } from './variable.js';

export { parseVariable, parseVariables, serializeVariable, fromWire } from './parser.js';
