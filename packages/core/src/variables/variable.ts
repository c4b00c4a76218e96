import type { JsonValue } from '../types.js';
import type { DeferredVariable, LiteralVariable, TemplateVariable, Variable } from './schema.js';

export function literal(value: JsonValue): LiteralVariable {
  return Object.freeze({ kind: 'literal', value });
}

export function template(value: JsonValue): TemplateVariable {
  return Object.freeze({ kind: 'template', value });
}

export function deferred(deferredType: string, value: JsonValue): DeferredVariable {
  return Object.freeze({ kind: 'deferred', value, deferredType });
}

export function isVariable(value: unknown): value is Variable {
  if (typeof value !== 'object' || value === null || !('kind' in value)) return false;

  switch (value.kind) {
    case 'literal':
    case 'template':
      return 'value' in value;
    case 'deferred':
      return 'value' in value && 'deferredType' in value && typeof value.deferredType === 'string';
    default:
      return false;
  }
}
