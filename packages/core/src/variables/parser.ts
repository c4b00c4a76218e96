import { VariableDefinitionError, VariableWireSchema } from './schema.js';
import type { Variable, VariableWire } from './schema.js';
import { deferred, literal, template } from './variable.js';

/**
 * Parse a variable from its wire format
 *
 * `plain` becomes a literal, `splice` a template and `lazy` a deferred
 * variable whose `custom_type` names the registered resolver.
 *
 * @throws VariableDefinitionError if the definition is malformed
 *
 * @example
 * ```typescript
 * parseVariable({ type: 'splice', value: 'release-${version}' });
 * parseVariable({ type: 'lazy', value: 'build', custom_type: 'timestamp' });
 * ```
 */
export function parseVariable(input: unknown): Variable {
  const result = VariableWireSchema.safeParse(input);

  if (!result.success) {
    throw new VariableDefinitionError('Variable validation failed', result.error);
  }

  return fromWire(result.data);
}

/**
 * Parse a name → wire-format mapping of variables
 *
 * @throws VariableDefinitionError naming the first malformed variable
 */
export function parseVariables(input: Record<string, unknown>): Record<string, Variable> {
  const variables: Record<string, Variable> = {};

  for (const [name, raw] of Object.entries(input)) {
    const result = VariableWireSchema.safeParse(raw);

    if (!result.success) {
      throw new VariableDefinitionError(`Variable '${name}' validation failed`, result.error);
    }

    variables[name] = fromWire(result.data);
  }

  return variables;
}

export function fromWire(wire: VariableWire): Variable {
  switch (wire.type) {
    case 'plain':
      return literal(wire.value);
    case 'splice':
      return template(wire.value);
    case 'lazy':
      return deferred(wire.custom_type, wire.value);
    default: {
      const _exhaustive: never = wire;
      return _exhaustive;
    }
  }
}

/**
 * Serialize a variable to its wire format
 */
export function serializeVariable(variable: Variable): VariableWire {
  switch (variable.kind) {
    case 'literal':
      return { type: 'plain', value: variable.value };
    case 'template':
      return { type: 'splice', value: variable.value };
    case 'deferred':
      return { type: 'lazy', value: variable.value, custom_type: variable.deferredType };
    default: {
      const _exhaustive: never = variable;
      return _exhaustive;
    }
  }
}
