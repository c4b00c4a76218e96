import { parse as parseYaml } from 'yaml';
import { parseSchema } from '../schema/parser.js';
import { SchemaDefinitionError } from '../schema/schema.js';
import type { SchemaNode } from '../schema/schema.js';
import { fromWire } from '../variables/parser.js';
import type { Variable } from '../variables/schema.js';
import { NodeDefinitionError, NodeDefinitionSchema } from './schema.js';
import type { NodeDefinition } from './schema.js';

/**
 * Parse YAML node definition content and validate it
 *
 * @param yamlContent - Raw YAML content
 * @returns Validated NodeDefinition
 * @throws NodeDefinitionError if parsing or validation fails
 *
 * @example
 * ```typescript
 * const node = parseNodeDefinition(`
 * id: deploy
 * inputs:
 *   tag: { type: splice, value: 'release-\${version}' }
 * input_schema:
 *   type: object
 *   properties:
 *     tag: { type: string }
 * `);
 * ```
 */
export function parseNodeDefinition(yamlContent: string): NodeDefinition {
  let parsed: unknown;

  try {
    parsed = parseYaml(yamlContent);
  } catch (error) {
    if (error instanceof Error) {
      throw new NodeDefinitionError(`Failed to parse YAML node definition: ${error.message}`);
    }
    throw new NodeDefinitionError('Unknown error parsing node definition');
  }

  if (!parsed) {
    throw new NodeDefinitionError('Node definition file is empty or contains only comments');
  }

  return validateNodeDefinition(parsed);
}

/**
 * Validate a node definition object (already parsed)
 *
 * @throws NodeDefinitionError if validation fails
 */
export function validateNodeDefinition(definition: unknown): NodeDefinition {
  const result = NodeDefinitionSchema.safeParse(definition);

  if (!result.success) {
    throw new NodeDefinitionError('Node definition validation failed', result.error);
  }

  const { id, description, inputs, input_schema, output_schema } = result.data;

  const variables: Record<string, Variable> = {};
  for (const [name, wire] of Object.entries(inputs)) {
    variables[name] = fromWire(wire);
  }

  return {
    id,
    description,
    inputs: variables,
    inputSchema: toSchema(id, 'input_schema', input_schema),
    outputSchema: toSchema(id, 'output_schema', output_schema),
  };
}

function toSchema(nodeId: string, field: string, raw: unknown): SchemaNode | undefined {
  if (raw === undefined) return undefined;

  try {
    return parseSchema(raw);
  } catch (error) {
    if (error instanceof SchemaDefinitionError) {
      throw new NodeDefinitionError(`Node '${nodeId}' has an invalid ${field}: ${error.getDetails()}`);
    }
    throw error;
  }
}
