import { parse as parseYaml } from 'yaml';
import { Schema } from './builders.js';
import { SchemaDefinitionError, SchemaWireSchema, isScalarSchema } from './schema.js';
import type { EnumValue, ScalarType, SchemaNode, SchemaWire } from './schema.js';

/**
 * Parse a schema from its wire format and build a frozen schema tree
 *
 * @param input - Wire-format schema object (e.g. decoded JSON or YAML)
 * @returns Validated schema tree
 * @throws SchemaDefinitionError if the definition is malformed
 *
 * @example
 * ```typescript
 * const schema = parseSchema({
 *   type: 'object',
 *   properties: {
 *     branch: { type: 'string' },
 *     timeout: { type: 'int' },
 *   },
 * });
 * ```
 */
export function parseSchema(input: unknown): SchemaNode {
  // zod would recurse forever on a cyclic object graph
  assertAcyclic(input, [], new Set());

  const result = SchemaWireSchema.safeParse(input);

  if (!result.success) {
    throw new SchemaDefinitionError('Schema validation failed', result.error);
  }

  return toNode(result.data, '$');
}

/**
 * Parse a YAML schema definition
 *
 * @throws SchemaDefinitionError if the YAML is invalid or the schema is malformed
 */
export function parseSchemaYaml(yamlContent: string): SchemaNode {
  let parsed: unknown;

  try {
    parsed = parseYaml(yamlContent);
  } catch (error) {
    throw new SchemaDefinitionError(
      `Failed to parse YAML schema: ${error instanceof Error ? error.message : 'Unknown'}`
    );
  }

  if (parsed === null || parsed === undefined) {
    throw new SchemaDefinitionError('Schema file is empty or contains only comments');
  }

  return parseSchema(parsed);
}

/**
 * Serialize a schema tree to its wire format
 *
 * Empty descriptions, enums and property maps are omitted.
 */
export function serializeSchema(node: SchemaNode): SchemaWire {
  const wire: SchemaWire = { type: node.type };

  if (node.description) {
    wire.description = node.description;
  }

  if (isScalarSchema(node)) {
    if (node.enum.length > 0) {
      wire.enum = [...node.enum];
    }
  } else if (node.type === 'array') {
    wire.items = serializeSchema(node.items);
  } else {
    const names = Object.keys(node.properties);
    if (names.length > 0) {
      const properties: Record<string, SchemaWire> = {};
      for (const name of names) {
        properties[name] = serializeSchema(node.properties[name]);
      }
      wire.properties = properties;
    }
  }

  return wire;
}

function toNode(wire: SchemaWire, path: string): SchemaNode {
  const description = wire.description ?? '';

  if (wire.type === 'array') {
    rejectField(wire.enum !== undefined, path, 'enum', wire.type);
    rejectField(wire.properties !== undefined, path, 'properties', wire.type);

    if (!wire.items) {
      throw new SchemaDefinitionError(`${path}: array schema requires 'items'`);
    }

    return Schema.array(toNode(wire.items, `${path}.items`), { description });
  }

  if (wire.type === 'object') {
    rejectField(wire.enum !== undefined, path, 'enum', wire.type);
    rejectField(wire.items !== undefined, path, 'items', wire.type);

    const properties: Record<string, SchemaNode> = {};
    for (const [name, child] of Object.entries(wire.properties ?? {})) {
      properties[name] = toNode(child, `${path}.properties.${name}`);
    }

    return Schema.object(properties, { description });
  }

  rejectField(wire.items !== undefined, path, 'items', wire.type);
  rejectField(wire.properties !== undefined, path, 'properties', wire.type);

  const allowed = wire.enum ?? [];
  for (const value of allowed) {
    if (!enumValueMatches(wire.type, value)) {
      throw new SchemaDefinitionError(
        `${path}: enum value ${JSON.stringify(value)} is not a valid ${wire.type}`
      );
    }
  }

  return Schema.scalar(wire.type, { description, enum: allowed });
}

function rejectField(present: boolean, path: string, field: string, type: string): void {
  if (present) {
    throw new SchemaDefinitionError(`${path}: '${field}' is not allowed for type '${type}'`);
  }
}

function enumValueMatches(type: ScalarType, value: EnumValue): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'int':
      return typeof value === 'number' && Number.isInteger(value);
    case 'float':
      return typeof value === 'number' && Number.isFinite(value);
    case 'boolean':
      return typeof value === 'boolean';
    default: {
      const _exhaustive: never = type;
      return _exhaustive;
    }
  }
}

function assertAcyclic(value: unknown, path: string[], ancestors: Set<object>): void {
  if (typeof value !== 'object' || value === null) return;

  if (ancestors.has(value)) {
    throw new SchemaDefinitionError(
      `Self-referential schema at ${['$', ...path].join('.')}`
    );
  }

  ancestors.add(value);
  for (const [key, child] of Object.entries(value)) {
    assertAcyclic(child, [...path, key], ancestors);
  }
  ancestors.delete(value);
}
