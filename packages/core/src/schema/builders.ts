import type {
  ArraySchemaNode,
  EnumValue,
  ObjectSchemaNode,
  ScalarSchemaNode,
  ScalarType,
  SchemaNode,
} from './schema.js';

export interface ScalarOptions {
  description?: string;
  enum?: readonly EnumValue[];
}

function scalar(type: ScalarType, options?: ScalarOptions): ScalarSchemaNode {
  return Object.freeze({
    type,
    description: options?.description ?? '',
    enum: Object.freeze([...(options?.enum ?? [])]),
  });
}

/**
 * Schema node builders. Every node they return is frozen.
 *
 * @example
 * ```typescript
 * const params = Schema.object({
 *   branch: Schema.string({ description: 'Branch to build' }),
 *   timeout: Schema.int(),
 *   targets: Schema.array(Schema.string({ enum: ['linux', 'mac'] })),
 * });
 * ```
 */
export const Schema = {
  string: (options?: ScalarOptions): ScalarSchemaNode => scalar('string', options),
  int: (options?: ScalarOptions): ScalarSchemaNode => scalar('int', options),
  float: (options?: ScalarOptions): ScalarSchemaNode => scalar('float', options),
  boolean: (options?: ScalarOptions): ScalarSchemaNode => scalar('boolean', options),
  scalar,

  array(items: SchemaNode, options?: { description?: string }): ArraySchemaNode {
    return Object.freeze({
      type: 'array',
      description: options?.description ?? '',
      items,
    });
  },

  object(
    properties: Record<string, SchemaNode> = {},
    options?: { description?: string }
  ): ObjectSchemaNode {
    return Object.freeze({
      type: 'object',
      description: options?.description ?? '',
      properties: Object.freeze({ ...properties }),
    });
  },
};
