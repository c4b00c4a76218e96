import { z } from 'zod';

/**
 * Zod schema for the schema wire format
 */

export const SCALAR_TYPES = ['string', 'int', 'float', 'boolean'] as const;

export type ScalarType = (typeof SCALAR_TYPES)[number];
export type SchemaType = ScalarType | 'array' | 'object';
export type EnumValue = string | number | boolean;

// Wire shape, recursive through items/properties
export interface SchemaWire {
  type: SchemaType;
  description?: string;
  enum?: EnumValue[];
  items?: SchemaWire;
  properties?: Record<string, SchemaWire>;
}

export const SchemaWireSchema: z.ZodType<SchemaWire> = z.lazy(() =>
  z
    .object({
      type: z.enum(['string', 'int', 'float', 'boolean', 'array', 'object']),
      description: z.string().optional(),
      enum: z.array(z.union([z.string(), z.number(), z.boolean()])).optional(),
      items: SchemaWireSchema.optional(),
      properties: z.record(SchemaWireSchema).optional(),
    })
    .strict()
);

// Schema tree: a tagged union over scalar, array and object nodes

export interface ScalarSchemaNode {
  readonly type: ScalarType;
  readonly description: string;
  /** Allowed values; empty means unconstrained */
  readonly enum: readonly EnumValue[];
}

export interface ArraySchemaNode {
  readonly type: 'array';
  readonly description: string;
  readonly items: SchemaNode;
}

export interface ObjectSchemaNode {
  readonly type: 'object';
  readonly description: string;
  /** Declared properties; empty means any properties are accepted unchecked */
  readonly properties: Readonly<Record<string, SchemaNode>>;
}

export type SchemaNode = ScalarSchemaNode | ArraySchemaNode | ObjectSchemaNode;

export function isScalarSchema(node: SchemaNode): node is ScalarSchemaNode {
  return node.type !== 'array' && node.type !== 'object';
}

/**
 * Custom error for malformed schema definitions
 */
export class SchemaDefinitionError extends Error {
  constructor(
    message: string,
    public errors?: z.ZodError
  ) {
    super(message);
    this.name = 'SchemaDefinitionError';
  }

  /**
   * Get formatted error details
   */
  getDetails(): string {
    if (!this.errors) return this.message;

    return this.errors.errors.map((err) => `${err.path.join('.')}: ${err.message}`).join('\n');
  }
}
