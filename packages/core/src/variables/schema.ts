import { z } from 'zod';
import type { JsonValue } from '../types.js';

/**
 * Zod schemas for the variable wire format
 */

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

const PlainVariableSchema = z
  .object({
    type: z.literal('plain'),
    value: JsonValueSchema,
  })
  .strict();

const SpliceVariableSchema = z
  .object({
    type: z.literal('splice'),
    value: JsonValueSchema,
  })
  .strict();

const LazyVariableSchema = z
  .object({
    type: z.literal('lazy'),
    value: JsonValueSchema,
    custom_type: z.string().min(1),
  })
  .strict();

export const VariableWireSchema = z.discriminatedUnion('type', [
  PlainVariableSchema,
  SpliceVariableSchema,
  LazyVariableSchema,
]);

export type VariableWire = z.infer<typeof VariableWireSchema>;
export type VariableWireType = VariableWire['type'];

// In-memory model

export type VariableKind = 'literal' | 'template' | 'deferred';

/** Resolved by returning its value unchanged */
export interface LiteralVariable {
  readonly kind: 'literal';
  readonly value: JsonValue;
}

/** String leaves at any depth may contain `${...}` markers */
export interface TemplateVariable {
  readonly kind: 'template';
  readonly value: JsonValue;
}

/** Value is template-resolved into a seed, then handed to a registered resolver */
export interface DeferredVariable {
  readonly kind: 'deferred';
  readonly value: JsonValue;
  readonly deferredType: string;
}

export type Variable = LiteralVariable | TemplateVariable | DeferredVariable;

/**
 * Custom error for variable definition failures
 */
export class VariableDefinitionError extends Error {
  constructor(
    message: string,
    public errors?: z.ZodError
  ) {
    super(message);
    this.name = 'VariableDefinitionError';
  }

  getDetails(): string {
    if (!this.errors) return this.message;

    return this.errors.errors.map((err) => `${err.path.join('.')}: ${err.message}`).join('\n');
  }
}
