import { z } from 'zod';
import type { SchemaNode } from '../schema/schema.js';
import type { Variable } from '../variables/schema.js';
import { VariableWireSchema } from '../variables/schema.js';

/**
 * Zod schema for a node definition: the inputs a task handler receives and
 * the schemas its inputs and outputs follow
 */
export const NodeDefinitionSchema = z
  .object({
    id: z.string().min(1),
    description: z.string().optional(),
    inputs: z.record(VariableWireSchema).default({}),
    // Checked separately by parseSchema, which reports schema-specific errors
    input_schema: z.unknown().optional(),
    output_schema: z.unknown().optional(),
  })
  .strict();

export type NodeDefinitionWire = z.input<typeof NodeDefinitionSchema>;

export interface NodeDefinition {
  id: string;
  description?: string;
  inputs: Record<string, Variable>;
  inputSchema?: SchemaNode;
  outputSchema?: SchemaNode;
  /** Source file, when loaded from disk */
  filepath?: string;
}

/**
 * Custom error for node definition validation failures
 */
export class NodeDefinitionError extends Error {
  constructor(
    message: string,
    public errors?: z.ZodError
  ) {
    super(message);
    this.name = 'NodeDefinitionError';
  }

  getDetails(): string {
    if (!this.errors) return this.message;

    return this.errors.errors.map((err) => `${err.path.join('.')}: ${err.message}`).join('\n');
  }
}
