import { describe, it, expect } from 'vitest';
import { Schema } from '../builders.js';
import { parseSchema, parseSchemaYaml, serializeSchema } from '../parser.js';
import { SchemaDefinitionError } from '../schema.js';
import type { SchemaNode } from '../schema.js';

describe('parseSchema', () => {
  it('should build a schema tree from the wire format', () => {
    const schema = parseSchema({
      type: 'object',
      description: 'Job parameters',
      properties: {
        branch: { type: 'string', enum: ['main', 'dev'] },
        timeout: { type: 'int' },
        targets: { type: 'array', items: { type: 'string' } },
      },
    });

    expect(schema).toEqual(
      Schema.object(
        {
          branch: Schema.string({ enum: ['main', 'dev'] }),
          timeout: Schema.int(),
          targets: Schema.array(Schema.string()),
        },
        { description: 'Job parameters' }
      )
    );
  });

  it('should default missing properties to an open object', () => {
    const schema = parseSchema({ type: 'object' });

    expect(schema).toEqual({ type: 'object', description: '', properties: {} });
  });

  it('should return frozen nodes', () => {
    const schema = parseSchema({ type: 'array', items: { type: 'float' } });

    expect(Object.isFrozen(schema)).toBe(true);
    if (schema.type === 'array') {
      expect(Object.isFrozen(schema.items)).toBe(true);
    }
  });

  describe('malformed definitions', () => {
    it('should reject an unknown type', () => {
      expect(() => parseSchema({ type: 'date' })).toThrow(SchemaDefinitionError);
      expect(() => parseSchema({ type: 'date' })).toThrow('Schema validation failed');
    });

    it('should reject unknown fields', () => {
      expect(() => parseSchema({ type: 'string', required: true })).toThrow(SchemaDefinitionError);
    });

    it('should reject enum on non-scalar types', () => {
      expect(() => parseSchema({ type: 'array', items: { type: 'int' }, enum: [1] })).toThrow(
        "$: 'enum' is not allowed for type 'array'"
      );
    });

    it('should reject items outside arrays', () => {
      expect(() => parseSchema({ type: 'string', items: { type: 'string' } })).toThrow(
        "$: 'items' is not allowed for type 'string'"
      );
    });

    it('should require items on arrays, reporting the nested path', () => {
      expect(() =>
        parseSchema({ type: 'object', properties: { tags: { type: 'array' } } })
      ).toThrow("$.properties.tags: array schema requires 'items'");
    });

    it('should reject enum values of the wrong type', () => {
      expect(() => parseSchema({ type: 'int', enum: [1, 'two'] })).toThrow(
        '$: enum value "two" is not a valid int'
      );
      expect(() => parseSchema({ type: 'int', enum: [1.5] })).toThrow(
        '$: enum value 1.5 is not a valid int'
      );
    });

    it('should reject self-referential schemas', () => {
      const properties: Record<string, unknown> = {};
      const node = { type: 'object', properties };
      properties.self = node;

      expect(() => parseSchema(node)).toThrow('Self-referential schema at $.properties.self');
    });

    it('should expose zod details', () => {
      try {
        parseSchema({ type: 'object', properties: { a: { type: 5 } } });
        expect.fail('should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(SchemaDefinitionError);
        if (error instanceof SchemaDefinitionError) {
          expect(error.getDetails()).toContain('properties.a.type');
        }
      }
    });
  });
});

describe('parseSchemaYaml', () => {
  it('should parse a YAML schema', () => {
    const schema = parseSchemaYaml(`
type: object
properties:
  branch:
    type: string
  retries:
    type: int
    enum: [0, 1, 3]
`);

    expect(schema).toEqual(
      Schema.object({ branch: Schema.string(), retries: Schema.int({ enum: [0, 1, 3] }) })
    );
  });

  it('should reject empty content', () => {
    expect(() => parseSchemaYaml('# nothing here\n')).toThrow(
      'Schema file is empty or contains only comments'
    );
  });

  it('should wrap YAML syntax errors', () => {
    expect(() => parseSchemaYaml('type: [unclosed')).toThrow(/Failed to parse YAML schema/);
  });
});

describe('serializeSchema', () => {
  it('should omit empty descriptions, enums and properties', () => {
    expect(serializeSchema(Schema.string())).toEqual({ type: 'string' });
    expect(serializeSchema(Schema.object())).toEqual({ type: 'object' });
  });

  it('should write nested wire fields', () => {
    const schema = Schema.array(Schema.object({ os: Schema.string({ enum: ['linux'] }) }), {
      description: 'Targets',
    });

    expect(serializeSchema(schema)).toEqual({
      type: 'array',
      description: 'Targets',
      items: {
        type: 'object',
        properties: { os: { type: 'string', enum: ['linux'] } },
      },
    });
  });

  // Builds every scalar/array/object combination down to the given depth
  function compositions(depth: number): SchemaNode[] {
    const leaves: SchemaNode[] = [
      Schema.string({ description: 'text' }),
      Schema.int({ enum: [1, 2] }),
      Schema.float(),
      Schema.boolean({ enum: [true] }),
      Schema.object(),
    ];
    if (depth === 0) return leaves;

    const children = compositions(depth - 1);
    return [
      ...leaves,
      ...children.map((child) => Schema.array(child)),
      Schema.object({ first: children[0], last: children[children.length - 1] }, { description: 'pair' }),
      Schema.object(Object.fromEntries(children.map((child, i) => [`p${i}`, child]))),
    ];
  }

  it('should round-trip through the wire format', () => {
    const trees = compositions(3);
    expect(trees.length).toBeGreaterThan(20);

    for (const tree of trees) {
      expect(parseSchema(serializeSchema(tree))).toEqual(tree);
    }
  });

  it('should round-trip through JSON text', () => {
    const tree = Schema.object({
      build: Schema.object({ id: Schema.int(), tags: Schema.array(Schema.string()) }),
    });

    expect(parseSchema(JSON.parse(JSON.stringify(serializeSchema(tree))))).toEqual(tree);
  });
});
