import { describe, it, expect } from 'vitest';
import { parseNodeDefinition, validateNodeDefinition } from '../parser.js';
import { NodeDefinitionError } from '../schema.js';
import { Schema } from '../../schema/builders.js';
import { deferred, literal, template } from '../../variables/variable.js';

describe('parseNodeDefinition', () => {
  const validNodeYAML = `
id: deploy
description: Ship a release
inputs:
  branch:
    type: plain
    value: main
  tag:
    type: splice
    value: 'release-\${version}'
  stamp:
    type: lazy
    value: build
    custom_type: timestamp
input_schema:
  type: object
  properties:
    branch:
      type: string
      enum: [main, develop]
    tag:
      type: string
output_schema:
  type: object
  properties:
    artifacts:
      type: array
      items:
        type: string
`;

  it('should parse a complete node definition', () => {
    const node = parseNodeDefinition(validNodeYAML);

    expect(node.id).toBe('deploy');
    expect(node.description).toBe('Ship a release');
    expect(node.inputs).toEqual({
      branch: literal('main'),
      tag: template('release-${version}'),
      stamp: deferred('timestamp', 'build'),
    });
    expect(node.inputSchema).toEqual(
      Schema.object({
        branch: Schema.string({ enum: ['main', 'develop'] }),
        tag: Schema.string(),
      })
    );
    expect(node.outputSchema).toEqual(Schema.object({ artifacts: Schema.array(Schema.string()) }));
  });

  it('should default inputs and leave schemas unset', () => {
    const node = parseNodeDefinition('id: noop');

    expect(node.inputs).toEqual({});
    expect(node.inputSchema).toBeUndefined();
    expect(node.outputSchema).toBeUndefined();
  });

  it('should reject empty files', () => {
    expect(() => parseNodeDefinition('# nothing here\n')).toThrow(
      'Node definition file is empty or contains only comments'
    );
  });

  it('should reject malformed YAML', () => {
    expect(() => parseNodeDefinition('id: [unclosed')).toThrow(/^Failed to parse YAML node definition: /);
  });

  it('should reject unknown variable types', () => {
    const yaml = `
id: deploy
inputs:
  branch:
    type: eager
    value: main
`;

    expect(() => parseNodeDefinition(yaml)).toThrow(NodeDefinitionError);
    expect(() => parseNodeDefinition(yaml)).toThrow('Node definition validation failed');
  });

  it('should report schema errors with the node id and field', () => {
    expect(() =>
      validateNodeDefinition({ id: 'deploy', input_schema: { type: 'array' } })
    ).toThrow("Node 'deploy' has an invalid input_schema: $: array schema requires 'items'");
  });

  it('should reject unknown top-level fields', () => {
    try {
      validateNodeDefinition({ id: 'deploy', handler: 'shell' });
      expect.fail('expected validation to fail');
    } catch (error) {
      expect(error).toBeInstanceOf(NodeDefinitionError);
      expect(error instanceof NodeDefinitionError && error.getDetails()).toBe(
        ": Unrecognized key(s) in object: 'handler'"
      );
    }
  });
});
