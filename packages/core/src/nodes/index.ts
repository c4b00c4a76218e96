/**
 * Node System - node definitions (inputs plus input/output schemas) and
 * their YAML loader
 */

export {
  NodeDefinitionSchema,
  NodeDefinitionError,
  type NodeDefinition,
  type NodeDefinitionWire,
} from './schema.js';

export { parseNodeDefinition, validateNodeDefinition } from './parser.js';

export { NodeDefinitionLoader } from './loader.js';
