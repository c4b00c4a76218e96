/**
 * Schema System - recursive type descriptors, wire parsing and validation
 */

export {
  SchemaWireSchema,
  SchemaDefinitionError,
  SCALAR_TYPES,
  isScalarSchema,
  type SchemaWire,
  type SchemaNode,
  type ScalarSchemaNode,
  type ArraySchemaNode,
  type ObjectSchemaNode,
  type ScalarType,
  type SchemaType,
  type EnumValue,
} from './schema.js';

export { Schema, type ScalarOptions } from './builders.js';

export { parseSchema, parseSchemaYaml, serializeSchema } from './parser.js';

export {
  validate,
  validateOrReport,
  describeSchema,
  typeTag,
  formatPath,
  formatViolations,
  type Violation,
  type ValidationReport,
  type PathSegment,
} from './validator.js';
