import { describe, it, expect } from 'vitest';
import { parseVariable, parseVariables, serializeVariable } from '../parser.js';
import { VariableDefinitionError } from '../schema.js';
import { deferred, isVariable, literal, template } from '../variable.js';

describe('parseVariable', () => {
  it('should map plain to a literal variable', () => {
    expect(parseVariable({ type: 'plain', value: { retries: 3 } })).toEqual({
      kind: 'literal',
      value: { retries: 3 },
    });
  });

  it('should map splice to a template variable', () => {
    expect(parseVariable({ type: 'splice', value: ['${a}', 1] })).toEqual({
      kind: 'template',
      value: ['${a}', 1],
    });
  });

  it('should map lazy to a deferred variable', () => {
    expect(parseVariable({ type: 'lazy', value: 'nightly', custom_type: 'timestamp' })).toEqual({
      kind: 'deferred',
      value: 'nightly',
      deferredType: 'timestamp',
    });
  });

  it('should accept null values', () => {
    expect(parseVariable({ type: 'plain', value: null })).toEqual({ kind: 'literal', value: null });
  });

  it('should require custom_type for lazy variables', () => {
    expect(() => parseVariable({ type: 'lazy', value: 'x' })).toThrow(VariableDefinitionError);
  });

  it('should reject custom_type on other variable types', () => {
    expect(() => parseVariable({ type: 'plain', value: 'x', custom_type: 'timestamp' })).toThrow(
      VariableDefinitionError
    );
  });

  it('should reject unknown types and missing values', () => {
    expect(() => parseVariable({ type: 'eval', value: '1' })).toThrow('Variable validation failed');
    expect(() => parseVariable({ type: 'plain' })).toThrow(VariableDefinitionError);
  });

  it('should return frozen variables', () => {
    expect(Object.isFrozen(parseVariable({ type: 'splice', value: 'a' }))).toBe(true);
  });
});

describe('parseVariables', () => {
  it('should parse a name to variable mapping', () => {
    const variables = parseVariables({
      branch: { type: 'plain', value: 'main' },
      tag: { type: 'splice', value: 'v${branch}' },
    });

    expect(variables).toEqual({
      branch: literal('main'),
      tag: template('v${branch}'),
    });
  });

  it('should name the malformed variable', () => {
    expect(() =>
      parseVariables({
        ok: { type: 'plain', value: 1 },
        broken: { type: 'lazy', value: 1 },
      })
    ).toThrow("Variable 'broken' validation failed");
  });
});

describe('serializeVariable', () => {
  it('should write the wire format for every kind', () => {
    expect(serializeVariable(literal(1))).toEqual({ type: 'plain', value: 1 });
    expect(serializeVariable(template('${x}'))).toEqual({ type: 'splice', value: '${x}' });
    expect(serializeVariable(deferred('env', 'HOME'))).toEqual({
      type: 'lazy',
      value: 'HOME',
      custom_type: 'env',
    });
  });

  it('should parse back to the same variable', () => {
    const variable = deferred('json', '{"a":1}');

    expect(parseVariable(serializeVariable(variable))).toEqual(variable);
  });
});

describe('isVariable', () => {
  it('should recognise variables', () => {
    expect(isVariable(literal('a'))).toBe(true);
    expect(isVariable(deferred('env', 'HOME'))).toBe(true);
  });

  it('should reject other values', () => {
    expect(isVariable({ kind: 'deferred', value: 'x' })).toBe(false);
    expect(isVariable({ kind: 'plain', value: 'x' })).toBe(false);
    expect(isVariable('literal')).toBe(false);
    expect(isVariable(null)).toBe(false);
  });
});
