import { describe, it, expect } from 'vitest';
import { Schema } from '../builders.js';
import { describeSchema, formatPath, formatViolations, typeTag, validate, validateOrReport } from '../validator.js';

describe('validate', () => {
  const jobParams = Schema.object({
    branch: Schema.string(),
    timeout: Schema.int(),
  });

  describe('object schemas', () => {
    it('should accept a value matching every declared property', () => {
      expect(validate(jobParams, { branch: 'master', timeout: 3600 })).toEqual([]);
    });

    it('should report exactly one violation for a mistyped property', () => {
      const violations = validate(jobParams, { timeout: '3600' });

      expect(violations).toEqual([
        {
          path: ['timeout'],
          expected: 'int',
          actual: 'string',
          message: 'expected int, got string',
        },
      ]);
    });

    it('should accept absent declared properties', () => {
      expect(validate(jobParams, {})).toEqual([]);
    });

    it('should accept unknown properties alongside declared ones', () => {
      expect(validate(jobParams, { branch: 'dev', extra: [1, 2, 3] })).toEqual([]);
    });

    it('should accept anything when no properties are declared', () => {
      const payload = Schema.object();

      expect(validate(payload, { a: 1, b: { c: ['d'] }, e: null })).toEqual([]);
    });

    it('should reject arrays and null where an object is expected', () => {
      expect(validate(jobParams, [1])).toEqual([
        { path: [], expected: 'object', actual: 'array', message: 'expected object, got array' },
      ]);
      expect(validate(jobParams, null)[0].actual).toBe('null');
    });

    it('should report nested paths', () => {
      const schema = Schema.object({
        targets: Schema.array(Schema.object({ name: Schema.string() })),
      });

      const violations = validate(schema, { targets: [{ name: 'linux' }, { name: 1 }] });

      expect(violations).toHaveLength(1);
      expect(violations[0].path).toEqual(['targets', 1, 'name']);
      expect(violations[0].actual).toBe('int');
    });
  });

  describe('array schemas', () => {
    it('should validate every element with an index path', () => {
      const violations = validate(Schema.array(Schema.int()), [1, 'x', 2.5]);

      expect(violations.map((v) => v.path)).toEqual([[1], [2]]);
      expect(violations.map((v) => v.actual)).toEqual(['string', 'float']);
    });

    it('should reject non-arrays', () => {
      const violations = validate(Schema.array(Schema.string()), 'a,b');

      expect(violations).toEqual([
        {
          path: [],
          expected: 'array<string>',
          actual: 'string',
          message: 'expected array<string>, got string',
        },
      ]);
    });

    it('should accept an empty array', () => {
      expect(validate(Schema.array(Schema.boolean()), [])).toEqual([]);
    });
  });

  describe('scalar schemas', () => {
    it('should check runtime types', () => {
      expect(validate(Schema.string(), 'a')).toEqual([]);
      expect(validate(Schema.boolean(), false)).toEqual([]);
      expect(validate(Schema.int(), 7)).toEqual([]);
      expect(validate(Schema.int(), 7.5)).toHaveLength(1);
      expect(validate(Schema.boolean(), 'true')).toHaveLength(1);
    });

    it('should accept integers as floats but not non-finite numbers', () => {
      expect(validate(Schema.float(), 3)).toEqual([]);
      expect(validate(Schema.float(), 0.25)).toEqual([]);

      const violations = validate(Schema.float(), Number.NaN);
      expect(violations[0].actual).toBe('non-finite number');
    });

    it('should enforce a non-empty enum', () => {
      const platform = Schema.string({ enum: ['linux', 'mac'] });

      expect(validate(platform, 'mac')).toEqual([]);
      expect(validate(platform, 'win')).toEqual([
        {
          path: [],
          expected: 'string enum["linux", "mac"]',
          actual: 'string',
          message: 'value "win" is not one of ["linux", "mac"]',
        },
      ]);
    });

    it('should treat an empty enum as unconstrained', () => {
      expect(validate(Schema.int({ enum: [] }), 42)).toEqual([]);
    });

    it('should report a type mismatch before the enum', () => {
      const violations = validate(Schema.int({ enum: [1, 2] }), 'one');

      expect(violations).toHaveLength(1);
      expect(violations[0].message).toBe('expected int enum[1, 2], got string');
    });
  });

  it('should not mutate or reject frozen values', () => {
    const value = Object.freeze({ branch: 'main', timeout: 10 });

    expect(validate(jobParams, value)).toEqual([]);
    expect(value).toEqual({ branch: 'main', timeout: 10 });
  });

  it('should summarise results with validateOrReport', () => {
    expect(validateOrReport(jobParams, { branch: 'a' })).toEqual({ valid: true, violations: [] });
    expect(validateOrReport(jobParams, { branch: 1 }).valid).toBe(false);
  });
});

describe('typeTag', () => {
  it('should tag values in schema vocabulary', () => {
    expect(typeTag('a')).toBe('string');
    expect(typeTag(1)).toBe('int');
    expect(typeTag(1.5)).toBe('float');
    expect(typeTag(true)).toBe('boolean');
    expect(typeTag(null)).toBe('null');
    expect(typeTag([])).toBe('array');
    expect(typeTag({})).toBe('object');
    expect(typeTag(undefined)).toBe('undefined');
  });
});

describe('describeSchema', () => {
  it('should describe nested arrays', () => {
    expect(describeSchema(Schema.array(Schema.array(Schema.int())))).toBe('array<array<int>>');
  });

  it('should describe objects without their properties', () => {
    expect(describeSchema(Schema.object({ a: Schema.string() }))).toBe('object');
  });
});

describe('formatViolations', () => {
  it('should render one line per violation', () => {
    const schema = Schema.object({
      targets: Schema.array(Schema.object({ name: Schema.string() })),
      timeout: Schema.int(),
    });

    const report = formatViolations(validate(schema, { targets: [{ name: 2 }], timeout: 'soon' }));

    expect(report).toBe(
      '$.targets[0].name: expected string, got int\n$.timeout: expected int, got string'
    );
  });

  it('should return an empty string when there are no violations', () => {
    expect(formatViolations([])).toBe('');
  });

  it('should quote keys that are not identifiers', () => {
    expect(formatPath(['env', 'my-key', 0])).toBe('$.env["my-key"][0]');
  });
});
