import { describe, it, expect } from 'vitest';
import {
  BUILTIN_RESOLVERS,
  compactTimestamp,
  envResolver,
  jsonResolver,
  registerBuiltins,
  timestampResolver,
} from '../builtins.js';
import { InvalidSeedError } from '../errors.js';
import { DeferredRegistry } from '../registry.js';
import type { DeferredAmbient } from '../registry.js';
import { FIXED_NOW } from '../../__tests__/test-helpers.js';

describe('built-in resolvers', () => {
  const ambient: DeferredAmbient = {
    key: 'value',
    now: () => FIXED_NOW,
    env: { DEPLOY_REGION: 'eu-west-1' },
  };

  describe('timestamp', () => {
    it('should append a compact UTC timestamp to the prefix', () => {
      expect(timestampResolver('build', ambient)).toBe('build_20240102030405');
    });

    it('should return the bare timestamp for an empty prefix', () => {
      expect(timestampResolver('', ambient)).toBe('20240102030405');
    });

    it('should honour the format option', () => {
      expect(timestampResolver({ prefix: 'b', format: 'iso' }, ambient)).toBe('b_2024-01-02T03:04:05.000Z');
      expect(timestampResolver({ format: 'epoch' }, ambient)).toBe(1704164645);
    });

    it('should reject other seeds', () => {
      expect(() => timestampResolver(42, ambient)).toThrow(InvalidSeedError);
      expect(() => timestampResolver({ format: 'rfc' }, ambient)).toThrow(
        "Invalid seed for 'timestamp': seed does not match the expected shape"
      );
    });

    it('should zero-pad every field', () => {
      expect(compactTimestamp(new Date(Date.UTC(987, 8, 7, 6, 5, 4)))).toBe('09870907060504');
    });
  });

  describe('env', () => {
    it('should read the named variable', () => {
      expect(envResolver('DEPLOY_REGION', ambient)).toBe('eu-west-1');
    });

    it('should fall back to the default', () => {
      expect(envResolver({ name: 'MISSING', default: 3 }, ambient)).toBe(3);
    });

    it('should fail when the variable is unset and has no default', () => {
      expect(() => envResolver('MISSING', ambient)).toThrow(
        "Invalid seed for 'env': environment variable 'MISSING' is not set"
      );
    });
  });

  describe('json', () => {
    it('should parse the seed as JSON', () => {
      expect(jsonResolver('{"targets":["linux",1]}', ambient)).toEqual({ targets: ['linux', 1] });
    });

    it('should reject invalid JSON and non-string seeds', () => {
      expect(() => jsonResolver('{oops', ambient)).toThrow(SyntaxError);
      expect(() => jsonResolver(['a'], ambient)).toThrow(InvalidSeedError);
    });
  });

  describe('registerBuiltins', () => {
    it('should register every built-in', () => {
      const registry = new DeferredRegistry();

      registerBuiltins(registry);

      expect(registry.listCodes().sort()).toEqual(Object.keys(BUILTIN_RESOLVERS).sort());
    });

    it('should keep resolvers already registered under a built-in code', () => {
      const registry = new DeferredRegistry();
      const custom = (): string => 'custom';
      registry.register('timestamp', custom);

      registerBuiltins(registry);

      expect(registry.get('timestamp')).toBe(custom);
      expect(registry.has('json')).toBe(true);
    });
  });
});
