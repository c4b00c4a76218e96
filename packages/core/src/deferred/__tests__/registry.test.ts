import { describe, it, expect, beforeEach, vi } from 'vitest';
import { DeferredRegistry } from '../registry.js';
import type { DeferredAmbient } from '../registry.js';
import { DuplicateDeferredTypeError, UnknownDeferredTypeError } from '../errors.js';

describe('DeferredRegistry', () => {
  let registry: DeferredRegistry;

  const ambient: DeferredAmbient = {
    key: 'tag',
    now: () => new Date(0),
    env: {},
  };

  beforeEach(() => {
    registry = new DeferredRegistry();
  });

  describe('register', () => {
    it('should register a resolver', () => {
      registry.register('upper', (seed) => String(seed).toUpperCase());

      expect(registry.size).toBe(1);
      expect(registry.has('upper')).toBe(true);
    });

    it('should throw if the code is already registered', () => {
      registry.register('upper', (seed) => seed);

      expect(() => registry.register('upper', (seed) => seed)).toThrow(DuplicateDeferredTypeError);
      expect(() => registry.register('upper', (seed) => seed)).toThrow(
        "Deferred type 'upper' is already registered"
      );
    });

    it('should reject an empty code', () => {
      expect(() => registry.register('', (seed) => seed)).toThrow(
        'Deferred type code must be a non-empty string'
      );
    });
  });

  describe('resolve', () => {
    it('should pass the seed and ambient state to the resolver', () => {
      const resolver = vi.fn((seed: unknown, env: DeferredAmbient) => `${String(seed)}@${env.key}`);
      registry.register('tagged', resolver);

      expect(registry.resolve('tagged', 'v1', ambient)).toBe('v1@tag');
      expect(resolver).toHaveBeenCalledWith('v1', ambient);
    });

    it('should throw UnknownDeferredTypeError naming the variable', () => {
      expect(() => registry.resolve('nope', 'x', ambient)).toThrow(UnknownDeferredTypeError);
      expect(() => registry.resolve('nope', 'x', ambient)).toThrow(
        "Unknown deferred type 'nope' for variable 'tag'"
      );
    });
  });

  describe('get', () => {
    it('should return the registered resolver', () => {
      const resolver = (): string => 'fixed';
      registry.register('fixed', resolver);

      expect(registry.get('fixed')).toBe(resolver);
    });

    it('should throw for unregistered codes', () => {
      expect(() => registry.get('nope')).toThrow('Unknown deferred type: nope');
    });
  });

  describe('listing and removal', () => {
    it('should list codes in registration order', () => {
      registry.register('a', (seed) => seed);
      registry.register('b', (seed) => seed);

      expect(registry.listCodes()).toEqual(['a', 'b']);
    });

    it('should unregister a resolver', () => {
      registry.register('a', (seed) => seed);

      expect(registry.unregister('a')).toBe(true);
      expect(registry.unregister('a')).toBe(false);
      expect(registry.has('a')).toBe(false);
    });

    it('should clear all resolvers', () => {
      registry.register('a', (seed) => seed);
      registry.register('b', (seed) => seed);

      registry.clear();

      expect(registry.size).toBe(0);
    });
  });
});
