/**
 * Deferred System - registry of custom resolvers for deferred variables
 */

export { DeferredRegistry, type DeferredResolver, type DeferredAmbient } from './registry.js';

export { UnknownDeferredTypeError, DuplicateDeferredTypeError, InvalidSeedError } from './errors.js';

export {
  BUILTIN_RESOLVERS,
  registerBuiltins,
  timestampResolver,
  envResolver,
  jsonResolver,
  compactTimestamp,
} from './builtins.js';
