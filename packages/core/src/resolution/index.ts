/**
 * Resolution System - per-pass contexts, the dependency-ordered resolver and
 * the shared global store
 */

export {
  ResolutionContext,
  inputKey,
  type EntryState,
  type ContextEntry,
} from './context.js';

export {
  Resolver,
  type ResolverOptions,
  type ResolveOptions,
  type ResolutionResult,
} from './resolver.js';

export { GlobalStore } from './globals.js';

export {
  ResolutionError,
  UnresolvedReferenceError,
  CyclicReferenceError,
  TemplateResolutionError,
  DeferredResolutionError,
  InvalidReferenceKeyError,
  DuplicateReferenceKeyError,
} from './errors.js';
