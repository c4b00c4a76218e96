import { z } from 'zod';
import { JsonValueSchema } from '../variables/schema.js';
import { InvalidSeedError } from './errors.js';
import type { DeferredRegistry, DeferredResolver } from './registry.js';

const TimestampSeedSchema = z.union([
  z.string(),
  z
    .object({
      prefix: z.string().optional(),
      format: z.enum(['compact', 'iso', 'epoch']).optional(),
    })
    .strict(),
]);

const EnvSeedSchema = z.union([
  z.string().min(1),
  z
    .object({
      name: z.string().min(1),
      default: JsonValueSchema.optional(),
    })
    .strict(),
]);

function parseSeed<T>(code: string, schema: z.ZodType<T>, seed: unknown): T {
  const result = schema.safeParse(seed);
  if (!result.success) {
    throw new InvalidSeedError(code, 'seed does not match the expected shape', result.error);
  }
  return result.data;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * UTC timestamp as YYYYMMDDHHmmss
 */
export function compactTimestamp(date: Date): string {
  return (
    pad(date.getUTCFullYear(), 4) +
    pad(date.getUTCMonth() + 1) +
    pad(date.getUTCDate()) +
    pad(date.getUTCHours()) +
    pad(date.getUTCMinutes()) +
    pad(date.getUTCSeconds())
  );
}

/**
 * `prefix` → `prefix_20240102030405`. An object seed picks the format:
 * `compact` (default), `iso` or `epoch` (seconds, returned as a number when
 * there is no prefix).
 */
export const timestampResolver: DeferredResolver = (seed, ambient) => {
  const parsed = parseSeed('timestamp', TimestampSeedSchema, seed);
  const { prefix, format } = typeof parsed === 'string' ? { prefix: parsed, format: undefined } : parsed;

  const now = ambient.now();
  let stamp: string | number;
  switch (format ?? 'compact') {
    case 'iso':
      stamp = now.toISOString();
      break;
    case 'epoch':
      stamp = Math.floor(now.getTime() / 1000);
      break;
    default:
      stamp = compactTimestamp(now);
  }

  return prefix ? `${prefix}_${stamp}` : stamp;
};

/**
 * Environment variable named by the seed, with an optional default
 */
export const envResolver: DeferredResolver = (seed, ambient) => {
  const parsed = parseSeed('env', EnvSeedSchema, seed);
  const { name, fallback } =
    typeof parsed === 'string'
      ? { name: parsed, fallback: undefined }
      : { name: parsed.name, fallback: parsed.default };

  const value = ambient.env[name];
  if (value !== undefined) return value;
  if (fallback !== undefined) return fallback;

  throw new InvalidSeedError('env', `environment variable '${name}' is not set`);
};

/**
 * Parse the seed string as JSON
 */
export const jsonResolver: DeferredResolver = (seed) => {
  const text = parseSeed('json', z.string(), seed);
  const parsed: unknown = JSON.parse(text);
  return parseSeed('json', JsonValueSchema, parsed);
};

export const BUILTIN_RESOLVERS: Readonly<Record<string, DeferredResolver>> = {
  timestamp: timestampResolver,
  env: envResolver,
  json: jsonResolver,
};

/**
 * Register every built-in resolver whose code is still free
 */
export function registerBuiltins(registry: DeferredRegistry): void {
  for (const [code, resolver] of Object.entries(BUILTIN_RESOLVERS)) {
    if (!registry.has(code)) {
      registry.register(code, resolver);
    }
  }
}
