/**
 * Environment and option schemas. Every public entry point runs its options
 * through one of these, so defaults live here and nowhere else.
 */

import { z } from 'zod';
import { CodecOptionsError } from './errors.ts';
import type { NaturalnessGate, RandomSource } from './types.ts';
import {
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_MAX_DERIVATION_STEPS,
  DEFAULT_PAYLOAD_BITS,
  DEFAULT_START_SYMBOL,
} from './types.ts';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const environmentSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).catch('production'),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

export type Environment = z.infer<typeof environmentSchema>;

export function readEnvironment(env: NodeJS.ProcessEnv = process.env): Environment {
  return parseOptions(environmentSchema, {
    NODE_ENV: env.NODE_ENV,
    LOG_LEVEL: env.LOG_LEVEL,
  });
}

export function defaultLogLevel(environment: Environment): LogLevel {
  if (environment.LOG_LEVEL) return environment.LOG_LEVEL;
  if (environment.NODE_ENV === 'test') return 'silent';
  return environment.NODE_ENV === 'development' ? 'debug' : 'info';
}

function hasMethod(value: unknown, name: string): boolean {
  return typeof value === 'object' && value !== null && typeof Reflect.get(value, name) === 'function';
}

const randomSourceSchema = z.custom<RandomSource>(
  (value) => hasMethod(value, 'next'),
  'random must provide next()'
);

const naturalnessGateSchema = z.custom<NaturalnessGate>(
  (value) => hasMethod(value, 'isNatural'),
  'naturalness must provide isNatural()'
);

export const grammarOptionsSchema = z.object({
  startSymbol: z.string().min(1).default(DEFAULT_START_SYMBOL),
  // Lenient parsing clamps out-of-range probabilities instead of failing
  strict: z.boolean().default(true),
});

export const payloadBitsSchema = z.number().int().min(0);

export const encodeOptionsSchema = z.object({
  payloadBits: payloadBitsSchema.default(DEFAULT_PAYLOAD_BITS),
  maxBits: z.number().int().min(0).optional(),
  maxAttempts: z.number().int().min(1).default(DEFAULT_MAX_ATTEMPTS),
  maxDerivationSteps: z.number().int().min(1).default(DEFAULT_MAX_DERIVATION_STEPS),
  reservedSymbols: z.array(z.string()).default([]),
  random: randomSourceSchema.optional(),
  naturalness: naturalnessGateSchema.optional(),
});

export const naturalnessOptionsSchema = z.object({
  minLetters: z.number().int().min(0).default(20),
  tolerance: z.number().positive().default(0.5),
  deviationScale: z.number().positive().default(0.05),
});

export const detectOptionsSchema = z.object({
  marker: z.string().min(1),
  slotSymbols: z.array(z.string()).optional(),
  excludedSymbols: z.array(z.string()).default([]),
});

export const keySearchOptionsSchema = z.object({
  messages: z.array(z.string()).optional(),
  similarityThreshold: z.number().min(0).max(1).default(0.8),
  keyOnlyBits: z.number().int().min(1).default(16),
  keyOnlyThreshold: z.number().min(0).max(1).default(0.5),
});

export const detectMessageOptionsSchema = detectOptionsSchema.merge(keySearchOptionsSchema).extend({
  keys: z.array(z.string()).optional(),
  wordlistPath: z.string().optional(),
  // Only used when the grammar arrives as text
  startSymbol: z.string().min(1).optional(),
});

export type GrammarOptions = z.input<typeof grammarOptionsSchema>;
export type EncodeOptions = z.input<typeof encodeOptionsSchema>;
export type NaturalnessOptions = z.input<typeof naturalnessOptionsSchema>;
export type DetectOptions = z.input<typeof detectOptionsSchema>;
export type KeySearchOptions = z.input<typeof keySearchOptionsSchema>;
export type DetectMessageOptions = z.input<typeof detectMessageOptionsSchema>;

/**
 * Validate and default an options object, raising CodecOptionsError.
 */
export function parseOptions<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new CodecOptionsError(
      parsed.error.issues.map((issue) =>
        issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
    );
  }
  return parsed.data;
}
