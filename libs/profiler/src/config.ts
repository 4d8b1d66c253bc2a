/**
 * Configuration
 *
 * Reads toolkit settings from environment variables.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { ArgumentError, DEFAULT_ITERATIONS, DEFAULT_WARMUP_ITERATIONS } from '@dispatch-perf/types';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const EnvSchema = z.object({
  NODE_ENV: z.string().optional(),
  PERF_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  PERF_DEFAULT_ITERATIONS: z.coerce.number().int().positive().default(DEFAULT_ITERATIONS),
  PERF_WARMUP_ITERATIONS: z.coerce.number().int().nonnegative().default(DEFAULT_WARMUP_ITERATIONS),
});

/**
 * Resolved toolkit configuration
 */
export interface PerfConfig {
  logLevel: LogLevel;
  defaultIterations: number;
  warmupIterations: number;
}

/**
 * Load configuration from the environment.
 *
 * Logging is silent under `NODE_ENV=test` unless `PERF_LOG_LEVEL` says otherwise.
 *
 * @throws ArgumentError naming the variable that failed validation
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PerfConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issue = result.error.issues[0];
    const variable = issue?.path.join('.') || 'env';
    throw new ArgumentError(variable, issue?.message ?? 'is invalid');
  }

  const parsed = result.data;
  return {
    logLevel: parsed.PERF_LOG_LEVEL ?? (parsed.NODE_ENV === 'test' ? 'silent' : 'info'),
    defaultIterations: parsed.PERF_DEFAULT_ITERATIONS,
    warmupIterations: parsed.PERF_WARMUP_ITERATIONS,
  };
}
