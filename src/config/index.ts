/**
 * Configuration Module
 *
 * Loads and validates environment variables for the relocation advisor.
 * Uses Zod for runtime validation with sensible defaults.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';
import { ConfigurationError, formatZodIssues } from '../errors.js';
import { DEFAULT_TOP_N } from '../ranking/ranker.js';

// Environment schema with optional values and defaults
const envSchema = z.object({
  // Shortlist length when --top is not given
  RELOCATE_DEFAULT_TOP_N: z.coerce.number().int().positive().default(DEFAULT_TOP_N),

  // Dataset file used instead of the built-in seed countries
  RELOCATE_DATASET: z.string().min(1).optional(),

  // Treat weight warnings as errors
  RELOCATE_STRICT_WEIGHTS: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),

  // Runtime environment
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

/**
 * Build the configuration from an environment map.
 *
 * @throws {ConfigurationError} If any variable fails validation
 */
export function loadConfig(env: NodeJS.ProcessEnv) {
  const parseResult = envSchema.safeParse(env);

  if (!parseResult.success) {
    throw new ConfigurationError('Invalid environment variables', formatZodIssues(parseResult.error));
  }

  const parsed = parseResult.data;

  return {
    // Ranking defaults
    defaultTopN: parsed.RELOCATE_DEFAULT_TOP_N,
    strictWeights: parsed.RELOCATE_STRICT_WEIGHTS,

    // Dataset override
    datasetPath: parsed.RELOCATE_DATASET,
  } as const;
}

export type Config = ReturnType<typeof loadConfig>;

let cached: Config | undefined;

/**
 * Application configuration singleton, read from process.env on first use.
 */
export function getConfig(): Config {
  if (!cached) {
    cached = loadConfig(process.env);
  }
  return cached;
}
