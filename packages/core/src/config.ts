import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { GeneratorConfig } from './types.js';

const BooleanFlagSchema = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

/**
 * Environment variables understood by the generator
 */
const EnvSchema = z.object({
  PIPEGEN_OUTPUT_DIR: z.string().min(1).optional(),
  PIPEGEN_LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).optional(),
  PIPEGEN_STRICT: BooleanFlagSchema.optional(),
});

export type EnvConfig = Pick<GeneratorConfig, 'outputDir' | 'logLevel' | 'strict'>;

/**
 * Read generator settings from environment variables
 *
 * Unset variables are left out of the result so callers can spread it under
 * their own defaults.
 *
 * @throws ConfigError if a variable is set to an unsupported value
 */
export function configFromEnv(env: Record<string, string | undefined> = process.env): EnvConfig {
  const result = EnvSchema.safeParse({
    PIPEGEN_OUTPUT_DIR: env.PIPEGEN_OUTPUT_DIR || undefined,
    PIPEGEN_LOG_LEVEL: env.PIPEGEN_LOG_LEVEL?.toLowerCase() || undefined,
    PIPEGEN_STRICT: env.PIPEGEN_STRICT?.toLowerCase() || undefined,
  });

  if (!result.success) {
    const details = result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
    throw new ConfigError(`Invalid environment configuration\n${details.join('\n')}`);
  }

  const config: EnvConfig = {};
  if (result.data.PIPEGEN_OUTPUT_DIR !== undefined) config.outputDir = result.data.PIPEGEN_OUTPUT_DIR;
  if (result.data.PIPEGEN_LOG_LEVEL !== undefined) config.logLevel = result.data.PIPEGEN_LOG_LEVEL;
  if (result.data.PIPEGEN_STRICT !== undefined) config.strict = result.data.PIPEGEN_STRICT;

  return config;
}
