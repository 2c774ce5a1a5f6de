/**
 * Unified Application Configuration
 *
 * Parses environment variables, validates them with Zod, and exports a
 * frozen config object that all runtime code should use.
 *
 * - `env.ts` defines the raw environment variable schema
 * - `unified.ts` (this file) assembles the typed application config
 * - `index.ts` re-exports everything for convenient imports
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { isJestRuntime } from '../../shared/utils/envFlags';
import {
  LogFormatSchema,
  LogLevelSchema,
  NodeEnvSchema,
  getEffectiveNodeEnv,
  isProduction,
  isTest,
  parseEnv,
} from './env';

// Skip in test mode so a local .env cannot override test-specific env vars.
if (process.env.NODE_ENV !== 'test' && !isJestRuntime()) {
  dotenv.config();
}

const envResult = parseEnv(process.env);
if (!envResult.success) {
  console.error('Invalid environment configuration:');
  for (const error of envResult.errors ?? []) {
    console.error(`  - ${error.path || 'root'}: ${error.message}`);
  }
  process.exit(1);
}
const env =
  envResult.data ??
  (() => {
    throw new Error('Missing env data after successful parse');
  })();

const nodeEnv = getEffectiveNodeEnv(env);

const ConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  isProduction: z.boolean(),
  isTest: z.boolean(),
  logging: z.object({
    level: LogLevelSchema,
    format: LogFormatSchema,
    file: z.string().min(1).optional(),
  }),
  board: z.object({
    width: z.number().int().positive(),
    height: z.number().int().positive(),
    traceTallies: z.boolean(),
  }),
});

/**
 * Application configuration type inferred from the schema.
 */
export type AppConfig = z.infer<typeof ConfigSchema>;

const preliminaryConfig = {
  nodeEnv,
  isProduction: isProduction(nodeEnv),
  isTest: isTest(nodeEnv),
  logging: {
    level: env.LOG_LEVEL,
    format: env.LOG_FORMAT,
    file: env.LOG_FILE?.trim() || undefined,
  },
  board: {
    width: env.BOARD_WIDTH,
    height: env.BOARD_HEIGHT,
    traceTallies: env.STACKBOARD_TRACE_TALLIES,
  },
};

export const config: AppConfig = Object.freeze(ConfigSchema.parse(preliminaryConfig));
