import { z } from 'zod';
import { config } from 'dotenv';
import { existsSync } from 'fs';
import { join } from 'path';

/**
 * Load environment variables from the appropriate .env file based on NODE_ENV.
 * Priority: .env.{NODE_ENV}.local > .env.{NODE_ENV} > .env.local > .env
 *
 * dotenv doesn't override, so the first value set for each variable wins.
 */
function loadEnvFile(): void {
  const nodeEnv = process.env.NODE_ENV || 'development';
  const cwd = process.cwd();

  const envFiles = [`.env.${nodeEnv}.local`, `.env.${nodeEnv}`, '.env.local', '.env'];

  for (const file of envFiles) {
    const filePath = join(cwd, file);
    if (existsSync(filePath)) {
      config({ path: filePath });
    }
  }
}

loadEnvFile();

/**
 * Environment variable schema.
 * Validated once at startup so a bad deploy fails fast.
 */
export const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.string().default('info'),

  // Cookie signing and token encryption
  ENCRYPTION_SECRET: z.string().min(16, 'ENCRYPTION_SECRET must be at least 16 characters'),

  // Google OAuth client (token refresh)
  GOOGLE_CLIENT_ID: z.string().min(1, 'GOOGLE_CLIENT_ID is required'),
  GOOGLE_CLIENT_SECRET: z.string().min(1, 'GOOGLE_CLIENT_SECRET is required'),
  GOOGLE_REDIRECT_URI: z.string().url('GOOGLE_REDIRECT_URI must be a valid URL').optional(),

  // Database
  DB_PATH: z.string().default('./data/app.db'),

  // Intent parsing
  AI_PROVIDER: z.enum(['openai', 'anthropic']).default('openai'),
  AI_API_KEY: z.string().optional(),
  AI_MODEL: z.string().optional(),
  AI_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),

  // Command pipeline
  DEFAULT_TIMEZONE: z.string().default('America/Los_Angeles'),
  PENDING_CONFIRMATION_TTL_SECONDS: z.coerce.number().int().positive().default(600),
  MAX_COMMAND_LENGTH: z.coerce.number().int().positive().default(500),
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Parse and validate the current process environment
 *
 * @throws ZodError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  return envSchema.parse(env);
}

/**
 * JSON Schema for @fastify/env, mirroring the required part of envSchema.
 * Keep this in sync with envSchema when adding required variables.
 */
export const fastifyEnvOptions = {
  schema: {
    type: 'object',
    required: ['ENCRYPTION_SECRET', 'GOOGLE_CLIENT_ID', 'GOOGLE_CLIENT_SECRET'],
    properties: {
      NODE_ENV: {
        type: 'string',
        enum: ['development', 'production', 'test'],
        default: 'development',
      },
      PORT: { type: 'string', default: '3000' },
      HOST: { type: 'string', default: '0.0.0.0' },
      ENCRYPTION_SECRET: { type: 'string', minLength: 16 },
      GOOGLE_CLIENT_ID: { type: 'string', minLength: 1 },
      GOOGLE_CLIENT_SECRET: { type: 'string', minLength: 1 },
      DB_PATH: { type: 'string', default: './data/app.db' },
      AI_PROVIDER: { type: 'string', enum: ['openai', 'anthropic'], default: 'openai' },
      DEFAULT_TIMEZONE: { type: 'string', default: 'America/Los_Angeles' },
    },
  } as const,
  dotenv: false, // env files are loaded above for multi-env support
  data: process.env,
};
