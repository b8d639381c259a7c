// src/config/env.ts
import { z } from 'zod';
import { config } from 'dotenv';
import { existsSync } from 'fs';
import { join } from 'path';

/**
 * Load environment variables from the appropriate .env file based on NODE_ENV.
 * Priority: .env.{NODE_ENV}.local > .env.{NODE_ENV} > .env.local > .env
 *
 * dotenv never overrides a variable that is already set, so the
 * highest-priority file is loaded first.
 */
function loadEnvFile(): void {
  const nodeEnv = process.env.NODE_ENV || 'development';
  const cwd = process.cwd();

  const envFiles = [
    `.env.${nodeEnv}.local`, // gitignored
    `.env.${nodeEnv}`,
    '.env.local', // gitignored
    '.env',
  ];

  for (const file of envFiles) {
    const filePath = join(cwd, file);
    if (existsSync(filePath)) {
      config({ path: filePath });
    }
  }
}

loadEnvFile();

// Blank lines in .env files (FOO=) count as unset
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const flag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(fallback)
    .transform((value) => value === 'true');

const nonNegativeInt = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform(Number)
    .pipe(z.number().int().nonnegative());

/**
 * Environment variable schema using Zod.
 *
 * Credentials are optional here: the HTTP app starts without them and each
 * collaborator asks for what it needs when it is built (see requireConfig).
 */
export const envSchema = z.object({
  // Server Configuration
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().default('3000').transform(Number),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Google Calendar
  GOOGLE_CLIENT_ID: optionalString,
  GOOGLE_CLIENT_SECRET: optionalString,
  GOOGLE_REFRESH_TOKEN: optionalString,
  GOOGLE_CALENDAR_ID: z.string().default('primary'),

  // Microsoft Graph
  OUTLOOK_ACCESS_TOKEN: optionalString,

  // Scheduling portal
  PORTAL_URL: optionalString,
  PORTAL_SCHEDULE_URL: optionalString,
  PORTAL_EMAIL: optionalString,
  PORTAL_PASSWORD: optionalString,
  PORTAL_TIMEZONE: z.string().default('UTC'),
  PORTAL_BLOCK_LABEL: z.string().default('Busy'),
  PORTAL_HEADLESS: flag('true'),
  PORTAL_BROWSER_PATH: optionalString,
  PORTAL_STEP_TIMEOUT_MS: nonNegativeInt('30000'),
  PORTAL_RETRY_DELAY_MS: nonNegativeInt('1000'),

  // Sync behaviour
  SYNC_HORIZON_DAYS: nonNegativeInt('7'),
  APPROVAL_TIMEOUT_MINUTES: nonNegativeInt('30'), // 0 disables expiry
  DISPLAY_TIMEZONE: z.string().default('UTC'),
});

export type EnvConfig = z.infer<typeof envSchema>;

export type CredentialKey = {
  [K in keyof EnvConfig]: undefined extends EnvConfig[K] ? K : never;
}[keyof EnvConfig];

/**
 * Parse and validate configuration
 *
 * @param env - Variables to read (defaults to process.env)
 * @returns Typed configuration with defaults applied
 * @throws Error listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }
  return result.data;
}

/**
 * Read a credential that a collaborator cannot work without
 *
 * @param purpose - What needs it, for the error message
 * @throws Error when the variable is unset or blank
 */
export function requireConfig(cfg: EnvConfig, key: CredentialKey, purpose: string): string {
  const value = cfg[key];
  if (!value) {
    throw new Error(`${key} is required for ${purpose}`);
  }
  return value;
}

/**
 * Fastify-compatible JSON Schema.
 * Manually maintained to mirror envSchema above; keep the two in sync.
 */
export const fastifyEnvOptions = {
  schema: {
    type: 'object',
    required: [],
    properties: {
      NODE_ENV: { type: 'string', enum: ['development', 'production', 'test'], default: 'development' },
      PORT: { type: 'string', default: '3000' },
      HOST: { type: 'string', default: '0.0.0.0' },
      LOG_LEVEL: { type: 'string', default: 'info' },
      GOOGLE_CLIENT_ID: { type: 'string' },
      GOOGLE_CLIENT_SECRET: { type: 'string' },
      GOOGLE_REFRESH_TOKEN: { type: 'string' },
      GOOGLE_CALENDAR_ID: { type: 'string', default: 'primary' },
      OUTLOOK_ACCESS_TOKEN: { type: 'string' },
      PORTAL_URL: { type: 'string' },
      PORTAL_SCHEDULE_URL: { type: 'string' },
      PORTAL_EMAIL: { type: 'string' },
      PORTAL_PASSWORD: { type: 'string' },
      PORTAL_TIMEZONE: { type: 'string', default: 'UTC' },
      PORTAL_BLOCK_LABEL: { type: 'string', default: 'Busy' },
      PORTAL_HEADLESS: { type: 'string', enum: ['true', 'false'], default: 'true' },
      PORTAL_BROWSER_PATH: { type: 'string' },
      PORTAL_STEP_TIMEOUT_MS: { type: 'string', default: '30000' },
      PORTAL_RETRY_DELAY_MS: { type: 'string', default: '1000' },
      SYNC_HORIZON_DAYS: { type: 'string', default: '7' },
      APPROVAL_TIMEOUT_MINUTES: { type: 'string', default: '30' },
      DISPLAY_TIMEZONE: { type: 'string', default: 'UTC' },
    },
  } as const,
  dotenv: false, // env files are loaded above for multi-env support
  data: process.env,
};
