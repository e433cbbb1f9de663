import { z } from 'zod';
import dotenv from 'dotenv';
import { existsSync } from 'fs';
import { resolve } from 'path';

const envSchema = z.object({
  // Database
  DATABASE_URL: z.string().url(),

  // Bearer tokens
  JWT_SECRET: z.string().min(16),
  JWT_ALGORITHM: z.enum(['HS256', 'HS384', 'HS512']).default('HS256'),
  ACCESS_TOKEN_EXPIRE_MINUTES: z.string().regex(/^\d+$/).transform(Number).default('30'),
  BCRYPT_ROUNDS: z
    .string()
    .regex(/^\d+$/)
    .transform(Number)
    .pipe(z.number().int().min(4).max(15))
    .default('12'),

  // Bulk import
  ADMIN_API_KEY: z.string().min(1).optional(),
  DEFAULT_CSV_PATH: z.string().min(1).default('data/catalog.csv'),
  IMPORT_BATCH_SIZE: z
    .string()
    .regex(/^\d+$/)
    .transform(Number)
    .pipe(z.number().int().min(1))
    .default('100'),

  // Runtime
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().regex(/^\d+$/).transform(Number).default('8000'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_FORMAT: z.enum(['json', 'pretty']).optional(),
});

export type Env = z.infer<typeof envSchema>;

export type EnvSource = Record<string, string | undefined>;

/**
 * Load `.env` from the working directory into process.env, if present.
 * Variables already set in the environment win.
 */
export function loadDotenv(cwd = process.cwd()): void {
  const envPath = resolve(cwd, '.env');
  if (!existsSync(envPath)) {
    return;
  }

  const result = dotenv.config({ path: envPath });
  if (result.error) {
    console.warn(`Failed to load ${envPath}: ${result.error.message}`);
  }
}

export class EnvValidationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Environment validation failed: ${issues.join('; ')}`);
    this.name = 'EnvValidationError';
  }
}

/**
 * Parse configuration from an environment map. Throws EnvValidationError
 * listing every failing variable.
 */
export function parseEnv(source: EnvSource): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    throw new EnvValidationError(
      result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`)
    );
  }
  return result.data;
}

/**
 * Startup entry: load .env, validate, and exit the process on failure.
 */
export function validateEnv(): Env {
  loadDotenv();

  try {
    return parseEnv(process.env);
  } catch (error) {
    if (error instanceof EnvValidationError) {
      console.error('\nEnvironment validation failed:');
      error.issues.forEach((issue) => console.error(`  - ${issue}`));
      console.error('\nSee .env.example for the expected variables.\n');
      process.exit(1);
    }
    throw error;
  }
}
