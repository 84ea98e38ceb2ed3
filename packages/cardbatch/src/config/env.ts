import { config as loadDotenv } from 'dotenv';
import { existsSync } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '../errors';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  CARDBATCH_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  CARDBATCH_USERNAME: z.string().min(1).optional(),
  CARDBATCH_PASSWORD: z.string().min(1).optional(),
});

export type Env = z.infer<typeof envSchema>;

export interface Credentials {
  username: string;
  password: string;
}

let _env: Env | null = null;

export function getEnv(): Env {
  if (!_env) {
    _env = envSchema.parse(process.env);
  }
  return _env;
}

/** Drop the cached env so the next getEnv() re-reads process.env. */
export function resetEnv(): void {
  _env = null;
}

/**
 * Load credentials into process.env from the first env file that exists:
 * the explicit path, then config/.env, then .env (both relative to cwd).
 * Returns the file that was loaded, or null when none was found.
 */
export function loadEnvFile(explicitPath?: string, cwd = process.cwd()): string | null {
  const candidates = explicitPath
    ? [path.resolve(cwd, explicitPath)]
    : [path.join(cwd, 'config', '.env'), path.join(cwd, '.env')];

  for (const candidate of candidates) {
    if (!existsSync(candidate)) continue;
    const result = loadDotenv({ path: candidate });
    if (result.error) {
      throw new ConfigurationError(`Could not read env file ${candidate}: ${result.error.message}`);
    }
    resetEnv();
    return candidate;
  }

  if (explicitPath) {
    throw new ConfigurationError(`Env file not found: ${candidates[0]}`);
  }
  return null;
}

export function requireCredentials(env: Env = getEnv()): Credentials {
  const missing: string[] = [];
  if (!env.CARDBATCH_USERNAME) missing.push('CARDBATCH_USERNAME');
  if (!env.CARDBATCH_PASSWORD) missing.push('CARDBATCH_PASSWORD');

  if (!env.CARDBATCH_USERNAME || !env.CARDBATCH_PASSWORD) {
    throw new ConfigurationError(
      `Missing credentials: ${missing.join(', ')}. Set them in config/.env or pass --env-file.`,
      missing,
    );
  }

  return { username: env.CARDBATCH_USERNAME, password: env.CARDBATCH_PASSWORD };
}
