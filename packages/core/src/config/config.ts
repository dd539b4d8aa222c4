import { z } from 'zod';
import { getDefaultDbPath } from '../db.js';
import { ConfigError } from '../errors/index.js';
import type { LogLevel } from '../logger/index.js';

export interface InstructionBackendConfig {
  readonly url: string;
  readonly token: string | null;
  readonly timeoutMs: number;
}

export interface AppConfig {
  readonly databasePath: string;
  readonly host: string;
  readonly port: number;
  readonly authServiceUrl: string;
  readonly authTimeoutMs: number;
  /** Null when no backend is configured; enrichment then always fails */
  readonly instructionBackend: InstructionBackendConfig | null;
  readonly logLevel: LogLevel;
}

export const DEFAULT_PORT = 8000;
export const DEFAULT_AUTH_SERVICE_URL = 'http://localhost:8001';
export const DEFAULT_INSTRUCTION_TIMEOUT_MS = 10_000;
export const DEFAULT_AUTH_TIMEOUT_MS = 5_000;

/** Prefix http:// when the value has no scheme ("localhost:8001") */
export function withScheme(url: string): string {
  return /^[a-z][a-z0-9+.-]*:\/\//i.test(url) ? url : `http://${url}`;
}

const optionalText = z.string().trim().transform(v => (v === '' ? undefined : v)).optional();

const envSchema = z.object({
  DATABASE_PATH: optionalText,
  SERVICE_HOST: optionalText.default('0.0.0.0'),
  SERVICE_PORT: z.coerce.number().int().min(0).max(65535).default(DEFAULT_PORT),
  AUTH_SERVICE_URL: optionalText.default(DEFAULT_AUTH_SERVICE_URL),
  AUTH_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_AUTH_TIMEOUT_MS),
  INSTRUCTION_API_URL: optionalText,
  INSTRUCTION_API_TOKEN: optionalText,
  INSTRUCTION_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_INSTRUCTION_TIMEOUT_MS),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

/**
 * Build the service configuration from environment variables.
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
  }
  const e = parsed.data;

  return Object.freeze({
    databasePath: e.DATABASE_PATH ?? getDefaultDbPath(),
    host: e.SERVICE_HOST ?? '0.0.0.0',
    port: e.SERVICE_PORT,
    authServiceUrl: withScheme(e.AUTH_SERVICE_URL ?? DEFAULT_AUTH_SERVICE_URL),
    authTimeoutMs: e.AUTH_TIMEOUT_MS,
    instructionBackend: e.INSTRUCTION_API_URL
      ? Object.freeze({
        url: withScheme(e.INSTRUCTION_API_URL),
        token: e.INSTRUCTION_API_TOKEN ?? null,
        timeoutMs: e.INSTRUCTION_TIMEOUT_MS,
      })
      : null,
    logLevel: e.LOG_LEVEL,
  });
}

/** Apply CLI overrides on top of a loaded configuration */
export function withOverrides(
  config: AppConfig,
  overrides: Partial<Pick<AppConfig, 'host' | 'port' | 'databasePath'>>,
): AppConfig {
  return Object.freeze({
    ...config,
    ...(overrides.host !== undefined && { host: overrides.host }),
    ...(overrides.port !== undefined && { port: overrides.port }),
    ...(overrides.databasePath !== undefined && { databasePath: overrides.databasePath }),
  });
}
