import { z } from 'zod';
import { ConfigurationException } from '../core/exceptions.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('true')
  .transform((value) => value === 'true' || value === '1');

/**
 * Environment variables read at startup.
 */
export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  STORAGE_DRIVER: z.enum(['memory', 'sqlite']).default('memory'),
  DATABASE_URL: z.string().min(1).default('file:company-roster.db'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  API_DOCS: booleanFlag,
});

export type StorageDriver = z.infer<typeof ConfigSchema>['STORAGE_DRIVER'];

export interface AppConfig {
  port: number;
  storageDriver: StorageDriver;
  /** libsql URL used by the `sqlite` driver (`file:` path or `:memory:`) */
  databaseUrl: string;
  logLevel: z.infer<typeof ConfigSchema>['LOG_LEVEL'];
  /** Serve `/openapi.json` and `/reference` */
  apiDocs: boolean;
}

/**
 * Validates the environment and returns the typed configuration.
 * Throws `ConfigurationException` naming the invalid keys; values are never
 * echoed since they may hold credentials.
 *
 * @example
 * ```ts
 * const config = loadConfig(process.env);
 * ```
 */
export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map((issue) => String(issue.path[0])))];
    throw new ConfigurationException(`Invalid configuration: ${keys.join(', ')}`, { keys });
  }

  return {
    port: parsed.data.PORT,
    storageDriver: parsed.data.STORAGE_DRIVER,
    databaseUrl: parsed.data.DATABASE_URL,
    logLevel: parsed.data.LOG_LEVEL,
    apiDocs: parsed.data.API_DOCS,
  };
}
