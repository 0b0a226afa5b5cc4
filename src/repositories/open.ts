import { createClient } from '@libsql/client';
import { drizzle } from 'drizzle-orm/libsql';
import type { AppConfig } from '../config/index.js';
import { getLogger } from '../core/logger.js';
import { createDrizzleRepositories, ensureSchema } from './drizzle/index.js';
import { createMemoryRepositories } from './memory.js';
import type { Repositories, RepositoryOptions } from './types.js';

export interface OpenedStorage {
  repositories: Repositories;
  /** Releases the database connection, if any */
  close(): void;
}

/**
 * Opens the storage selected by the configuration.
 * The `sqlite` driver creates its tables on first use.
 */
export async function openRepositories(
  config: Pick<AppConfig, 'storageDriver' | 'databaseUrl'>,
  options: RepositoryOptions = {}
): Promise<OpenedStorage> {
  if (config.storageDriver === 'memory') {
    return {
      repositories: createMemoryRepositories(options),
      close: () => {},
    };
  }

  const client = createClient({ url: config.databaseUrl });
  const db = drizzle(client);
  await ensureSchema(db);
  getLogger().debug('SQLite schema ready', { url: config.databaseUrl });

  return {
    repositories: createDrizzleRepositories(db, options),
    close: () => client.close(),
  };
}
