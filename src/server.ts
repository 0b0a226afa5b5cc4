import { serve } from '@hono/node-server';
import { createApp } from './app.js';
import { loadConfig } from './config/index.js';
import { createConsoleLogger, getLogger, setLogger } from './core/logger.js';
import { openRepositories } from './repositories/open.js';
import { toError } from './utils/errors.js';

async function main(): Promise<void> {
  const config = loadConfig(process.env);
  setLogger(createConsoleLogger(config.logLevel));

  const storage = await openRepositories(config);
  const app = createApp({
    repositories: storage.repositories,
    storageName: config.storageDriver,
    docs: config.apiDocs,
  });

  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    getLogger().info(`Listening on http://localhost:${info.port}`, {
      storage: config.storageDriver,
      docs: config.apiDocs ? '/reference' : 'disabled',
    });
  });

  const shutdown = (signal: string) => {
    getLogger().info('Shutting down', { signal });
    server.close(() => {
      storage.close();
      process.exit(0);
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err) => {
  getLogger().error('Failed to start', { error: toError(err).message });
  process.exitCode = 1;
});
