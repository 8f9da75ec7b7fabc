/**
 * Library Catalog Entry Point
 *
 * Boot sequence: configuration, database, application, routes, server.
 * Opens the home page in the default browser once the server listens.
 */

import open from 'open';
import { createLogger, loadConfig, setLogger } from './framework/mod.ts';
import { createCatalogApp, openCatalogDatabase } from './src/mod.ts';

async function main(): Promise<void> {
  // 1. Load configuration
  const config = await loadConfig();

  // 2. Logger for the configured environment
  const logger = createLogger(config.string('env', 'development'), config.logLevel());
  setLogger(logger);

  // 3. Open database (created on first run)
  const database = openCatalogDatabase(config.string('database.path', './data/library.sqlite'), logger);

  // 4. Create application with its routes
  const app = createCatalogApp({ config, database, logger });
  app.lifecycle.onShutdown(() => database.close());

  // 5. Start server
  await app.listen({
    onListen: async ({ hostname, port }) => {
      const url = `http://${hostname}:${port}/home`;
      if (config.boolean('open', true)) {
        logger.info(`Opening ${url}`);
        await open(url);
      }
    },
  });
}

main().catch((error: unknown) => {
  console.error('Failed to start the library catalog:', error);
  process.exit(1);
});
