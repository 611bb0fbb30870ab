#!/usr/bin/env node
import type { Server } from 'http';
import { configPathFrom, loadConfig, parseArgs, USAGE } from './src/config/loader.js';
import { FileService } from './src/filesystem/service.js';
import { Logger } from './src/logging/logger.js';
import { RootshareServer } from './src/server/embeddable.js';

async function startServer(argv: readonly string[], env: NodeJS.ProcessEnv): Promise<Server | undefined> {
  const options = parseArgs(argv);
  if (options.command === 'help') {
    console.log(USAGE);
    return undefined;
  }

  const configPath = configPathFrom(options, env);
  const config = await loadConfig(configPath, env, options.override);

  if (options.configCheck) {
    console.log(`Config OK: ${configPath} (file roots: ${config.fileRoots.length})`);
    return undefined;
  }

  const logger = await Logger.fromFile(config.logging.file, config.logging.level, config.logging.format);
  const service = await FileService.create(config.fileRoots);
  for (const root of service.roots()) {
    logger.info('file root', { virtual: root.virtual, source: root.source });
  }

  const server = new RootshareServer(service, config, logger);
  const httpServer = await server.start();

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info('shutting down', { signal });
    server
      .stop()
      .then(() => logger.close())
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('shutdown failed:', error instanceof Error ? error.message : error);
        process.exit(1);
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  return httpServer;
}

startServer(process.argv.slice(2), process.env).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
