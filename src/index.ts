/**
 * Backend entry point: load config, wire the renderer and start the HTTP server.
 */
import type { Server } from 'http';
import { createApp } from './api/app';
import { ConfigError, loadConfig } from './config';
import { logger } from './config/logger';
import { createConversationRenderer } from './services/conversation';

async function start(): Promise<Server> {
  const config = loadConfig();
  logger.level = config.logLevel;

  const { renderer, store } = createConversationRenderer(config);
  await store.ensureOutputDir();
  logger.info('Audio output directory ready', { outputDir: store.outputDir });

  const app = createApp(config, renderer);

  const server = app.listen(config.port, config.host, () => {
    logger.info(`Server listening on ${config.host}:${config.port} (env: ${config.env})`);
    logger.info(`Serving audio at ${config.storage.publicBaseUrl}${config.storage.staticPath}`, {
      ttsModel: config.ai.ttsModel,
    });
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`${signal} received, closing server`);
    server.close((err) => {
      if (err) {
        logger.error('Error while closing server', { error: err.message });
        process.exit(1);
      }
      process.exit(0);
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  return server;
}

const serverPromise = start().catch((e: unknown) => {
  if (e instanceof ConfigError) {
    logger.error(`Startup failed: ${e.message}`);
  } else {
    logger.error('Startup failed:', e);
  }
  process.exit(1);
});

export default serverPromise;
