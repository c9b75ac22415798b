/**
 * Express app: CORS, JSON body, static audio directory and the render routes.
 * Built from an explicit config and renderer so tests can inject fakes.
 */

import express, { Express } from 'express';
import cors from 'cors';
import type { AppConfig } from '../config';
import type { ConversationRenderer } from '../services/conversation/ConversationRenderer';
import { createConversationRoutes } from './routes/conversation.routes';
import { errorHandler } from './middleware/error';

export function createApp(config: AppConfig, renderer: ConversationRenderer): Express {
  const app = express();

  app.use(cors({ origin: true }));
  app.use(express.json({ limit: '10mb' }));
  app.use(
    config.storage.staticPath,
    express.static(config.storage.outputDir, { fallthrough: false, index: false, dotfiles: 'deny' })
  );

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', ts: new Date().toISOString() });
  });

  app.use(`${config.apiPrefix}/render-conversation`, createConversationRoutes(renderer));

  app.use(errorHandler);

  return app;
}
