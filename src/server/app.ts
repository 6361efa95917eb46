import express, { type Express } from 'express';
import type { ServerConfig } from '../config/index.js';
import { createRoutes } from './routes.js';

/**
 * Build the express app; the store connection is opened by the caller
 */
export function createApp(limits: Pick<ServerConfig, 'defaultLimit' | 'maxLimit'>): Express {
  const app = express();

  // CORS for development
  app.use((req, res, next) => {
    res.header('Access-Control-Allow-Origin', '*');
    res.header('Access-Control-Allow-Headers', 'Origin, X-Requested-With, Content-Type, Accept');
    res.header('Access-Control-Allow-Methods', 'GET, OPTIONS');
    if (req.method === 'OPTIONS') {
      res.sendStatus(200);
      return;
    }
    next();
  });

  app.use('/api', createRoutes(limits));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
