import express, { Application } from 'express';
import { setupRoutes, RouteDependencies } from './api/routes/index.js';

export interface AppOptions extends RouteDependencies {
  urlPrefix?: string;
}

export function createApp(options: AppOptions): Application {
  const app = express();

  app.disable('x-powered-by');
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true, limit: '1mb' }));

  setupRoutes(app, options.urlPrefix ?? '', options);

  return app;
}
