import cors from 'cors';
import express, { type Express } from 'express';
import { errorHandler, notFound } from './middleware/errorHandler';
import { type RouteDeps, createRoutes } from './routes';
import type { HealthStatus } from './types/checks';

export const PROJECT_NAME = 'Web Security API';
export const API_VERSION = '1.0.0';

export interface AppOptions extends RouteDeps {
  corsOrigins: string[];
}

export const createApp = ({ corsOrigins, ...deps }: AppOptions): Express => {
  const app = express();

  app.use(
    cors({
      origin: corsOrigins,
      methods: ['GET', 'POST'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    })
  );
  app.use(express.json({ limit: '100kb' }));

  app.get('/', (_req, res) => {
    const health: HealthStatus = { project: PROJECT_NAME, version: API_VERSION, status: 'running' };
    res.json(health);
  });

  app.use(createRoutes(deps));
  app.use(notFound);
  app.use(errorHandler);

  return app;
};
