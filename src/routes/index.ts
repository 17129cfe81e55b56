import { Express } from 'express';
import feedRoutes from './feed';
import { notFoundHandler } from '../middleware/errorHandler';

export const setupRoutes = (app: Express): void => {
  app.use('/api/v1/feed', feedRoutes);
};

// Mounted last so /health and the docs stay reachable
export const setupFallbackRoute = (app: Express): void => {
  app.use('*', notFoundHandler);
};
