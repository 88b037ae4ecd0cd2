import express from 'express';
import type { RequestHandler } from 'express';
import healthRoutes from './api/health/health.routes';
import { createUploadRoutes } from './api/upload/upload.routes';
import { NotFoundError } from './utils/errors';
import { errorHandler } from './utils/errorHandler';

// `uploads` is the middleware returned by `multipartS3`, built once at startup.
export const createApp = (uploads: RequestHandler) => {
  const app = express();

  app.use('/api/health', healthRoutes);
  app.use('/api/uploads', createUploadRoutes(uploads));

  app.get('/', (req, res) => {
    res.send('API is running...');
  });

  app.use((req, res, next) => {
    next(new NotFoundError(`Cannot ${req.method} ${req.path}`));
  });

  app.use(errorHandler);

  return app;
};
