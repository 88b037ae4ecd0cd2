import { Router } from 'express';
import type { RequestHandler } from 'express';
import * as uploadController from './upload.controller';

// Route: /api/uploads
export const createUploadRoutes = (uploads: RequestHandler) => {
  const router = Router();
  router.post('/', uploads, uploadController.uploadFormHandler);
  return router;
};
