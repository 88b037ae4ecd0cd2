import { Request, Response, NextFunction } from 'express';
import { NotFoundError, BadRequestError, MultipartUploadError } from './errors';

export const errorHandler = (err: Error, req: Request, res: Response, next: NextFunction): void => {
  if (err instanceof NotFoundError) {
    res.status(404).json({ message: err.message });
    return;
  }
  if (err instanceof BadRequestError) {
    res.status(400).json({ message: err.message });
    return;
  }

  if (err instanceof MultipartUploadError) {
    console.error(`[upload] ${err.stage} failed:`, err);
  } else {
    console.error(err);
  }
  res.status(500).json({ message: 'Internal Server Error' });
};
