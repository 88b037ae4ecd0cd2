import { Request, Response } from 'express';
import { BadRequestError } from '../../utils/errors';

// The multipart middleware ran before this handler: files are already in S3 and
// `req.body` only holds string lists.
export const uploadFormHandler = (req: Request, res: Response) => {
  if (typeof req.body !== 'object' || req.body === null || Object.keys(req.body).length === 0) {
    throw new BadRequestError('Expected a multipart/form-data body.');
  }

  res.status(201).json(req.body);
};
