import type { RequestHandler } from 'express';
import { ZodError } from 'zod';
import { MultipartUploadError } from '../utils/errors';
import { createS3Client, ensureBucket } from '../utils/s3';
import { FormValues, mergeFormValues } from './formValues';
import { decodeParts, isMultipart } from './multipartParts';
import { S3StreamingStorage, datePrefix } from './s3Storage';
import type { MultipartS3Options } from './upload.types';
import { uploadSettingsSchema } from './upload.validation';

const parseSettings = (options: MultipartS3Options) => {
  try {
    return uploadSettingsSchema.parse({
      bucket: options.bucket,
      bucketAcl: options.bucketAcl,
      createBucket: options.createBucket,
      fileAcl: options.fileAcl,
      partSize: options.partSize,
      fieldSizeLimit: options.fieldSizeLimit,
    });
  } catch (error) {
    const message = error instanceof ZodError ? error.issues[0]?.message : undefined;
    throw new MultipartUploadError('config', message || 'invalid upload options', error);
  }
};

/**
 * Builds the middleware that streams every file of a `multipart/form-data`
 * request to S3 and replaces it, in `req.body`, with four string lists:
 *
 * - `field`: object key
 * - `field_name`: original filename without directories
 * - `field_type`: detected MIME type
 * - `field_size`: size in bytes
 *
 * Other fields land in `req.body` as lists of their submitted values. Requests
 * that are not multipart pass through untouched. Any failure answers 500 and
 * never reaches the next handler.
 *
 * Rejects when the options are invalid or the bucket cannot be created.
 */
export const multipartS3 = async (options: MultipartS3Options): Promise<RequestHandler> => {
  const settings = parseSettings(options);
  const logger = options.logger ?? console;
  const client = options.client ?? createS3Client(options.s3);

  if (settings.createBucket) {
    await ensureBucket(client, settings.bucket, settings.bucketAcl);
  }

  const storage = new S3StreamingStorage({
    client,
    bucket: settings.bucket,
    fileAcl: settings.fileAcl,
    partSize: settings.partSize,
    prefix: options.prefix ?? datePrefix,
  });

  return async (req, res, next) => {
    if (!isMultipart(req)) {
      next();
      return;
    }

    // Client gone before we answered: stop the upload in flight.
    const controller = new AbortController();
    const onClose = () => {
      if (!res.writableFinished) controller.abort();
    };
    res.once('close', onClose);

    const form = new FormValues();
    try {
      await decodeParts(
        req,
        async (part) => {
          if (part.kind === 'file') {
            form.addFile(part.name, await storage.upload(req, part, controller.signal));
          } else {
            form.addField(part.name, part.value);
          }
        },
        { fieldSizeLimit: settings.fieldSizeLimit, logger }
      );
    } catch (error) {
      controller.abort();
      res.off('close', onClose);
      logger.error('[upload] failed to process multipart request:', error);
      if (!res.headersSent) res.status(500).json({ message: 'Internal Server Error' });
      return;
    }

    res.off('close', onClose);
    mergeFormValues(req, form);
    next();
  };
};
