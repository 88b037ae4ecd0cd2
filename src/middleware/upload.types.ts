import type { Request } from 'express';
import type { S3Client, S3ClientConfig } from '@aws-sdk/client-s3';
import type { UploadSettingsInput } from './upload.validation';

export type Logger = Pick<Console, 'error' | 'warn'>;

// Namespace segment put in front of every object key of a request.
export type KeyPrefix = (req: Request) => string;

export type MultipartS3Options = UploadSettingsInput & {
  /** Pre-built client. When omitted one is created from `s3`. */
  client?: S3Client;
  /** Endpoint and credentials for a new client; the SDK default chain applies when both are omitted. */
  s3?: S3ClientConfig;
  /** Defaults to the UTC date path `/YYYY/MM/DD/`. */
  prefix?: KeyPrefix;
  logger?: Logger;
};

export type UploadedFile = {
  key: string;
  name: string;
  type: string;
  size: number;
};
