import {
  BucketAlreadyOwnedByYou,
  BucketCannedACL,
  CreateBucketCommand,
  HeadObjectCommand,
  ObjectCannedACL,
  S3Client,
  S3ClientConfig,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';
import { Readable } from 'stream';
import { MultipartUploadError } from './errors';

// The narrow slice of the client the bucket and head-object helpers talk to.
export type S3Sender = Pick<S3Client, 'send'>;

export const createS3Client = (config: S3ClientConfig = {}): S3Client => {
  try {
    return new S3Client({
      forcePathStyle: true, // Necessary for MinIO, Garage, etc.
      ...config,
    });
  } catch (error) {
    throw new MultipartUploadError('config', 'failed to create S3 client', error);
  }
};

const isAlreadyOwned = (error: unknown): boolean =>
  error instanceof BucketAlreadyOwnedByYou ||
  (error instanceof S3ServiceException && error.name === 'BucketAlreadyOwnedByYou');

/**
 * Creates the bucket, treating "already owned by you" as success so that the
 * call can run on every start.
 */
export const ensureBucket = async (client: S3Sender, bucket: string, acl: BucketCannedACL) => {
  try {
    await client.send(new CreateBucketCommand({ Bucket: bucket, ACL: acl }));
    console.log(`[S3] Bucket ready: ${bucket}`);
  } catch (error) {
    if (isAlreadyOwned(error)) return;
    throw new MultipartUploadError('bucket-setup', `failed to create bucket "${bucket}"`, error);
  }
};

export const uploadStream = async (options: {
  client: S3Client;
  bucket: string;
  key: string;
  acl: ObjectCannedACL;
  body: Readable;
  partSize: number;
  signal: AbortSignal;
}) => {
  options.signal.throwIfAborted();

  const upload = new Upload({
    client: options.client,
    partSize: options.partSize,
    params: {
      Bucket: options.bucket,
      Key: options.key,
      ACL: options.acl,
      Body: options.body,
    },
  });

  const onAbort = () => {
    void upload.abort();
  };
  options.signal.addEventListener('abort', onAbort, { once: true });

  try {
    await upload.done();
  } finally {
    options.signal.removeEventListener('abort', onAbort);
  }
};

export const objectExists = async (client: S3Sender, bucket: string, key: string): Promise<boolean> => {
  try {
    await client.send(new HeadObjectCommand({ Bucket: bucket, Key: key }));
    return true;
  } catch (error) {
    if (error instanceof S3ServiceException && (error.name === 'NotFound' || error.name === 'NoSuchKey')) {
      return false;
    }
    throw error;
  }
};
