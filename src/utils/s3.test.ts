import { describe, it, expect, vi } from 'vitest';
import { Readable } from 'stream';
import { CreateBucketCommand, HeadObjectCommand, NotFound, S3ServiceException } from '@aws-sdk/client-s3';
import { createS3Client, ensureBucket, objectExists, uploadStream } from './s3';
import { MultipartUploadError } from './errors';
import { buckets, createFakeS3Client, objectId, objects, uploadPlan, uploads } from '../test/fakeS3';

describe('utils/s3 ensureBucket', () => {
  it('creates the bucket with the configured ACL', async () => {
    const send = vi.fn().mockResolvedValue({});
    vi.spyOn(console, 'log').mockImplementation(() => {});

    await ensureBucket({ send }, 'test', 'public-read');

    expect(send).toHaveBeenCalledOnce();
    const command = send.mock.calls[0][0];
    expect(command).toBeInstanceOf(CreateBucketCommand);
    expect(command.input).toEqual({ Bucket: 'test', ACL: 'public-read' });
  });

  it('succeeds every time against a bucket the caller already owns', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const client = createFakeS3Client();

    await expect(ensureBucket(client, 'test', 'private')).resolves.toBeUndefined();
    await expect(ensureBucket(client, 'test', 'private')).resolves.toBeUndefined();
    await expect(ensureBucket(client, 'test', 'private')).resolves.toBeUndefined();
    expect([...buckets]).toEqual(['test']);
  });

  it('treats a generic service error named BucketAlreadyOwnedByYou as success', async () => {
    const error = new S3ServiceException({
      name: 'BucketAlreadyOwnedByYou',
      $fault: 'client',
      $metadata: { httpStatusCode: 409 },
      message: 'owned',
    });
    const send = vi.fn().mockRejectedValue(error);

    await expect(ensureBucket({ send }, 'test', 'private')).resolves.toBeUndefined();
  });

  it('wraps any other failure as a bucket-setup error', async () => {
    const cause = new Error('AccessDenied');
    const send = vi.fn().mockRejectedValue(cause);

    const error = await ensureBucket({ send }, 'test', 'private').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(MultipartUploadError);
    expect(error).toMatchObject({ stage: 'bucket-setup', message: 'failed to create bucket "test"', cause });
  });
});

describe('utils/s3 uploadStream', () => {
  const client = createFakeS3Client();

  it('uploads the body under the key with ACL and part size', async () => {
    await uploadStream({
      client,
      bucket: 'test',
      key: '/2024/01/02/abc',
      acl: 'public-read',
      body: Readable.from([Buffer.from('hello '), Buffer.from('world')]),
      partSize: 6 * 1024 * 1024,
      signal: new AbortController().signal,
    });

    expect(uploads).toHaveLength(1);
    expect(uploads[0].partSize).toBe(6 * 1024 * 1024);
    expect(uploads[0].params).toMatchObject({ Bucket: 'test', Key: '/2024/01/02/abc', ACL: 'public-read' });
    expect(objects.get(objectId('test', '/2024/01/02/abc'))?.toString()).toBe('hello world');
  });

  it('aborts the upload when the signal fires', async () => {
    uploadPlan.push('stall');
    const controller = new AbortController();

    const pending = uploadStream({
      client,
      bucket: 'test',
      key: 'k',
      acl: 'private',
      body: Readable.from([Buffer.from('x')]),
      partSize: 5 * 1024 * 1024,
      signal: controller.signal,
    });
    controller.abort();

    await expect(pending).rejects.toThrow('Upload aborted.');
    expect(uploads[0].aborted).toBe(true);
    expect(objects.size).toBe(0);
  });

  it('does not start when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      uploadStream({
        client,
        bucket: 'test',
        key: 'k',
        acl: 'private',
        body: Readable.from([Buffer.from('x')]),
        partSize: 5 * 1024 * 1024,
        signal: controller.signal,
      })
    ).rejects.toThrow();
    expect(uploads).toHaveLength(0);
  });

  it('propagates store failures without retrying', async () => {
    uploadPlan.push(new Error('SlowDown'));

    await expect(
      uploadStream({
        client,
        bucket: 'test',
        key: 'k',
        acl: 'private',
        body: Readable.from([Buffer.from('x')]),
        partSize: 5 * 1024 * 1024,
        signal: new AbortController().signal,
      })
    ).rejects.toThrow('SlowDown');
    expect(uploads).toHaveLength(1);
  });
});

describe('utils/s3 objectExists', () => {
  it('reports stored objects and missing keys', async () => {
    const client = createFakeS3Client();
    objects.set(objectId('test', 'present'), Buffer.from('x'));

    await expect(objectExists(client, 'test', 'present')).resolves.toBe(true);
    await expect(objectExists(client, 'test', 'missing')).resolves.toBe(false);
  });

  it('sends a HeadObject request and rethrows unexpected errors', async () => {
    const send = vi
      .fn()
      .mockRejectedValueOnce(new NotFound({ $metadata: {}, message: 'Not Found' }))
      .mockRejectedValueOnce(new Error('socket hang up'));

    await expect(objectExists({ send }, 'test', 'a')).resolves.toBe(false);
    await expect(objectExists({ send }, 'test', 'b')).rejects.toThrow('socket hang up');
    expect(send.mock.calls[0][0]).toBeInstanceOf(HeadObjectCommand);
    expect(send.mock.calls[1][0].input).toEqual({ Bucket: 'test', Key: 'b' });
  });
});

describe('utils/s3 createS3Client', () => {
  it('builds a path-style client', async () => {
    const client = createS3Client({ region: 'us-east-1' });
    await expect(client.config.region()).resolves.toBe('us-east-1');
    expect(client.config.forcePathStyle).toBe(true);
  });
});
