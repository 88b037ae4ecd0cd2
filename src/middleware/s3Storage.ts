import type { Request } from 'express';
import type { ObjectCannedACL, S3Client } from '@aws-sdk/client-s3';
import { nanoid } from 'nanoid';
import path from 'path';
import { KEY_ID_LENGTH, OCTET_STREAM } from '../constants/upload';
import { CountingSniffer, typeByExtension } from '../utils/countingSniffer';
import { MultipartUploadError } from '../utils/errors';
import { uploadStream } from '../utils/s3';
import type { FilePart } from './multipartParts';
import type { KeyPrefix, UploadedFile } from './upload.types';

// Date partition of the current UTC day, e.g. `/2024/03/09/`.
export const datePrefix: KeyPrefix = () => `/${new Date().toISOString().slice(0, 10).replace(/-/g, '/')}/`;

// Drops every directory component, whichever separator the client used.
export const cleanFilename = (filename: string): string => path.posix.basename(filename.replace(/\\/g, '/'));

export type S3StreamingStorageOptions = {
  client: S3Client;
  bucket: string;
  fileAcl: ObjectCannedACL;
  partSize: number;
  prefix: KeyPrefix;
};

/**
 * Streams file parts straight to S3 (no buffering in RAM / disk) while counting
 * their bytes and sniffing their content type.
 */
export class S3StreamingStorage {
  constructor(private readonly options: S3StreamingStorageOptions) {}

  async upload(req: Request, part: FilePart, signal: AbortSignal): Promise<UploadedFile> {
    const name = cleanFilename(part.filename);
    const key = `${this.options.prefix(req)}${nanoid(KEY_ID_LENGTH)}`;

    const sniffer = new CountingSniffer();
    part.stream.once('error', (error) => sniffer.destroy(error));
    part.stream.pipe(sniffer);

    try {
      await uploadStream({
        client: this.options.client,
        bucket: this.options.bucket,
        key,
        acl: this.options.fileAcl,
        body: sniffer,
        partSize: this.options.partSize,
        signal,
      });
    } catch (error) {
      part.stream.unpipe(sniffer);
      throw new MultipartUploadError('upload', `failed to upload "${name}" to S3`, error);
    }

    const sniffed = await sniffer.type;
    const type = sniffed === OCTET_STREAM ? typeByExtension(name) ?? OCTET_STREAM : sniffed;

    return { key, name, type, size: sniffer.bytes };
  }
}
