import type { IncomingMessage } from 'http';
import type { Readable } from 'stream';
import busboy from 'busboy';
import type { Busboy, FileInfo } from 'busboy';
import { MultipartUploadError, asUploadError } from '../utils/errors';
import type { Logger } from './upload.types';

export type FilePart = {
  kind: 'file';
  name: string;
  filename: string;
  mimeType: string;
  stream: Readable;
};

export type FieldPart = {
  kind: 'field';
  name: string;
  value: string;
};

export type MultipartPart = FilePart | FieldPart;

export type PartHandler = (part: MultipartPart) => Promise<void>;

export const isMultipart = (req: IncomingMessage): boolean =>
  (req.headers['content-type'] ?? '').startsWith('multipart/form-data');

const drainField = async (stream: Readable, limit: number): Promise<string> => {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of stream) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > limit) {
      throw new MultipartUploadError('decode', `field exceeds ${limit} bytes`);
    }
    chunks.push(buf);
  }
  return Buffer.concat(chunks).toString('utf8');
};

// A section is a file only when it declares a non-empty filename; browsers send
// `filename=""` for file inputs left empty, and those are plain (empty) fields.
export const classifySection = async (
  name: string,
  stream: Readable,
  info: FileInfo,
  fieldSizeLimit: number
): Promise<MultipartPart> => {
  if (typeof info.filename === 'string' && info.filename !== '') {
    return { kind: 'file', name, filename: info.filename, mimeType: info.mimeType, stream };
  }
  return { kind: 'field', name, value: await drainField(stream, fieldSizeLimit) };
};

// Releases whatever the handler left unread so the decoder can move on.
export const closePart = (part: MultipartPart, logger: Logger) => {
  if (part.kind !== 'file') return;
  try {
    if (!part.stream.readableEnded) part.stream.resume();
  } catch (error) {
    logger.warn('[upload] failed to close part:', new MultipartUploadError('close', `failed to close part "${part.name}"`, error));
  }
};

/**
 * Decodes the multipart body of `req` and hands every part to `handlePart`, one
 * at a time and in the order they appear in the body. The next part is not
 * read before the previous handler has settled.
 *
 * Rejects with a `MultipartUploadError` on the first decoder or handler
 * failure; the remaining body is drained and discarded.
 */
export const decodeParts = (
  req: IncomingMessage,
  handlePart: PartHandler,
  options: { fieldSizeLimit: number; logger: Logger }
): Promise<void> =>
  new Promise<void>((resolve, reject) => {
    let decoder: Busboy;
    try {
      decoder = busboy({
        headers: req.headers,
        preservePath: true,
        // Browsers send non-ASCII filenames as raw UTF-8.
        defParamCharset: 'utf8',
        limits: { fieldSize: options.fieldSizeLimit },
      });
    } catch (error) {
      reject(new MultipartUploadError('decode', 'failed to create multipart reader', error));
      return;
    }

    let failed = false;
    let queue: Promise<void> = Promise.resolve();

    const fail = (error: MultipartUploadError) => {
      if (failed) return;
      failed = true;
      req.unpipe(decoder);
      req.resume();
      reject(error);
    };

    const enqueue = (next: () => Promise<MultipartPart>, section: string) => {
      queue = queue.then(async () => {
        if (failed) return;
        let part: MultipartPart | undefined;
        try {
          part = await next();
          await handlePart(part);
        } catch (error) {
          fail(asUploadError(error, 'decode', `failed to read request part "${section}"`));
        } finally {
          if (part) closePart(part, options.logger);
        }
      });
    };

    decoder.on('file', (name, stream, info) => {
      // A queued part can be destroyed by the decoder before its turn comes.
      stream.on('error', (error) => {
        fail(new MultipartUploadError('decode', `failed to read request part "${name}"`, error));
      });
      if (failed) {
        stream.resume();
        return;
      }
      enqueue(() => classifySection(name, stream, info, options.fieldSizeLimit), name);
    });

    decoder.on('field', (name, value, info) => {
      if (info.valueTruncated) {
        fail(new MultipartUploadError('decode', `field "${name}" exceeds ${options.fieldSizeLimit} bytes`));
        return;
      }
      const part: FieldPart = { kind: 'field', name, value };
      enqueue(async () => part, name);
    });

    decoder.on('error', (error) => {
      fail(new MultipartUploadError('decode', 'failed to read request part', error));
    });

    decoder.on('close', () => {
      queue.then(() => {
        if (!failed) resolve();
      }, reject);
    });

    req.on('error', (error) => {
      fail(new MultipartUploadError('decode', 'failed to read request body', error));
    });

    req.pipe(decoder);
  });
