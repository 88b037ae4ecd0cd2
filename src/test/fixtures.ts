import { Readable } from 'stream';

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

const pngChunk = (type: string, data: Buffer) => {
  const length = Buffer.alloc(4);
  length.writeUInt32BE(data.length, 0);
  return Buffer.concat([length, Buffer.from(type, 'ascii'), data, Buffer.alloc(4)]);
};

// A PNG of exactly `size` bytes: signature, IHDR, then one IDAT chunk padding
// the rest. Enough structure for magic-number detection.
export const pngBytes = (size: number): Buffer => {
  const ihdr = pngChunk('IHDR', Buffer.alloc(13));
  const idatLength = size - PNG_SIGNATURE.length - ihdr.length - 12;
  if (idatLength < 0) throw new Error(`PNG fixture needs at least 45 bytes, got ${size}`);
  return Buffer.concat([PNG_SIGNATURE, ihdr, pngChunk('IDAT', Buffer.alloc(idatLength, 7))]);
};

export const chunksOf = (data: Buffer, size: number): Buffer[] => {
  const chunks: Buffer[] = [];
  for (let i = 0; i < data.length; i += size) chunks.push(data.subarray(i, i + size));
  return chunks;
};

export const readAll = async (stream: Readable): Promise<Buffer> => {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  return Buffer.concat(chunks);
};

export type RawPart = { headers: string[]; body: string | Buffer };

// Hand-built multipart body, for cases a form client would not produce.
export const multipartBody = (boundary: string, parts: RawPart[], options: { terminate?: boolean } = {}): Buffer => {
  const pieces: Buffer[] = [];
  for (const part of parts) {
    pieces.push(Buffer.from(`--${boundary}\r\n${part.headers.join('\r\n')}\r\n\r\n`));
    pieces.push(Buffer.isBuffer(part.body) ? part.body : Buffer.from(part.body));
    pieces.push(Buffer.from('\r\n'));
  }
  if (options.terminate ?? true) pieces.push(Buffer.from(`--${boundary}--\r\n`));
  return Buffer.concat(pieces);
};
