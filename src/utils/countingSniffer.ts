import { Transform, TransformCallback } from 'stream';
import FileType from 'file-type';
import { lookup } from 'mime-types';
import { OCTET_STREAM, SNIFF_BYTES } from '../constants/upload';

// Classifies a byte prefix by magic numbers. Never rejects: anything the
// signature table does not recognise is reported as a generic binary.
export const sniffType = async (prefix: Buffer): Promise<string> => {
  try {
    const result = await FileType.fromBuffer(prefix);
    return result?.mime ?? OCTET_STREAM;
  } catch {
    return OCTET_STREAM;
  }
};

export const typeByExtension = (filename: string): string | undefined => {
  const type = lookup(filename);
  return type === false ? undefined : type;
};

/**
 * Pass-through stream that counts the bytes flowing through it and detects the
 * content type from the first `limit` bytes.
 *
 * Chunks are forwarded as soon as they arrive; only the end of the stream waits
 * for the type label to be frozen, so `type` is settled once a consumer has
 * read the stream to its end.
 */
export class CountingSniffer extends Transform {
  private count = 0;
  private sample: Buffer[] | null = [];
  private sampled = 0;
  private detection: Promise<void> | null = null;
  private resolved: string | undefined;
  private resolveType: (type: string) => void = () => undefined;

  readonly type: Promise<string> = new Promise<string>((resolve) => {
    this.resolveType = resolve;
  });

  constructor(private readonly limit: number = SNIFF_BYTES) {
    super();
  }

  get bytes(): number {
    return this.count;
  }

  // Resolved type label, or undefined while the sample is still filling up.
  get label(): string | undefined {
    return this.resolved;
  }

  _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback) {
    this.count += chunk.length;

    if (this.sample) {
      const wanted = this.limit - this.sampled;
      const piece = chunk.length > wanted ? chunk.subarray(0, wanted) : chunk;
      this.sample.push(piece);
      this.sampled += piece.length;
      if (this.sampled >= this.limit) this.freeze();
    }

    callback(null, chunk);
  }

  _flush(callback: TransformCallback) {
    if (this.sample) this.freeze();
    (this.detection ?? Promise.resolve()).then(() => callback(), callback);
  }

  private freeze() {
    const prefix = Buffer.concat(this.sample ?? []);
    this.sample = null;
    this.detection = sniffType(prefix).then((type) => {
      this.resolved = type;
      this.resolveType(type);
    });
  }
}
