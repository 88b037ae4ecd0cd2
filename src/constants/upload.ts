// S3 rejects multipart chunks smaller than 5 MiB (except the last one).
export const MIN_PART_SIZE = 5 * 1024 * 1024;

// Bytes `file-type` needs to run its whole signature table.
export const SNIFF_BYTES = 4100;

export const OCTET_STREAM = 'application/octet-stream';

export const DEFAULT_ACL = 'private';

// nanoid alphabet is 64 symbols: 22 characters carry 132 random bits.
export const KEY_ID_LENGTH = 22;

export const DEFAULT_FIELD_SIZE_LIMIT = 1024 * 1024;

// Suffixes of the synthetic form keys written for every uploaded file.
export const FILE_NAME_SUFFIX = '_name';
export const FILE_TYPE_SUFFIX = '_type';
export const FILE_SIZE_SUFFIX = '_size';
