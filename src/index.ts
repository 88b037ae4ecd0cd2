export { multipartS3 } from './middleware/upload';
export type { KeyPrefix, Logger, MultipartS3Options, UploadedFile } from './middleware/upload.types';
export { FormValues, mergeFormValues } from './middleware/formValues';
export { decodeParts, isMultipart } from './middleware/multipartParts';
export type { FieldPart, FilePart, MultipartPart } from './middleware/multipartParts';
export { S3StreamingStorage, cleanFilename, datePrefix } from './middleware/s3Storage';
export { CountingSniffer, sniffType, typeByExtension } from './utils/countingSniffer';
export { createS3Client, ensureBucket, objectExists, uploadStream } from './utils/s3';
export { MultipartUploadError } from './utils/errors';
export type { UploadStage } from './utils/errors';
