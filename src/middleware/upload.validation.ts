import { z } from 'zod';
import { BucketCannedACL, ObjectCannedACL } from '@aws-sdk/client-s3';
import { DEFAULT_ACL, DEFAULT_FIELD_SIZE_LIMIT, MIN_PART_SIZE } from '../constants/upload';

export const bucketAclSchema = z.nativeEnum(BucketCannedACL).default(DEFAULT_ACL);

export const fileAclSchema = z.nativeEnum(ObjectCannedACL).default(DEFAULT_ACL);

export const uploadSettingsSchema = z.object({
  bucket: z.string().trim().min(1, 'bucket name is required'),
  bucketAcl: bucketAclSchema,
  createBucket: z.boolean().default(true),
  fileAcl: fileAclSchema,
  // Chunks below the S3 minimum are raised to it instead of being rejected.
  partSize: z
    .number()
    .int()
    .positive()
    .optional()
    .transform((value) => Math.max(value ?? MIN_PART_SIZE, MIN_PART_SIZE)),
  fieldSizeLimit: z.number().int().positive().default(DEFAULT_FIELD_SIZE_LIMIT),
});

export type UploadSettingsInput = z.input<typeof uploadSettingsSchema>;
export type UploadSettings = z.output<typeof uploadSettingsSchema>;
