import dotenv from 'dotenv';
import fs from 'fs';
import { z } from 'zod';
import { bucketAclSchema, fileAclSchema } from '../middleware/upload.validation';

dotenv.config();

const s3CredentialsSchema = z.object({
  accessKeyId: z.string().min(1),
  secretAccessKey: z.string().min(1),
});

type S3Credentials = z.infer<typeof s3CredentialsSchema>;

const parsePort = (raw: string | undefined, fallback: number): number => {
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const parseBoolean = (raw: string | undefined, fallback: boolean): boolean => {
  if (raw === undefined) return fallback;
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'y', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'n', 'off'].includes(normalized)) return false;
  return fallback;
};

const parsePositive = (raw: string | undefined): number | undefined => {
  const parsed = Number.parseFloat(String(raw ?? '').trim());
  if (!Number.isFinite(parsed) || parsed <= 0) return undefined;
  return parsed;
};

export type ConfigEnv = Record<string, string | undefined>;

export const createConfig = (env: ConfigEnv = process.env, deps?: { fs?: typeof fs }) => {
  const fsImpl = deps?.fs ?? fs;
  const isProduction = (env.NODE_ENV || '').toLowerCase() === 'production';

  const readS3CredentialsFile = (): S3Credentials | null => {
    const p = env.S3_CREDENTIALS_FILE;
    if (!p) return null;

    try {
      if (!fsImpl.existsSync(p)) return null;
      const raw = fsImpl.readFileSync(p, 'utf8');
      const parsed = s3CredentialsSchema.safeParse(JSON.parse(raw));
      return parsed.success ? parsed.data : null;
    } catch (error) {
      console.warn(`[config] ignoring unreadable S3_CREDENTIALS_FILE ${p}:`, error);
      return null;
    }
  };

  const fileCreds = readS3CredentialsFile();
  const partSizeMb = parsePositive(env.S3_PART_SIZE_MB);
  const fieldSizeKb = parsePositive(env.UPLOAD_FIELD_SIZE_KB);

  const config = {
    env: env.NODE_ENV || 'development',
    port: parsePort(env.PORT, 3000),
    s3: {
      endpoint: env.S3_ENDPOINT || 'localhost',
      port: parsePort(env.S3_PORT, 9000),
      accessKeyId: env.S3_ACCESS_KEY_ID || fileCreds?.accessKeyId || 'minioadmin',
      secretAccessKey: env.S3_SECRET_ACCESS_KEY || fileCreds?.secretAccessKey || 'minioadmin',
      useSsl: parseBoolean(env.S3_USE_SSL, false),
      region: env.S3_REGION || 'us-east-1',
    },
    upload: {
      bucket: env.S3_BUCKET_NAME || 'uploads',
      bucketAcl: bucketAclSchema.parse(env.S3_BUCKET_ACL || undefined),
      createBucket: parseBoolean(env.S3_CREATE_BUCKET, true),
      fileAcl: fileAclSchema.parse(env.S3_FILE_ACL || undefined),
      // Left undefined so the middleware applies its own minimum.
      partSize: partSizeMb === undefined ? undefined : Math.floor(partSizeMb * 1024 * 1024),
      fieldSizeLimit: fieldSizeKb === undefined ? undefined : Math.floor(fieldSizeKb * 1024),
    },
  };

  // Fail-fast on missing critical secrets in production.
  if (isProduction) {
    if (!config.s3.accessKeyId || !config.s3.secretAccessKey || config.s3.secretAccessKey === 'minioadmin') {
      throw new Error('Missing required S3 credentials (S3_ACCESS_KEY_ID/S3_SECRET_ACCESS_KEY or S3_CREDENTIALS_FILE)');
    }
  }

  return config;
};

export type AppConfig = ReturnType<typeof createConfig>;

// Base URL of the S3 API, without the default port of the protocol.
export const s3EndpointUrl = (s3: AppConfig['s3']): string => {
  const protocol = s3.useSsl ? 'https' : 'http';
  if ((protocol === 'http' && s3.port === 80) || (protocol === 'https' && s3.port === 443)) {
    return `${protocol}://${s3.endpoint}`;
  }
  return `${protocol}://${s3.endpoint}:${s3.port}`;
};

const config = createConfig(process.env);
export default config;
