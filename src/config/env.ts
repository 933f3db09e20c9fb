import dotenv from 'dotenv';
import path from 'path';

// Explicitly load .env from project root to avoid cwd issues.
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

const DEFAULT_MAX_UPLOAD_BYTES = 10 * 1024 * 1024;
const DEFAULT_MAX_UPLOAD_FILES = 5;

const trimSlash = (value: string) => value.trim().replace(/\/+$/, '');

export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
  return {
    port: Number(env.PORT || 8000),
    dbUrl: env.DATABASE_URL || '',
    dbName: env.DATABASE_NAME || '',
    uploadDir: path.resolve(env.UPLOAD_DIR || '/tmp/uploads'),
    uploadPublicPrefix: trimSlash(env.UPLOAD_PUBLIC_PREFIX || '/uploads'),
    maxUploadBytes: Number(env.MAX_UPLOAD_BYTES || DEFAULT_MAX_UPLOAD_BYTES),
    maxUploadFiles: Number(env.MAX_UPLOAD_FILES || DEFAULT_MAX_UPLOAD_FILES),
    corsOrigins: (env.CORS_ORIGINS || '')
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s.length > 0),
  };
}

export type AppConfig = ReturnType<typeof loadConfig>;

export const config: AppConfig = loadConfig();
