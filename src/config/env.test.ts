import path from 'path';
import { describe, expect, it } from 'vitest';
import { loadConfig } from './env';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 8000,
      dbUrl: '',
      dbName: '',
      uploadDir: '/tmp/uploads',
      uploadPublicPrefix: '/uploads',
      maxUploadBytes: 10 * 1024 * 1024,
      maxUploadFiles: 5,
      corsOrigins: [],
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      PORT: '9100',
      DATABASE_URL: 'mongodb://db.local:27017',
      DATABASE_NAME: 'barang',
      UPLOAD_DIR: 'data/uploads',
      UPLOAD_PUBLIC_PREFIX: '/static/uploads//',
      CORS_ORIGINS: 'http://localhost:5173, https://barang.example.com ,',
    });

    expect(config.port).toBe(9100);
    expect(config.dbUrl).toBe('mongodb://db.local:27017');
    expect(config.dbName).toBe('barang');
    expect(config.uploadDir).toBe(path.resolve('data/uploads'));
    expect(config.uploadPublicPrefix).toBe('/static/uploads');
    expect(config.corsOrigins).toEqual(['http://localhost:5173', 'https://barang.example.com']);
  });
});
