import type { StorageConfig } from '../config/allocation.js';
import type { StorageProvider } from './types.js';
import { LocalStorageProvider } from './localStorage.js';
import { S3StorageProvider } from './s3Storage.js';

export function createStorageProvider(cfg: StorageConfig): StorageProvider {
  if (cfg.kind === 's3') {
    return new S3StorageProvider({
      endpoint: cfg.endpoint ?? undefined,
      region: cfg.region,
      bucket: cfg.bucket,
      accessKeyId: cfg.accessKeyId,
      secretAccessKey: cfg.secretAccessKey,
      publicBaseUrl: cfg.publicBaseUrl,
      keyPrefix: cfg.keyPrefix,
      forcePathStyle: cfg.forcePathStyle,
    });
  }
  return new LocalStorageProvider({ uploadDir: cfg.uploadDir, publicBaseUrl: cfg.publicBaseUrl });
}
