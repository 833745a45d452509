import fs from 'fs';
import path from 'path';
import { errorMessage, logger } from '../utils/logger.js';
import { isStorageKey, joinUrl, type StorageProvider, type StoreFileArgs, type StoredObject } from './types.js';

export type LocalStorageConfig = {
  uploadDir: string;
  /** Served at `/uploads` when unset. */
  publicBaseUrl: string | null;
};

export class LocalStorageProvider implements StorageProvider {
  kind: 'local' = 'local';
  private readonly rootDir: string;

  constructor(private readonly cfg: LocalStorageConfig) {
    // UPLOAD_DIR can be relative (to cwd) or absolute.
    this.rootDir = path.resolve(process.cwd(), cfg.uploadDir);
  }

  async storeFile(args: StoreFileArgs): Promise<StoredObject> {
    if (!isStorageKey(args.key)) throw new Error(`Invalid storage key: ${args.key}`);
    const target = path.join(this.rootDir, args.key);

    await fs.promises.mkdir(this.rootDir, { recursive: true });
    // COPYFILE_EXCL: keys are never reused, an existing file means a stale upload under the same key.
    await fs.promises.copyFile(args.sourcePath, target, fs.constants.COPYFILE_EXCL).catch((err: unknown) => {
      if (err instanceof Error && 'code' in err && err.code === 'EEXIST') {
        logger.warn('storage.local.overwrite', { key: args.key });
        return fs.promises.copyFile(args.sourcePath, target);
      }
      throw err;
    });

    const publicUrl = this.cfg.publicBaseUrl ? joinUrl(this.cfg.publicBaseUrl, args.key) : `/uploads/${args.key}`;
    return { key: args.key, publicUrl };
  }

  async deleteByKey(key: string): Promise<void> {
    if (!isStorageKey(key)) return;
    try {
      await fs.promises.unlink(path.join(this.rootDir, key));
    } catch (error) {
      logger.warn('storage.local.delete_failed', { key, errorMessage: errorMessage(error) });
    }
  }
}
