import fs from 'fs';
import { S3Client, PutObjectCommand, DeleteObjectCommand } from '@aws-sdk/client-s3';
import { errorMessage, logger } from '../utils/logger.js';
import { joinUrl, type StorageProvider, type StoreFileArgs, type StoredObject } from './types.js';

export type S3Config = {
  endpoint?: string;
  region: string;
  bucket: string;
  accessKeyId: string;
  secretAccessKey: string;
  publicBaseUrl: string;
  keyPrefix: string;
  forcePathStyle: boolean;
};

export class S3StorageProvider implements StorageProvider {
  kind: 's3' = 's3';
  private readonly cfg: S3Config;
  private readonly client: S3Client;

  constructor(cfg: S3Config, client?: S3Client) {
    this.cfg = cfg;
    this.client =
      client ??
      new S3Client({
        region: cfg.region,
        endpoint: cfg.endpoint,
        forcePathStyle: cfg.forcePathStyle,
        credentials: {
          accessKeyId: cfg.accessKeyId,
          secretAccessKey: cfg.secretAccessKey,
        },
      });
  }

  objectKey(key: string): string {
    const prefix = this.cfg.keyPrefix ? this.cfg.keyPrefix.replace(/\/+$/, '') + '/' : '';
    return `${prefix}${key}`;
  }

  async storeFile(args: StoreFileArgs): Promise<StoredObject> {
    const objectKey = this.objectKey(args.key);
    const stat = await fs.promises.stat(args.sourcePath);

    await this.client.send(
      new PutObjectCommand({
        Bucket: this.cfg.bucket,
        Key: objectKey,
        Body: fs.createReadStream(args.sourcePath),
        ContentLength: stat.size,
        ContentType: args.mediaType || undefined,
        // Identifiers are never reissued, so an object under a key never changes.
        CacheControl: 'public, max-age=31536000, immutable',
      })
    );

    return { key: args.key, publicUrl: joinUrl(this.cfg.publicBaseUrl, objectKey) };
  }

  async deleteByKey(key: string): Promise<void> {
    try {
      await this.client.send(new DeleteObjectCommand({ Bucket: this.cfg.bucket, Key: this.objectKey(key) }));
    } catch (error) {
      logger.warn('storage.s3.delete_failed', { key, errorMessage: errorMessage(error) });
    }
  }
}
