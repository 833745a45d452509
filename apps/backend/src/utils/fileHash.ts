import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import { Semaphore } from './semaphore.js';

export type FileHasher = {
  /** Hex SHA-512 of the file contents, streamed. */
  hash: (filePath: string) => Promise<string>;
};

export function createFileHasher(concurrency: number): FileHasher {
  const semaphore = new Semaphore(concurrency);
  return {
    hash: (filePath) => semaphore.use(() => calculateFileHash(filePath)),
  };
}

export function calculateFileHash(filePath: string, algorithm: 'sha256' | 'sha512' = 'sha512'): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash(algorithm);
    const stream = fs.createReadStream(filePath);

    stream.on('data', (data) => hash.update(data));
    stream.on('end', () => resolve(hash.digest('hex')));
    stream.on('error', reject);
  });
}

// Simple MIME type detection based on extension
const MEDIA_TYPES: Record<string, string> = {
  '.mp4': 'video/mp4',
  '.webm': 'video/webm',
  '.mov': 'video/quicktime',
  '.mkv': 'video/x-matroska',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.svg': 'image/svg+xml',
  '.mp3': 'audio/mpeg',
  '.wav': 'audio/wav',
  '.ogg': 'audio/ogg',
  '.pdf': 'application/pdf',
  '.txt': 'text/plain',
  '.json': 'application/json',
  '.zip': 'application/zip',
};

export type FileFactsFromPath = {
  originalFilename: string;
  /** Lowercase with leading dot, or null when the name has no usable extension. */
  fileExtension: string | null;
  fileSize: number;
  mediaType: string;
};

export async function getFileFacts(filePath: string): Promise<FileFactsFromPath> {
  const stats = await fs.promises.stat(filePath);
  const originalFilename = path.basename(filePath);
  const ext = path.extname(originalFilename).toLowerCase();
  const fileExtension = /^\.[a-z0-9]{1,15}$/.test(ext) ? ext : null;
  return {
    originalFilename,
    fileExtension,
    fileSize: stats.size,
    mediaType: (fileExtension && MEDIA_TYPES[fileExtension]) || 'application/octet-stream',
  };
}
