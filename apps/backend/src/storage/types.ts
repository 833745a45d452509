export type StoredObject = {
  /** Object key under the provider root: identifier (or content key) + extension. */
  key: string;
  /** Publicly reachable URL or path ("/uploads/Ab3x.png" or "https://cdn/…/Ab3x.png"). */
  publicUrl: string;
};

export type StoreFileArgs = {
  sourcePath: string;
  key: string;
  mediaType?: string | null;
};

export interface StorageProvider {
  kind: 'local' | 's3';

  /** Copies the file under `key`. The source file is left in place. */
  storeFile(args: StoreFileArgs): Promise<StoredObject>;

  /** Best-effort delete by key; failures are logged, not thrown. */
  deleteByKey(key: string): Promise<void>;
}

const STORAGE_KEY_PATTERN = /^(?:[0-9A-Za-z]+|[0-9a-f]{8}(?:-[0-9a-f]{4}){3}-[0-9a-f]{12})(?:\.[a-z0-9]{1,15})?$/;

function checkedKey(key: string): string {
  if (!STORAGE_KEY_PATTERN.test(key)) {
    throw new Error(`Invalid storage key: ${key}`);
  }
  return key;
}

/** Storage key for an identifier: the identifier followed by the lowercase extension. */
export function storageKeyFor(identifier: string, extWithDot: string | null | undefined): string {
  return checkedKey(`${identifier}${(extWithDot ?? '').toLowerCase()}`);
}

/**
 * Storage key for content that has no identifier yet: the first 128 bits of the
 * fingerprint laid out as a UUID, e.g. `3f2a9c1e-7b4d-4e8a-9c0f-1d2e3f4a5b6c.png`.
 */
export function contentKeyFor(fingerprint: string, extWithDot: string | null | undefined): string {
  const hex = fingerprint.toLowerCase();
  if (!/^[0-9a-f]{32,}$/.test(hex)) throw new Error('fingerprint must be at least 32 hex characters');
  const uuid = [hex.slice(0, 8), hex.slice(8, 12), hex.slice(12, 16), hex.slice(16, 20), hex.slice(20, 32)].join('-');
  return checkedKey(`${uuid}${(extWithDot ?? '').toLowerCase()}`);
}

export function isStorageKey(key: string): boolean {
  return STORAGE_KEY_PATTERN.test(key);
}

export function joinUrl(base: string, pathPart: string): string {
  const b = base.endsWith('/') ? base.slice(0, -1) : base;
  const p = pathPart.startsWith('/') ? pathPart.slice(1) : pathPart;
  return `${b}/${p}`;
}
