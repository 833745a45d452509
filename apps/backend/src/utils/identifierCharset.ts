import { randomBytes, randomInt } from 'node:crypto';

export const IDENTIFIER_CHARSET = '0123456789abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ';
export const CHARSET_SIZE = IDENTIFIER_CHARSET.length;

const IDENTIFIER_PATTERN = /^[0-9a-zA-Z]+$/;

/** Each character is an independent CSPRNG draw; nothing is derived from the salt. */
export function generateIdentifier(length: number): string {
  let out = '';
  for (let i = 0; i < length; i += 1) {
    out += IDENTIFIER_CHARSET.charAt(randomInt(CHARSET_SIZE));
  }
  return out;
}

/** 16 random bytes, hex. Stored with the record for auditing. */
export function generateSalt(): string {
  return randomBytes(16).toString('hex');
}

export function isIdentifierShaped(value: string, length?: number): boolean {
  if (!IDENTIFIER_PATTERN.test(value)) return false;
  return length === undefined || value.length === length;
}

const RATIO_SCALE = 1_000_000_000n;

/**
 * ⌊charsetSize^length × (1 − reservedRatio)⌋, clamped to Number.MAX_SAFE_INTEGER.
 * Computed on bigints: 62^9 already exceeds 2^53.
 */
export function computeCapacity(length: number, reservedRatio: number, charsetSize: number = CHARSET_SIZE): number {
  if (!Number.isInteger(length) || length < 1) return 0;
  const ratio = Math.min(1, Math.max(0, reservedRatio));
  const keep = BigInt(Math.round((1 - ratio) * Number(RATIO_SCALE)));
  const total = BigInt(charsetSize) ** BigInt(length);
  const capacity = (total * keep) / RATIO_SCALE;
  const max = BigInt(Number.MAX_SAFE_INTEGER);
  return Number(capacity > max ? max : capacity);
}
