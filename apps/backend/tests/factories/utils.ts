import crypto from 'crypto';

let counter = 0;

export function uniqueId(prefix = 'id'): string {
  counter += 1;
  return `${prefix}_${Date.now()}_${counter}`;
}

/** 128 hex chars, shaped like a real SHA-512 file fingerprint. */
export function fingerprintFor(seed: string = uniqueId('fp')): string {
  return crypto.createHash('sha512').update(seed).digest('hex');
}

/** Candidate source that replays `scripted` in order, then counts upward in base 36 padded to the length. */
export function scriptedCandidates(scripted: string[] = []): (length: number) => string {
  const queue = [...scripted];
  let next = 0;
  return (length) => {
    const head = queue.shift();
    if (head !== undefined) return head;
    next += 1;
    return next.toString(36).padStart(length, 'q').slice(-length);
  };
}
