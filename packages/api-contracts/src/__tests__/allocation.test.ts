import { describe, expect, it } from 'vitest';

import { CreateAllocationBodySchema, CreateAllocationResponseSchema } from '../endpoints/allocations/create.js';
import { BatchAllocationBodySchema } from '../endpoints/allocations/batch.js';
import { AddReservedBodySchema } from '../endpoints/admin/reserved.js';
import { AssignMissingBodySchema } from '../endpoints/admin/migrations.js';
import { FingerprintSchema, RecordMetadataSchema, TagsSchema } from '../entities/allocation.js';

const sha256 = 'a'.repeat(64);

const record = {
  id: 1,
  fingerprint: sha256,
  identifier: 'Ab3x',
  identifierLength: 4,
  generationSalt: '00'.repeat(16),
  identifierAssignedAt: '2024-01-01T00:00:00.000Z',
  originalFilename: 'cat.png',
  fileExtension: '.png',
  fileSize: 2048,
  mediaType: 'image/png',
  storageKey: null,
  publicUrl: null,
  status: 'active',
  accessCount: 0,
  lastAccessedAt: null,
  metadata: null,
  tags: null,
  createdAt: '2024-01-01T00:00:00.000Z',
  updatedAt: '2024-01-01T00:00:00.000Z',
};

describe('FingerprintSchema', () => {
  it('normalises uppercase hex to lowercase', () => {
    expect(FingerprintSchema.parse('AB'.repeat(32))).toBe('ab'.repeat(32));
  });

  it('accepts SHA-512 length digests', () => {
    expect(FingerprintSchema.safeParse('0'.repeat(128)).success).toBe(true);
  });

  it('rejects digests of other lengths and non-hex characters', () => {
    expect(FingerprintSchema.safeParse('a'.repeat(63)).success).toBe(false);
    expect(FingerprintSchema.safeParse('g'.repeat(64)).success).toBe(false);
  });
});

describe('CreateAllocationBodySchema', () => {
  it('accepts a fingerprint with optional file facts', () => {
    const result = CreateAllocationBodySchema.safeParse({
      fingerprint: sha256,
      originalFilename: 'cat.PNG',
      fileExtension: '.PNG',
      fileSize: 10,
      tags: ['cats'],
      metadata: { width: 640, animated: false, source: null },
    });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.fileExtension).toBe('.png');
    }
  });

  it('rejects an extension without a leading dot', () => {
    expect(CreateAllocationBodySchema.safeParse({ fingerprint: sha256, fileExtension: 'png' }).success).toBe(false);
  });
});

describe('RecordMetadataSchema and TagsSchema', () => {
  it('rejects nested metadata values', () => {
    expect(RecordMetadataSchema.safeParse({ nested: { a: 1 } }).success).toBe(false);
  });

  it('caps metadata at 32 keys', () => {
    const tooMany = Object.fromEntries(Array.from({ length: 33 }, (_, i) => [`k${i}`, i]));
    expect(RecordMetadataSchema.safeParse(tooMany).success).toBe(false);
  });

  it('caps tag length', () => {
    expect(TagsSchema.safeParse(['x'.repeat(65)]).success).toBe(false);
  });
});

describe('CreateAllocationResponseSchema', () => {
  it('discriminates assigned results', () => {
    const result = CreateAllocationResponseSchema.safeParse({
      kind: 'assigned',
      identifier: 'Ab3x',
      length: 4,
      salt: '00'.repeat(16),
      record,
    });
    expect(result.success).toBe(true);
  });

  it('rejects an assigned result without an identifier', () => {
    expect(CreateAllocationResponseSchema.safeParse({ kind: 'assigned', record }).success).toBe(false);
  });

  it('accepts a dedup hit carrying only the record', () => {
    expect(CreateAllocationResponseSchema.safeParse({ kind: 'dedupHit', record }).success).toBe(true);
  });
});

describe('admin bodies', () => {
  it('requires at least one batch item', () => {
    expect(BatchAllocationBodySchema.safeParse({ items: [] }).success).toBe(false);
  });

  it('rejects reserved values with punctuation', () => {
    expect(AddReservedBodySchema.safeParse({ value: 'ad-min' }).success).toBe(false);
  });

  it('defaults the migration limit', () => {
    expect(AssignMissingBodySchema.parse({})).toEqual({ limit: 1000 });
  });
});
