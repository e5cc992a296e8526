import { describe, it, expect } from 'vitest';
import { toPayload, toSnapshot } from '../../../src/engine/source/mapper.js';
import { Tier } from '../../../src/engine/types.js';
import { ROOTS, hashOf } from '../../helpers/fakes.js';

function rawEntry(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    hash: hashOf('A'),
    name: 'Film',
    category: 'movies',
    size: 4096,
    num_complete: 12,
    num_incomplete: 3,
    num_seeds: 2,
    num_leechs: 1,
    upspeed: 2048,
    uploaded: 1 << 20,
    save_path: '/data/movies',
    content_path: '/data/movies/Film',
    added_on: 1700000000,
    ...overrides,
  };
}

describe('toPayload', () => {
  it('should map a complete entry', () => {
    expect(toPayload(rawEntry(), ROOTS)).toEqual({
      ok: true,
      payload: {
        id: hashOf('A'),
        name: 'Film',
        category: 'movies',
        size: 4096,
        seeders: 12,
        leechers: 3,
        uploadSpeed: 2048,
        uploaded: 1048576,
        savePath: '/data/movies',
        contentPath: '/data/movies/Film',
        addedOn: 1700000000,
        tier: Tier.MASTER,
      },
    });
  });

  it('should derive the tier from the save path', () => {
    const cached = toPayload(
      rawEntry({ save_path: '/cache/movies', content_path: '/cache/movies/Film' }),
      ROOTS
    );
    const elsewhere = toPayload(
      rawEntry({ save_path: '/downloads', content_path: '/downloads/Film' }),
      ROOTS
    );

    expect(cached.ok && cached.payload.tier).toBe(Tier.CACHE);
    expect(elsewhere.ok && elsewhere.payload.tier).toBe(Tier.UNMANAGED);
  });

  it('should accept a 64-character v2 hash', () => {
    const v2 = 'ab'.repeat(32);

    const result = toPayload(rawEntry({ hash: v2 }), ROOTS);

    expect(result.ok && result.payload.id).toBe(v2);
  });

  it('should lowercase the hash', () => {
    const result = toPayload(rawEntry({ hash: hashOf('A').toUpperCase() }), ROOTS);

    expect(result.ok && result.payload.id).toBe(hashOf('A'));
  });

  it('should fall back to connected peers when the tracker reports none', () => {
    const result = toPayload(rawEntry({ num_complete: -1, num_incomplete: -1 }), ROOTS);

    expect(result.ok && [result.payload.seeders, result.payload.leechers]).toEqual([2, 1]);
  });

  it('should default optional fields', () => {
    const result = toPayload(
      rawEntry({ category: undefined, upspeed: -5, uploaded: 'n/a', added_on: null }),
      ROOTS
    );

    expect(result.ok && result.payload).toMatchObject({
      category: '',
      uploadSpeed: 0,
      uploaded: 0,
      addedOn: 0,
    });
  });

  const malformed: Array<[Record<string, unknown>, string]> = [
    [{ hash: 'xyz' }, 'missing or malformed hash'],
    [{ name: 42 }, 'missing name'],
    [{ save_path: '' }, 'missing save_path'],
    [{ content_path: undefined }, 'missing content_path'],
    [{ size: -1 }, 'missing or negative size'],
    [{ num_complete: -1, num_seeds: -1 }, 'missing swarm counts'],
  ];

  it.each(malformed)('should reject %j', (overrides, reason) => {
    const result = toPayload(rawEntry(overrides), ROOTS);

    expect(result.ok).toBe(false);
    expect(!result.ok && result.rejected.reason).toBe(reason);
  });

  it('should reject non-objects without an id', () => {
    expect(toPayload('Film', ROOTS)).toEqual({
      ok: false,
      rejected: { reason: 'entry is not an object' },
    });
  });
});

describe('toSnapshot', () => {
  it('should keep valid entries when others are malformed', () => {
    const snapshot = toSnapshot(
      [rawEntry(), rawEntry({ hash: hashOf('B'), size: 'big' }), null],
      ROOTS
    );

    expect(snapshot.payloads.map((p) => p.id)).toEqual([hashOf('A')]);
    expect(snapshot.rejected).toEqual([
      { id: hashOf('B'), reason: 'missing or negative size' },
      { reason: 'entry is not an object' },
    ]);
  });
});
