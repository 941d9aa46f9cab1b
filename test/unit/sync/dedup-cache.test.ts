import { describe, it, expect } from 'vitest';
import { DedupCache } from '../../../src/sync/dedup-cache.js';

describe('DedupCache', () => {
  it('should admit an id once per window', () => {
    const cache = new DedupCache({ windowMs: 5000 });

    expect(cache.tryAdmit(42, 1000)).toBe(true);
    expect(cache.tryAdmit(42, 1000)).toBe(false);
    expect(cache.tryAdmit(42, 5999)).toBe(false);
    expect(cache.tryAdmit(42, 6000)).toBe(true);
  });

  it('should treat ids independently', () => {
    const cache = new DedupCache();

    expect(cache.tryAdmit(1, 0)).toBe(true);
    expect(cache.tryAdmit(2, 0)).toBe(true);
    expect(cache.tryAdmit('/photos/a.jpg', 0)).toBe(true);
    expect(cache.size).toBe(3);
  });

  it('should restart the window from the second admission', () => {
    const cache = new DedupCache({ windowMs: 5000 });

    cache.tryAdmit(7, 0);
    cache.tryAdmit(7, 6000);

    expect(cache.isFresh(7, 10_999)).toBe(true);
    expect(cache.isFresh(7, 11_000)).toBe(false);
  });

  it('should report freshness without mutating', () => {
    const cache = new DedupCache({ windowMs: 100 });

    expect(cache.isFresh(9, 0)).toBe(false);
    expect(cache.size).toBe(0);

    cache.tryAdmit(9, 0);
    expect(cache.isFresh(9, 50)).toBe(true);
    expect(cache.size).toBe(1);
  });

  // ── Sweeping ──

  it('should keep expired entries until the high-water mark is crossed', () => {
    const cache = new DedupCache({ windowMs: 100, highWaterMark: 3 });

    cache.tryAdmit(1, 0);
    cache.tryAdmit(2, 0);
    cache.tryAdmit(3, 0);
    expect(cache.size).toBe(3);

    // Fourth entry pushes size to 4 and sweeps the three expired ones
    cache.tryAdmit(4, 500);
    expect(cache.size).toBe(1);
    expect(cache.isFresh(4, 500)).toBe(true);
  });

  it('should not sweep entries still inside the window', () => {
    const cache = new DedupCache({ windowMs: 1000, highWaterMark: 2 });

    cache.tryAdmit(1, 0);
    cache.tryAdmit(2, 100);
    cache.tryAdmit(3, 200);

    expect(cache.size).toBe(3);
  });

  it('should sweep on demand and return the removed count', () => {
    const cache = new DedupCache({ windowMs: 100 });

    cache.tryAdmit('a', 0);
    cache.tryAdmit('b', 50);
    cache.tryAdmit('c', 200);

    expect(cache.sweep(151)).toBe(2);
    expect(cache.size).toBe(1);
  });

  it('should clear all entries', () => {
    const cache = new DedupCache();
    cache.tryAdmit(1, 0);
    cache.clear();

    expect(cache.size).toBe(0);
    expect(cache.tryAdmit(1, 1)).toBe(true);
  });

  it('should reject non-positive settings', () => {
    expect(() => new DedupCache({ windowMs: 0 })).toThrow('DedupCache windowMs must be >= 1');
    expect(() => new DedupCache({ highWaterMark: 0 })).toThrow('DedupCache highWaterMark must be >= 1');
  });

  it('should expose its window', () => {
    expect(new DedupCache().window).toBe(5000);
    expect(new DedupCache({ windowMs: 250 }).window).toBe(250);
  });
});
