import { describe, it, expect } from 'vitest';
import { parseSeed, Rng } from './random';

describe('Rng', () => {
  it('replays the same stream for the same seed', () => {
    const a = Rng.fromSeed(1430n);
    const b = Rng.fromSeed(1430n);
    const drawsA = Array.from({ length: 5 }, () => a.float());
    const drawsB = Array.from({ length: 5 }, () => b.float());
    expect(drawsA).toEqual(drawsB);
  });

  it('keeps ranges within [lo, hi)', () => {
    const rng = Rng.fromSeed(3n);
    for (let i = 0; i < 500; i++) {
      const n = rng.range(-4, 5);
      expect(Number.isInteger(n)).toBe(true);
      expect(n).toBeGreaterThanOrEqual(-4);
      expect(n).toBeLessThan(5);
    }
  });

  it('returns lo on an empty range without consuming the stream', () => {
    const rng = Rng.fromSeed(9n);
    const fresh = Rng.fromSeed(9n);
    expect(rng.range(5, 5)).toBe(5);
    expect(rng.float()).toBe(fresh.float());
  });

  it('picks nothing from an empty list', () => {
    expect(Rng.fromSeed(1n).pick([])).toBeUndefined();
  });
});

describe('parseSeed', () => {
  it('reads unsigned 64-bit decimal seeds', () => {
    expect(parseSeed('42')).toBe(42n);
    expect(parseSeed(' 7 ')).toBe(7n);
    expect(parseSeed('18446744073709551615')).toBe(18446744073709551615n);
  });

  it('rejects everything else', () => {
    expect(parseSeed('18446744073709551616')).toBeNull();
    expect(parseSeed('-1')).toBeNull();
    expect(parseSeed('abc')).toBeNull();
    expect(parseSeed('')).toBeNull();
  });
});
