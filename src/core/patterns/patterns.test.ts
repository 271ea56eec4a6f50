import { describe, it, expect } from 'vitest';
import { PATTERN_KINDS } from '@/constants/shapes';
import { frameOfSize } from '@/lib/geom/frame';
import { Pos } from '@/lib/geom/pos';
import { Rng } from '@/lib/random';
import type { PatternKind, PatternPlan } from '@/types/scene';
import { contains, createRegions, regionBounds, type Region } from './index';
import { concentricCircles, parallelStripes } from './generators';
import { UNBOUNDED } from './regions';

const frame = frameOfSize(200, 100);
const plan = (kind: PatternKind, over: Partial<PatternPlan> = {}): PatternPlan => ({
  kind,
  count: 6,
  width: 0.3,
  variation: 0,
  tightness: 0.5,
  ...over,
});

function gridPoints(): Pos[] {
  const pts: Pos[] = [];
  for (let x = 1.3; x < frame.w; x += 9.7) {
    for (let y = 1.1; y < frame.h; y += 8.3) pts.push(new Pos(x, y));
  }
  return pts;
}

describe('contains', () => {
  it('disc excludes its border', () => {
    const disc: Region = { kind: 'disc', center: new Pos(0, 0), radius: 5 };
    expect(contains(disc, new Pos(3, 3))).toBe(true);
    expect(contains(disc, new Pos(5, 0))).toBe(false);
  });

  it('ring includes its inner border only', () => {
    const ring: Region = { kind: 'ring', center: new Pos(0, 0), inner: 2, outer: 4 };
    expect(contains(ring, new Pos(2, 0))).toBe(true);
    expect(contains(ring, new Pos(3, 0))).toBe(true);
    expect(contains(ring, new Pos(4, 0))).toBe(false);
    expect(contains(ring, new Pos(1, 0))).toBe(false);
  });

  it('triangle', () => {
    const tri: Region = { kind: 'triangle', a: new Pos(0, 0), b: new Pos(10, 0), c: new Pos(0, 10) };
    expect(contains(tri, new Pos(2, 2))).toBe(true);
    expect(contains(tri, new Pos(20, 20))).toBe(false);
  });

  it('band is half open', () => {
    const band: Region = { kind: 'band', origin: new Pos(0, 0), normal: new Pos(1, 0), lo: -1, hi: 1 };
    expect(contains(band, new Pos(0.5, 100))).toBe(true);
    expect(contains(band, new Pos(-1, 0))).toBe(true);
    expect(contains(band, new Pos(1, 0))).toBe(false);
  });

  it('spiral follows its arm', () => {
    const spiral: Region = { kind: 'spiral', center: new Pos(0, 0), spacing: 10, fill: 0.5, phase: 0, radius: 100 };
    expect(contains(spiral, new Pos(2, 0))).toBe(true);
    expect(contains(spiral, new Pos(7, 0))).toBe(false);
    expect(contains(spiral, new Pos(0, 2))).toBe(false);
    expect(contains(spiral, new Pos(0, 5))).toBe(true);
    expect(contains(spiral, new Pos(200, 0))).toBe(false);
  });

  it('wave shifts its borders along the band', () => {
    const wave: Region = {
      kind: 'wave',
      origin: new Pos(0, 0),
      normal: new Pos(0, 1),
      lo: 0,
      hi: 10,
      amplitude: 2,
      wavelength: 40,
      phase: 0,
    };
    expect(contains(wave, new Pos(0, 1))).toBe(true);
    expect(contains(wave, new Pos(-10, 1))).toBe(false);
    expect(contains(wave, new Pos(-10, 11))).toBe(true);
  });

  it('sawtooth shifts its borders linearly', () => {
    const saw: Region = {
      kind: 'sawtooth',
      origin: new Pos(0, 0),
      normal: new Pos(0, 1),
      lo: 0,
      hi: 10,
      amplitude: 2,
      wavelength: 40,
      phase: 0,
    };
    expect(contains(saw, new Pos(0, -0.5))).toBe(true);
    expect(contains(saw, new Pos(0, 9))).toBe(false);
    expect(contains(saw, new Pos(-10, -0.5))).toBe(true);
  });
});

describe('regionBounds', () => {
  it('boxes bounded shapes', () => {
    expect(regionBounds({ kind: 'disc', center: new Pos(10, 20), radius: 5 })).toEqual({ minX: 5, minY: 15, maxX: 15, maxY: 25 });
    expect(regionBounds({ kind: 'triangle', a: new Pos(0, 4), b: new Pos(3, -1), c: new Pos(-2, 0) })).toEqual({
      minX: -2,
      minY: -1,
      maxX: 3,
      maxY: 4,
    });
  });

  it('leaves bands unbounded', () => {
    const b = regionBounds({ kind: 'band', origin: new Pos(0, 0), normal: new Pos(1, 0), lo: -1, hi: 1 });
    expect(b.maxX).toBe(UNBOUNDED);
    expect(b.minY).toBe(-UNBOUNDED);
  });
});

describe('createRegions', () => {
  it('is deterministic for a seed', () => {
    const a = createRegions(frame, plan('free-triangles'), Rng.fromSeed(4n));
    const b = createRegions(frame, plan('free-triangles'), Rng.fromSeed(4n));
    expect(a).toEqual(b);
  });

  it('sorts free circles smallest first', () => {
    const regions = createRegions(frame, plan('free-circles', { count: 12 }), Rng.fromSeed(2n));
    expect(regions).toHaveLength(12);
    const radii = regions.map((r) => (r.kind === 'disc' ? r.radius : NaN));
    expect(radii).toEqual([...radii].sort((u, v) => u - v));
    for (const r of radii) {
      expect(r).toBeGreaterThanOrEqual(5);
      expect(r).toBeLessThan(30);
    }
  });

  it('nests concentric rings around a central disc', () => {
    const regions = createRegions(frame, plan('concentric-circles', { count: 4 }), Rng.fromSeed(6n));
    expect(regions.map((r) => r.kind)).toEqual(['disc', 'ring', 'ring', 'ring', 'ring']);
    for (let k = 1; k < regions.length; k++) {
      const prev = regions[k - 1];
      const cur = regions[k];
      if (cur.kind !== 'ring') throw new Error('expected a ring');
      expect(cur.inner).toBe(prev.kind === 'disc' ? prev.radius : prev.kind === 'ring' ? prev.outer : NaN);
    }
    for (const p of gridPoints()) {
      expect(regions.some((r) => contains(r, p))).toBe(true);
    }
  });

  it('partitions the frame with straight parallel stripes', () => {
    const regions = createRegions(frame, plan('parallel-stripes', { count: 5 }), Rng.fromSeed(9n));
    expect(regions).toHaveLength(5);
    for (const p of gridPoints()) {
      expect(regions.filter((r) => contains(r, p))).toHaveLength(1);
    }
  });

  it('stacks undulating bands edge to edge', () => {
    for (const kind of ['parallel-waves', 'parallel-sawteeth'] as const) {
      const regions = createRegions(frame, plan(kind, { count: 5 }), Rng.fromSeed(1n));
      expect(regions).toHaveLength(5);
      expect(regions.every((r) => r.kind === (kind === 'parallel-waves' ? 'wave' : 'sawtooth'))).toBe(true);
      const bounds = regions.map((r) => ('lo' in r ? [r.lo, r.hi] : [NaN, NaN]));
      for (let k = 1; k < bounds.length; k++) {
        expect(bounds[k][0]).toBeCloseTo(bounds[k - 1][1], 9);
      }
    }
  });

  it('gives spirals the configured width and tightness', () => {
    const regions = createRegions(frame, plan('free-spirals', { count: 2, width: 0.4, tightness: 0.5 }), Rng.fromSeed(3n));
    expect(regions).toHaveLength(2);
    for (const r of regions) {
      expect(r).toMatchObject({ kind: 'spiral', fill: 0.4, spacing: 18.75 });
    }
  });

  it('alternates crossed stripes by a quarter turn', () => {
    const regions = createRegions(frame, plan('crossed-stripes', { count: 2, width: 0.1 }), Rng.fromSeed(7n));
    const [a, b] = regions;
    if (a.kind !== 'band' || b.kind !== 'band') throw new Error('expected bands');
    expect(a.normal.dot(b.normal)).toBeCloseTo(0, 9);
    expect(a.hi - a.lo).toBeCloseTo(15, 9);
  });

  it.each(PATTERN_KINDS)('returns no %s region for a zero count', (kind) => {
    expect(createRegions(frame, plan(kind, { count: 0 }), Rng.fromSeed(1n))).toEqual([]);
  });

  it.each(['parallel-stripes', 'concentric-circles'] as const)('returns no %s region from the generator itself for a zero count', (kind) => {
    const generate = kind === 'parallel-stripes' ? parallelStripes : concentricCircles;
    expect(generate(frame, plan(kind, { count: 0 }), Rng.fromSeed(1n))).toEqual([]);
  });
});
