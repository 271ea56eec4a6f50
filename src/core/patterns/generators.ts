import { Pos } from '@/lib/geom/pos';
import { frameCenter, frameRadius, type Frame } from '@/lib/geom/frame';
import type { Rng } from '@/lib/random';
import type { PatternPlan } from '@/types/scene';
import type { Region } from './regions';

/**
 * Générateurs de motifs. Chacun consomme le flux dans un ordre fixe et
 * renvoie ses régions par priorité décroissante (la première qui contient
 * un point l'emporte au moment de la coloration).
 */

const minSide = (f: Frame) => Math.min(f.w, f.h);
const meanSide = (f: Frame) => (f.w + f.h) / 2;

/** Trie par taille croissante: les petites formes restent visibles sous les grandes */
function smallestFirst<T>(items: T[], size: (t: T) => number): T[] {
  return items
    .map((item, idx) => ({ item, idx }))
    .sort((u, v) => size(u.item) - size(v.item) || u.idx - v.idx)
    .map(({ item }) => item);
}

export function freeCircles(frame: Frame, plan: PatternPlan, rng: Rng): Region[] {
  const discs: Extract<Region, { kind: 'disc' }>[] = [];
  for (let i = 0; i < plan.count; i++) {
    const center = Pos.random(frame, rng);
    const radius = minSide(frame) * (0.05 + rng.float() * 0.25);
    discs.push({ kind: 'disc', center, radius });
  }
  return smallestFirst(discs, (d) => d.radius);
}

export function freeTriangles(frame: Frame, plan: PatternPlan, rng: Rng): Region[] {
  const tris: { size: number; region: Region }[] = [];
  for (let i = 0; i < plan.count; i++) {
    const center = Pos.random(frame, rng);
    const size = minSide(frame) * (0.05 + rng.float() * 0.25);
    const rot = rng.range(0, 360);
    const [a, b, c] = [0, 120, 240].map((k) => center.add(Pos.polar(rot + k, size)));
    tris.push({ size, region: { kind: 'triangle', a, b, c } });
  }
  return smallestFirst(tris, (t) => t.size).map((t) => t.region);
}

export function freeStripes(frame: Frame, plan: PatternPlan, rng: Rng): Region[] {
  const half = (plan.width * meanSide(frame)) / 2;
  const regions: Region[] = [];
  for (let i = 0; i < plan.count; i++) {
    const origin = Pos.random(frame, rng);
    const normal = Pos.polar(rng.range(0, 360), 1);
    regions.push({ kind: 'band', origin, normal, lo: -half, hi: half });
  }
  return regions;
}

export function freeSpirals(frame: Frame, plan: PatternPlan, rng: Rng): Region[] {
  const spacing = (plan.tightness * (frame.w + frame.h)) / 8;
  const regions: Region[] = [];
  for (let i = 0; i < plan.count; i++) {
    const center = Pos.random(frame, rng);
    const phase = rng.range(0, 360);
    const radius = meanSide(frame) * (0.2 + rng.float() * 0.3);
    regions.push({ kind: 'spiral', center, spacing, fill: plan.width, phase, radius });
  }
  return regions;
}

/** Disque central puis `count` anneaux jusqu'au coin le plus éloigné du cadre */
export function concentricCircles(frame: Frame, plan: PatternPlan, rng: Rng): Region[] {
  if (plan.count < 1) return [];
  const center = Pos.random(frame, rng);
  const corners = [
    new Pos(frame.x, frame.y),
    new Pos(frame.x + frame.w, frame.y),
    new Pos(frame.x, frame.y + frame.h),
    new Pos(frame.x + frame.w, frame.y + frame.h),
  ];
  const outer = Math.max(...corners.map((c) => c.dist(center)));
  const step = outer / (plan.count + 1);

  const radii: number[] = [];
  for (let k = 0; k <= plan.count; k++) {
    const jitter = k < plan.count ? (rng.float() - 0.5) * step * 0.5 : 0;
    radii.push(step * (k + 1) + jitter);
  }

  const regions: Region[] = [{ kind: 'disc', center, radius: radii[0] }];
  for (let k = 1; k < radii.length; k++) {
    regions.push({ kind: 'ring', center, inner: radii[k - 1], outer: radii[k] });
  }
  return regions;
}

/** Points de coupe triés partageant [-extent, extent] en `count` intervalles */
function partition(count: number, extent: number, rng: Rng): number[] {
  const cuts: number[] = [];
  for (let i = 1; i < count; i++) cuts.push(-extent + rng.float() * 2 * extent);
  cuts.sort((u, v) => u - v);
  return [-extent, ...cuts, extent];
}

export function parallelStripes(frame: Frame, plan: PatternPlan, rng: Rng): Region[] {
  if (plan.count < 1) return [];
  const center = frameCenter(frame);
  const base = rng.range(0, 360);
  const axis = Pos.polar(base, 1);
  const bounds = partition(plan.count, frameRadius(frame), rng);

  const regions: Region[] = [];
  for (let k = 0; k + 1 < bounds.length; k++) {
    const mid = (bounds[k] + bounds[k + 1]) / 2;
    const half = (bounds[k + 1] - bounds[k]) / 2;
    const tilt = rng.range(-plan.variation, plan.variation + 1);
    regions.push({
      kind: 'band',
      origin: center.add(axis.mul(mid)),
      normal: Pos.polar(base + tilt, 1),
      lo: -half,
      hi: half,
    });
  }
  return regions;
}

export function crossedStripes(frame: Frame, plan: PatternPlan, rng: Rng): Region[] {
  const half = (plan.width * meanSide(frame)) / 2;
  const base = rng.range(0, 360);
  const regions: Region[] = [];
  for (let i = 0; i < plan.count; i++) {
    const origin = Pos.random(frame, rng);
    const tilt = rng.range(-plan.variation, plan.variation + 1);
    const normal = Pos.polar(base + (i % 2) * 90 + tilt, 1);
    regions.push({ kind: 'band', origin, normal, lo: -half, hi: half });
  }
  return regions;
}

function undulatingBands(kind: 'wave' | 'sawtooth', frame: Frame, plan: PatternPlan, rng: Rng): Region[] {
  const center = frameCenter(frame);
  const extent = frameRadius(frame);
  const normal = Pos.polar(rng.range(0, 360), 1);
  const wavelength = meanSide(frame) * (0.2 + rng.float() * 0.3);
  const phase = rng.float();
  const spacing = (2 * extent) / Math.max(plan.count, 1);
  const amplitude = plan.width * spacing;

  const regions: Region[] = [];
  for (let k = 0; k < plan.count; k++) {
    const lo = -extent + k * spacing;
    regions.push({ kind, origin: center, normal, lo, hi: lo + spacing, amplitude, wavelength, phase });
  }
  return regions;
}

export function parallelWaves(frame: Frame, plan: PatternPlan, rng: Rng): Region[] {
  return undulatingBands('wave', frame, plan, rng);
}

export function parallelSawteeth(frame: Frame, plan: PatternPlan, rng: Rng): Region[] {
  return undulatingBands('sawtooth', frame, plan, rng);
}
