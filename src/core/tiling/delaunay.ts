import { centroid, Pos } from '@/lib/geom/pos';
import type { Frame } from '@/lib/geom/frame';
import type { Rng } from '@/lib/random';
import type { Tile } from './periodic';

type Triangle = {
  v: [number, number, number];
  cx: number;
  cy: number;
  r2: number;
};

function circumscribe(pts: readonly Pos[], v: [number, number, number]): Triangle | null {
  const [a, b, c] = v.map((i) => pts[i]);
  const d = 2 * (a.x * (b.y - c.y) + b.x * (c.y - a.y) + c.x * (a.y - b.y));
  if (Math.abs(d) < 1e-12) return null;
  const a2 = a.x * a.x + a.y * a.y;
  const b2 = b.x * b.x + b.y * b.y;
  const c2 = c.x * c.x + c.y * c.y;
  const cx = (a2 * (b.y - c.y) + b2 * (c.y - a.y) + c2 * (a.y - b.y)) / d;
  const cy = (a2 * (c.x - b.x) + b2 * (a.x - c.x) + c2 * (b.x - a.x)) / d;
  return { v, cx, cy, r2: (a.x - cx) ** 2 + (a.y - cy) ** 2 };
}

const edgeKey = (i: number, j: number) => (i < j ? `${i}:${j}` : `${j}:${i}`);

/**
 * Triangulation de Delaunay incrémentale (Bowyer–Watson).
 * Retourne les triangles sous forme de triplets d'indices dans `points`,
 * dans l'ordre de construction.
 */
export function triangulate(points: readonly Pos[]): [number, number, number][] {
  if (points.length < 3) return [];

  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const p of points) {
    minX = Math.min(minX, p.x);
    minY = Math.min(minY, p.y);
    maxX = Math.max(maxX, p.x);
    maxY = Math.max(maxY, p.y);
  }
  const mid = new Pos((minX + maxX) / 2, (minY + maxY) / 2);
  const span = Math.max(maxX - minX, maxY - minY, 1) * 1000;

  // Super-triangle englobant, retiré à la fin
  const pts = [...points, mid.add(Pos.polar(90, span)), mid.add(Pos.polar(210, span)), mid.add(Pos.polar(330, span))];
  const n = points.length;
  const root = circumscribe(pts, [n, n + 1, n + 2]);
  if (!root) return [];
  let triangles: Triangle[] = [root];

  for (let i = 0; i < n; i++) {
    const p = pts[i];
    const bad: Triangle[] = [];
    const kept: Triangle[] = [];
    for (const t of triangles) {
      if ((p.x - t.cx) ** 2 + (p.y - t.cy) ** 2 < t.r2) bad.push(t);
      else kept.push(t);
    }

    // Arêtes du trou: celles qui n'appartiennent qu'à un seul triangle invalidé
    const edges = new Map<string, [number, number]>();
    const count = new Map<string, number>();
    for (const t of bad) {
      const [a, b, c] = t.v;
      for (const [u, w] of [
        [a, b],
        [b, c],
        [c, a],
      ]) {
        const k = edgeKey(u, w);
        count.set(k, (count.get(k) ?? 0) + 1);
        edges.set(k, [u, w]);
      }
    }

    triangles = kept;
    for (const [k, [u, w]] of edges) {
      if (count.get(k) !== 1) continue;
      const t = circumscribe(pts, [u, w, i]);
      if (t) triangles.push(t);
    }
  }

  return triangles.filter((t) => t.v.every((i) => i < n)).map((t) => t.v);
}

/**
 * Pavage par triangulation d'un semis de `count` points aléatoires,
 * complété des quatre coins du cadre élargi pour couvrir tout le cadre.
 */
export function delaunayTiles(frame: Frame, count: number, rng: Rng): Tile[] {
  const errx = frame.w / 10;
  const erry = frame.h / 10;
  const x0 = frame.x - errx;
  const y0 = frame.y - erry;
  const x1 = frame.x + frame.w + errx;
  const y1 = frame.y + frame.h + erry;

  const points = [new Pos(x0, y0), new Pos(x1, y0), new Pos(x1, y1), new Pos(x0, y1)];
  for (let i = 0; i < count; i++) points.push(Pos.random(frame, rng));

  return triangulate(points).map((v) => {
    const shape = v.map((i) => points[i]);
    return { anchor: centroid(shape), points: shape };
  });
}
