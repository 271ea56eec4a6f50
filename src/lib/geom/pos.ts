import { MalformedIntersectionError } from '@/core/errors';
import type { Rng } from '@/lib/random';
import type { Frame } from './frame';

export function radians(deg: number): number {
  return (deg * Math.PI) / 180;
}

/**
 * Point / vecteur 2D immuable.
 *
 * L'égalité se fait au centième d'unité (voir round/key): deux sommets issus
 * de calculs flottants différents sur une arête partagée restent identiques.
 */
export class Pos {
  constructor(
    readonly x: number,
    readonly y: number,
  ) {}

  static zero(): Pos {
    return new Pos(0, 0);
  }

  /** Vecteur de norme r orienté à deg degrés */
  static polar(deg: number, r: number): Pos {
    const theta = radians(deg);
    return new Pos(r * Math.cos(theta), r * Math.sin(theta));
  }

  /**
   * Point uniforme dans le cadre élargi de 10% de chaque côté,
   * pour que les formes libres débordent sur les bords.
   */
  static random(f: Frame, rng: Rng): Pos {
    const errx = f.w / 10;
    const erry = f.h / 10;
    const x = f.x - errx + rng.float() * f.w * 1.2;
    const y = f.y - erry + rng.float() * f.h * 1.2;
    return new Pos(x, y);
  }

  /**
   * Intersection de deux droites, chacune donnée par un point et un angle (degrés).
   * @throws MalformedIntersectionError si les droites sont quasi parallèles
   */
  static intersect([p1, rot1]: [Pos, number], [p2, rot2]: [Pos, number]): Pos {
    const p1b = p1.add(Pos.polar(rot1, 1));
    const p2b = p2.add(Pos.polar(rot2, 1));

    const dx = new Pos(p1.x - p1b.x, p2.x - p2b.x);
    const dy = new Pos(p1.y - p1b.y, p2.y - p2b.y);

    const div = det(dx, dy);
    if (Math.abs(div) < 0.01) {
      throw new MalformedIntersectionError(div);
    }
    const inv = 1 / div;

    const d = new Pos(det(p1, p1b), det(p2, p2b));
    return new Pos(det(d, dx) * inv, det(d, dy) * inv);
  }

  add(o: Pos): Pos {
    return new Pos(this.x + o.x, this.y + o.y);
  }

  sub(o: Pos): Pos {
    return new Pos(this.x - o.x, this.y - o.y);
  }

  mul(k: number): Pos {
    return new Pos(this.x * k, this.y * k);
  }

  dot(o: Pos): number {
    return this.x * o.x + this.y * o.y;
  }

  norm(): number {
    return Math.hypot(this.x, this.y);
  }

  unit(): Pos {
    return this.mul(1 / this.norm());
  }

  dist(o: Pos): number {
    return this.sub(o).norm();
  }

  /** Projection de this sur la direction de o */
  project(o: Pos): Pos {
    const u = o.unit();
    return u.mul(this.dot(u));
  }

  /** Rotation autour de l'origine */
  rotate(deg: number): Pos {
    const t = radians(deg);
    const c = Math.cos(t);
    const s = Math.sin(t);
    return new Pos(this.x * c - this.y * s, this.x * s + this.y * c);
  }

  /** Angle polaire en degrés, dans (-180, 180] */
  angle(): number {
    return (Math.atan2(this.y, this.x) * 180) / Math.PI;
  }

  /** Coordonnées au centième d'unité */
  round(): [number, number] {
    return [Math.round(this.x * 100), Math.round(this.y * 100)];
  }

  key(): string {
    const [x, y] = this.round();
    return `${x},${y}`;
  }

  equals(o: Pos): boolean {
    return this.key() === o.key();
  }
}

function det(a: Pos, b: Pos): number {
  return a.x * b.y - a.y * b.x;
}

/** Signe du produit vectoriel (a - c) × (b - c) */
export function crossprodSign(a: Pos, b: Pos, c: Pos): boolean {
  return (a.x - c.x) * (b.y - c.y) - (b.x - c.x) * (a.y - c.y) > 0;
}

/** Centre de gravité des sommets */
export function centroid(points: readonly Pos[]): Pos {
  if (points.length === 0) return Pos.zero();
  let sx = 0;
  let sy = 0;
  for (const p of points) {
    sx += p.x;
    sy += p.y;
  }
  return new Pos(sx / points.length, sy / points.length);
}

/** Test point-dans-polygone (règle pair-impair), bords inclus à epsilon près */
export function pointInPolygon(p: Pos, poly: readonly Pos[], eps = 1e-9): boolean {
  let inside = false;
  for (let i = 0, j = poly.length - 1; i < poly.length; j = i++) {
    const a = poly[i];
    const b = poly[j];
    if (onSegment(p, a, b, eps)) return true;
    const crosses = a.y > p.y !== b.y > p.y;
    if (crosses && p.x < ((b.x - a.x) * (p.y - a.y)) / (b.y - a.y) + a.x) {
      inside = !inside;
    }
  }
  return inside;
}

function onSegment(p: Pos, a: Pos, b: Pos, eps: number): boolean {
  const cross = (b.x - a.x) * (p.y - a.y) - (b.y - a.y) * (p.x - a.x);
  if (Math.abs(cross) > eps * Math.max(1, a.dist(b))) return false;
  const dot = (p.x - a.x) * (b.x - a.x) + (p.y - a.y) * (b.y - a.y);
  return dot >= -eps && dot <= (b.x - a.x) ** 2 + (b.y - a.y) ** 2 + eps;
}
