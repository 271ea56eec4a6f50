import { crossprodSign, Pos } from '@/lib/geom/pos';

/**
 * Régions décoratives: union fermée, une variante par forme, chacune ne portant
 * que les paramètres de son test d'appartenance. Immuables une fois créées.
 */
export type Region =
  | { kind: 'disc'; center: Pos; radius: number }
  | { kind: 'ring'; center: Pos; inner: number; outer: number }
  | { kind: 'triangle'; a: Pos; b: Pos; c: Pos }
  | { kind: 'band'; origin: Pos; normal: Pos; lo: number; hi: number }
  | { kind: 'spiral'; center: Pos; spacing: number; fill: number; phase: number; radius: number }
  | { kind: 'wave'; origin: Pos; normal: Pos; lo: number; hi: number; amplitude: number; wavelength: number; phase: number }
  | {
      kind: 'sawtooth';
      origin: Pos;
      normal: Pos;
      lo: number;
      hi: number;
      amplitude: number;
      wavelength: number;
      phase: number;
    };

export type RegionKind = Region['kind'];

/** Boîte englobante (minX, minY, maxX, maxY), format attendu par l'index R-tree */
export type BBox = {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
};

/** Emprise des régions non bornées (bandes, vagues, dents de scie) */
export const UNBOUNDED = 1e9;

const frac = (t: number) => t - Math.floor(t);

/** Décalage de la frontière d'une bande ondulée au point d'abscisse `along` */
function boundaryShift(r: Extract<Region, { kind: 'wave' | 'sawtooth' }>, along: number): number {
  const t = along / r.wavelength + r.phase;
  if (r.kind === 'wave') return r.amplitude * Math.sin(2 * Math.PI * t);
  return r.amplitude * (2 * frac(t) - 1);
}

export function contains(r: Region, p: Pos): boolean {
  switch (r.kind) {
    case 'disc':
      return p.dist(r.center) < r.radius;
    case 'ring': {
      const d = p.dist(r.center);
      return d >= r.inner && d < r.outer;
    }
    case 'triangle': {
      const s1 = crossprodSign(p, r.a, r.b);
      const s2 = crossprodSign(p, r.b, r.c);
      const s3 = crossprodSign(p, r.c, r.a);
      return s1 === s2 && s2 === s3;
    }
    case 'band': {
      const across = p.sub(r.origin).dot(r.normal);
      return across >= r.lo && across < r.hi;
    }
    case 'spiral': {
      const v = p.sub(r.center);
      const d = v.norm();
      if (d >= r.radius) return false;
      // Spirale d'Archimède: le bras avance d'un pas `spacing` par tour
      const turn = frac((v.angle() - r.phase) / 360);
      return frac(d / r.spacing - turn) < r.fill;
    }
    case 'wave':
    case 'sawtooth': {
      const v = p.sub(r.origin);
      const across = v.dot(r.normal);
      const along = v.dot(new Pos(-r.normal.y, r.normal.x));
      const shift = boundaryShift(r, along);
      return across >= r.lo + shift && across < r.hi + shift;
    }
  }
}

function boxAround(center: Pos, radius: number): BBox {
  return { minX: center.x - radius, minY: center.y - radius, maxX: center.x + radius, maxY: center.y + radius };
}

export function regionBounds(r: Region): BBox {
  switch (r.kind) {
    case 'disc':
      return boxAround(r.center, r.radius);
    case 'ring':
      return boxAround(r.center, r.outer);
    case 'spiral':
      return boxAround(r.center, r.radius);
    case 'triangle':
      return {
        minX: Math.min(r.a.x, r.b.x, r.c.x),
        minY: Math.min(r.a.y, r.b.y, r.c.y),
        maxX: Math.max(r.a.x, r.b.x, r.c.x),
        maxY: Math.max(r.a.y, r.b.y, r.c.y),
      };
    case 'band':
    case 'wave':
    case 'sawtooth':
      return { minX: -UNBOUNDED, minY: -UNBOUNDED, maxX: UNBOUNDED, maxY: UNBOUNDED };
  }
}
