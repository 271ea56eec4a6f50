import { centroid, Pos } from '@/lib/geom/pos';
import { frameCenter, frameRadius, type Frame } from '@/lib/geom/frame';
import type { Deg } from '@/types/scene';

/** Tuile produite: ancre (position de référence pour la couleur) et contour fermé */
export type Tile = {
  anchor: Pos;
  points: Pos[];
};

/** Élément de motif: décalage de l'ancre dans la maille, sommets relatifs à l'ancre */
export type MotifTile = {
  offset: Pos;
  shape: Pos[];
};

/** Pavage périodique: base du réseau (a, b) et motif répété à chaque nœud */
export type Lattice = {
  a: Pos;
  b: Pos;
  motif: MotifTile[];
};

/**
 * Construit un élément de motif à partir de sommets absolus (repère de la maille):
 * l'ancre est le centre de gravité des sommets.
 */
export function motifFromPolygon(points: readonly Pos[]): MotifTile {
  const offset = centroid(points);
  return { offset, shape: points.map((p) => p.sub(offset)) };
}

/** Applique une transformation linéaire à tout le réseau */
export function mapLattice(l: Lattice, f: (p: Pos) => Pos): Lattice {
  return {
    a: f(l.a),
    b: f(l.b),
    motif: l.motif.map((m) => ({ offset: f(m.offset), shape: m.shape.map(f) })),
  };
}

function cross(a: Pos, b: Pos): number {
  return a.x * b.y - a.y * b.x;
}

/**
 * Répète le motif sur le réseau tourné de `rot` degrés autour du centre du cadre.
 *
 * Une tuile est émise si son ancre est à moins de (demi-diagonale + étendue du motif)
 * du centre: toute tuile touchant le cadre est donc produite. Les tuiles qui
 * débordent sont conservées telles quelles (pas de découpe).
 * Ordre d'émission: i, puis j, puis ordre du motif. Les ancres en double
 * (au centième près) sont ignorées.
 */
export function periodic(frame: Frame, lattice: Lattice, rot: Deg): Tile[] {
  const { a, b, motif } = mapLattice(lattice, (p) => p.rotate(rot));
  const center = frameCenter(frame);

  let extent = 0;
  let maxOffset = 0;
  for (const m of motif) {
    maxOffset = Math.max(maxOffset, m.offset.norm());
    for (const v of m.shape) extent = Math.max(extent, v.norm());
  }
  const reach = frameRadius(frame) + extent;
  const span = reach + maxOffset;

  const det = Math.abs(cross(a, b));
  const ni = Math.ceil((span * b.norm()) / det);
  const nj = Math.ceil((span * a.norm()) / det);

  const seen = new Set<string>();
  const tiles: Tile[] = [];
  for (let i = -ni; i <= ni; i++) {
    for (let j = -nj; j <= nj; j++) {
      const node = center.add(a.mul(i)).add(b.mul(j));
      for (const m of motif) {
        const anchor = node.add(m.offset);
        if (anchor.dist(center) > reach) continue;
        const key = anchor.key();
        if (seen.has(key)) continue;
        seen.add(key);
        tiles.push({ anchor, points: m.shape.map((v) => anchor.add(v)) });
      }
    }
  }
  return tiles;
}
