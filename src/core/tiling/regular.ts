import { Pos } from '@/lib/geom/pos';
import type { RegularFamily } from '@/types/scene';
import { hexagon, rhombus, square, triangle } from './movable';
import type { Lattice } from './periodic';

const SQRT3 = Math.sqrt(3);

/** Hexagones de rayon circonscrit `s` */
export function hexagonsLattice(s: number): Lattice {
  return {
    a: Pos.polar(30, s * SQRT3),
    b: Pos.polar(90, s * SQRT3),
    motif: [{ offset: Pos.zero(), shape: hexagon(s) }],
  };
}

/** Triangles de rayon circonscrit `s`: un triangle pointe en haut, un en bas */
export function trianglesLattice(s: number): Lattice {
  return {
    a: Pos.polar(150, s * SQRT3),
    b: Pos.polar(270, s * SQRT3),
    motif: [
      { offset: Pos.zero(), shape: triangle(s) },
      { offset: Pos.polar(180, s), shape: triangle(s, 60) },
    ],
  };
}

/** Pavage trihexagonal, côté `s`: un hexagone et deux triangles par maille */
export function hexagonsAndTrianglesLattice(s: number): Lattice {
  const r = s / SQRT3;
  return {
    a: Pos.polar(0, 2 * s),
    b: Pos.polar(60, 2 * s),
    motif: [
      { offset: Pos.zero(), shape: hexagon(s) },
      { offset: Pos.polar(30, 2 * r), shape: triangle(r, 30) },
      { offset: Pos.polar(90, 2 * r), shape: triangle(r, 90) },
    ],
  };
}

/** Pavage triangulaire allongé, côté `s`: rangées de carrés séparées par des rangées de triangles */
export function squaresAndTrianglesLattice(s: number): Lattice {
  const r = s / SQRT3;
  return {
    a: new Pos(s, 0),
    b: new Pos(s / 2, s * (1 + SQRT3 / 2)),
    motif: [
      { offset: Pos.zero(), shape: square(s) },
      { offset: new Pos(0, s / 2 + (s * SQRT3) / 6), shape: triangle(r, 90) },
      { offset: new Pos(s / 2, s / 2 + (s * SQRT3) / 3), shape: triangle(r, 270) },
    ],
  };
}

/** Losanges de demi-diagonales `ldiag` et `sdiag` */
export function rhombusLattice(ldiag: number, sdiag: number): Lattice {
  return {
    a: new Pos(ldiag, sdiag),
    b: new Pos(ldiag, -sdiag),
    motif: [{ offset: Pos.zero(), shape: rhombus(ldiag, sdiag) }],
  };
}

export function regularLattice(kind: RegularFamily, size: number): Lattice {
  switch (kind) {
    case 'hexagons':
      return hexagonsLattice(size);
    case 'triangles':
      return trianglesLattice(size);
    case 'hexagons-and-triangles':
      return hexagonsAndTrianglesLattice(size);
    case 'squares-and-triangles':
      return squaresAndTrianglesLattice(size);
  }
}
