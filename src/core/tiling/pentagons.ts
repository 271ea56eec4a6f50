import { Pos } from '@/lib/geom/pos';
import { hexagon, midpoint } from './movable';
import { mapLattice, motifFromPolygon, type Lattice } from './periodic';

/**
 * Six pavages pentagonaux bord à bord, paramétrés par une longueur `s`.
 * Les sommets obtenus par croisement de deux lignes passent par Pos.intersect.
 */

const SQRT3 = Math.sqrt(3);

/** Type 1: maisons à toit à 45°, une rangée droite et une rangée retournée */
export function prismaticLattice(s: number): Lattice {
  const h = s;
  const eave = new Pos(0, h);
  const apex = Pos.intersect([eave, 45], [new Pos(s, h), 135]);
  const t = apex.y - h;

  const up = [new Pos(0, 0), new Pos(s, 0), new Pos(s, h), apex, eave];
  const down = [
    apex,
    new Pos(s, h),
    new Pos(s + s / 2, h + t),
    new Pos(s + s / 2, 2 * h + t),
    new Pos(s / 2, 2 * h + t),
  ];
  return {
    a: new Pos(s, 0),
    b: new Pos(s / 2, 2 * h + t),
    motif: [motifFromPolygon(up), motifFromPolygon(down)],
  };
}

/** Type 2: pavage du Caire, quatre pentagones par maille */
export function cairoLattice(s: number): Lattice {
  const k = s / 2;
  const c = (Math.sqrt(7) - 1) / 3;
  const p = (x: number, y: number) => new Pos(x * k, y * k);
  const polys = [
    [p(0, 2), p(1 - c, 1), p(1 + c, 1), p(2, 2), p(1, 3 - c)],
    [p(0, 0), p(1, -1 + c), p(2, 0), p(1 + c, 1), p(1 - c, 1)],
    [p(0, 2), p(1, 3 - c), p(1, 3 + c), p(0, 4), p(-1 + c, 3)],
    [p(2, 2), p(3 - c, 3), p(2, 4), p(1, 3 + c), p(1, 3 - c)],
  ];
  return {
    a: p(2, 2),
    b: p(2, -2),
    motif: polys.map(motifFromPolygon),
  };
}

/** Hexagone de rayon `s` coupé entre les milieux des arêtes `edge` et `edge + 3` */
function halvedHexagon(s: number, edge: number): Lattice {
  const v = hexagon(s);
  const at = (i: number) => v[i % 6];
  const m1 = midpoint(at(edge), at(edge + 1));
  const m2 = midpoint(at(edge + 3), at(edge + 4));
  return {
    a: Pos.polar(30, s * SQRT3),
    b: Pos.polar(90, s * SQRT3),
    motif: [
      motifFromPolygon([m1, at(edge + 1), at(edge + 2), at(edge + 3), m2]),
      motifFromPolygon([m2, at(edge + 4), at(edge + 5), at(edge), m1]),
    ],
  };
}

/** Type 3: hexagones coupés en deux */
export function halvedHexagonsLattice(s: number): Lattice {
  return halvedHexagon(s, 0);
}

/**
 * Carré de côté `s` en (x0, 0) coupé par une ligne brisée reliant les milieux
 * des côtés bas et haut; le coude est décalé vers la droite (lean = 1) ou la gauche (-1).
 */
function splitSquare(s: number, x0: number, lean: 1 | -1): Pos[][] {
  const bottom = new Pos(x0 + s / 2, 0);
  const top = new Pos(x0 + s / 2, s);
  const elbow = Pos.intersect([bottom, 90 - lean * 30], [top, 270 + lean * 30]);
  return [
    [new Pos(x0, 0), bottom, elbow, top, new Pos(x0, s)],
    [bottom, new Pos(x0 + s, 0), new Pos(x0 + s, s), top, elbow],
  ];
}

/** Type 4: carrés coupés en zig-zag, le coude alternant d'une colonne à l'autre */
export function zigzagSquaresLattice(s: number): Lattice {
  return {
    a: new Pos(2 * s, 0),
    b: new Pos(0, s),
    motif: [...splitSquare(s, 0, 1), ...splitSquare(s, s, -1)].map(motifFromPolygon),
  };
}

/** Type 5: carrés coupés, rangées décalées d'un demi-carré */
export function runningBondLattice(s: number): Lattice {
  return {
    a: new Pos(s, 0),
    b: new Pos(s / 2, s),
    motif: splitSquare(s, 0, 1).map(motifFromPolygon),
  };
}

/** Type 6: hexagones coupés entre d'autres arêtes, étirés horizontalement */
export function stretchedHexagonsLattice(s: number): Lattice {
  return mapLattice(halvedHexagon(s, 1), (q) => new Pos(q.x * 1.5, q.y / 1.5));
}

export function pentagonLattice(variant: 1 | 2 | 3 | 4 | 5 | 6, s: number): Lattice {
  switch (variant) {
    case 1:
      return prismaticLattice(s);
    case 2:
      return cairoLattice(s);
    case 3:
      return halvedHexagonsLattice(s);
    case 4:
      return zigzagSquaresLattice(s);
    case 5:
      return runningBondLattice(s);
    case 6:
      return stretchedHexagonsLattice(s);
  }
}
