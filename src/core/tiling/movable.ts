import { Pos } from '@/lib/geom/pos';

/**
 * Formes de base, sommets exprimés autour de l'origine (ancre de la tuile),
 * à rotation 0. La rotation du pavage est appliquée ensuite en bloc.
 */

export function regularPolygon(sides: number, radius: number, startDeg = 0): Pos[] {
  const pts: Pos[] = [];
  for (let i = 0; i < sides; i++) {
    pts.push(Pos.polar(startDeg + (360 / sides) * i, radius));
  }
  return pts;
}

export function hexagon(radius: number): Pos[] {
  return regularPolygon(6, radius);
}

export function triangle(radius: number, startDeg = 0): Pos[] {
  return regularPolygon(3, radius, startDeg);
}

/** Carré de côté `side`, côtés alignés sur les axes */
export function square(side: number): Pos[] {
  return regularPolygon(4, side / Math.SQRT2, 45);
}

/** Losange de demi-diagonales `ldiag` (axe x) et `sdiag` (axe y) */
export function rhombus(ldiag: number, sdiag: number): Pos[] {
  return [Pos.polar(0, ldiag), Pos.polar(90, sdiag), Pos.polar(180, ldiag), Pos.polar(270, sdiag)];
}

export function midpoint(a: Pos, b: Pos): Pos {
  return a.add(b).mul(0.5);
}
