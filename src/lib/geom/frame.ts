import { Pos } from './pos';

/** Rectangle aligné sur les axes, en unités de dessin */
export type Frame = {
  x: number;
  y: number;
  w: number;
  h: number;
};

export function frameOfSize(w: number, h: number): Frame {
  return { x: 0, y: 0, w, h };
}

export function frameCenter(f: Frame): Pos {
  return new Pos(f.x + f.w / 2, f.y + f.h / 2);
}

/** Demi-diagonale: rayon du cercle circonscrit au cadre */
export function frameRadius(f: Frame): number {
  return Math.hypot(f.w, f.h) / 2;
}
