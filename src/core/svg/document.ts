import { Color } from '@/lib/color';
import type { Frame } from '@/lib/geom/frame';
import type { Pos } from '@/lib/geom/pos';

/** Polygone fermé coloré */
export class Path {
  constructor(
    readonly points: readonly Pos[],
    readonly fill: Color = Color.black(),
    readonly stroke: Color = Color.black(),
    readonly strokeWidth = 1,
  ) {}

  withFill(fill: Color): Path {
    return new Path(this.points, fill, this.stroke, this.strokeWidth);
  }

  withStroke(stroke: Color): Path {
    return new Path(this.points, this.fill, stroke, this.strokeWidth);
  }

  withStrokeWidth(strokeWidth: number): Path {
    return new Path(this.points, this.fill, this.stroke, strokeWidth);
  }

  /** `Mx,y Lx,y ... z` ; chaîne vide sans sommet */
  d(): string {
    if (this.points.length === 0) return '';
    const [first, ...rest] = this.points;
    const parts = [`M${fmt(first.x)},${fmt(first.y)}`, ...rest.map((p) => `L${fmt(p.x)},${fmt(p.y)}`)];
    return `${parts.join(' ')} z`;
  }

  toSvg(): string {
    return `<path d="${this.d()}" fill="${this.fill}" stroke="${this.stroke}" stroke-width="${fmt(this.strokeWidth)}" />`;
  }
}

/** Nombres à 3 décimales au plus, sans zéros superflus ni `-0` */
function fmt(n: number): string {
  const r = Math.round(n * 1000) / 1000;
  return String(Object.is(r, -0) ? 0 : r);
}

/** Document vectoriel: cadre et chemins dans l'ordre d'ajout */
export class Document {
  private readonly items: Path[] = [];

  constructor(readonly frame: Frame) {}

  add(path: Path): this {
    this.items.push(path);
    return this;
  }

  get paths(): readonly Path[] {
    return this.items;
  }

  toSvg(): string {
    const { x, y, w, h } = this.frame;
    const lines = [
      `<svg viewBox="${fmt(x)} ${fmt(y)} ${fmt(w)} ${fmt(h)}" xmlns="http://www.w3.org/2000/svg">`,
      ...this.items.map((p) => p.toSvg()),
      '</svg>',
    ];
    return `${lines.join('\n')}\n`;
  }
}
