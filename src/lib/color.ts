import type { Rng } from './random';

/** Couleur RGB à composantes entières (bornée à [0,255] à la sérialisation) */
export class Color {
  constructor(
    readonly r: number,
    readonly g: number,
    readonly b: number,
  ) {}

  static black(): Color {
    return new Color(0, 0, 0);
  }

  static random(rng: Rng): Color {
    return new Color(rng.range(0, 255), rng.range(0, 255), rng.range(0, 255));
  }

  /** `#RRGGBB` → Color, null si le format ne correspond pas */
  static fromHex(s: string): Color | null {
    const m = /^#([0-9a-fA-F]{2})([0-9a-fA-F]{2})([0-9a-fA-F]{2})$/.exec(s);
    if (!m) return null;
    return new Color(parseInt(m[1], 16), parseInt(m[2], 16), parseInt(m[3], 16));
  }

  /** Bruit additif par composante dans [-amount, amount) ; plancher à 0 */
  variate(rng: Rng, amount: number): Color {
    if (amount <= 0) return this;
    const jitter = (c: number) => Math.max(0, c + rng.range(-amount, amount));
    const r = jitter(this.r);
    const g = jitter(this.g);
    const b = jitter(this.b);
    return new Color(r, g, b);
  }

  /**
   * Mélange pondéré vers `theme`: distance 0 → this, 100 → theme.
   */
  meanpoint(theme: Color, distance: number): Color {
    const d = Math.min(100, Math.max(0, distance));
    const mix = (a: number, t: number) => Math.floor((a * (100 - d) + t * d) / 100);
    return new Color(mix(this.r, theme.r), mix(this.g, theme.g), mix(this.b, theme.b));
  }

  /** Composantes bornées à [0,255] */
  clamped(): [number, number, number] {
    const c = (v: number) => Math.min(255, Math.max(0, Math.round(v)));
    return [c(this.r), c(this.g), c(this.b)];
  }

  /** Format SVG: `rgb(r,g,b)` */
  toString(): string {
    const [r, g, b] = this.clamped();
    return `rgb(${r},${g},${b})`;
  }
}
