import seedrandom from 'seedrandom';

/**
 * Flux pseudo-aléatoire unique d'une génération.
 *
 * Toute décision aléatoire (résolution de config, motifs, pavage, couleurs)
 * passe par la même instance, dans un ordre fixe: réordonner deux appels
 * change l'image produite pour une même graine.
 */
export class Rng {
  private readonly prng: seedrandom.PRNG;

  private constructor(prng: seedrandom.PRNG) {
    this.prng = prng;
  }

  static fromSeed(seed: bigint): Rng {
    return new Rng(seedrandom(BigInt.asUintN(64, seed).toString()));
  }

  /** Flottant uniforme dans [0, 1) */
  float(): number {
    return this.prng();
  }

  /** Entier uniforme dans [lo, hi) ; lo si l'intervalle est vide */
  range(lo: number, hi: number): number {
    if (hi <= lo) return lo;
    return lo + Math.floor(this.prng() * (hi - lo));
  }

  pick<T>(items: readonly T[]): T | undefined {
    if (items.length === 0) return undefined;
    return items[this.range(0, items.length)];
  }
}

/** Graine 64 bits aléatoire (hors flux déterministe) */
export function randomSeed(): bigint {
  const hi = BigInt(Math.floor(Math.random() * 2 ** 32));
  const lo = BigInt(Math.floor(Math.random() * 2 ** 32));
  return (hi << 32n) | lo;
}

/**
 * Parse une graine décimale non signée 64 bits.
 * Retourne null si la chaîne n'en est pas une.
 */
export function parseSeed(raw: string): bigint | null {
  const s = raw.trim();
  if (!/^\d+$/.test(s)) return null;
  const n = BigInt(s);
  return n < 2n ** 64n ? n : null;
}
