import type { Rng } from './random';

export type Weighted<T> = [item: T, weight: number];

/**
 * Sélection aléatoire pondérée.
 *
 * L'ordre d'insertion est conservé: il fixe la correspondance entre le tirage
 * et l'élément retenu (poids cumulés), donc le résultat pour une graine donnée.
 */
export class Chooser<T> {
  private readonly items: Weighted<T>[] = [];
  private totalWeight = 0;

  constructor(items: Iterable<Weighted<T>> = []) {
    for (const [item, weight] of items) this.push(item, weight);
  }

  push(item: T, weight: number): void {
    const w = Number.isFinite(weight) && weight > 0 ? weight : 0;
    this.items.push([item, w]);
    this.totalWeight += w;
  }

  append(items: Iterable<Weighted<T>>): void {
    for (const [item, weight] of items) this.push(item, weight);
  }

  /** Copie des paires (élément, poids) dans l'ordre d'insertion */
  extract(): Weighted<T>[] {
    return this.items.map(([item, weight]) => [item, weight]);
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  total(): number {
    return this.totalWeight;
  }

  /**
   * Tire un élément avec une probabilité proportionnelle à son poids.
   * Un seul tirage consommé si le poids total est positif, aucun sinon.
   */
  choose(rng: Rng): T | undefined {
    if (this.totalWeight <= 0) return undefined;
    const target = rng.float() * this.totalWeight;
    let acc = 0;
    let last: T | undefined;
    for (const [item, weight] of this.items) {
      if (weight <= 0) continue;
      acc += weight;
      last = item;
      if (target < acc) return item;
    }
    // Arrondi flottant: target peut égaler acc en toute fin de liste
    return last;
  }
}
