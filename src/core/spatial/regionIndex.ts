import RBush from 'rbush';
import type { Pos } from '@/lib/geom/pos';
import { contains, regionBounds, type BBox, type Region } from '@/core/patterns';

type Node = BBox & { index: number };

/**
 * Index R-tree des régions d'une scène.
 * Présélection par boîte englobante, puis test exact dans l'ordre des régions:
 * le résultat est le même qu'un parcours linéaire (première région qui contient).
 */
export class RegionIndex {
  private readonly tree = new RBush<Node>();

  constructor(private readonly regions: readonly Region[]) {
    this.tree.load(regions.map((r, index) => ({ ...regionBounds(r), index })));
  }

  get size(): number {
    return this.regions.length;
  }

  /** Indices des régions dont la boîte contient `p`, triés */
  candidates(p: Pos): number[] {
    return this.tree
      .search({ minX: p.x, minY: p.y, maxX: p.x, maxY: p.y })
      .map((n) => n.index)
      .sort((a, b) => a - b);
  }

  /** Indice de la première région contenant `p`, -1 si aucune */
  firstMatch(p: Pos): number {
    for (const i of this.candidates(p)) {
      if (contains(this.regions[i], p)) return i;
    }
    return -1;
  }
}
