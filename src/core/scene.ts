import type { Color } from '@/lib/color';
import type { Pos } from '@/lib/geom/pos';
import type { Rng } from '@/lib/random';
import type { SceneCfg } from '@/types/scene';
import { createRegions, type Region } from './patterns';
import { RegionIndex } from './spatial/regionIndex';
import { chooseColor, type ColorItem } from './theme';

/**
 * Compositeur: régions décoratives et leurs recettes de couleur.
 *
 * Construction (ordre des tirages): recette du fond, régions, puis une recette
 * par région dans l'ordre des régions. Requête: première région (ordre de
 * génération) qui contient le point; sinon le fond.
 */
export class Scene {
  private readonly index: RegionIndex;

  private constructor(
    readonly background: ColorItem,
    readonly regions: readonly Region[],
    readonly items: readonly ColorItem[],
  ) {
    this.index = new RegionIndex(regions);
  }

  static build(cfg: SceneCfg, rng: Rng): Scene {
    const background = chooseColor(cfg, rng);
    const regions = createRegions(cfg.frame, cfg.pattern, rng);
    const items = regions.map(() => chooseColor(cfg, rng));
    return new Scene(background, regions, items);
  }

  /** Indice de la région retenue pour `pos`, -1 pour le fond */
  regionAt(pos: Pos): number {
    return this.index.firstMatch(pos);
  }

  /** Couleur tirée pour `pos` et indice de la région retenue (-1: fond) */
  sample(pos: Pos, rng: Rng): { color: Color; region: number } {
    const region = this.regionAt(pos);
    const item = region < 0 ? this.background : this.items[region];
    return { color: item.sample(rng), region };
  }

  color(pos: Pos, rng: Rng): Color {
    return this.sample(pos, rng).color;
  }
}
