import { Color } from '@/lib/color';
import type { Rng } from '@/lib/random';
import { Salt } from '@/lib/salt';
import type { SceneCfg, ThemeItem } from '@/types/scene';

/** Recette de couleur d'un élément décoratif, figée à la construction de la scène */
export class ColorItem {
  constructor(
    readonly shade: Color,
    readonly deviation: number,
    readonly distance: number,
    readonly theme: Color,
    readonly salt: Salt,
  ) {}

  /**
   * Mélange la teinte vers la couleur du thème, bruite, puis applique le sel.
   * Ordre des tirages: bruit (r, g, b) puis sel.
   */
  sample(rng: Rng): Color {
    const base = this.shade.meanpoint(this.theme, this.distance).variate(rng, this.deviation);
    return this.salt.sample(rng) ?? base;
  }
}

const FALLBACK_ITEM: ThemeItem = { color: Color.black(), salt: Salt.none() };

/**
 * Tire un élément du thème (noir sans surcharge si le thème est vide),
 * puis une teinte aléatoire.
 */
export function chooseColor(cfg: Pick<SceneCfg, 'theme' | 'deviation' | 'distance'>, rng: Rng): ColorItem {
  const item = cfg.theme.choose(rng) ?? FALLBACK_ITEM;
  const shade = Color.random(rng);
  return new ColorItem(shade, item.deviation ?? cfg.deviation, item.distance ?? cfg.distance, item.color, item.salt);
}
