import { Color } from './color';
import type { Rng } from './random';

export type SaltItem = {
  color: Color;
  /** Probabilité de remplacement, dans [0, 1] */
  likeliness: number;
  /** Amplitude du bruit appliqué à la couleur de remplacement */
  variability: number;
};

/**
 * Règle de « sel »: remplace occasionnellement la couleur calculée
 * par une couleur d'accent, pour moucheter le rendu.
 */
export class Salt {
  constructor(readonly items: readonly SaltItem[] = []) {}

  static none(): Salt {
    return new Salt([]);
  }

  /**
   * Parcourt les entrées dans l'ordre: un tirage par entrée, la première
   * retenue fournit la couleur (bruitée). null si aucune ne l'est.
   */
  sample(rng: Rng): Color | null {
    for (const item of this.items) {
      if (rng.float() < item.likeliness) {
        return item.color.variate(rng, item.variability);
      }
    }
    return null;
  }
}
