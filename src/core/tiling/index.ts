import type { Frame } from '@/lib/geom/frame';
import type { Rng } from '@/lib/random';
import type { TilingPlan } from '@/types/scene';
import { delaunayTiles } from './delaunay';
import { pentagonLattice } from './pentagons';
import { periodic, type Tile } from './periodic';
import { regularLattice, rhombusLattice } from './regular';

export type { Tile } from './periodic';

/**
 * Produit les tuiles du pavage résolu, dans l'ordre d'émission.
 * Seul le semis de Delaunay consomme le flux aléatoire ici: les tirages
 * des pavages réguliers (rotation, sous-type) ont déjà été faits à la résolution.
 */
export function makeTiling(frame: Frame, plan: TilingPlan, rng: Rng): Tile[] {
  switch (plan.kind) {
    case 'delaunay':
      return delaunayTiles(frame, plan.points, rng);
    case 'rhombus':
      return periodic(frame, rhombusLattice(plan.size, plan.shortDiagonal), plan.rotation);
    case 'pentagons':
      return periodic(frame, pentagonLattice(plan.variant, plan.size), plan.rotation);
    default:
      return periodic(frame, regularLattice(plan.kind, plan.size), plan.rotation);
  }
}
