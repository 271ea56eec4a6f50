import type { Frame } from '@/lib/geom/frame';
import type { Rng } from '@/lib/random';
import type { PatternPlan } from '@/types/scene';
import {
  concentricCircles,
  crossedStripes,
  freeCircles,
  freeSpirals,
  freeStripes,
  freeTriangles,
  parallelSawteeth,
  parallelStripes,
  parallelWaves,
} from './generators';
import type { Region } from './regions';

export { contains, regionBounds, type BBox, type Region, type RegionKind } from './regions';

/** Régions du motif résolu, par priorité décroissante; aucune si `count` < 1 */
export function createRegions(frame: Frame, plan: PatternPlan, rng: Rng): Region[] {
  if (plan.count < 1) return [];
  switch (plan.kind) {
    case 'free-circles':
      return freeCircles(frame, plan, rng);
    case 'free-triangles':
      return freeTriangles(frame, plan, rng);
    case 'free-stripes':
      return freeStripes(frame, plan, rng);
    case 'free-spirals':
      return freeSpirals(frame, plan, rng);
    case 'concentric-circles':
      return concentricCircles(frame, plan, rng);
    case 'parallel-stripes':
      return parallelStripes(frame, plan, rng);
    case 'crossed-stripes':
      return crossedStripes(frame, plan, rng);
    case 'parallel-waves':
      return parallelWaves(frame, plan, rng);
    case 'parallel-sawteeth':
      return parallelSawteeth(frame, plan, rng);
  }
}
