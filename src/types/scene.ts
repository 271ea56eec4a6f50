// Types de base du générateur

import type { Chooser } from '@/lib/chooser';
import type { Color } from '@/lib/color';
import type { Frame } from '@/lib/geom/frame';
import type { Salt } from '@/lib/salt';

export type Deg = number; // degrés (0..360)
export type Seed = bigint; // entier non signé 64 bits

export type PentagonVariant = 0 | 1 | 2 | 3 | 4 | 5 | 6;

/** Famille de pavage telle que désignée par un jeton de forme (avant résolution) */
export type TilingKind =
  | { kind: 'hexagons' }
  | { kind: 'triangles' }
  | { kind: 'hexagons-and-triangles' }
  | { kind: 'squares-and-triangles' }
  | { kind: 'rhombus' }
  | { kind: 'delaunay' }
  | { kind: 'pentagons'; variant: PentagonVariant };

export type TilingFamily = TilingKind['kind'];

export type RegularFamily = 'hexagons' | 'triangles' | 'hexagons-and-triangles' | 'squares-and-triangles';

/** Pavage entièrement résolu: paramètres numériques et tirages compris */
export type TilingPlan =
  | { kind: RegularFamily; size: number; rotation: Deg }
  | { kind: 'rhombus'; size: number; shortDiagonal: number; rotation: Deg }
  | { kind: 'pentagons'; variant: Exclude<PentagonVariant, 0>; size: number; rotation: Deg }
  | { kind: 'delaunay'; points: number };

export type PatternKind =
  | 'free-circles'
  | 'free-triangles'
  | 'free-stripes'
  | 'free-spirals'
  | 'concentric-circles'
  | 'parallel-stripes'
  | 'crossed-stripes'
  | 'parallel-waves'
  | 'parallel-sawteeth';

/**
 * Motif résolu. Les champs sans objet pour la famille valent 0
 * (ex. tightness hors spirales).
 */
export type PatternPlan = {
  kind: PatternKind;
  count: number;
  width: number;
  variation: number;
  tightness: number;
};

/** Couleur nommée d'un thème, avec surcharges optionnelles */
export type ThemeItem = {
  color: Color;
  deviation?: number;
  distance?: number;
  salt: Salt;
};

export type Theme = Chooser<ThemeItem>;

/** Descripteur de génération entièrement résolu */
export type SceneCfg = {
  deviation: number;
  distance: number;
  frame: Frame;
  tiling: TilingPlan;
  pattern: PatternPlan;
  lineWidth: number;
  lineColor: Color;
  theme: Theme;
};
