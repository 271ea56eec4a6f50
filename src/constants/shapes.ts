/**
 * Table fermée des jetons de forme: code court | abréviation | mot complet.
 */

import type { PatternKind, PentagonVariant, TilingKind } from '@/types/scene';

export type ShapeRef = { type: 'tiling'; tiling: TilingKind } | { type: 'pattern'; pattern: PatternKind };

const tiling = (t: TilingKind): ShapeRef => ({ type: 'tiling', tiling: t });
const pattern = (p: PatternKind): ShapeRef => ({ type: 'pattern', pattern: p });
const pentagons = (variant: PentagonVariant) => tiling({ kind: 'pentagons', variant });

const SHAPE_TABLE: ReadonlyArray<[tokens: readonly string[], shape: ShapeRef]> = [
  [['H', 'hex.', 'hexagons'], tiling({ kind: 'hexagons' })],
  [['T', 'tri.', 'triangles'], tiling({ kind: 'triangles' })],
  [['H&T', 'hex.&tri.', 'hexagons&triangles'], tiling({ kind: 'hexagons-and-triangles' })],
  [['S&T', 'squ.&tri.', 'squares&triangles'], tiling({ kind: 'squares-and-triangles' })],
  [['R', 'rho.', 'rhombus'], tiling({ kind: 'rhombus' })],
  [['D', 'del.', 'delaunay'], tiling({ kind: 'delaunay' })],
  [['P', 'pen.', 'pentagons'], pentagons(0)],
  [['P1', 'pen.1', 'pentagons-1'], pentagons(1)],
  [['P2', 'pen.2', 'pentagons-2'], pentagons(2)],
  [['P3', 'pen.3', 'pentagons-3'], pentagons(3)],
  [['P4', 'pen.4', 'pentagons-4'], pentagons(4)],
  [['P5', 'pen.5', 'pentagons-5'], pentagons(5)],
  [['P6', 'pen.6', 'pentagons-6'], pentagons(6)],
  [['FC', 'f-cir.', 'free-circles'], pattern('free-circles')],
  [['FT', 'f-tri.', 'free-triangles'], pattern('free-triangles')],
  [['FR', 'f-str.', 'free-stripes'], pattern('free-stripes')],
  [['FP', 'f-spi.', 'free-spirals'], pattern('free-spirals')],
  [['CC', 'c-cir.', 'concentric-circles'], pattern('concentric-circles')],
  [['PS', 'p-str.', 'parallel-stripes'], pattern('parallel-stripes')],
  [['CS', 'c-str.', 'crossed-stripes'], pattern('crossed-stripes')],
  [['PW', 'p-wav.', 'parallel-waves'], pattern('parallel-waves')],
  [['PT', 'p-saw.', 'parallel-sawteeth'], pattern('parallel-sawteeth')],
];

const BY_TOKEN = new Map<string, ShapeRef>(
  SHAPE_TABLE.flatMap(([tokens, shape]) => tokens.map((t): [string, ShapeRef] => [t, shape])),
);

/** Résout un jeton de forme, null s'il est inconnu */
export function lookupShape(token: string): ShapeRef | null {
  return BY_TOKEN.get(token) ?? null;
}

/** Ordre de tirage uniforme quand aucune combinaison n'est imposée */
export const TILING_KINDS: readonly TilingKind[] = [
  { kind: 'hexagons' },
  { kind: 'triangles' },
  { kind: 'hexagons-and-triangles' },
  { kind: 'squares-and-triangles' },
  { kind: 'rhombus' },
  { kind: 'delaunay' },
  { kind: 'pentagons', variant: 0 },
];

export const PATTERN_KINDS: readonly PatternKind[] = [
  'free-circles',
  'free-triangles',
  'free-stripes',
  'free-spirals',
  'concentric-circles',
  'parallel-stripes',
  'crossed-stripes',
  'parallel-waves',
  'parallel-sawteeth',
];
