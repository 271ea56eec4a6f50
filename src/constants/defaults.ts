/**
 * Valeurs par défaut de la résolution de configuration.
 *
 * Table unique injectée dans le résolveur (resolveSceneCfg(..., { defaults })),
 * pour que les tests puissent la surcharger sans état global.
 */

import { Color } from '@/lib/color';

export type PatternDefaults = {
  nbFreeCircles: number;
  nbFreeTriangles: number;
  nbFreeStripes: number;
  nbFreeSpirals: number;
  nbConcentricCircles: number;
  nbParallelStripes: number;
  nbCrossedStripes: number;
  nbParallelWaves: number;
  nbParallelSawteeth: number;
  varParallelStripes: number;
  varCrossedStripes: number;
  widthSpiral: number;
  widthStripe: number;
  widthWave: number;
  widthSawtooth: number;
  tightnessSpiral: number;
};

export type Defaults = {
  deviation: number;
  distance: number;
  /** Taille caractéristique des tuiles */
  size: number;
  width: number;
  height: number;
  nbDelaunay: number;
  lineWidth: number;
  lineColor: Color;
  /** Poids d'un élément de thème / de forme sans poids explicite */
  baseWeight: number;
  patterns: PatternDefaults;
};

export const DEFAULTS: Readonly<Defaults> = Object.freeze({
  deviation: 20,
  distance: 40,
  size: 15,
  width: 1000,
  height: 600,
  nbDelaunay: 1000,
  lineWidth: 1,
  lineColor: Color.black(),
  baseWeight: 10,
  patterns: Object.freeze({
    nbFreeCircles: 10,
    nbFreeTriangles: 15,
    nbFreeStripes: 7,
    nbFreeSpirals: 3,
    nbConcentricCircles: 5,
    nbParallelStripes: 15,
    nbCrossedStripes: 10,
    nbParallelWaves: 15,
    nbParallelSawteeth: 15,
    varParallelStripes: 15,
    varCrossedStripes: 10,
    widthSpiral: 0.3,
    widthStripe: 0.1,
    widthWave: 0.3,
    widthSawtooth: 0.3,
    tightnessSpiral: 0.5,
  }),
});

/** Seuil sous lequel le trait prend la couleur de remplissage */
export const STROKE_LIKE_FILL_EPS = 0.0001;

/** Épaisseur minimale du trait à la sérialisation */
export const MIN_STROKE_WIDTH = 0.1;
