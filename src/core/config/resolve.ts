import { DEFAULTS, type Defaults, type PatternDefaults } from '@/constants/defaults';
import { PATTERN_KINDS, TILING_KINDS } from '@/constants/shapes';
import { Chooser } from '@/lib/chooser';
import { Color } from '@/lib/color';
import { frameOfSize } from '@/lib/geom/frame';
import type { Rng } from '@/lib/random';
import { Salt } from '@/lib/salt';
import type { PatternKind, PatternPlan, SceneCfg, Theme, ThemeItem, TilingKind, TilingPlan } from '@/types/scene';
import { cascade, resolve } from './cascade';
import { chooseThemeShapes } from './entries';
import type { MetaConfig } from './metaConfig';
import { consoleReporter, showValue, type ConfigReporter } from './report';
import { buildColors, buildShapes, buildThemes, colorFromValue, type ColorDict } from './values';

export type ResolveOptions = {
  /** Heure HHMM servant à filtrer les entrées `[[entry]]` */
  time: number;
  defaults?: Readonly<Defaults>;
  report?: ConfigReporter;
};

type PatternFields = {
  count: keyof PatternDefaults;
  width?: keyof PatternDefaults;
  variation?: keyof PatternDefaults;
  tightness?: keyof PatternDefaults;
};

/** Réglages lus pour chaque famille de motifs; les autres champs valent 0 */
const PATTERN_FIELDS: Record<PatternKind, PatternFields> = {
  'free-circles': { count: 'nbFreeCircles' },
  'free-triangles': { count: 'nbFreeTriangles' },
  'free-stripes': { count: 'nbFreeStripes', width: 'widthStripe' },
  'free-spirals': { count: 'nbFreeSpirals', width: 'widthSpiral', tightness: 'tightnessSpiral' },
  'concentric-circles': { count: 'nbConcentricCircles' },
  'parallel-stripes': { count: 'nbParallelStripes', variation: 'varParallelStripes' },
  'crossed-stripes': { count: 'nbCrossedStripes', width: 'widthStripe', variation: 'varCrossedStripes' },
  'parallel-waves': { count: 'nbParallelWaves', width: 'widthWave' },
  'parallel-sawteeth': { count: 'nbParallelSawteeth', width: 'widthSawtooth' },
};

const PENTAGON_VARIANTS = [1, 2, 3, 4, 5, 6] as const;

export function patternPlan(kind: PatternKind, overrides: Partial<PatternDefaults>, defaults: PatternDefaults): PatternPlan {
  const fields = PATTERN_FIELDS[kind];
  const read = (field: keyof PatternDefaults | undefined) => (field ? resolve(overrides[field], undefined, defaults[field]) : 0);
  return {
    kind,
    count: read(fields.count),
    width: read(fields.width),
    variation: read(fields.variation),
    tightness: read(fields.tightness),
  };
}

/** Plan du pavage. Tirages: facteur de petite diagonale, sous-type, puis rotation */
function tilingPlan(tiling: TilingKind, meta: MetaConfig, size: number, defaults: Readonly<Defaults>, rng: Rng): TilingPlan {
  if (tiling.kind === 'delaunay') {
    return { kind: 'delaunay', points: resolve(meta.tilings.nbDelaunay, undefined, defaults.nbDelaunay) };
  }
  const tileSize = resolve(meta.tilings.sizes[tiling.kind], undefined, size);
  switch (tiling.kind) {
    case 'rhombus': {
      const shortDiagonal = (rng.float() * 0.6 + 0.4) * tileSize;
      return { kind: 'rhombus', size: tileSize, shortDiagonal, rotation: rng.range(0, 360) };
    }
    case 'pentagons': {
      const variant = tiling.variant === 0 ? PENTAGON_VARIANTS[rng.range(0, PENTAGON_VARIANTS.length)] : tiling.variant;
      return { kind: 'pentagons', variant, size: tileSize, rotation: rng.range(0, 360) };
    }
    default:
      return { kind: tiling.kind, size: tileSize, rotation: rng.range(0, 360) };
  }
}

function lineSettings(
  meta: MetaConfig,
  tiling: TilingKind,
  override: unknown,
  colors: ColorDict,
  defaults: Readonly<Defaults>,
  report: ConfigReporter,
): { lineWidth: number; lineColor: Color } {
  const { lines } = meta;
  const perTiling = lines.perTiling[tiling.kind];

  const parse = (val: unknown, path: string): Color | null => {
    if (val === undefined) return null;
    const c = colorFromValue(val, colors);
    if (!c) report({ path, message: `${showValue(val)} is not a valid line color` });
    return c;
  };

  return {
    lineWidth: cascade([perTiling?.width, lines.width], defaults.lineWidth),
    lineColor: cascade(
      [parse(override, 'entry.line_color'), parse(perTiling?.color, `lines[${tiling.kind}].color`), parse(lines.color, 'lines.color')],
      defaults.lineColor,
    ),
  };
}

/**
 * Résout le document en descripteur de génération complet.
 *
 * Ordre des tirages: entrée horaire (entrée, thème, formes), pavage, motif,
 * thème de secours, choix de thème par défaut, plan du pavage.
 * Aucun défaut de configuration n'est levé: il est signalé et remplacé.
 */
export function resolveSceneCfg(meta: MetaConfig, rng: Rng, options: ResolveOptions): SceneCfg {
  const defaults = options.defaults ?? DEFAULTS;
  const report = options.report ?? consoleReporter;
  const { global } = meta;

  const deviation = resolve(global.deviation, undefined, defaults.deviation);
  const distance = resolve(global.distance, undefined, defaults.distance);
  const size = resolve(global.size, undefined, defaults.size);
  const width = resolve(global.width, undefined, defaults.width);
  const height = resolve(global.height, undefined, defaults.height);

  const colors = buildColors(meta.colors, report);
  const themes = buildThemes(meta.themes, colors, defaults.baseWeight, report);
  const shapes = buildShapes(meta.shapes, defaults.baseWeight, report);

  const selection = chooseThemeShapes(meta.entries, rng, options.time, defaults.baseWeight);

  const combo = shapes.get(selection.shapes);
  const tiling = combo?.tilings.choose(rng) ?? chooseTilingKind(rng);
  const pattern = combo?.patterns.choose(rng) ?? choosePatternKind(rng);

  if (themes.size === 0) {
    const names = [...colors.keys()];
    const name = rng.pick(names);
    const color = name === undefined ? Color.random(rng) : (colors.get(name) ?? Color.black());
    themes.set('-default-', new Chooser<ThemeItem>([[{ color, salt: Salt.none() }, defaults.baseWeight]]));
  }

  const theme = themes.get(selection.theme) ?? pickTheme(themes, rng);
  const plan = tilingPlan(tiling, meta, size, defaults, rng);
  const { lineWidth, lineColor } = lineSettings(meta, tiling, selection.lineColor, colors, defaults, report);

  return {
    deviation,
    distance,
    frame: frameOfSize(width, height),
    tiling: plan,
    pattern: patternPlan(pattern, meta.patterns, defaults.patterns),
    lineWidth,
    lineColor,
    theme,
  };
}

function pickTheme(themes: ReadonlyMap<string, Theme>, rng: Rng): Theme {
  const name = rng.pick([...themes.keys()]);
  return (name === undefined ? undefined : themes.get(name)) ?? new Chooser<ThemeItem>();
}

export function chooseTilingKind(rng: Rng): TilingKind {
  return rng.pick(TILING_KINDS) ?? { kind: 'hexagons' };
}

export function choosePatternKind(rng: Rng): PatternKind {
  return rng.pick(PATTERN_KINDS) ?? 'free-circles';
}
