import { readFile } from 'node:fs/promises';
import { parse } from 'smol-toml';
import type { PatternDefaults } from '@/constants/defaults';
import { errorMessage } from '@/core/errors';
import { asCount, asNumber, isArray, isString, isTable, type Table } from '@/lib/typeGuards';
import type { TilingFamily } from '@/types/scene';
import { consoleReporter, showValue, type ConfigReporter } from './report';

/**
 * Document de configuration brut, champ par champ optionnel.
 *
 * Les scalaires sont validés ici (type, signe); les couleurs, thèmes et formes
 * restent des valeurs TOML brutes, interprétées à la résolution parce qu'elles
 * se référencent entre elles. L'ordre des clés du document est conservé.
 */

export type GlobalSettings = {
  deviation?: number;
  /** `weight` est accepté comme ancien nom de `distance` */
  distance?: number;
  size?: number;
  width?: number;
  height?: number;
};

export type LineSettings = {
  width?: number;
  color?: unknown;
};

export type LinesSection = LineSettings & {
  perTiling: Partial<Record<TilingFamily, LineSettings>>;
};

export type TilingsSection = {
  sizes: Partial<Record<TilingFamily, number>>;
  nbDelaunay?: number;
};

export type ConfigEntry = {
  /** `HHMM-HHMM`, journée entière si absent */
  span?: string;
  weight?: number;
  themes: string[];
  shapes: string[];
  lineColor?: unknown;
};

export type NamedValue = [name: string, value: unknown];

export type MetaConfig = {
  global: GlobalSettings;
  lines: LinesSection;
  colors: NamedValue[];
  themes: NamedValue[];
  shapes: NamedValue[];
  patterns: Partial<PatternDefaults>;
  tilings: TilingsSection;
  entries: ConfigEntry[];
};

export function emptyMetaConfig(): MetaConfig {
  return {
    global: {},
    lines: { perTiling: {} },
    colors: [],
    themes: [],
    shapes: [],
    patterns: {},
    tilings: { sizes: {} },
    entries: [],
  };
}

/** Préfixes des réglages de trait par pavage (`hex_width`, `hex_color`...) */
const LINE_PREFIXES: ReadonlyArray<[prefix: string, family: TilingFamily]> = [
  ['del', 'delaunay'],
  ['hex', 'hexagons'],
  ['tri', 'triangles'],
  ['rho', 'rhombus'],
  ['hex_and_tri', 'hexagons-and-triangles'],
  ['squ_and_tri', 'squares-and-triangles'],
  ['pen', 'pentagons'],
];

const TILING_SIZES: ReadonlyArray<[key: string, family: TilingFamily]> = [
  ['size_hex', 'hexagons'],
  ['size_tri', 'triangles'],
  ['size_hex_and_tri', 'hexagons-and-triangles'],
  ['size_squ_and_tri', 'squares-and-triangles'],
  ['size_rho', 'rhombus'],
  ['size_pen', 'pentagons'],
];

type PatternKey = keyof PatternDefaults;

/** Clés de `[data.patterns]`: entiers (nb_*, var_*) ou flottants (width_*, tightness_*) */
const PATTERN_KEYS: ReadonlyArray<[key: string, field: PatternKey, integer: boolean]> = [
  ['nb_free_circles', 'nbFreeCircles', true],
  ['nb_free_triangles', 'nbFreeTriangles', true],
  ['nb_free_stripes', 'nbFreeStripes', true],
  ['nb_free_spirals', 'nbFreeSpirals', true],
  ['nb_concentric_circles', 'nbConcentricCircles', true],
  ['nb_parallel_stripes', 'nbParallelStripes', true],
  ['nb_crossed_stripes', 'nbCrossedStripes', true],
  ['nb_parallel_waves', 'nbParallelWaves', true],
  ['nb_parallel_sawteeth', 'nbParallelSawteeth', true],
  ['var_parallel_stripes', 'varParallelStripes', true],
  ['var_crossed_stripes', 'varCrossedStripes', true],
  ['width_spiral', 'widthSpiral', false],
  ['width_stripe', 'widthStripe', false],
  ['width_wave', 'widthWave', false],
  ['width_sawtooth', 'widthSawtooth', false],
  ['tightness_spiral', 'tightnessSpiral', false],
];

const SECTIONS = new Set(['global', 'lines', 'colors', 'themes', 'shapes', 'data', 'entry']);

type Check = 'count' | 'non-negative' | 'positive';

class SectionReader {
  constructor(
    private readonly table: Table,
    private readonly path: string,
    private readonly report: ConfigReporter,
  ) {}

  number(key: string, check: Check = 'non-negative'): number | undefined {
    const raw = this.table[key];
    if (raw === undefined) return undefined;
    const n = check === 'count' ? asCount(raw) : asNumber(raw);
    const ok = n !== null && (check === 'positive' ? n > 0 : n >= 0);
    if (n === null || !ok) {
      const expected = check === 'count' ? 'a non-negative integer' : check === 'positive' ? 'a positive number' : 'a non-negative number';
      this.report({ path: `${this.path}.${key}`, message: `expected ${expected}, got ${showValue(raw)}` });
      return undefined;
    }
    return n;
  }

  string(key: string): string | undefined {
    const raw = this.table[key];
    if (raw === undefined) return undefined;
    if (isString(raw)) return raw;
    this.report({ path: `${this.path}.${key}`, message: `expected a string, got ${showValue(raw)}` });
    return undefined;
  }

  /** Liste de noms; une chaîne seule vaut une liste d'un élément */
  names(key: string): string[] {
    const raw = this.table[key];
    if (raw === undefined) return [];
    if (isString(raw)) return [raw];
    if (isArray(raw)) {
      const names = raw.filter(isString);
      if (names.length !== raw.length) {
        this.report({ path: `${this.path}.${key}`, message: 'non-string names ignored' });
      }
      return names;
    }
    this.report({ path: `${this.path}.${key}`, message: 'expected a list of names' });
    return [];
  }
}

function section(doc: Table, key: string, report: ConfigReporter): Table | null {
  const raw = doc[key];
  if (raw === undefined) return null;
  if (isTable(raw)) return raw;
  report({ path: key, message: 'expected a table, section ignored' });
  return null;
}

function readGlobal(t: Table, report: ConfigReporter): GlobalSettings {
  const r = new SectionReader(t, 'global', report);
  return {
    deviation: r.number('deviation', 'count'),
    distance: r.number('distance', 'count') ?? r.number('weight', 'count'),
    size: r.number('size', 'positive'),
    width: r.number('width', 'positive'),
    height: r.number('height', 'positive'),
  };
}

function readLines(t: Table, report: ConfigReporter): LinesSection {
  const r = new SectionReader(t, 'lines', report);
  const perTiling: Partial<Record<TilingFamily, LineSettings>> = {};
  for (const [prefix, family] of LINE_PREFIXES) {
    const width = r.number(`${prefix}_width`);
    const color = t[`${prefix}_color`];
    if (width !== undefined || color !== undefined) perTiling[family] = { width, color };
  }
  return { width: r.number('width'), color: t['color'], perTiling };
}

function readPatterns(t: Table, report: ConfigReporter): Partial<PatternDefaults> {
  const r = new SectionReader(t, 'data.patterns', report);
  const out: Partial<PatternDefaults> = {};
  for (const [key, field, integer] of PATTERN_KEYS) {
    const n = r.number(key, integer ? 'count' : 'non-negative');
    if (n !== undefined) out[field] = n;
  }
  return out;
}

function readTilings(t: Table, report: ConfigReporter): TilingsSection {
  const r = new SectionReader(t, 'data.tilings', report);
  const sizes: Partial<Record<TilingFamily, number>> = {};
  for (const [key, family] of TILING_SIZES) {
    const n = r.number(key, 'positive');
    if (n !== undefined) sizes[family] = n;
  }
  return { sizes, nbDelaunay: r.number('nb_delaunay', 'count') };
}

function readEntries(raw: unknown, report: ConfigReporter): ConfigEntry[] {
  if (!isArray(raw)) {
    report({ path: 'entry', message: 'expected an array of tables ([[entry]]), section ignored' });
    return [];
  }
  const entries: ConfigEntry[] = [];
  raw.forEach((item, i) => {
    const path = `entry[${i}]`;
    if (!isTable(item)) {
      report({ path, message: 'expected a table, entry ignored' });
      return;
    }
    const r = new SectionReader(item, path, report);
    entries.push({
      span: r.string('span'),
      weight: r.number('distance', 'count') ?? r.number('weight', 'count'),
      themes: r.names('themes'),
      shapes: r.names('shapes'),
      lineColor: item['line_color'],
    });
  });
  return entries;
}

function namedValues(t: Table | null): NamedValue[] {
  return t ? Object.entries(t) : [];
}

/** Interprète un document déjà décodé (table racine TOML) */
export function metaConfigFromTable(doc: Table, report: ConfigReporter = consoleReporter): MetaConfig {
  for (const key of Object.keys(doc)) {
    if (!SECTIONS.has(key)) report({ path: key, message: 'unknown section ignored' });
  }

  const cfg = emptyMetaConfig();
  const global = section(doc, 'global', report);
  if (global) cfg.global = readGlobal(global, report);
  const lines = section(doc, 'lines', report);
  if (lines) cfg.lines = readLines(lines, report);
  cfg.colors = namedValues(section(doc, 'colors', report));
  cfg.themes = namedValues(section(doc, 'themes', report));
  cfg.shapes = namedValues(section(doc, 'shapes', report));

  const data = section(doc, 'data', report);
  if (data) {
    const patterns = section(data, 'patterns', (issue) => report({ ...issue, path: `data.${issue.path}` }));
    if (patterns) cfg.patterns = readPatterns(patterns, report);
    const tilings = section(data, 'tilings', (issue) => report({ ...issue, path: `data.${issue.path}` }));
    if (tilings) cfg.tilings = readTilings(tilings, report);
  }

  if (doc['entry'] !== undefined) cfg.entries = readEntries(doc['entry'], report);
  return cfg;
}

/**
 * Décode un document TOML. Un document illisible vaut un document vide
 * (toutes valeurs par défaut) et est signalé.
 */
export function parseMetaConfig(src: string, report: ConfigReporter = consoleReporter): MetaConfig {
  let doc: unknown;
  try {
    doc = parse(src);
  } catch (err) {
    report({ path: '', message: `invalid TOML, using defaults (${errorMessage(err)})` });
    return emptyMetaConfig();
  }
  return isTable(doc) ? metaConfigFromTable(doc, report) : emptyMetaConfig();
}

/**
 * Lit un fichier de configuration. Fichier absent ou illisible: document vide, signalé.
 */
export async function loadMetaConfig(path: string, report: ConfigReporter = consoleReporter): Promise<MetaConfig> {
  let src: string;
  try {
    src = await readFile(path, 'utf8');
  } catch (err) {
    report({ path: '', message: `can't read ${path}, using defaults (${errorMessage(err)})` });
    return emptyMetaConfig();
  }
  return parseMetaConfig(src, report);
}
