import { lookupShape } from '@/constants/shapes';
import { Chooser, type Weighted } from '@/lib/chooser';
import { Color } from '@/lib/color';
import { Salt, type SaltItem } from '@/lib/salt';
import { asCount, asNumber, isArray, isString, isTable, type Table } from '@/lib/typeGuards';
import type { PatternKind, Theme, ThemeItem, TilingKind } from '@/types/scene';
import type { NamedValue } from './metaConfig';
import { showValue, type ConfigReporter } from './report';

export type ColorDict = ReadonlyMap<string, Color>;
export type ThemeDict = ReadonlyMap<string, Theme>;

/** Combinaison de formes: pavages et motifs tirés indépendamment */
export type ShapeCombo = {
  tilings: Chooser<TilingKind>;
  patterns: Chooser<PatternKind>;
};
export type ShapeDict = ReadonlyMap<string, ShapeCombo>;

const COLOR_HINT = 'use [0, 0, 255] or "#0000FF"';

/** Poids provisoire, remplacé par le poids de base configuré */
const BASE_WEIGHT_UNSET = -1;

/**
 * Couleur littérale: nom du dictionnaire, puis `#RRGGBB`, puis `[r, g, b]` entiers.
 * null si la valeur n'est pas une couleur.
 */
export function colorFromValue(val: unknown, dict: ColorDict): Color | null {
  if (isString(val)) return dict.get(val) ?? Color.fromHex(val);
  if (isArray(val) && val.length === 3) {
    const [r, g, b] = val.map(asNumber);
    if (r !== null && g !== null && b !== null && [r, g, b].every(Number.isInteger)) {
      return new Color(r, g, b);
    }
  }
  return null;
}

/** Dictionnaire des couleurs nommées; une entrée peut citer une entrée précédente */
export function buildColors(entries: readonly NamedValue[], report: ConfigReporter): Map<string, Color> {
  const colors = new Map<string, Color>();
  for (const [name, val] of entries) {
    const c = colorFromValue(val, colors);
    if (c) colors.set(name, c);
    else report({ path: `colors.${name}`, message: `${showValue(val)} is not a valid color, ${COLOR_HINT}` });
  }
  return colors;
}

/** Entier positif ou nul écrit après un préfixe de jeton (`x5`, `~10`, `!40`) */
function tokenNumber(raw: string): number | null {
  return /^\d+$/.test(raw) ? Number(raw) : null;
}

function nonNegative(val: unknown): number | undefined {
  return asCount(val) ?? undefined;
}

function themeItemFromString(s: string, colors: ColorDict, report: ConfigReporter, path: string): Weighted<ThemeItem> {
  const item: ThemeItem = { color: Color.black(), salt: Salt.none() };
  let weight = BASE_WEIGHT_UNSET;
  for (const token of s.split(' ')) {
    if (token === '') continue;
    const head = token[0];
    const n = tokenNumber(token.slice(1));
    if (head === 'x' || head === '~' || head === '!') {
      if (n === null) {
        report({ path, message: `${JSON.stringify(token)} has no valid number, ignored` });
        continue;
      }
      if (head === 'x') weight = n;
      else if (head === '~') item.deviation = n;
      else item.distance = n;
      continue;
    }
    const c = colorFromValue(token, colors);
    if (c) item.color = c;
    else report({ path, message: `${JSON.stringify(token)} is not a valid color, ${COLOR_HINT}` });
  }
  return [item, weight];
}

function saltFromValue(val: unknown, colors: ColorDict, report: ConfigReporter, path: string): Salt {
  if (val === undefined) return Salt.none();
  if (!isArray(val)) {
    report({ path, message: 'salt must be an array of tables, ignored' });
    return Salt.none();
  }
  const items: SaltItem[] = [];
  for (const entry of val) {
    if (!isTable(entry)) {
      report({ path, message: `${showValue(entry)} is not a salt table, ignored` });
      continue;
    }
    const color = entry['color'] === undefined ? Color.black() : colorFromValue(entry['color'], colors);
    if (!color) report({ path, message: `${showValue(entry['color'])} is not a valid color, ${COLOR_HINT}` });
    items.push({
      color: color ?? Color.black(),
      likeliness: asNumber(entry['likeliness']) ?? 1,
      variability: nonNegative(entry['variability']) ?? 0,
    });
  }
  return new Salt(items);
}

function themeItemFromTable(t: Table, colors: ColorDict, report: ConfigReporter, path: string): Weighted<ThemeItem> {
  let color = Color.black();
  if (t['color'] !== undefined) {
    const c = colorFromValue(t['color'], colors);
    if (c) color = c;
    else report({ path, message: `${showValue(t['color'])} is not a valid color, ${COLOR_HINT}` });
  }
  const weight = asNumber(t['weight']);
  return [
    {
      color,
      deviation: nonNegative(t['variability']),
      distance: nonNegative(t['distance']),
      salt: saltFromValue(t['salt'], colors, report, `${path}.salt`),
    },
    weight === null ? BASE_WEIGHT_UNSET : Math.max(0, weight),
  ];
}

/**
 * Élément de thème et son poids: chaîne de jetons ou table structurée.
 * Une valeur illisible donne du noir au poids de base.
 */
export function themeItemFromValue(
  val: unknown,
  colors: ColorDict,
  baseWeight: number,
  report: ConfigReporter,
  path: string,
): Weighted<ThemeItem> {
  let parsed: Weighted<ThemeItem>;
  if (isString(val)) parsed = themeItemFromString(val, colors, report, path);
  else if (isTable(val)) parsed = themeItemFromTable(val, colors, report, path);
  else {
    report({ path, message: `${showValue(val)} is not a valid theme item` });
    parsed = [{ color: Color.black(), salt: Salt.none() }, BASE_WEIGHT_UNSET];
  }
  const [item, weight] = parsed;
  return [item, weight === BASE_WEIGHT_UNSET ? baseWeight : weight];
}

/**
 * Thème: nom d'un thème précédent, élément unique (chaîne ou table),
 * ou tableau d'éléments et de noms de thèmes (aplatis).
 */
export function themeFromValue(
  val: unknown,
  colors: ColorDict,
  themes: ThemeDict,
  baseWeight: number,
  report: ConfigReporter,
  path: string,
): Theme {
  const theme = new Chooser<ThemeItem>();
  const items = isArray(val) ? val : [val];
  items.forEach((x, i) => {
    const ref = isString(x) ? themes.get(x) : undefined;
    if (ref) theme.append(ref.extract());
    else {
      const [item, weight] = themeItemFromValue(x, colors, baseWeight, report, isArray(val) ? `${path}[${i}]` : path);
      theme.push(item, weight);
    }
  });
  return theme;
}

export function buildThemes(
  entries: readonly NamedValue[],
  colors: ColorDict,
  baseWeight: number,
  report: ConfigReporter,
): Map<string, Theme> {
  const themes = new Map<string, Theme>();
  for (const [name, val] of entries) {
    themes.set(name, themeFromValue(val, colors, themes, baseWeight, report, `themes.${name}`));
  }
  return themes;
}

function addShape(combo: ShapeCombo, token: string, weight: number, report: ConfigReporter, path: string): void {
  const shape = lookupShape(token);
  if (!shape) {
    report({ path, message: `${JSON.stringify(token)} is not recognized as a shape` });
    return;
  }
  if (shape.type === 'tiling') combo.tilings.push(shape.tiling, weight);
  else combo.patterns.push(shape.pattern, weight);
}

/**
 * Combinaison de formes: tableau de jetons, de paires `[jeton, poids]`
 * ou de noms de combinaisons précédentes.
 */
export function shapesFromValue(
  val: unknown,
  shapes: ShapeDict,
  baseWeight: number,
  report: ConfigReporter,
  path: string,
): ShapeCombo {
  const combo: ShapeCombo = { tilings: new Chooser(), patterns: new Chooser() };
  if (!isArray(val)) {
    report({ path, message: `${showValue(val)} is not an array of shapes` });
    return combo;
  }
  for (const x of val) {
    if (isString(x)) {
      const ref = shapes.get(x);
      if (ref) {
        combo.tilings.append(ref.tilings.extract());
        combo.patterns.append(ref.patterns.extract());
      } else addShape(combo, x, baseWeight, report, path);
      continue;
    }
    if (isArray(x) && x.length === 2) {
      const [token, w] = x;
      const weight = asNumber(w);
      if (isString(token) && weight !== null && weight > 0) {
        addShape(combo, token, weight, report, path);
        continue;
      }
    }
    report({ path, message: `${showValue(x)} is not a valid shape` });
  }
  return combo;
}

export function buildShapes(entries: readonly NamedValue[], baseWeight: number, report: ConfigReporter): Map<string, ShapeCombo> {
  const shapes = new Map<string, ShapeCombo>();
  for (const [name, val] of entries) {
    shapes.set(name, shapesFromValue(val, shapes, baseWeight, report, `shapes.${name}`));
  }
  return shapes;
}
