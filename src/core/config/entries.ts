import { Chooser } from '@/lib/chooser';
import type { Rng } from '@/lib/random';
import type { ConfigEntry } from './metaConfig';

export type Span = { start: number; end: number };

export const FULL_DAY: Readonly<Span> = Object.freeze({ start: 0, end: 2400 });

/**
 * `HHMM-HHMM` → bornes incluses. Une borne absente ou illisible prend
 * sa valeur de journée entière (0 ou 2400).
 */
export function parseSpan(raw: string | undefined): Span {
  if (raw === undefined) return { ...FULL_DAY };
  const [start, end] = raw.split('-');
  const read = (s: string | undefined, fallback: number) => (s !== undefined && /^\d+$/.test(s.trim()) ? Number(s.trim()) : fallback);
  return { start: read(start, FULL_DAY.start), end: read(end, FULL_DAY.end) };
}

/**
 * Heure HHMM associée à une graine: la graine elle-même si elle se lit
 * comme une heure valide, sinon la graine modulo une journée, en minutes.
 */
export function timeOfSeed(seed: bigint): number {
  if (seed < 2400n) {
    const n = Number(seed);
    if (Math.floor(n / 100) < 24 && n % 100 < 60) return n;
  }
  const minutes = Number(seed % 1440n);
  return Math.floor(minutes / 60) * 100 + (minutes % 60);
}

export type EntrySelection = {
  theme: string;
  shapes: string;
  /** Couleur de trait imposée par l'entrée, valeur brute */
  lineColor: unknown;
};

const NO_SELECTION: EntrySelection = { theme: '', shapes: '', lineColor: undefined };

/**
 * Parmi les entrées dont la plage contient `time`, en tire une selon son poids,
 * puis un nom de thème et un nom de combinaison de formes dans ses listes.
 */
export function chooseThemeShapes(entries: readonly ConfigEntry[], rng: Rng, time: number, baseWeight: number): EntrySelection {
  if (entries.length === 0) return NO_SELECTION;

  const valid = new Chooser<ConfigEntry>();
  for (const e of entries) {
    const { start, end } = parseSpan(e.span);
    if (start <= time && time <= end) valid.push(e, e.weight ?? baseWeight);
  }

  const chosen = valid.choose(rng);
  if (!chosen) return NO_SELECTION;
  return {
    theme: rng.pick(chosen.themes) ?? '',
    shapes: rng.pick(chosen.shapes) ?? '',
    lineColor: chosen.lineColor,
  };
}
