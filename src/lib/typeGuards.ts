/**
 * Type guards pour restreindre les valeurs `unknown` issues du document TOML.
 *
 * @see https://www.typescriptlang.org/docs/handbook/2/narrowing.html#using-type-predicates
 */

export type Table = { [key: string]: unknown };

/**
 * Table TOML (objet simple): ni tableau, ni date, ni null.
 *
 * @example
 * const lines = doc['lines'];
 * if (!isTable(lines)) return;
 * lines['width']; // unknown, à restreindre à son tour
 */
export function isTable(x: unknown): x is Table {
  return typeof x === 'object' && x !== null && !Array.isArray(x) && !(x instanceof Date);
}

export function isArray(x: unknown): x is unknown[] {
  return Array.isArray(x);
}

export function isString(x: unknown): x is string {
  return typeof x === 'string';
}

/**
 * Nombre fini (entier ou flottant TOML, bigint compris), null sinon.
 */
export function asNumber(x: unknown): number | null {
  if (typeof x === 'bigint') return Number(x);
  if (typeof x === 'number' && Number.isFinite(x)) return x;
  return null;
}

/** Entier positif ou nul, null sinon */
export function asCount(x: unknown): number | null {
  const n = asNumber(x);
  return n !== null && Number.isInteger(n) && n >= 0 ? n : null;
}
