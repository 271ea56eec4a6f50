/**
 * Précédence des valeurs optionnelles: la première couche définie l'emporte,
 * la constante ferme la chaîne.
 *
 * @example
 * cascade([perTiling.width, lines.width], defaults.lineWidth)
 */
export function cascade<T>(layers: ReadonlyArray<T | null | undefined>, hard: T): T {
  for (const layer of layers) {
    if (layer !== undefined && layer !== null) return layer;
  }
  return hard;
}

/** Valeur explicite, sinon défaut de section, sinon constante */
export function resolve<T>(value: T | null | undefined, parent: T | null | undefined, hard: T): T {
  return cascade([value, parent], hard);
}
