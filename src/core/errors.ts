/**
 * Erreurs de génération.
 *
 * - Défauts de configuration: jamais levés, signalés via ConfigReporter (voir config/report.ts)
 * - Défauts de géométrie: MalformedIntersectionError, fatal pour la génération en cours
 * - Défauts d'E/S: GenerationError et ses sous-classes, remontés à l'appelant
 */

export class MalformedIntersectionError extends Error {
  readonly determinant: number;

  constructor(determinant: number) {
    super(`Malformed intersection (determinant ${determinant})`);
    this.name = 'MalformedIntersectionError';
    this.determinant = determinant;
  }
}

export type GenerationErrorKind = 'artifact' | 'image';

export abstract class GenerationError extends Error {
  abstract readonly kind: GenerationErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** L'artefact vectoriel/raster n'a pas pu être produit ou écrit. */
export class ArtifactError extends GenerationError {
  readonly kind = 'artifact';

  constructor(detail: string, options?: { cause?: unknown }) {
    super(`can't save the generated image: ${detail}`, options);
  }
}

/** Une image n'a pas pu être ouverte ou décodée. */
export class ImageOpenError extends GenerationError {
  readonly kind = 'image';

  constructor(detail: string, options?: { cause?: unknown }) {
    super(`can't open image: ${detail}`, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
