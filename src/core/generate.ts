import { writeFile } from 'node:fs/promises';
import { decode, encode } from 'blurhash';
import sharp from 'sharp';
import { MIN_STROKE_WIDTH, STROKE_LIKE_FILL_EPS, type Defaults } from '@/constants/defaults';
import { addTrace } from '@/lib/debug/generationTrace';
import { incGeneration, incGenerationFailure, setLastGeneration } from '@/lib/metrics';
import { randomSeed, Rng } from '@/lib/random';
import type { Seed } from '@/types/scene';
import { timeOfSeed } from './config/entries';
import { emptyMetaConfig, type MetaConfig } from './config/metaConfig';
import type { ConfigReporter } from './config/report';
import { resolveSceneCfg } from './config/resolve';
import { ArtifactError, errorMessage, ImageOpenError, MalformedIntersectionError } from './errors';
import { Scene } from './scene';
import { Document, Path } from './svg/document';
import { makeTiling, type Tile } from './tiling';

/** Grille de composantes BlurHash et contraste au décodage */
export const BLURHASH_COMPONENTS = { x: 4, y: 3 } as const;
export const BLURHASH_PUNCH = 1.2;

export type BuildOptions = {
  /** Heure HHMM imposée; par défaut dérivée de la graine */
  time?: number;
  defaults?: Readonly<Defaults>;
  report?: ConfigReporter;
};

/**
 * Construit le document vectoriel d'une graine. Pur: aucune E/S.
 *
 * Ordre des tirages: résolution de la configuration, scène (fond, régions,
 * recettes), pavage, puis une couleur par tuile dans l'ordre du pavage.
 * @throws MalformedIntersectionError sur une singularité du pavage
 */
export function buildDocument(seed: Seed, meta: MetaConfig, options: BuildOptions = {}): Document {
  const started = performance.now();
  const rng = Rng.fromSeed(seed);
  const time = options.time ?? timeOfSeed(seed);
  const cfg = resolveSceneCfg(meta, rng, { time, defaults: options.defaults, report: options.report });
  const scene = Scene.build(cfg, rng);

  let tiles: Tile[];
  try {
    tiles = makeTiling(cfg.frame, cfg.tiling, rng);
  } catch (err) {
    if (err instanceof MalformedIntersectionError) incGenerationFailure('geometry');
    throw err;
  }

  const doc = new Document(cfg.frame);
  const strokeLikeFill = cfg.lineWidth < STROKE_LIKE_FILL_EPS;
  const strokeWidth = Math.max(cfg.lineWidth, MIN_STROKE_WIDTH);
  let tilesInRegions = 0;
  for (const tile of tiles) {
    const { color, region } = scene.sample(tile.anchor, rng);
    if (region >= 0) tilesInRegions++;
    doc.add(new Path(tile.points, color, strokeLikeFill ? color : cfg.lineColor, strokeWidth));
  }

  const durationMs = performance.now() - started;
  incGeneration(cfg.tiling.kind, cfg.pattern.kind);
  setLastGeneration(tiles.length, scene.regions.length, durationMs);
  addTrace({
    seed: seed.toString(),
    time,
    tiling: cfg.tiling.kind,
    pattern: cfg.pattern.kind,
    frame: { w: cfg.frame.w, h: cfg.frame.h },
    regions: scene.regions.length,
    tiles: tiles.length,
    tilesInRegions,
    durationMs,
  });
  return doc;
}

export type ArtifactFormat = 'svg' | 'png';

/** Format d'après l'extension (`.svg`, `.png`, éventuellement suivis de `.tmp`) */
export function artifactFormat(dest: string): ArtifactFormat | null {
  const name = dest.toLowerCase().replace(/\.tmp$/, '');
  if (name.endsWith('.svg')) return 'svg';
  if (name.endsWith('.png')) return 'png';
  return null;
}

async function writeArtifact(dest: string, data: string | Buffer): Promise<void> {
  try {
    await writeFile(dest, data);
  } catch (err) {
    throw new ArtifactError(`${dest}: ${errorMessage(err)}`, { cause: err });
  }
}

/**
 * Écrit le document: texte SVG ou raster PNG selon l'extension.
 * @throws ArtifactError extension non prise en charge, rendu ou écriture impossible
 */
export async function saveDocument(doc: Document, dest: string): Promise<void> {
  const format = artifactFormat(dest);
  if (!format) throw new ArtifactError(`unsupported extension for ${dest} (expected .svg or .png)`);

  const svg = doc.toSvg();
  if (format === 'svg') {
    await writeArtifact(dest, svg);
    return;
  }
  let png: Buffer;
  try {
    png = await sharp(Buffer.from(svg)).png().toBuffer();
  } catch (err) {
    throw new ArtifactError(`rendering failed: ${errorMessage(err)}`, { cause: err });
  }
  await writeArtifact(dest, png);
}

type Rgba = { pixels: Uint8ClampedArray; width: number; height: number };

async function openRgba(path: string): Promise<Rgba> {
  try {
    const { data, info } = await sharp(path).ensureAlpha().raw().toBuffer({ resolveWithObject: true });
    return {
      pixels: new Uint8ClampedArray(data.buffer, data.byteOffset, data.length),
      width: info.width,
      height: info.height,
    };
  } catch (err) {
    throw new ImageOpenError(`${path}: ${errorMessage(err)}`, { cause: err });
  }
}

export type GenerateRequest = {
  /** Graine 64 bits; aléatoire si absente */
  seed?: Seed;
  /** Image générée: `.svg` ou `.png` */
  genDest: string;
  /** Aperçu flou décodé du BlurHash: `.png` uniquement */
  blurDest: string;
  meta?: MetaConfig;
  time?: number;
  report?: ConfigReporter;
};

export type GenerateResult = {
  seed: Seed;
  blurhash: string;
};

/**
 * Génère l'image, calcule son BlurHash et écrit l'aperçu flou.
 * @throws ArtifactError | ImageOpenError | MalformedIntersectionError
 */
export async function generateImages(req: GenerateRequest): Promise<GenerateResult> {
  if (artifactFormat(req.blurDest) !== 'png') {
    throw new ArtifactError(`unsupported extension for ${req.blurDest} (expected .png)`);
  }
  const seed = req.seed ?? randomSeed();
  const doc = buildDocument(seed, req.meta ?? emptyMetaConfig(), { time: req.time, report: req.report });

  try {
    await saveDocument(doc, req.genDest);
    const { pixels, width, height } = await openRgba(req.genDest);
    const blurhash = encode(pixels, width, height, BLURHASH_COMPONENTS.x, BLURHASH_COMPONENTS.y);

    const preview = decode(blurhash, width, height, BLURHASH_PUNCH);
    let png: Buffer;
    try {
      png = await sharp(preview, { raw: { width, height, channels: 4 } }).png().toBuffer();
    } catch (err) {
      throw new ArtifactError(`blur preview: ${errorMessage(err)}`, { cause: err });
    }
    await writeArtifact(req.blurDest, png);

    console.info(`[generate] seed=${seed} blurhash=${blurhash}`);
    return { seed, blurhash };
  } catch (err) {
    if (err instanceof ArtifactError) incGenerationFailure('artifact');
    else if (err instanceof ImageOpenError) incGenerationFailure('image');
    throw err;
  }
}
