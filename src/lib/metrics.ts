// Compteurs et jauges du processus (générations, tuiles, régions)
type Ctx = { [k: string]: number };
const ctx: Ctx = Object.create(null);

export function inc(key: string, by = 1) {
  ctx[key] = (ctx[key] ?? 0) + by;
}

export function setGauge(key: string, v: number) {
  ctx[key] = v;
}

export function getAll(): Record<string, number> {
  return { ...ctx };
}

export function reset() {
  for (const k of Object.keys(ctx)) delete ctx[k];
}

// Helpers de suivi des générations
export function incGeneration(tiling: string, pattern: string) {
  inc('generation_total');
  inc(`generation_total{tiling=${tiling}}`);
  inc(`generation_total{pattern=${pattern}}`);
}

export function incGenerationFailure(kind: 'geometry' | 'artifact' | 'image') {
  inc(`generation_failure_total{kind=${kind}}`);
}

export function setLastGeneration(tiles: number, regions: number, ms: number) {
  setGauge('last_generation_tiles', tiles);
  setGauge('last_generation_regions', regions);
  setGauge('last_generation_ms', ms);
}
