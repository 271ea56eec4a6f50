import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { addTrace, clearTraces, getAllTraces, getRecentTraces, type GenerationTraceEntry } from './generationTrace';

const entry = (seed: string): Omit<GenerationTraceEntry, 'traceId' | 'timestamp'> => ({
  seed,
  time: 1430,
  tiling: 'hexagons',
  pattern: 'free-circles',
  frame: { w: 100, h: 60 },
  regions: 4,
  tiles: 90,
  tilesInRegions: 12,
  durationMs: 1,
});

describe('generationTrace', () => {
  beforeEach(() => clearTraces());
  afterEach(() => vi.unstubAllEnvs());

  it('records nothing unless debug is enabled', () => {
    vi.stubEnv('PAVAGE_DEBUG', 'false');
    addTrace(entry('1'));
    expect(getAllTraces()).toEqual([]);
  });

  it('records with debug enabled or when forced', () => {
    vi.stubEnv('PAVAGE_DEBUG', 'true');
    addTrace(entry('1'));
    vi.stubEnv('PAVAGE_DEBUG', 'false');
    addTrace(entry('2'), true);
    expect(getAllTraces().map((t) => [t.traceId, t.seed])).toEqual([
      [1, '1'],
      [2, '2'],
    ]);
  });

  it('keeps the 50 most recent traces', () => {
    for (let i = 0; i < 55; i++) addTrace(entry(String(i)), true);
    const all = getAllTraces();
    expect(all).toHaveLength(50);
    expect(all[0].seed).toBe('5');
    expect(getRecentTraces(2).map((t) => t.seed)).toEqual(['53', '54']);
  });
});
