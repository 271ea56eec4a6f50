/**
 * Trace des générations (debug uniquement, PAVAGE_DEBUG=true)
 */

import { isDebugEnabled } from '@/lib/env';
import type { PatternKind, TilingFamily } from '@/types/scene';

/**
 * Entrée de trace pour une génération
 */
export interface GenerationTraceEntry {
  traceId: number;
  timestamp: number;
  seed: string;
  /** Valeur HHMM utilisée pour filtrer les entrées horaires */
  time: number;

  tiling: TilingFamily;
  pattern: PatternKind;
  frame: { w: number; h: number };

  regions: number;
  tiles: number;
  /** Tuiles colorées par une région (le reste prend le fond) */
  tilesInRegions: number;

  durationMs: number;
}

/**
 * Buffer FIFO de traces (limité à 50 entrées)
 */
const MAX_TRACES = 50;
let traces: GenerationTraceEntry[] = [];
let traceCounter = 0;

/**
 * Ajoute une trace au buffer si le mode debug est actif
 */
export function addTrace(entry: Omit<GenerationTraceEntry, 'traceId' | 'timestamp'>, force = false): void {
  if (!force && !isDebugEnabled()) return;

  traces.push({ ...entry, traceId: ++traceCounter, timestamp: Date.now() });
  if (traces.length > MAX_TRACES) {
    traces.shift(); // Remove oldest
  }
}

export function getAllTraces(): readonly GenerationTraceEntry[] {
  return traces;
}

/**
 * Récupère les N dernières traces
 */
export function getRecentTraces(count: number = 10): readonly GenerationTraceEntry[] {
  return traces.slice(-count);
}

export function clearTraces(): void {
  traces = [];
  traceCounter = 0;
}
