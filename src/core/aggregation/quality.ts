import type { WorkerOutput } from './aggregation-types';

/**
 * Bring a worker-reported quality onto the 0-1 scale.
 * Values above 1 and up to 100 are read as percentages.
 */
export function normalizeQuality(value: number): number {
  if (!Number.isFinite(value)) return 0;
  const scaled = value > 1 && value <= 100 ? value / 100 : value;
  return Math.max(0, Math.min(1, scaled));
}

export interface OutputQualityStats {
  count: number;
  average: number;
  max: number;
  min: number;
}

export function summarizeOutputQuality(outputs: readonly WorkerOutput[] | null | undefined): OutputQualityStats {
  if (!outputs || outputs.length === 0) {
    return { count: 0, average: 0, max: 0, min: 0 };
  }
  const qualities = outputs.map((output) => output.quality);
  const total = qualities.reduce((sum, quality) => sum + quality, 0);
  return {
    count: qualities.length,
    average: total / qualities.length,
    max: Math.max(...qualities),
    min: Math.min(...qualities),
  };
}
