import type { HeatmapGrid, TargetStatistics } from './types/heatmap.types.js';

/** Colour scale used when no cell holds a positive latency. */
export const DEFAULT_LATENCY_RANGE = { min: 0, max: 100 } as const;

/**
 * Lays the statistics out as a target-by-time grid. The first target's
 * timestamps are the shared timeline: a longer series is truncated to it, a
 * shorter one leaves its trailing cells at 0.
 */
export function buildHeatmap(statistics: readonly TargetStatistics[]): HeatmapGrid {
  const targets = statistics.map((stat) => stat.target);
  const timestamps = statistics[0]?.timestamps ?? [];
  const width = timestamps.length;

  let minLatency = Infinity;
  let maxLatency = -Infinity;

  const latency = statistics.map((stat) => {
    const row: Array<number | null> = new Array<number | null>(width).fill(0);

    stat.rtts.forEach((rtt, index) => {
      if (index >= width) return;
      row[index] = rtt;

      if (rtt !== null && rtt > 0) {
        minLatency = Math.min(minLatency, rtt);
        maxLatency = Math.max(maxLatency, rtt);
      }
    });

    return row;
  });

  if (minLatency === Infinity) {
    minLatency = DEFAULT_LATENCY_RANGE.min;
    maxLatency = DEFAULT_LATENCY_RANGE.max;
  }

  return { targets, timestamps, latency, minLatency, maxLatency };
}
