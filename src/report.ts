import type { LatencyHeatmapConfig } from './config.js';
import type {
  HeatmapGrid,
  HeatmapPayload,
  LatencyHeatmapReport,
  TargetStatistics,
  TargetStatisticsPayload,
} from './types/heatmap.types.js';

/** rtt written for a failed round. */
export const FAILED_RTT = -1;

/** RFC3339 in UTC, second precision: `2024-05-01T12:00:03Z`. */
export function formatRfc3339(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

function serializeRtt(rtt: number | null): number {
  return rtt === null ? FAILED_RTT : rtt;
}

export function serializeStatistics(stat: TargetStatistics): TargetStatisticsPayload {
  return {
    target: stat.target,
    minRtt: stat.minRtt,
    avgRtt: stat.avgRtt,
    maxRtt: stat.maxRtt,
    medianRtt: stat.medianRtt,
    jitter: stat.jitter,
    packetLoss: stat.packetLoss,
    rtts: stat.rtts.map(serializeRtt),
    timestamps: stat.timestamps.map(formatRfc3339),
  };
}

export function serializeHeatmap(grid: HeatmapGrid): HeatmapPayload {
  return {
    targets: [...grid.targets],
    timestamps: grid.timestamps.map(formatRfc3339),
    latencyData: grid.latency.map((row) => row.map(serializeRtt)),
    minLatency: grid.minLatency,
    maxLatency: grid.maxLatency,
  };
}

/** Final payload: config echo, statistics and heatmap, with sentinels applied. */
export function assembleReport(
  config: LatencyHeatmapConfig,
  statistics: readonly TargetStatistics[],
  grid: HeatmapGrid,
  completedAt: Date = new Date()
): LatencyHeatmapReport {
  return {
    targets: [...config.targets],
    interval: config.interval,
    samples: config.samples,
    timeout: config.timeout,
    packetSize: config.packetSize,
    statistics: statistics.map(serializeStatistics),
    heatmapData: serializeHeatmap(grid),
    showGraph: config.showGraph,
    timestamp: formatRfc3339(completedAt),
  };
}
