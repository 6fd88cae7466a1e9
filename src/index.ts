// =============================================================================
// Invocation
// =============================================================================

export { LatencyHeatmap, runLatencyHeatmap, type LatencyHeatmapOptions, type RunOptions } from './latency-heatmap.class.js';
export {
  resolveConfig,
  toSamplingPlan,
  DEFAULT_INTERVAL_SECONDS,
  DEFAULT_SAMPLES,
  DEFAULT_TIMEOUT_SECONDS,
  DEFAULT_PACKET_SIZE,
  DEFAULT_SHOW_GRAPH,
  type LatencyHeatmapConfig,
  type LatencyHeatmapParams,
  type SamplingPlan,
} from './config.js';

// =============================================================================
// Sampling core
// =============================================================================

export { Sampler, DEFAULT_PROBE_GRACE_MS, type SamplerOptions, type SampleSink } from './sampler.class.js';
export {
  SamplingScheduler,
  type SamplingSchedulerOptions,
  type WorkerSummary,
  type CollectionSummary,
} from './scheduler.class.js';
export { aggregateSamples, computeTargetStatistics, groupByTarget } from './aggregator.js';
export { buildHeatmap, DEFAULT_LATENCY_RANGE } from './heatmap-builder.js';
export { assembleReport, serializeStatistics, serializeHeatmap, formatRfc3339, FAILED_RTT } from './report.js';

// =============================================================================
// Probers
// =============================================================================

export * from './probers/index.js';

// =============================================================================
// Errors, concerns & types
// =============================================================================

export * from './errors.js';
export { SampleChannel, type SampleChannelOptions } from './concerns/sample-channel.js';
export { createLogger, getGlobalLogger, getLoggerOptionsFromEnv, type Logger, type LoggerOptions } from './concerns/logger.js';
export { roundHalfUp, mean, median, meanAbsoluteDeviation } from './concerns/statistics.js';
export type * from './types/probe.types.js';
export type * from './types/heatmap.types.js';
