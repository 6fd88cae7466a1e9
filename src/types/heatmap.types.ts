import type { ProbeFailureReason } from './probe.types.js';

/** A cancelled round is dropped, never recorded as a failure. */
export type SampleFailureReason = Exclude<ProbeFailureReason, 'cancelled'>;

interface SampleBase {
  readonly target: string;
  /** Zero-based position of the round in the target's sampling sequence. */
  readonly round: number;
  /** When the round completed. */
  readonly timestamp: Date;
}

export interface SuccessfulSample extends SampleBase {
  readonly success: true;
  readonly rttMs: number;
}

export interface FailedSample extends SampleBase {
  readonly success: false;
  readonly rttMs: null;
  readonly reason: SampleFailureReason;
}

export type Sample = SuccessfulSample | FailedSample;

/**
 * Per-target aggregate. `rtts` and `timestamps` hold one entry per collected
 * round in time order; a failed round is `null` in `rtts`.
 */
export interface TargetStatistics {
  readonly target: string;
  readonly minRtt: number;
  readonly avgRtt: number;
  readonly maxRtt: number;
  readonly medianRtt: number;
  readonly jitter: number;
  readonly packetLoss: number;
  readonly rtts: ReadonlyArray<number | null>;
  readonly timestamps: ReadonlyArray<Date>;
}

/**
 * Target-by-time latency matrix. A cell is the measured rtt, `null` for a
 * failed round, or `0` when the target has no round at that position.
 */
export interface HeatmapGrid {
  readonly targets: readonly string[];
  readonly timestamps: ReadonlyArray<Date>;
  readonly latency: ReadonlyArray<ReadonlyArray<number | null>>;
  readonly minLatency: number;
  readonly maxLatency: number;
}

export interface TargetStatisticsPayload {
  target: string;
  minRtt: number;
  avgRtt: number;
  maxRtt: number;
  medianRtt: number;
  jitter: number;
  packetLoss: number;
  /** Failed rounds are `-1`. */
  rtts: number[];
  /** RFC3339 */
  timestamps: string[];
}

export interface HeatmapPayload {
  targets: string[];
  timestamps: string[];
  /** rtt in ms, `-1` for a failed round, `0` for an unpopulated cell. */
  latencyData: number[][];
  minLatency: number;
  maxLatency: number;
}

export interface LatencyHeatmapReport {
  targets: string[];
  interval: number;
  samples: number;
  timeout: number;
  packetSize: number;
  statistics: TargetStatisticsPayload[];
  heatmapData: HeatmapPayload;
  showGraph: boolean;
  /** RFC3339, invocation completion time. */
  timestamp: string;
}
