import {
  maxOf,
  mean,
  meanAbsoluteDeviation,
  median,
  minOf,
  roundHalfUp,
} from './concerns/statistics.js';
import type { Sample, SuccessfulSample, TargetStatistics } from './types/heatmap.types.js';

function compareSamples(a: Sample, b: Sample): number {
  const byTime = a.timestamp.getTime() - b.timestamp.getTime();
  return byTime !== 0 ? byTime : a.round - b.round;
}

/** Partitions samples by target, each partition sorted by (timestamp, round). */
export function groupByTarget(samples: readonly Sample[]): Map<string, Sample[]> {
  const groups = new Map<string, Sample[]>();
  for (const sample of samples) {
    const group = groups.get(sample.target);
    if (group) {
      group.push(sample);
    } else {
      groups.set(sample.target, [sample]);
    }
  }

  for (const group of groups.values()) {
    group.sort(compareSamples);
  }
  return groups;
}

/**
 * Statistics over one target's time-ordered samples. min/avg/max/median and
 * jitter only look at successful rounds and are 0 when there are none.
 */
export function computeTargetStatistics(target: string, samples: readonly Sample[]): TargetStatistics {
  const successful = samples
    .filter((sample): sample is SuccessfulSample => sample.success)
    .map((sample) => sample.rttMs);

  const avgRtt = mean(successful);
  const total = samples.length;
  const packetLoss = total === 0 ? 0 : ((total - successful.length) / total) * 100;

  return {
    target,
    minRtt: roundHalfUp(minOf(successful), 2),
    avgRtt: roundHalfUp(avgRtt, 2),
    maxRtt: roundHalfUp(maxOf(successful), 2),
    medianRtt: roundHalfUp(median(successful), 2),
    jitter: roundHalfUp(meanAbsoluteDeviation(successful, avgRtt), 2),
    packetLoss: roundHalfUp(packetLoss, 2),
    rtts: samples.map((sample) => sample.rttMs),
    timestamps: samples.map((sample) => sample.timestamp),
  };
}

/**
 * Reduces the full sample collection to per-target statistics, ordered by
 * target name. Targets that produced no sample are absent.
 */
export function aggregateSamples(samples: readonly Sample[]): TargetStatistics[] {
  const statistics: TargetStatistics[] = [];
  for (const [target, group] of groupByTarget(samples)) {
    statistics.push(computeTargetStatistics(target, group));
  }

  return statistics.sort((a, b) => (a.target < b.target ? -1 : a.target > b.target ? 1 : 0));
}
