import type { Sample } from '../../src/types/heatmap.types.js';

export const BASE_TIME = Date.UTC(2024, 0, 1, 12, 0, 0);

/**
 * Builds one sample per entry; `null` is a failed round. Round `i` completes
 * `i` seconds after `startMs`.
 */
export function samplesFor(target: string, rtts: Array<number | null>, startMs: number = BASE_TIME): Sample[] {
  return rtts.map((rtt, round): Sample => {
    const timestamp = new Date(startMs + round * 1000);
    return rtt === null
      ? { target, round, timestamp, success: false, rttMs: null, reason: 'timeout' }
      : { target, round, timestamp, success: true, rttMs: rtt };
  });
}
