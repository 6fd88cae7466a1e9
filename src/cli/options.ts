import { InvalidArgumentError } from 'commander';
import type { LatencyHeatmapParams } from '../config.js';

export interface CliOptions {
  interval?: number;
  samples?: number;
  timeout?: number;
  packetSize?: number;
  graph: boolean;
  deadline?: number;
  json: boolean;
}

export function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive number.');
  }
  return parsed;
}

export function parsePositiveInteger(value: string): number {
  const parsed = parsePositiveNumber(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Targets may be given as separate arguments or comma separated; both forms
 * end up as one list.
 */
export function buildParams(targets: string[], options: CliOptions): LatencyHeatmapParams {
  return {
    targets: targets.flatMap((target) => target.split(',')),
    interval: options.interval,
    samples: options.samples,
    timeout: options.timeout,
    packetSize: options.packetSize,
    showGraph: options.graph,
  };
}
