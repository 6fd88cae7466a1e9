/**
 * LatencyHeatmap
 *
 * One invocation: resolve config, sample every target concurrently, aggregate
 * per target, lay out the heatmap grid and assemble the report.
 *
 * Usage:
 * const heatmap = new LatencyHeatmap();
 * const report = await heatmap.run({ targets: '1.1.1.1,8.8.8.8', samples: 10 }, { deadlineMs: 30_000 });
 */

import { EventEmitter } from 'events';
import { aggregateSamples } from './aggregator.js';
import { resolveConfig, toSamplingPlan, type LatencyHeatmapParams } from './config.js';
import { getGlobalLogger, type Logger } from './concerns/logger.js';
import { linkSignals } from './concerns/timers.js';
import { buildHeatmap } from './heatmap-builder.js';
import { SystemPingProber } from './probers/system-ping.prober.js';
import { assembleReport } from './report.js';
import { SamplingScheduler } from './scheduler.class.js';
import type { Prober } from './types/probe.types.js';
import type { LatencyHeatmapReport, Sample } from './types/heatmap.types.js';

export interface LatencyHeatmapOptions {
  prober?: Prober;
  probeGraceMs?: number;
  logger?: Logger;
}

export interface RunOptions {
  /** External cancellation; sampling stops and the partial report is returned. */
  signal?: AbortSignal;
  /** Overall wall-clock bound for sampling, in milliseconds. */
  deadlineMs?: number;
}

export class LatencyHeatmap extends EventEmitter {
  private prober: Prober;
  private probeGraceMs?: number;
  private logger: Logger;

  constructor(options: LatencyHeatmapOptions = {}) {
    super();
    this.logger = options.logger ?? getGlobalLogger();
    this.prober = options.prober ?? new SystemPingProber({ logger: this.logger });
    this.probeGraceMs = options.probeGraceMs;
  }

  /**
   * @throws ConfigurationError when the parameters are invalid; nothing is sampled
   */
  async run(params: LatencyHeatmapParams, options: RunOptions = {}): Promise<LatencyHeatmapReport> {
    const config = resolveConfig(params);
    const plan = toSamplingPlan(config);

    const controller = new AbortController();
    const onCancel = (): void => {
      this.logger.warn({ reason: String(controller.signal.reason) }, 'latency sampling cancelled, returning partial results');
    };
    controller.signal.addEventListener('abort', onCancel, { once: true });

    const unlink = linkSignals(controller, options.signal);
    const deadline = options.deadlineMs !== undefined
      ? setTimeout(() => controller.abort(new Error(`deadline of ${options.deadlineMs}ms reached`)), options.deadlineMs)
      : undefined;

    const scheduler = new SamplingScheduler({
      prober: this.prober,
      probeGraceMs: this.probeGraceMs,
      logger: this.logger,
    });
    const forward = (sample: Sample): void => {
      this.emit('sample', sample);
    };
    scheduler.on('sample', forward);

    this.logger.info(
      { targets: config.targets, samples: config.samples, interval: config.interval, timeout: config.timeout },
      'latency sampling started'
    );

    let samples: Sample[];
    try {
      samples = await scheduler.collect(plan, controller.signal);
    } finally {
      clearTimeout(deadline);
      unlink();
      controller.signal.removeEventListener('abort', onCancel);
      scheduler.off('sample', forward);
    }

    const statistics = aggregateSamples(samples);
    const grid = buildHeatmap(statistics);
    const report = assembleReport(config, statistics, grid, new Date());

    this.logger.info(
      { samples: samples.length, targets: statistics.length, cancelled: controller.signal.aborted },
      'latency sampling finished'
    );

    return report;
  }
}

/** Runs one invocation with a fresh LatencyHeatmap. */
export async function runLatencyHeatmap(
  params: LatencyHeatmapParams,
  options: RunOptions & LatencyHeatmapOptions = {}
): Promise<LatencyHeatmapReport> {
  const { signal, deadlineMs, ...heatmapOptions } = options;
  return new LatencyHeatmap(heatmapOptions).run(params, { signal, deadlineMs });
}

export default LatencyHeatmap;
