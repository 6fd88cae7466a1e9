/**
 * SamplingScheduler
 *
 * Fans out one Sampler per target, all started before anything is awaited,
 * and funnels their samples through a single SampleChannel. `collect()`
 * resolves once every worker has finished (or stopped on cancellation) and
 * the channel has been drained.
 *
 * Events:
 * - `sample` (sample: Sample) for every collected record, in arrival order
 * - `worker:done` ({ target, emitted })
 * - `complete` ({ samples, durationMs, cancelled })
 */

import { EventEmitter } from 'events';
import { getGlobalLogger, type Logger } from './concerns/logger.js';
import { SampleChannel } from './concerns/sample-channel.js';
import { SamplingError } from './errors.js';
import { Sampler } from './sampler.class.js';
import type { SamplingPlan } from './config.js';
import type { Prober } from './types/probe.types.js';
import type { Sample } from './types/heatmap.types.js';

export interface SamplingSchedulerOptions {
  prober: Prober;
  probeGraceMs?: number;
  logger?: Logger;
}

export interface WorkerSummary {
  target: string;
  emitted: number;
}

export interface CollectionSummary {
  samples: number;
  durationMs: number;
  cancelled: boolean;
}

export class SamplingScheduler extends EventEmitter {
  private prober: Prober;
  private probeGraceMs?: number;
  private baseLogger: Logger;
  private logger: Logger;

  constructor(options: SamplingSchedulerOptions) {
    super();
    this.prober = options.prober;
    this.probeGraceMs = options.probeGraceMs;
    this.baseLogger = options.logger ?? getGlobalLogger();
    this.logger = this.baseLogger.child({ component: 'scheduler' });
  }

  async collect(plan: SamplingPlan, signal?: AbortSignal): Promise<Sample[]> {
    const startedAt = Date.now();
    const { targets, samples } = plan;

    const channel = new SampleChannel<Sample>({
      capacity: Math.max(1, targets.length * samples),
      producers: targets.length,
    });

    this.logger.debug({ targets: targets.length, samples }, 'starting sampling workers');
    const workers = targets.map((target) => this.runWorker(target, plan, channel, signal));
    const settled = Promise.allSettled(workers);

    const collected: Sample[] = [];
    for await (const sample of channel) {
      collected.push(sample);
      this.emit('sample', sample);
    }

    const outcomes = await settled;
    const crashed = outcomes.findIndex((outcome) => outcome.status === 'rejected');
    const failure = outcomes[crashed];
    if (failure && failure.status === 'rejected') {
      const target = targets[crashed];
      throw new SamplingError(`Sampling worker for "${target}" crashed`, {
        target,
        original: failure.reason,
      });
    }

    const summary: CollectionSummary = {
      samples: collected.length,
      durationMs: Date.now() - startedAt,
      cancelled: signal?.aborted ?? false,
    };
    this.emit('complete', summary);

    return collected;
  }

  private async runWorker(
    target: string,
    plan: SamplingPlan,
    channel: SampleChannel<Sample>,
    signal?: AbortSignal
  ): Promise<void> {
    try {
      const sampler = new Sampler({
        target,
        samples: plan.samples,
        intervalMs: plan.intervalMs,
        timeoutMs: plan.timeoutMs,
        packetSize: plan.packetSize,
        prober: this.prober,
        signal,
        probeGraceMs: this.probeGraceMs,
        logger: this.baseLogger,
      });
      const emitted = await sampler.run((sample) => channel.send(sample));
      const summary: WorkerSummary = { target, emitted };
      this.emit('worker:done', summary);
    } catch (error) {
      this.logger.error({ err: error, target }, 'sampling worker crashed');
      throw error;
    } finally {
      channel.done();
    }
  }
}
