/**
 * Sampler
 *
 * Drives one target through a fixed number of rounds. Each round probes once,
 * records a timestamped sample and then waits the full interval, whatever the
 * probe outcome was. Probe failures become failed samples; they never throw.
 * A round interrupted by cancellation produced no measurement and is dropped.
 */

import { getGlobalLogger, type Logger } from './concerns/logger.js';
import { HeatmapError } from './errors.js';
import { sleep, withDeadline } from './concerns/timers.js';
import { tryFn, type TryResult } from './concerns/try-fn.js';
import type { ProbeOutcome, Prober } from './types/probe.types.js';
import type { Sample } from './types/heatmap.types.js';

export const DEFAULT_PROBE_GRACE_MS = 500;

export interface SamplerOptions {
  target: string;
  samples: number;
  intervalMs: number;
  timeoutMs: number;
  packetSize: number;
  prober: Prober;
  signal?: AbortSignal;
  /** Extra time a prober gets past `timeoutMs` before its round is recorded as a timeout. */
  probeGraceMs?: number;
  logger?: Logger;
}

export type SampleSink = (sample: Sample) => Promise<void> | void;

export class Sampler {
  readonly target: string;
  private options: SamplerOptions;
  private logger: Logger;

  constructor(options: SamplerOptions) {
    if (!Number.isInteger(options.samples) || options.samples < 0) {
      throw new HeatmapError(`samples must be a non-negative integer, got ${options.samples}`, {
        target: options.target,
        samples: options.samples,
      });
    }
    this.options = options;
    this.target = options.target;
    this.logger = (options.logger ?? getGlobalLogger()).child({ component: 'sampler', target: options.target });
  }

  /**
   * Runs every round, handing each sample to `emit` before sleeping.
   * Stops early, without error, when the signal aborts.
   *
   * @returns the number of samples emitted
   */
  async run(emit: SampleSink): Promise<number> {
    const { samples, intervalMs, signal } = this.options;
    let emitted = 0;

    for (let round = 0; round < samples; round++) {
      if (signal?.aborted) {
        this.logger.debug({ round, emitted }, 'sampling cancelled');
        break;
      }

      const sample = await this.sampleRound(round);
      if (!sample) {
        this.logger.debug({ round, emitted }, 'round interrupted by cancellation, dropped');
        break;
      }
      await emit(sample);
      emitted++;

      await sleep(intervalMs, signal);
    }

    return emitted;
  }

  private async sampleRound(round: number): Promise<Sample | null> {
    const outcome = await this.probe();
    const timestamp = new Date();

    if (outcome.ok) {
      const rttMs = Math.trunc(outcome.rttMicroseconds) / 1000;
      this.logger.debug({ round, rttMs }, 'probe succeeded');
      return { target: this.target, round, timestamp, success: true, rttMs };
    }

    const { reason, message } = outcome;
    if (reason === 'cancelled' || this.options.signal?.aborted) {
      return null;
    }

    this.logger.debug({ round, reason, detail: message }, 'probe failed');
    return { target: this.target, round, timestamp, success: false, rttMs: null, reason };
  }

  private async probe(): Promise<ProbeOutcome> {
    const { prober, packetSize, timeoutMs, signal, probeGraceMs = DEFAULT_PROBE_GRACE_MS } = this.options;

    const attempt = tryFn(() => prober.probe(this.target, { packetSize, timeoutMs, signal }));
    const deadlineMs = timeoutMs + probeGraceMs;
    const [ok, err, outcome] = await withDeadline<TryResult<ProbeOutcome>>(
      attempt,
      deadlineMs,
      () => [true, null, { ok: false, reason: 'timeout', message: `prober did not settle within ${deadlineMs}ms` }]
    );

    if (!ok) {
      return { ok: false, reason: 'error', message: err.message };
    }
    return outcome;
  }
}
