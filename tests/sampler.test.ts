import { pino } from 'pino';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { HeatmapError } from '../src/errors.js';
import { Sampler, type SamplerOptions } from '../src/sampler.class.js';
import type { Sample } from '../src/types/heatmap.types.js';
import type { Prober } from '../src/types/probe.types.js';
import { FakeTimers, track } from './utils/time-helpers.js';
import { ScriptedProber, abortableProber, fail, ok } from './mocks/scripted-prober.js';

function createSampler(prober: Prober, overrides: Partial<SamplerOptions> = {}): Sampler {
  return new Sampler({
    target: 'host.example',
    samples: 3,
    intervalMs: 1000,
    timeoutMs: 2000,
    packetSize: 56,
    prober,
    ...overrides,
  });
}

describe('Sampler', () => {
  let start: number;
  let collected: Sample[];
  const sink = (sample: Sample): void => {
    collected.push(sample);
  };

  beforeEach(() => {
    FakeTimers.install();
    start = Date.now();
    collected = [];
  });

  afterEach(() => {
    FakeTimers.uninstall();
  });

  it('should emit exactly one sample per round', async () => {
    const prober = new ScriptedProber({ fallback: ok(12) });
    const run = track(createSampler(prober, { samples: 4 }).run(sink));

    await FakeTimers.runAll();

    await expect(run.promise).resolves.toBe(4);
    expect(collected.map((s) => s.round)).toEqual([0, 1, 2, 3]);
    expect(collected.every((s) => s.target === 'host.example' && s.success && s.rttMs === 12)).toBe(true);
  });

  it('should sleep the full interval after every probe, measured from its completion', async () => {
    const prober = new ScriptedProber({ fallback: ok(5), delayMs: 100 });
    const run = track(createSampler(prober).run(sink));

    await FakeTimers.advance(3299);
    expect(run.settled).toBe(false);
    await FakeTimers.advance(1);
    expect(run.settled).toBe(true);

    expect(prober.calls.map((call) => call.at - start)).toEqual([0, 1100, 2200]);
    expect(collected.map((s) => s.timestamp.getTime() - start)).toEqual([100, 1200, 2300]);
  });

  it('should record failed rounds without retrying and keep the cadence', async () => {
    const prober = new ScriptedProber({ scripts: { 'host.example': [fail('no-reply'), ok(7), fail('unreachable')] } });
    const run = track(createSampler(prober).run(sink));

    await FakeTimers.advance(3000);

    expect(run.settled).toBe(true);
    expect(prober.calls).toHaveLength(3);
    expect(prober.calls.map((call) => call.at - start)).toEqual([0, 1000, 2000]);
    expect(collected).toEqual([
      { target: 'host.example', round: 0, timestamp: new Date(start), success: false, rttMs: null, reason: 'no-reply' },
      { target: 'host.example', round: 1, timestamp: new Date(start + 1000), success: true, rttMs: 7 },
      { target: 'host.example', round: 2, timestamp: new Date(start + 2000), success: false, rttMs: null, reason: 'unreachable' },
    ]);
  });

  it('should convert microseconds to milliseconds at microsecond precision', async () => {
    const prober: Prober = { probe: async () => ({ ok: true, rttMicroseconds: 12345.9 }) };
    const run = track(createSampler(prober, { samples: 1 }).run(sink));

    await FakeTimers.runAll();
    await run.promise;

    expect(collected[0]?.rttMs).toBe(12.345);
  });

  it('should turn a throwing prober into a failed sample', async () => {
    const prober = new ScriptedProber({ fallback: new Error('socket: operation not permitted') });
    const run = track(createSampler(prober, { samples: 2 }).run(sink));

    await FakeTimers.runAll();

    await expect(run.promise).resolves.toBe(2);
    expect(collected.map((s) => (s.success ? 'ok' : s.reason))).toEqual(['error', 'error']);
  });

  it('should record a timeout when the prober does not settle in time', async () => {
    const prober = new ScriptedProber({ fallback: 'hang' });
    const run = track(createSampler(prober, { samples: 1, timeoutMs: 2000, probeGraceMs: 500 }).run(sink));

    await FakeTimers.advance(2499);
    expect(collected).toHaveLength(0);
    await FakeTimers.advance(1);

    expect(collected).toHaveLength(1);
    expect(collected[0]).toMatchObject({ success: false, reason: 'timeout', rttMs: null });
    expect(collected[0]?.timestamp.getTime()).toBe(start + 2500);

    await FakeTimers.advance(1000);
    expect(run.settled).toBe(true);
  });

  it('should log the abandoned probe with the deadline actually applied', async () => {
    const records: Array<Record<string, unknown>> = [];
    const logger = pino({ level: 'debug' }, {
      write: (line: string) => {
        records.push(JSON.parse(line));
      },
    });
    const prober = new ScriptedProber({ fallback: 'hang' });
    const run = track(createSampler(prober, { samples: 1, timeoutMs: 2000, probeGraceMs: 500, logger }).run(sink));

    await FakeTimers.advance(3500);

    expect(run.settled).toBe(true);
    expect(records.find((record) => record.msg === 'probe failed')).toMatchObject({
      component: 'sampler',
      target: 'host.example',
      round: 0,
      reason: 'timeout',
      detail: 'prober did not settle within 2500ms',
    });
  });

  it('should reject a sample count that is not a non-negative integer', () => {
    const prober = new ScriptedProber();

    expect(() => createSampler(prober, { samples: 1.5 })).toThrow(HeatmapError);
    expect(() => createSampler(prober, { samples: -1 })).toThrow('samples must be a non-negative integer, got -1');
    expect(() => createSampler(prober, { samples: 0 })).not.toThrow();
  });

  it('should pass packet size, timeout and signal to the prober', async () => {
    const controller = new AbortController();
    const prober = new ScriptedProber();
    const run = track(createSampler(prober, { samples: 1, packetSize: 128, timeoutMs: 750, signal: controller.signal }).run(sink));

    await FakeTimers.runAll();
    await run.promise;

    expect(prober.calls[0]?.options).toEqual({ packetSize: 128, timeoutMs: 750, signal: controller.signal });
  });

  describe('cancellation', () => {
    it('should not probe at all when already cancelled', async () => {
      const controller = new AbortController();
      controller.abort();
      const prober = new ScriptedProber();

      await expect(createSampler(prober, { signal: controller.signal }).run(sink)).resolves.toBe(0);
      expect(prober.calls).toHaveLength(0);
    });

    it('should stop promptly when cancelled between rounds', async () => {
      const controller = new AbortController();
      const prober = new ScriptedProber();
      const run = track(createSampler(prober, { samples: 10, signal: controller.signal }).run(sink));

      await FakeTimers.advance(1500);
      controller.abort();
      await FakeTimers.advance(0);

      expect(run.settled).toBe(true);
      await expect(run.promise).resolves.toBe(2);
      expect(prober.calls).toHaveLength(2);
    });

    it('should drop a round whose probe was cut short by cancellation', async () => {
      const controller = new AbortController();
      const run = track(createSampler(abortableProber(5, 1000), { intervalMs: 100, signal: controller.signal }).run(sink));

      await FakeTimers.advance(1500);
      controller.abort();
      await FakeTimers.advance(0);

      expect(run.settled).toBe(true);
      await expect(run.promise).resolves.toBe(1);
      expect(collected).toEqual([
        { target: 'host.example', round: 0, timestamp: new Date(start + 1000), success: true, rttMs: 5 },
      ]);
    });

    it('should drop a failure that arrives after cancellation', async () => {
      const controller = new AbortController();
      const prober = new ScriptedProber({ fallback: fail('no-reply'), delayMs: 1000 });
      const run = track(createSampler(prober, { signal: controller.signal }).run(sink));

      await FakeTimers.advance(500);
      controller.abort();
      await FakeTimers.advance(500);

      expect(run.settled).toBe(true);
      await expect(run.promise).resolves.toBe(0);
      expect(collected).toHaveLength(0);
    });

    it('should keep a measurement that completes after cancellation', async () => {
      const controller = new AbortController();
      const prober = new ScriptedProber({ fallback: ok(4), delayMs: 1000 });
      const run = track(createSampler(prober, { signal: controller.signal }).run(sink));

      await FakeTimers.advance(500);
      controller.abort();
      await FakeTimers.advance(500);

      expect(run.settled).toBe(true);
      await expect(run.promise).resolves.toBe(1);
      expect(collected).toMatchObject([{ round: 0, success: true, rttMs: 4 }]);
    });
  });
});
