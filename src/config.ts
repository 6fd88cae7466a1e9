import { z } from 'zod';
import { ConfigurationError, type ConfigurationIssue } from './errors.js';

export const DEFAULT_INTERVAL_SECONDS = 1;
export const DEFAULT_SAMPLES = 30;
export const DEFAULT_TIMEOUT_SECONDS = 2;
export const DEFAULT_PACKET_SIZE = 56;
export const DEFAULT_SHOW_GRAPH = true;

/** Loosely typed invocation parameters, as received from a caller or a CLI. */
export type LatencyHeatmapParams = Record<string, unknown>;

const configSchema = z.object({
  targets: z.array(z.string().min(1, 'target host must not be empty')).min(1, 'at least one target host is required'),
  interval: z.number().finite().positive(),
  samples: z.number().int().positive(),
  timeout: z.number().finite().positive(),
  packetSize: z.number().int().positive(),
  showGraph: z.boolean(),
});

export type LatencyHeatmapConfig = z.infer<typeof configSchema>;

/** Millisecond view of a config, as consumed by the sampling core. */
export interface SamplingPlan {
  targets: readonly string[];
  samples: number;
  intervalMs: number;
  timeoutMs: number;
  packetSize: number;
}

function positiveNumberOr(value: unknown, fallback: number): number {
  return typeof value === 'number' && value > 0 ? value : fallback;
}

function parseTargets(value: unknown): unknown[] {
  let entries: unknown[];
  if (typeof value === 'string') {
    entries = value.split(',');
  } else if (Array.isArray(value)) {
    entries = value;
  } else {
    return [];
  }

  const seen = new Set<unknown>();
  const targets: unknown[] = [];
  for (const entry of entries) {
    const normalized = typeof entry === 'string' ? entry.trim() : entry;
    if (normalized === '' || seen.has(normalized)) continue;
    seen.add(normalized);
    targets.push(normalized);
  }
  return targets;
}

/**
 * Applies defaults to raw parameters and validates the result.
 *
 * `targets` is required (comma separated string or array). Every other
 * parameter falls back to its default when missing, not a number, or not
 * positive; `samples` and `packetSize` are truncated to integers.
 *
 * @throws ConfigurationError before any sampling can start
 */
export function resolveConfig(params: LatencyHeatmapParams): LatencyHeatmapConfig {
  const targets = parseTargets(params.targets);
  if (targets.length === 0) {
    throw new ConfigurationError('target hosts parameter is required', {
      field: 'targets',
      value: params.targets,
      constraint: 'required',
      issues: [{ field: 'targets', message: 'target hosts parameter is required', value: params.targets }],
    });
  }

  const candidate = {
    targets,
    interval: positiveNumberOr(params.interval, DEFAULT_INTERVAL_SECONDS),
    samples: Math.trunc(positiveNumberOr(params.samples, DEFAULT_SAMPLES)),
    timeout: positiveNumberOr(params.timeout, DEFAULT_TIMEOUT_SECONDS),
    packetSize: Math.trunc(positiveNumberOr(params.packetSize, DEFAULT_PACKET_SIZE)),
    showGraph: typeof params.showGraph === 'boolean' ? params.showGraph : DEFAULT_SHOW_GRAPH,
  };

  const parsed = configSchema.safeParse(candidate);
  if (!parsed.success) {
    const issues: ConfigurationIssue[] = parsed.error.issues.map((issue) => ({
      field: issue.path.join('.'),
      message: issue.message,
    }));
    const [first] = issues;
    throw new ConfigurationError(
      `Invalid latency heatmap configuration: ${issues.map((i) => `${i.field}: ${i.message}`).join('; ')}`,
      {
        field: first?.field,
        constraint: parsed.error.issues[0]?.code,
        issues,
      }
    );
  }

  return parsed.data;
}

export function toSamplingPlan(config: LatencyHeatmapConfig): SamplingPlan {
  return {
    targets: config.targets,
    samples: config.samples,
    intervalMs: Math.round(config.interval * 1000),
    timeoutMs: Math.round(config.timeout * 1000),
    packetSize: config.packetSize,
  };
}
