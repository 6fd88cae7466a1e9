/**
 * SystemPingProber
 *
 * Measures one ICMP echo round-trip by running the platform `ping` binary,
 * which already holds the privileges raw sockets need:
 * - Linux:   ping -c 1 -s <bytes> -W <seconds> <host>
 * - macOS:   ping -c 1 -s <bytes> -t <seconds> <host>
 * - Windows: ping -n 1 -l <bytes> -w <milliseconds> <host>
 *
 * Every outcome, including a missing binary, resolves to a ProbeOutcome.
 */

import { spawn } from 'child_process';
import { getGlobalLogger, type Logger } from '../concerns/logger.js';
import type { ProbeFailureReason, ProbeOptions, ProbeOutcome, Prober } from '../types/probe.types.js';

export interface SystemPingProberOptions {
  /** Executable to run. */
  command?: string;
  platform?: NodeJS.Platform;
  /** Time the process gets past the probe timeout before it is killed. */
  killGraceMs?: number;
  logger?: Logger;
}

const ROUND_TRIP_PATTERN = /time[=<]\s*([\d.]+)\s*ms/i;
const UNREACHABLE_PATTERN = /unknown host|cannot resolve|could not find host|name or service not known|temporary failure in name resolution|network is unreachable/i;

/** Extracts the round-trip time, in milliseconds, from ping's output. */
export function parsePingOutput(output: string): number | undefined {
  const match = output.match(ROUND_TRIP_PATTERN);
  if (!match || match[1] === undefined) {
    return undefined;
  }
  const value = Number(match[1]);
  return Number.isFinite(value) ? value : undefined;
}

export function buildPingArgs(
  target: string,
  options: Pick<ProbeOptions, 'packetSize' | 'timeoutMs'>,
  platform: NodeJS.Platform = process.platform
): string[] {
  const { packetSize, timeoutMs } = options;
  const seconds = String(Math.max(1, Math.ceil(timeoutMs / 1000)));

  if (platform === 'win32') {
    return ['-n', '1', '-l', String(packetSize), '-w', String(Math.max(1, Math.round(timeoutMs))), target];
  }
  if (platform === 'darwin' || platform === 'freebsd' || platform === 'openbsd') {
    return ['-c', '1', '-s', String(packetSize), '-t', seconds, target];
  }
  return ['-c', '1', '-s', String(packetSize), '-W', seconds, target];
}

function classifyFailure(exitCode: number | null, output: string): ProbeFailureReason {
  if (UNREACHABLE_PATTERN.test(output)) {
    return 'unreachable';
  }
  if (exitCode === 1) {
    return 'no-reply';
  }
  if (exitCode === 2 || exitCode === 68) {
    return 'unreachable';
  }
  return 'error';
}

export class SystemPingProber implements Prober {
  private command: string;
  private platform: NodeJS.Platform;
  private killGraceMs: number;
  private logger: Logger;

  constructor(options: SystemPingProberOptions = {}) {
    this.command = options.command ?? 'ping';
    this.platform = options.platform ?? process.platform;
    this.killGraceMs = options.killGraceMs ?? 250;
    this.logger = (options.logger ?? getGlobalLogger()).child({ component: 'system-ping' });
  }

  probe(target: string, options: ProbeOptions): Promise<ProbeOutcome> {
    const args = buildPingArgs(target, options, this.platform);

    return new Promise<ProbeOutcome>((resolve) => {
      const { signal } = options;
      if (signal?.aborted) {
        resolve({ ok: false, reason: 'cancelled' });
        return;
      }

      let output = '';
      let settled = false;

      const proc = spawn(this.command, args, { shell: false, stdio: ['ignore', 'pipe', 'pipe'] });

      const finish = (outcome: ProbeOutcome): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        resolve(outcome);
      };

      const onAbort = (): void => {
        proc.kill('SIGKILL');
        finish({ ok: false, reason: 'cancelled' });
      };

      const timer = setTimeout(() => {
        proc.kill('SIGKILL');
        finish({ ok: false, reason: 'timeout', message: `ping timed out after ${options.timeoutMs}ms` });
      }, options.timeoutMs + this.killGraceMs);

      signal?.addEventListener('abort', onAbort, { once: true });

      proc.stdout?.on('data', (chunk: Buffer) => {
        output += chunk.toString('utf8');
      });

      proc.stderr?.on('data', (chunk: Buffer) => {
        output += chunk.toString('utf8');
      });

      proc.on('error', (error: Error) => {
        this.logger.debug({ err: error, target }, 'ping could not be started');
        finish({ ok: false, reason: 'error', message: error.message });
      });

      proc.on('close', (code: number | null) => {
        const rttMs = code === 0 ? parsePingOutput(output) : undefined;
        if (rttMs !== undefined) {
          finish({ ok: true, rttMicroseconds: Math.round(rttMs * 1000) });
          return;
        }

        const reason = code === 0 ? 'no-reply' : classifyFailure(code, output);
        finish({ ok: false, reason, message: output.trim().split('\n').pop() || `ping exited with code ${code}` });
      });
    });
  }
}
