/**
 * Contract between the sampling core and whatever performs the network
 * round-trip. The core treats a prober as a black box and never lets one of
 * its outcomes abort an invocation.
 */

export type ProbeFailureReason = 'timeout' | 'no-reply' | 'unreachable' | 'error' | 'cancelled';

export interface ProbeOptions {
  /** Payload size of the echo request, in bytes. */
  packetSize: number;
  /** Upper bound for one round-trip, in milliseconds. */
  timeoutMs: number;
  signal?: AbortSignal;
}

export type ProbeOutcome =
  | { ok: true; rttMicroseconds: number }
  | { ok: false; reason: ProbeFailureReason; message?: string };

export interface Prober {
  probe(target: string, options: ProbeOptions): Promise<ProbeOutcome>;
}
