/**
 * DispatchThrottler: coalescing, rate-limited bridge from formant vectors
 * to single-parameter commands.
 *
 * At most one dispatch is in flight and at most one is pending. A newer
 * submission replaces the pending one (and inherits its `full` flag), so a
 * burst of pad drags collapses into the latest vector. With diffing on, only
 * fields whose sink value differs from the last successfully sent value go
 * out; `full` sends all twelve in FORMANT_FIELDS order.
 */

import { EngineError, errorMessage } from '../errors.js';
import { FORMANT_FIELDS } from '../types/formant.js';
import type { FormantField, FormantVector, ParamCommand, ParamRanges } from '../types/formant.js';
import type { CommandSink } from './CommandSink.js';
import { sinkValue, toCommands } from './commands.js';

export type DispatchStatus = 'sent' | 'unchanged' | 'failed';

export interface DispatchReport {
  readonly status: DispatchStatus;
  readonly full: boolean;
  readonly vector: FormantVector;
  /** Commands the sink accepted, in send order. */
  readonly sent: readonly ParamCommand[];
  readonly clamps: readonly string[];
  /** Earlier submissions replaced by this one before it started. */
  readonly coalesced: number;
  readonly error?: EngineError;
}

export interface DispatchThrottlerOptions {
  ranges: ParamRanges;
  /** Minimum spacing between dispatch starts. */
  minIntervalMs?: number;
  diff?: boolean;
  now?: () => number;
  onReport?: (report: DispatchReport) => void;
}

interface PendingDispatch {
  vector: FormantVector;
  full: boolean;
  coalesced: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class DispatchThrottler {
  private readonly sink: CommandSink;
  private readonly ranges: ParamRanges;
  private readonly minIntervalMs: number;
  private readonly diff: boolean;
  private readonly now: () => number;
  private readonly onReport?: (report: DispatchReport) => void;

  private readonly lastSent = new Map<FormantField, number>();
  private pending: PendingDispatch | null = null;
  private running: Promise<void> | null = null;
  /** Set while an exclusive task owns the sink's link. */
  private held: Promise<void> | null = null;
  private lastStartAt = -Infinity;

  constructor(sink: CommandSink, options: DispatchThrottlerOptions) {
    this.sink = sink;
    this.ranges = options.ranges;
    this.minIntervalMs = options.minIntervalMs ?? 150;
    this.diff = options.diff ?? true;
    this.now = options.now ?? Date.now;
    this.onReport = options.onReport;
  }

  /** Queue `vector` for dispatch. Never blocks and never throws. */
  submit(vector: FormantVector, options: { full?: boolean } = {}): void {
    const full = options.full ?? false;
    this.pending = this.pending
      ? { vector, full: this.pending.full || full, coalesced: this.pending.coalesced + 1 }
      : { vector, full, coalesced: 0 };
    if (!this.running && !this.held) this.running = this.pump();
  }

  /** Resolves once nothing is pending, in flight or held. */
  async idle(): Promise<void> {
    while (this.running || this.held) {
      await (this.running ?? this.held);
    }
  }

  /**
   * Run `task` with the link to itself: it starts after the in-flight
   * dispatch finishes, and submissions made meanwhile wait until it settles.
   */
  async exclusive<T>(task: () => Promise<T>): Promise<T> {
    while (this.held) await this.held;
    let release: () => void = () => {};
    this.held = new Promise<void>((resolve) => {
      release = resolve;
    });
    try {
      if (this.running) await this.running;
      return await task();
    } finally {
      this.held = null;
      if (this.pending && !this.running) this.running = this.pump();
      release();
    }
  }

  get busy(): boolean {
    return this.running !== null;
  }

  get hasPending(): boolean {
    return this.pending !== null;
  }

  /** Drop the queued (not yet started) dispatch. */
  cancelPending(): void {
    this.pending = null;
  }

  /** Record that the destination is known to hold `vector` (e.g. just captured from it). */
  markDispatched(vector: FormantVector): void {
    for (const field of FORMANT_FIELDS) {
      this.lastSent.set(field, sinkValue(field, vector[field], this.ranges));
    }
  }

  private changedFields(vector: FormantVector): Set<FormantField> {
    const changed = new Set<FormantField>();
    for (const field of FORMANT_FIELDS) {
      if (this.lastSent.get(field) !== sinkValue(field, vector[field], this.ranges)) changed.add(field);
    }
    return changed;
  }

  private async pump(): Promise<void> {
    try {
      while (this.pending && !this.held) {
        const wait = this.lastStartAt + this.minIntervalMs - this.now();
        if (wait > 0) await sleep(wait);

        const job = this.pending;
        if (!job || this.held) break; // cancelled or link taken while waiting
        this.pending = null;
        this.lastStartAt = this.now();

        const report = await this.run(job);
        this.emit(report);
      }
    } finally {
      this.running = null;
    }
  }

  private async run(job: PendingDispatch): Promise<DispatchReport> {
    const fields = this.diff && !job.full ? this.changedFields(job.vector) : undefined;
    const { commands, clamps } = toCommands(job.vector, this.ranges, fields);
    for (const note of clamps) console.warn(`[dispatch] ${note}`);

    const base = { full: job.full, vector: job.vector, clamps, coalesced: job.coalesced };
    if (commands.length === 0) {
      return { ...base, status: 'unchanged', sent: [] };
    }

    const sent: ParamCommand[] = [];
    for (const cmd of commands) {
      try {
        await this.sink.send(cmd);
      } catch (err) {
        // Destination state for this field is now unknown: resend it next time
        this.lastSent.delete(cmd.param);
        const error = new EngineError('DISPATCH_FAILURE', `Sink rejected ${cmd.param}=${cmd.value}: ${errorMessage(err)}`, {
          cause: err,
          details: { param: cmd.param, value: cmd.value, sentBefore: sent.length },
        });
        console.error(`[dispatch] ${error.message}`);
        return { ...base, status: 'failed', sent, error };
      }
      this.lastSent.set(cmd.param, cmd.value);
      sent.push(cmd);
    }
    return { ...base, status: 'sent', sent };
  }

  private emit(report: DispatchReport) {
    if (!this.onReport) return;
    try {
      this.onReport(report);
    } catch (err) {
      console.error('[dispatch] report listener failed:', err);
    }
  }
}
