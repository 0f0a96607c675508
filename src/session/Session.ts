/**
 * Control session: the single writer of pad state, sliders, profile and
 * the A/B store.
 *
 * `handle(event)` validates first, then commits: an invalid event leaves
 * every field untouched. Recomputation is synchronous; dispatch is handed to
 * the throttler and never awaited here. WAV analysis runs as a sliced
 * background task whose result comes back as a `wav_analyzed` event, and
 * only the most recent task's result is applied.
 */

import { DEFAULT_FINGERPRINT, DEFAULT_SHAPING, type DispatchSettings, type FingerprintConstants, type ShapingConstants } from '../config.js';
import { EngineError, isEngineError } from '../errors.js';
import { startAnalysis, type AnalysisHandle } from '../analysis/AnalysisTask.js';
import { decodeWav } from '../analysis/wavInput.js';
import type { CommandSink } from '../dispatch/CommandSink.js';
import type { DlinLibrarian } from '../dispatch/dlin.js';
import { DispatchThrottler, type DispatchReport } from '../dispatch/DispatchThrottler.js';
import { assertPad, assertSlider, computeFromState, type ShapingState } from '../engine/interpolate.js';
import type { ProfileName, VoiceProfile } from '../profile/schema.js';
import { defaultProfileTable, getProfile, type ProfileTable } from '../profile/table.js';
import type { SlotStore } from '../slots/slotStore.js';
import type { ControlEvent, SessionSnapshot, SliderName } from '../types/control.js';
import { formantVector, type Fingerprint, type PadPoint } from '../types/formant.js';
import { ABStore } from './ABStore.js';

export interface SessionOptions {
  sink: CommandSink;
  slots?: SlotStore;
  /** Slot dump and copy on the instrument; absent in dry-run. */
  librarian?: DlinLibrarian;
  profiles?: ProfileTable;
  shaping?: ShapingConstants;
  fingerprint?: FingerprintConstants;
  dispatch?: Partial<DispatchSettings>;
  initialProfile?: ProfileName;
  onChange?: (snapshot: SessionSnapshot) => void;
  onDispatch?: (report: DispatchReport) => void;
  onAnalysisProgress?: (taskId: number, fraction: number) => void;
}

export class Session {
  private readonly ab = new ABStore();
  private readonly throttler: DispatchThrottler;
  private readonly profiles: ProfileTable;
  private readonly shaping: ShapingConstants;
  private readonly fingerprintConstants: FingerprintConstants;
  private readonly slots?: SlotStore;
  private readonly librarian?: DlinLibrarian;
  private readonly onChange?: (snapshot: SessionSnapshot) => void;
  private readonly onAnalysisProgress?: (taskId: number, fraction: number) => void;

  private pad: PadPoint = { x: 0, y: 0 };
  private profile: VoiceProfile;
  private brightness = 0;
  private resonance = 0;
  private baseSlot: number | null = null;
  private savedSlot: number | null = null;
  private fingerprint: Fingerprint | null = null;
  private analysis: AnalysisHandle | null = null;

  constructor(options: SessionOptions) {
    this.profiles = options.profiles ?? defaultProfileTable();
    this.shaping = options.shaping ?? DEFAULT_SHAPING;
    this.fingerprintConstants = options.fingerprint ?? DEFAULT_FINGERPRINT;
    this.slots = options.slots;
    this.librarian = options.librarian;
    this.onChange = options.onChange;
    this.onAnalysisProgress = options.onAnalysisProgress;
    this.profile = getProfile(options.initialProfile ?? 'Neutral', this.profiles);
    this.throttler = new DispatchThrottler(options.sink, {
      ranges: this.shaping.ranges,
      minIntervalMs: options.dispatch?.minIntervalMs,
      diff: options.dispatch?.diff,
      onReport: options.onDispatch,
    });
  }

  // ── Event loop ───────────────────────────────────────────────

  handle(event: ControlEvent): SessionSnapshot {
    switch (event.type) {
      case 'pad_moved':
        assertPad(event.pad);
        this.reshape({ pad: { x: event.pad.x, y: event.pad.y } });
        break;

      case 'slider_changed':
        assertSlider(event.slider, event.value);
        this.reshape(sliderUpdate(event.slider, event.value));
        break;

      case 'profile_selected':
        this.reshape({ profile: getProfile(event.profile, this.profiles) });
        break;

      case 'toggle_requested': {
        this.ab.toggle();
        const current = this.ab.current();
        // The destination may hold anything after a toggle: always resend everything
        if (current) this.throttler.submit(current, { full: true });
        break;
      }

      case 'base_captured': {
        const base = formantVector(event.vector);
        this.reshape({ base });
        this.baseSlot = event.slot ?? null;
        break;
      }

      case 'wav_analyzed':
        if (this.analysis?.id !== event.taskId) {
          console.log(`[control] dropping stale analysis #${event.taskId}`);
          return this.snapshot();
        }
        this.analysis = null;
        this.fingerprint = event.fingerprint;
        break;

      case 'snap_to_fingerprint':
        if (!this.fingerprint) {
          throw new EngineError('NO_FINGERPRINT', 'Analyze a WAV file before snapping to its fingerprint');
        }
        this.reshape({ pad: this.fingerprint.pad });
        break;

      case 'processed_committed':
        this.savedSlot = event.slot;
        break;

      case 'base_committed': {
        const processed = this.ab.processed;
        if (!processed) {
          throw new EngineError('MISSING_BASE', 'Nothing to commit: capture a base preset first');
        }
        // The shaping now lives in the base: return to the neutral pad and sliders
        this.reshape(
          { base: processed, pad: { x: 0, y: 0 }, brightness: 0, resonance: 0 },
          { baseOnInstrument: false }
        );
        this.baseSlot = null;
        // The audible side on A changed too
        if (this.ab.state === 'base') this.throttler.submit(processed);
        break;
      }
    }

    const snapshot = this.snapshot();
    this.onChange?.(snapshot);
    return snapshot;
  }

  /**
   * Compute the processed vector for the candidate state, then commit it.
   * Compute throws before anything is assigned.
   */
  private reshape(update: Partial<ShapingState>, options: { baseOnInstrument?: boolean } = {}): void {
    const next: ShapingState = {
      pad: update.pad ?? this.pad,
      profile: update.profile ?? this.profile,
      brightness: update.brightness ?? this.brightness,
      resonance: update.resonance ?? this.resonance,
      base: update.base ?? this.ab.base,
    };
    const processed = next.base ? computeFromState(next, this.shaping) : null;

    this.pad = next.pad;
    this.profile = next.profile;
    this.brightness = next.brightness;
    this.resonance = next.resonance;
    if (update.base) {
      this.ab.setCapturedBase(update.base);
      // Captured from the destination, so it already holds these values
      if (options.baseOnInstrument ?? true) this.throttler.markDispatched(update.base);
    }
    if (!processed) return;

    this.ab.setProcessed(processed);
    if (this.ab.state === 'processed') this.throttler.submit(processed);
  }

  // ── Async helpers ────────────────────────────────────────────

  private requireSlots(): SlotStore {
    if (!this.slots) throw new Error('No slot store configured for this session');
    return this.slots;
  }

  async captureBaseFromSlot(slot: number): Promise<SessionSnapshot> {
    const record = await this.requireSlots().readSlot(slot);
    console.log(`[control] captured base from slot ${slot} ("${record.name}")`);
    return this.handle({ type: 'base_captured', vector: record.vector, slot });
  }

  async saveProcessedToSlot(slot: number, name?: string): Promise<SessionSnapshot> {
    const processed = this.ab.processed;
    if (!processed) {
      throw new EngineError('MISSING_BASE', 'Nothing to save: capture a base preset first');
    }
    const record = await this.requireSlots().writeSlot(slot, processed, name);
    console.log(`[control] saved processed vector to slot ${slot} ("${record.name}")`);
    return this.handle({ type: 'processed_committed', slot });
  }

  private requireLibrarian(): DlinLibrarian {
    if (!this.librarian) throw new Error('No librarian configured for this session');
    return this.librarian;
  }

  /** Save an instrument slot to `<name>.dlp`. Knob dispatch waits while the librarian runs. */
  async dumpSlotToFile(slot: number, name: string): Promise<void> {
    const librarian = this.requireLibrarian();
    await this.throttler.exclusive(() => librarian.dump(slot, name));
    console.log(`[control] dumped slot ${slot} to ${name}.dlp`);
  }

  async copySlot(from: number, to: number): Promise<void> {
    const librarian = this.requireLibrarian();
    await this.throttler.exclusive(() => librarian.copySlot(from, to));
    console.log(`[control] copied slot ${from} to slot ${to}`);
  }

  /**
   * Decode and analyze a WAV clip in the background. Any analysis already
   * running is cancelled; its promise rejects with ANALYSIS_CANCELLED.
   */
  async analyzeWav(bytes: Uint8Array): Promise<Fingerprint> {
    const wav = decodeWav(bytes);
    this.cancelAnalysis();

    const task = startAnalysis(wav.samples, wav.sampleRate, {
      constants: this.fingerprintConstants,
      onProgress: (fraction) => this.onAnalysisProgress?.(task.id, fraction),
    });
    this.analysis = task;
    this.onChange?.(this.snapshot());

    let fingerprint: Fingerprint;
    try {
      fingerprint = await task.promise;
    } catch (err) {
      if (this.analysis === task) {
        this.analysis = null;
        this.onChange?.(this.snapshot());
      }
      if (!isEngineError(err, 'ANALYSIS_CANCELLED')) {
        console.error(`[analyze] task #${task.id} failed:`, err);
      }
      throw err;
    }

    this.handle({ type: 'wav_analyzed', taskId: task.id, fingerprint });
    return fingerprint;
  }

  cancelAnalysis(): boolean {
    if (!this.analysis) return false;
    this.analysis.cancel();
    this.analysis = null;
    return true;
  }

  /** Resend the audible vector in full, e.g. after a dispatch failure. */
  retryDispatch(): void {
    const current = this.ab.current();
    if (!current) {
      throw new EngineError('MISSING_BASE', 'Nothing to dispatch: capture a base preset first');
    }
    this.throttler.submit(current, { full: true });
  }

  idle(): Promise<void> {
    return this.throttler.idle();
  }

  dispose(): void {
    this.cancelAnalysis();
    this.throttler.cancelPending();
  }

  // ── View ─────────────────────────────────────────────────────

  snapshot(): SessionSnapshot {
    return Object.freeze({
      abState: this.ab.state,
      profile: this.profile.name,
      pad: Object.freeze({ ...this.pad }),
      brightness: this.brightness,
      resonance: this.resonance,
      base: this.ab.base,
      processed: this.ab.processed,
      current: this.ab.current(),
      baseSlot: this.baseSlot,
      savedSlot: this.savedSlot,
      fingerprint: this.fingerprint,
      analyzing: this.analysis !== null,
    });
  }
}

function sliderUpdate(slider: SliderName, value: number): Partial<ShapingState> {
  return slider === 'brightness' ? { brightness: value } : { resonance: value };
}
