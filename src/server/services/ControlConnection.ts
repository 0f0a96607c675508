import type { AppConfig } from '../../config.js';
import type { CommandSink } from '../../dispatch/CommandSink.js';
import type { DispatchReport } from '../../dispatch/DispatchThrottler.js';
import type { DlinLibrarian } from '../../dispatch/dlin.js';
import { errorMessage, isEngineError } from '../../errors.js';
import type { ProfileTable } from '../../profile/table.js';
import { Session } from '../../session/Session.js';
import type { SlotStore } from '../../slots/slotStore.js';
import {
  CONTROL_PROTOCOL_VERSION,
  ClientMessageSchema,
  type ClientMessage,
  type ServerMessage,
} from '../../types/control.js';

const MAX_MSGS_PER_SEC = 200;       // pad drags arrive at pointer rate
const OPEN = 1;

/** The part of a ws WebSocket the connection uses. */
export interface ControlSocket {
  readonly readyState: number;
  send(data: string): void;
}

export interface ControlConnectionDeps {
  config: AppConfig;
  profiles: ProfileTable;
  slots: SlotStore;
  sink: CommandSink;
  librarian?: DlinLibrarian;
  /**
   * Resolves once the previous connection's last dispatch has finished.
   * The session is not created before then: the sink is one serial link.
   */
  linkFree?: Promise<void>;
  now?: () => number;
}

/**
 * One pad UI attached over WebSocket. Translates wire messages into session
 * events and session output back into wire messages.
 */
export class ControlConnection {
  private readonly socket: ControlSocket;
  private readonly deps: ControlConnectionDeps;
  private readonly now: () => number;
  private session: Session | null = null;
  private drained: Promise<void> | null = null;

  // Rate limiter (sliding window)
  private msgTimestamps: number[] = [];
  private rateLimitWarned = false;

  constructor(socket: ControlSocket, deps: ControlConnectionDeps) {
    this.socket = socket;
    this.deps = deps;
    this.now = deps.now ?? Date.now;
  }

  get initialized(): boolean {
    return this.session !== null;
  }

  // ── Lifecycle ────────────────────────────────────────────────

  private async init(protocolVersion: number): Promise<void> {
    if (protocolVersion !== CONTROL_PROTOCOL_VERSION) {
      this.sendError('PROTOCOL_MISMATCH',
        `Server speaks protocol v${CONTROL_PROTOCOL_VERSION}, client sent v${protocolVersion}`);
      return;
    }

    if (this.deps.linkFree) await this.deps.linkFree;
    if (this.destroyed) return;

    if (!this.session) {
      const { config, profiles, slots, sink, librarian } = this.deps;
      this.session = new Session({
        sink,
        slots,
        librarian,
        profiles,
        shaping: config.shaping,
        fingerprint: config.fingerprint,
        dispatch: config.dispatch,
        onChange: (state) => this.send({ type: 'state', state }),
        onDispatch: (report) => this.sendDispatch(report),
        onAnalysisProgress: (taskId, fraction) => this.send({ type: 'analysis_progress', taskId, fraction }),
      });
    }

    this.send({
      type: 'hello_ack',
      protocolVersion: CONTROL_PROTOCOL_VERSION,
      profiles: [...this.deps.profiles.profiles.keys()],
      state: this.session.snapshot(),
    });
  }

  /**
   * Stop background work on disconnect. Queued dispatches are dropped; the
   * returned promise resolves when the one already in flight has finished.
   */
  destroy(): Promise<void> {
    if (!this.drained) {
      const session = this.session;
      session?.dispose();
      this.session = null;
      this.msgTimestamps = [];
      this.drained = session ? session.idle() : Promise.resolve();
    }
    return this.drained;
  }

  private get destroyed(): boolean {
    return this.drained !== null;
  }

  // ── Message dispatch ─────────────────────────────────────────

  /** Handle one raw frame from the socket. Never throws. */
  async handleRaw(raw: string): Promise<void> {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      this.sendError('PARSE_ERROR', `Invalid message: ${errorMessage(err)}`);
      return;
    }
    const parsed = ClientMessageSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      this.sendError('PARSE_ERROR', `Invalid message: ${issue ? `${issue.path.join('.') || 'type'}: ${issue.message}` : 'unknown'}`);
      return;
    }
    await this.handleMessage(parsed.data);
  }

  async handleMessage(msg: ClientMessage): Promise<void> {
    // Rate limit: sliding 1-second window
    const now = this.now();
    this.msgTimestamps.push(now);
    while (this.msgTimestamps.length > 0 && this.msgTimestamps[0] < now - 1000) {
      this.msgTimestamps.shift();
    }
    if (this.msgTimestamps.length > MAX_MSGS_PER_SEC) {
      if (!this.rateLimitWarned) {
        this.rateLimitWarned = true;
        this.sendError('RATE_LIMITED', `Too many messages (>${MAX_MSGS_PER_SEC}/sec). Slow down.`);
        console.warn(`[control] Rate limited session (${this.msgTimestamps.length} msgs in 1s)`);
      }
      return;
    }
    this.rateLimitWarned = false;

    if (msg.type === 'hello') {
      await this.init(msg.protocolVersion);
      return;
    }
    if (msg.type === 'ping') {
      this.send({ type: 'pong', clientTimestamp: msg.clientTimestamp, serverTimestamp: Date.now() });
      return;
    }

    const session = this.session;
    if (!session) {
      this.sendError('NOT_INITIALIZED', 'Send hello first');
      return;
    }

    try {
      switch (msg.type) {
        case 'pad_moved':
          session.handle({ type: 'pad_moved', pad: { x: msg.x, y: msg.y } });
          break;

        case 'slider_changed':
          session.handle({ type: 'slider_changed', slider: msg.slider, value: msg.value });
          break;

        case 'profile_selected':
          session.handle({ type: 'profile_selected', profile: msg.profile });
          break;

        case 'toggle_requested':
          session.handle({ type: 'toggle_requested' });
          break;

        case 'snap_to_fingerprint':
          session.handle({ type: 'snap_to_fingerprint' });
          break;

        case 'commit_to_base':
          session.handle({ type: 'base_committed' });
          break;

        case 'capture_base':
          await session.captureBaseFromSlot(msg.slot);
          break;

        case 'save_processed':
          await session.saveProcessedToSlot(msg.slot, msg.name);
          break;

        case 'dump_slot':
          await session.dumpSlotToFile(msg.slot, msg.name);
          this.send({ type: 'slot_done', action: 'dump', message: `Slot ${msg.slot} saved to ${msg.name}.dlp` });
          break;

        case 'copy_slot':
          await session.copySlot(msg.from, msg.to);
          this.send({ type: 'slot_done', action: 'copy', message: `Slot ${msg.from} copied to slot ${msg.to}` });
          break;

        case 'analyze_wav': {
          const fingerprint = await session.analyzeWav(Buffer.from(msg.base64, 'base64'));
          if (session.snapshot().fingerprint === fingerprint) {
            this.send({ type: 'fingerprint', fingerprint });
          }
          break;
        }

        case 'cancel_analysis':
          session.cancelAnalysis();
          break;

        case 'retry_dispatch':
          session.retryDispatch();
          break;
      }
    } catch (err) {
      if (isEngineError(err, 'ANALYSIS_CANCELLED')) {
        console.log(`[control] ${err.message}`);
        return;
      }
      if (isEngineError(err)) {
        this.sendError(err.code, err.message);
        return;
      }
      console.error('[control] Unexpected error:', err);
      this.sendError('INTERNAL', errorMessage(err));
    }
  }

  // ── Output ───────────────────────────────────────────────────

  private sendDispatch(report: DispatchReport): void {
    if (report.status === 'unchanged') return;
    this.send({
      type: 'dispatch',
      status: report.status,
      full: report.full,
      sent: report.sent,
      clamps: report.clamps,
      ...(report.error ? { error: { code: report.error.code, message: report.error.message } } : {}),
    });
  }

  private send(msg: ServerMessage): void {
    if (this.socket.readyState === OPEN) {
      this.socket.send(JSON.stringify(msg));
    }
  }

  private sendError(code: string, message: string): void {
    this.send({ type: 'error', code, message });
  }
}
