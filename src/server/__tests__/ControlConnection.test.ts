import { afterEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_CONFIG, type AppConfig } from '../../config.js';
import type { CommandSink } from '../../dispatch/CommandSink.js';
import { DlinLibrarian } from '../../dispatch/dlin.js';
import { EngineError } from '../../errors.js';
import { defaultProfileTable } from '../../profile/table.js';
import type { SlotMeta, SlotRecord, SlotStore } from '../../slots/slotStore.js';
import type { ServerMessage } from '../../types/control.js';
import { formantVector, type FormantVector, type ParamCommand } from '../../types/formant.js';
import { ControlConnection, type ControlSocket } from '../services/ControlConnection.js';

const BASE = formantVector({
  F1: 500, F2: 1500, F3: 2500, F4: 3500,
  L1: 60, L2: 50, L3: 40, L4: 30,
  R1: 3, R2: 4, R3: 5, R4: 6,
});

const CONFIG: AppConfig = { ...DEFAULT_CONFIG, dispatch: { minIntervalMs: 0, diff: true } };

class FakeSocket implements ControlSocket {
  readyState = 1;
  readonly frames: string[] = [];

  send(data: string): void {
    this.frames.push(data);
  }

  messages(): ServerMessage[] {
    return this.frames.map((f) => JSON.parse(f));
  }

  last(): ServerMessage | undefined {
    return this.messages().at(-1);
  }
}

class OneSlotStore implements SlotStore {
  async readSlot(slot: number): Promise<SlotRecord> {
    if (slot !== 4) throw new EngineError('SLOT_NOT_FOUND', `Slot ${slot} has no saved vector`);
    return { slot, name: 'reference', savedAt: '2026-01-01T00:00:00.000Z', vector: BASE };
  }

  async writeSlot(slot: number, vector: FormantVector, name?: string): Promise<SlotRecord> {
    return { slot, name: name ?? `Slot ${slot}`, savedAt: '2026-01-01T00:00:00.000Z', vector };
  }

  async listSlots(): Promise<SlotMeta[]> {
    return [];
  }
}

class RecordingSink implements CommandSink {
  readonly sent: ParamCommand[] = [];
  async send(command: ParamCommand): Promise<void> {
    this.sent.push(command);
  }
}

/** Holds every send until released. */
class GatedSink implements CommandSink {
  readonly sent: ParamCommand[] = [];
  private held = true;
  private waiters: Array<() => void> = [];

  get waiting(): number {
    return this.waiters.length;
  }

  async send(command: ParamCommand): Promise<void> {
    if (this.held) await new Promise<void>((resolve) => this.waiters.push(resolve));
    this.sent.push(command);
  }

  release(): void {
    this.held = false;
    for (const wake of this.waiters.splice(0)) wake();
  }
}

function connect(now: () => number = Date.now, extra: { sink?: CommandSink; librarian?: DlinLibrarian; linkFree?: Promise<void> } = {}) {
  const socket = new FakeSocket();
  const sink = new RecordingSink();
  const connection = new ControlConnection(socket, {
    config: CONFIG,
    profiles: defaultProfileTable(),
    slots: new OneSlotStore(),
    sink: extra.sink ?? sink,
    librarian: extra.librarian,
    linkFree: extra.linkFree,
    now,
  });
  return { socket, sink, connection };
}

const hello = JSON.stringify({ type: 'hello', protocolVersion: 1 });

describe('ControlConnection', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('acknowledges hello with the profile list and initial state', async () => {
    const { socket, connection } = connect();
    await connection.handleRaw(JSON.stringify({ type: 'hello', protocolVersion: 1 }));

    expect(connection.initialized).toBe(true);
    const ack = socket.last();
    expect(ack?.type).toBe('hello_ack');
    if (ack?.type !== 'hello_ack') return;
    expect(ack.protocolVersion).toBe(1);
    expect(ack.profiles).toHaveLength(7);
    expect(ack.profiles).toContain('Tenor');
    expect(ack.state).toMatchObject({ abState: 'processed', profile: 'Neutral', base: null });
  });

  it('refuses a different protocol version', async () => {
    const { socket, connection } = connect();
    await connection.handleRaw(JSON.stringify({ type: 'hello', protocolVersion: 2 }));
    expect(connection.initialized).toBe(false);
    expect(socket.last()).toEqual({
      type: 'error',
      code: 'PROTOCOL_MISMATCH',
      message: 'Server speaks protocol v1, client sent v2',
    });
  });

  it('requires hello before session messages', async () => {
    const { socket, connection } = connect();
    await connection.handleRaw(JSON.stringify({ type: 'toggle_requested' }));
    expect(socket.last()).toEqual({ type: 'error', code: 'NOT_INITIALIZED', message: 'Send hello first' });
  });

  it('reports unparseable and invalid frames', async () => {
    const { socket, connection } = connect();
    await connection.handleRaw('{not json');
    const parseError = socket.last();
    expect(parseError?.type === 'error' && parseError.code).toBe('PARSE_ERROR');

    await connection.handleRaw(JSON.stringify({ type: 'pad_moved', x: 3, y: 0 }));
    const invalid = socket.last();
    expect(invalid?.type === 'error' && invalid.message.startsWith('Invalid message: x: ')).toBe(true);
  });

  it('answers ping with pong', async () => {
    vi.spyOn(Date, 'now').mockReturnValue(1234);
    const { socket, connection } = connect(() => 0);
    await connection.handleRaw(JSON.stringify({ type: 'ping', clientTimestamp: 5 }));
    expect(socket.last()).toEqual({ type: 'pong', clientTimestamp: 5, serverTimestamp: 1234 });
  });

  it('streams state and dispatch results for pad moves', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { socket, sink, connection } = connect();
    await connection.handleRaw(JSON.stringify({ type: 'hello', protocolVersion: 1 }));
    await connection.handleRaw(JSON.stringify({ type: 'capture_base', slot: 4 }));
    await connection.handleRaw(JSON.stringify({ type: 'pad_moved', x: 1, y: 0 }));

    await vi.waitFor(() => expect(sink.sent).toHaveLength(4));

    const types = socket.messages().map((m) => m.type);
    expect(types).toEqual(['hello_ack', 'state', 'state', 'dispatch']);
    const dispatch = socket.last();
    expect(dispatch).toEqual({
      type: 'dispatch',
      status: 'sent',
      full: false,
      sent: [
        { param: 'F1', value: 575 },
        { param: 'F2', value: 1725 },
        { param: 'F3', value: 2875 },
        { param: 'F4', value: 4000 },
      ],
      clamps: [expect.stringMatching(/^F4 clamped from 402\d(\.\d+)? to 4000$/)],
    });
  });

  it('forwards engine errors with their code', async () => {
    const { socket, connection } = connect();
    await connection.handleRaw(JSON.stringify({ type: 'hello', protocolVersion: 1 }));

    await connection.handleRaw(JSON.stringify({ type: 'toggle_requested' }));
    expect(socket.last()).toEqual({
      type: 'error',
      code: 'MISSING_BASE',
      message: 'Capture a base preset before toggling A/B',
    });

    await connection.handleRaw(JSON.stringify({ type: 'capture_base', slot: 9 }));
    expect(socket.last()).toEqual({ type: 'error', code: 'SLOT_NOT_FOUND', message: 'Slot 9 has no saved vector' });
  });

  it('rate limits a flood once per burst', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { socket, connection } = connect(() => 0);
    for (let i = 0; i < 202; i++) {
      await connection.handleMessage({ type: 'ping', clientTimestamp: i });
    }
    const messages = socket.messages();
    expect(messages.filter((m) => m.type === 'pong')).toHaveLength(200);
    expect(messages.filter((m) => m.type === 'error')).toEqual([
      { type: 'error', code: 'RATE_LIMITED', message: 'Too many messages (>200/sec). Slow down.' },
    ]);
  });

  it('sends nothing once the socket has closed', async () => {
    const { socket, connection } = connect();
    socket.readyState = 3;
    await connection.handleRaw(JSON.stringify({ type: 'ping', clientTimestamp: 1 }));
    expect(socket.frames).toEqual([]);
  });

  it('holds a new session until the previous connection has finished sending', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const link = new GatedSink();
    const first = connect(Date.now, { sink: link });
    await first.connection.handleRaw(hello);
    await first.connection.handleRaw(JSON.stringify({ type: 'capture_base', slot: 4 }));
    await first.connection.handleRaw(JSON.stringify({ type: 'pad_moved', x: 1, y: 0 }));
    await vi.waitFor(() => expect(link.waiting).toBe(1));

    const drained = first.connection.destroy();
    expect(first.connection.destroy()).toBe(drained);

    const second = connect(Date.now, { sink: link, linkFree: drained });
    const greeting = second.connection.handleRaw(hello);
    await new Promise((resolve) => setTimeout(resolve, 5));
    expect(second.socket.frames).toEqual([]);
    expect(second.connection.initialized).toBe(false);

    link.release();
    await greeting;
    expect(link.sent.map((c) => c.param)).toEqual(['F1', 'F2', 'F3', 'F4']);
    expect(second.socket.last()?.type).toBe('hello_ack');
    expect(second.connection.initialized).toBe(true);
  });

  it('commits the processed vector into the base', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { socket, connection } = connect();
    await connection.handleRaw(hello);
    await connection.handleRaw(JSON.stringify({ type: 'capture_base', slot: 4 }));
    await connection.handleRaw(JSON.stringify({ type: 'pad_moved', x: -1, y: 0 }));
    await connection.handleRaw(JSON.stringify({ type: 'commit_to_base' }));

    const state = socket.messages().filter((m) => m.type === 'state').at(-1);
    expect(state?.type === 'state' && state.state.base?.F1).toBeCloseTo(425, 9);
    expect(state?.type === 'state' && state.state.pad).toEqual({ x: 0, y: 0 });
  });

  it('dumps and copies instrument slots', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const calls: string[][] = [];
    const librarian = new DlinLibrarian(async (args) => {
      calls.push([...args]);
      return { stdout: '', stderr: '' };
    });
    const { socket, connection } = connect(Date.now, { librarian });
    await connection.handleRaw(hello);

    await connection.handleRaw(JSON.stringify({ type: 'dump_slot', slot: 2, name: 'bright_alto' }));
    expect(socket.last()).toEqual({ type: 'slot_done', action: 'dump', message: 'Slot 2 saved to bright_alto.dlp' });

    await connection.handleRaw(JSON.stringify({ type: 'copy_slot', from: 2, to: 6 }));
    expect(socket.last()).toEqual({ type: 'slot_done', action: 'copy', message: 'Slot 2 copied to slot 6' });

    await connection.handleRaw(JSON.stringify({ type: 'dump_slot', slot: 2, name: '../escape' }));
    const rejected = socket.last();
    expect(rejected?.type === 'error' && rejected.code).toBe('PARSE_ERROR');

    expect(calls).toEqual([
      ['dump', '-s', '2', '-f', 'bright_alto'],
      ['dump', '-s', '2', '-f', '_formant_pad_copy'],
      ['pump', '-f', '_formant_pad_copy', '-s', '6'],
    ]);
  });
});
