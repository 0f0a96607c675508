/**
 * Control protocol: pad UI <-> control session.
 *
 * Internally every user action is a ControlEvent consumed by the session
 * loop. Over the WebSocket, all messages are JSON with a `type` field;
 * client messages are validated with zod before they reach the session.
 */

import { z } from 'zod';
import type { ProfileName } from '../profile/schema.js';
import type { ABState, Fingerprint, FormantVector, PadPoint, ParamCommand } from './formant.js';

export const CONTROL_PROTOCOL_VERSION = 1;

export type SliderName = 'brightness' | 'resonance';

// ── Session events ───────────────────────────────────────────────

export interface PadMovedEvent {
  type: 'pad_moved';
  pad: PadPoint;
}

export interface SliderChangedEvent {
  type: 'slider_changed';
  slider: SliderName;
  value: number;          // -1..1
}

export interface ProfileSelectedEvent {
  type: 'profile_selected';
  profile: string;
}

export interface ToggleRequestedEvent {
  type: 'toggle_requested';
}

export interface BaseCapturedEvent {
  type: 'base_captured';
  vector: FormantVector;
  slot?: number;
}

export interface WavAnalyzedEvent {
  type: 'wav_analyzed';
  taskId: number;
  fingerprint: Fingerprint;
}

export interface SnapToFingerprintEvent {
  type: 'snap_to_fingerprint';
}

export interface ProcessedCommittedEvent {
  type: 'processed_committed';
  slot: number;
}

/** Make the processed vector the new base. */
export interface BaseCommittedEvent {
  type: 'base_committed';
}

export type ControlEvent =
  | PadMovedEvent
  | SliderChangedEvent
  | ProfileSelectedEvent
  | ToggleRequestedEvent
  | BaseCapturedEvent
  | WavAnalyzedEvent
  | SnapToFingerprintEvent
  | ProcessedCommittedEvent
  | BaseCommittedEvent;

/** Immutable view of the session for display. */
export interface SessionSnapshot {
  readonly abState: ABState;
  readonly profile: ProfileName;
  readonly pad: PadPoint;
  readonly brightness: number;
  readonly resonance: number;
  readonly base: FormantVector | null;
  readonly processed: FormantVector | null;
  /** Vector for the audible side. */
  readonly current: FormantVector | null;
  readonly baseSlot: number | null;
  readonly savedSlot: number | null;
  readonly fingerprint: Fingerprint | null;
  readonly analyzing: boolean;
}

// ── Client → Server ──────────────────────────────────────────────

const unit = z.number().finite().min(-1).max(1);
const slotId = z.number().int().nonnegative();

export const ClientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('hello'), protocolVersion: z.number().int() }),
  z.object({ type: z.literal('pad_moved'), x: unit, y: unit }),
  z.object({ type: z.literal('slider_changed'), slider: z.enum(['brightness', 'resonance']), value: unit }),
  z.object({ type: z.literal('profile_selected'), profile: z.string().min(1) }),
  z.object({ type: z.literal('toggle_requested') }),
  z.object({ type: z.literal('snap_to_fingerprint') }),
  z.object({ type: z.literal('commit_to_base') }),
  z.object({ type: z.literal('capture_base'), slot: slotId }),
  z.object({ type: z.literal('save_processed'), slot: slotId, name: z.string().max(120).optional() }),
  z.object({ type: z.literal('dump_slot'), slot: slotId, name: z.string().regex(/^[\w.-]{1,64}$/) }),
  z.object({ type: z.literal('copy_slot'), from: slotId, to: slotId }),
  z.object({ type: z.literal('analyze_wav'), base64: z.string().min(1) }),
  z.object({ type: z.literal('cancel_analysis') }),
  z.object({ type: z.literal('retry_dispatch') }),
  z.object({ type: z.literal('ping'), clientTimestamp: z.number() }),
]);

export type ClientMessage = z.infer<typeof ClientMessageSchema>;

// ── Server → Client ──────────────────────────────────────────────

export interface HelloAckMessage {
  type: 'hello_ack';
  protocolVersion: number;
  profiles: ProfileName[];
  state: SessionSnapshot;
}

export interface StateMessage {
  type: 'state';
  state: SessionSnapshot;
}

export interface FingerprintMessage {
  type: 'fingerprint';
  fingerprint: Fingerprint;
}

export interface AnalysisProgressMessage {
  type: 'analysis_progress';
  taskId: number;
  fraction: number;       // 0..1
}

export interface DispatchMessage {
  type: 'dispatch';
  status: 'sent' | 'unchanged' | 'failed';
  full: boolean;
  sent: readonly ParamCommand[];
  clamps: readonly string[];
  error?: { code: string; message: string };
}

export interface SlotDoneMessage {
  type: 'slot_done';
  action: 'dump' | 'copy';
  message: string;
}

export interface ErrorMessage {
  type: 'error';
  code: string;
  message: string;
}

export interface PongMessage {
  type: 'pong';
  clientTimestamp: number;
  serverTimestamp: number;
}

export type ServerMessage =
  | HelloAckMessage
  | StateMessage
  | FingerprintMessage
  | AnalysisProgressMessage
  | DispatchMessage
  | SlotDoneMessage
  | ErrorMessage
  | PongMessage;
