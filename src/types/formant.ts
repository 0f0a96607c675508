/**
 * Formant parameter model shared by the engine, the analyzer and the
 * dispatch path.
 *
 * Pad domain is fixed to [-1, 1] x [-1, 1]:
 *   x: dark (-1) -> bright (+1)
 *   y: chest (-1) -> head (+1)
 */

import { z } from 'zod';

export const FORMANT_INDICES = [1, 2, 3, 4] as const;
export type FormantIndex = (typeof FORMANT_INDICES)[number];

export type FrequencyField = `F${FormantIndex}`;
export type LevelField = `L${FormantIndex}`;
export type ResonanceField = `R${FormantIndex}`;
export type FormantField = FrequencyField | LevelField | ResonanceField;

/** Dispatch order. The librarian applies commands sequentially in this order. */
export const FORMANT_FIELDS: readonly FormantField[] = [
  'F1', 'F2', 'F3', 'F4',
  'L1', 'L2', 'L3', 'L4',
  'R1', 'R2', 'R3', 'R4',
];

export type FormantVector = Readonly<Record<FormantField, number>>;

export type FieldKind = 'frequency' | 'level' | 'resonance';

export function fieldKind(field: FormantField): FieldKind {
  switch (field[0]) {
    case 'F': return 'frequency';
    case 'L': return 'level';
    default: return 'resonance';
  }
}

export function frequencyField(i: FormantIndex): FrequencyField {
  return `F${i}`;
}

export function levelField(i: FormantIndex): LevelField {
  return `L${i}`;
}

export function resonanceField(i: FormantIndex): ResonanceField {
  return `R${i}`;
}

export const FormantVectorSchema = z.object({
  F1: z.number().finite(), F2: z.number().finite(), F3: z.number().finite(), F4: z.number().finite(),
  L1: z.number().finite(), L2: z.number().finite(), L3: z.number().finite(), L4: z.number().finite(),
  R1: z.number().finite(), R2: z.number().finite(), R3: z.number().finite(), R4: z.number().finite(),
});

/** Validate and freeze a vector. Extra keys are dropped. */
export function formantVector(values: Record<FormantField, number>): FormantVector {
  return Object.freeze(FormantVectorSchema.parse(values));
}

/** Build a vector field by field, in dispatch order. */
export function vectorFrom(fn: (field: FormantField) => number): FormantVector {
  return formantVector({
    F1: fn('F1'), F2: fn('F2'), F3: fn('F3'), F4: fn('F4'),
    L1: fn('L1'), L2: fn('L2'), L3: fn('L3'), L4: fn('L4'),
    R1: fn('R1'), R2: fn('R2'), R3: fn('R3'), R4: fn('R4'),
  });
}

/** Soft invariant: F1 < F2 < F3 < F4. */
export function frequenciesAscending(v: FormantVector): boolean {
  return v.F1 < v.F2 && v.F2 < v.F3 && v.F3 < v.F4;
}

export interface PadPoint {
  readonly x: number;
  readonly y: number;
}

export const PAD_MIN = -1;
export const PAD_MAX = 1;

export type ABState = 'base' | 'processed';

export interface ParamCommand {
  readonly param: FormantField;
  readonly value: number;
}

export interface ValueRange {
  readonly min: number;
  readonly max: number;
}

/** Sink-facing bounds per field kind. */
export interface ParamRanges {
  readonly frequencyHz: ValueRange;
  readonly level: ValueRange;
  readonly resonance: ValueRange;
}

export function rangeFor(ranges: ParamRanges, field: FormantField): ValueRange {
  switch (fieldKind(field)) {
    case 'frequency': return ranges.frequencyHz;
    case 'level': return ranges.level;
    default: return ranges.resonance;
  }
}

export type FingerprintConfidence = 'normal' | 'low';

export interface FingerprintMetadata {
  readonly sampleRate: number;
  readonly frameSize: number;
  readonly frameCount: number;
  readonly durationSec: number;
  readonly rmsDbfs: number;
  readonly peakDbfs: number;
  /** Sum of frame energies (windowed, squared samples). */
  readonly energy: number;
  readonly f0Hz: number | null;
}

export interface Fingerprint {
  readonly pad: PadPoint;
  readonly centroidHz: number;
  /** 10*log10(head band power / chest band power). */
  readonly bandBalanceDb: number;
  readonly confidence: FingerprintConfidence;
  readonly lowConfidenceReasons: readonly string[];
  readonly metadata: FingerprintMetadata;
}
