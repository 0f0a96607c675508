import { clamp } from '../engine/curves.js';
import { FORMANT_FIELDS, rangeFor } from '../types/formant.js';
import type { FormantField, FormantVector, ParamCommand, ParamRanges } from '../types/formant.js';

export interface CommandBatch {
  commands: ParamCommand[];
  /** Human-readable note per value that had to be pulled into range. */
  clamps: string[];
}

/** Value as the sink will receive it: clamped into range, integer knob steps. */
export function sinkValue(field: FormantField, value: number, ranges: ParamRanges): number {
  const r = rangeFor(ranges, field);
  return Math.round(clamp(value, r.min, r.max));
}

/**
 * Turn a vector into parameter commands, always in FORMANT_FIELDS order.
 * `fields` restricts the batch (diff dispatch) without changing the order.
 */
export function toCommands(
  vector: FormantVector,
  ranges: ParamRanges,
  fields?: ReadonlySet<FormantField>
): CommandBatch {
  const commands: ParamCommand[] = [];
  const clamps: string[] = [];
  for (const param of FORMANT_FIELDS) {
    if (fields && !fields.has(param)) continue;
    const raw = vector[param];
    const r = rangeFor(ranges, param);
    if (raw < r.min || raw > r.max) {
      clamps.push(`${param} clamped from ${raw} to ${clamp(raw, r.min, r.max)}`);
    }
    commands.push({ param, value: sinkValue(param, raw, ranges) });
  }
  return { commands, clamps };
}
