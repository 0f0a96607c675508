/**
 * Pad interpolation: (base, pad, profile, sliders) -> processed vector.
 *
 * For each formant index, identically:
 *   wy    = clamp(|y|, 0, 1)
 *   shift = 1 + kBright * x * (1 + brightness)
 *   Fi = lerp(base.Fi, profile.Fi, wy) * shift
 *   Li = clamp(lerp(base.Li, profile.Li, wy) * (1 - kRes * max(0, resonance)), 0, LMAX)
 *   Ri = clamp(lerp(base.Ri, profile.Ri, wy) * (1 - kResQ * resonance), RMIN, RMAX)
 *
 * Brightness is the intensity of the pad-x shift (-1 disables it, +1 doubles
 * it). Positive resonance is reduction intent: it lowers levels and Q;
 * negative resonance raises Q and leaves levels alone.
 */

import { DEFAULT_SHAPING, type ShapingConstants } from '../config.js';
import { EngineError } from '../errors.js';
import type { VoiceProfile } from '../profile/schema.js';
import {
  PAD_MAX,
  PAD_MIN,
  fieldKind,
  vectorFrom,
  type FormantField,
  type FormantVector,
  type PadPoint,
} from '../types/formant.js';
import { clamp, lerp } from './curves.js';

export interface ShapingState {
  base: FormantVector | null;
  pad: PadPoint;
  profile: VoiceProfile;
  brightness: number;
  resonance: number;
}

export function assertPad(pad: PadPoint): void {
  const inDomain = (v: number) => Number.isFinite(v) && v >= PAD_MIN && v <= PAD_MAX;
  if (!inDomain(pad.x) || !inDomain(pad.y)) {
    throw new EngineError('INVALID_PAD', `Pad point (${pad.x}, ${pad.y}) outside [${PAD_MIN}, ${PAD_MAX}]²`, {
      details: { x: pad.x, y: pad.y },
    });
  }
}

export function assertSlider(name: 'brightness' | 'resonance', value: number): void {
  if (!Number.isFinite(value) || value < -1 || value > 1) {
    throw new EngineError('INVALID_SLIDER', `${name} slider ${value} outside [-1, 1]`, {
      details: { slider: name, value },
    });
  }
}

export function compute(
  base: FormantVector | null,
  pad: PadPoint,
  profile: VoiceProfile,
  brightness: number,
  resonance: number,
  constants: ShapingConstants = DEFAULT_SHAPING
): FormantVector {
  assertPad(pad);
  assertSlider('brightness', brightness);
  assertSlider('resonance', resonance);
  if (!base) {
    throw new EngineError('MISSING_BASE', 'No base preset captured; capture the current slot first');
  }

  const { kBright, kRes, kResQ, ranges } = constants;
  const target = profile.canonical;
  const wy = clamp(Math.abs(pad.y), 0, 1);
  const shift = 1 + kBright * pad.x * (1 + brightness);
  const levelGain = 1 - kRes * Math.max(0, resonance);
  const qGain = 1 - kResQ * resonance;

  return vectorFrom((field: FormantField) => {
    const blended = lerp(base[field], target[field], wy);
    switch (fieldKind(field)) {
      case 'frequency':
        return blended * shift;
      case 'level':
        return clamp(blended * levelGain, ranges.level.min, ranges.level.max);
      case 'resonance':
        return clamp(blended * qGain, ranges.resonance.min, ranges.resonance.max);
    }
  });
}

export function computeFromState(state: ShapingState, constants: ShapingConstants = DEFAULT_SHAPING): FormantVector {
  return compute(state.base, state.pad, state.profile, state.brightness, state.resonance, constants);
}
