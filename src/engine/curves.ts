export function clamp(v: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, v));
}

export function lerp(a: number, b: number, t: number): number {
  return a * (1 - t) + b * t;
}

/** Map `v` from [lo, hi] onto [-1, 1], clamped. */
export function toBipolar(v: number, lo: number, hi: number): number {
  return clamp((2 * (v - lo)) / (hi - lo) - 1, -1, 1);
}

export function linearToDb(amplitude: number): number {
  return amplitude > 0 ? 20 * Math.log10(amplitude) : -Infinity;
}

export function powerRatioToDb(ratio: number): number {
  return 10 * Math.log10(ratio);
}

/**
 * Hz -> librarian knob value for the formant frequency knobs.
 * The instrument's knob scale is linear over the sink's frequency range.
 */
export function hzToKnobValue(
  hz: number,
  loHz: number = 200,
  hiHz: number = 4000,
  knobLo: number = 100,
  knobHi: number = 3500
): number {
  const t = (clamp(hz, loHz, hiHz) - loHz) / (hiHz - loHz);
  return Math.round(knobLo + t * (knobHi - knobLo));
}
