import { describe, expect, it } from 'vitest';
import { clamp, hzToKnobValue, lerp, linearToDb, powerRatioToDb, toBipolar } from '../curves.js';

describe('curves', () => {
  it('clamps and interpolates', () => {
    expect(clamp(5, 0, 1)).toBe(1);
    expect(clamp(-5, 0, 1)).toBe(0);
    expect(lerp(10, 20, 0.25)).toBe(12.5);
  });

  it('maps a band onto [-1, 1]', () => {
    expect(toBipolar(1500, 1500, 4000)).toBe(-1);
    expect(toBipolar(2750, 1500, 4000)).toBe(0);
    expect(toBipolar(9000, 1500, 4000)).toBe(1);
  });

  it('converts to decibels', () => {
    expect(linearToDb(0.1)).toBeCloseTo(-20, 12);
    expect(linearToDb(0)).toBe(-Infinity);
    expect(powerRatioToDb(100)).toBe(20);
  });

  it('maps the frequency range onto the knob scale', () => {
    expect(hzToKnobValue(200)).toBe(100);
    expect(hzToKnobValue(4000)).toBe(3500);
    expect(hzToKnobValue(2100)).toBe(1800);
    expect(hzToKnobValue(50)).toBe(100);
  });
});
