import { describe, expect, it } from 'vitest';
import { DEFAULT_FINGERPRINT } from '../../config.js';
import { isEngineError } from '../../errors.js';
import { analyze, frameCountFor, frameSizeFor } from '../fingerprint.js';

const SR = 16000; // 2048-point frames: 7.8125 Hz bins

function sine(hz: number, seconds: number, amplitude = 0.5, sampleRate = SR): Float64Array {
  const n = Math.round(seconds * sampleRate);
  const out = new Float64Array(n);
  for (let i = 0; i < n; i++) out[i] = amplitude * Math.sin((2 * Math.PI * hz * i) / sampleRate);
  return out;
}

describe('frame sizing', () => {
  it('picks the smallest power of two with <= 12 Hz bins', () => {
    expect(frameSizeFor(8000)).toBe(2048);
    expect(frameSizeFor(16000)).toBe(2048);
    expect(frameSizeFor(44100)).toBe(4096);
    expect(frameSizeFor(48000)).toBe(4096);
    expect(frameSizeFor(96000)).toBe(8192);
    expect(frameSizeFor(384000)).toBe(16384);
  });

  it('counts 50%-overlapping frames', () => {
    expect(frameCountFor(1000, 2048)).toBe(1);
    expect(frameCountFor(2048, 2048)).toBe(1);
    expect(frameCountFor(3072, 2048)).toBe(2);
    expect(frameCountFor(16000, 2048)).toBe(14);
  });
});

describe('analyze', () => {
  it('maps a 3 kHz tone to x = 0.2 and full head', () => {
    const fp = analyze(sine(3000, 1), SR);
    expect(fp.centroidHz).toBeCloseTo(3000, 6);
    expect(fp.pad.x).toBeCloseTo(0.2, 6);
    expect(fp.pad.y).toBe(1);
    expect(fp.confidence).toBe('normal');
    expect(fp.lowConfidenceReasons).toEqual([]);
  });

  it('maps a tone at the middle of the reference band to x = 0', () => {
    expect(analyze(sine(2750, 1), SR).pad.x).toBeCloseTo(0, 6);
  });

  it('maps a low tone to the dark chest corner', () => {
    const fp = analyze(sine(312.5, 1), SR);
    expect(fp.centroidHz).toBeCloseTo(312.5, 6);
    expect(fp.pad).toEqual({ x: -1, y: -1 });
  });

  it('rates a 3 kHz tone brighter than a 300 Hz tone', () => {
    expect(analyze(sine(3000, 1), SR).pad.x).toBeGreaterThan(analyze(sine(300, 1), SR).pad.x);
  });

  it('uses the configured reference band', () => {
    const constants = { ...DEFAULT_FINGERPRINT, centroidLowHz: 0, centroidHighHz: 4000 };
    expect(analyze(sine(312.5, 1), SR, constants).pad.x).toBeCloseTo(-0.84375, 6);
  });

  it('weights frames by energy', () => {
    const loud = sine(3000, 0.5, 0.5);
    const quiet = sine(312.5, 0.5, 0.005);
    const clip = new Float64Array(loud.length + quiet.length);
    clip.set(loud);
    clip.set(quiet, loud.length);
    expect(analyze(clip, SR).centroidHz).toBeGreaterThan(2900);
  });

  it('records metadata', () => {
    const fp = analyze(sine(220, 1), SR);
    expect(fp.metadata).toMatchObject({ sampleRate: SR, frameSize: 2048, frameCount: 14, durationSec: 1 });
    expect(fp.metadata.peakDbfs).toBeCloseTo(20 * Math.log10(0.5), 1);
    expect(Math.abs((fp.metadata.f0Hz ?? 0) - 220)).toBeLessThan(2);
  });

  it('returns a frozen result', () => {
    const fp = analyze(sine(1000, 0.5), SR);
    expect(Object.isFrozen(fp)).toBe(true);
    expect(Object.isFrozen(fp.pad)).toBe(true);
    expect(Object.isFrozen(fp.metadata)).toBe(true);
  });

  describe('low confidence', () => {
    it('puts digital silence at the pad centre', () => {
      const fp = analyze(new Float64Array(SR), SR);
      expect(fp.pad).toEqual({ x: 0, y: 0 });
      expect(fp.confidence).toBe('low');
      expect(fp.lowConfidenceReasons).toEqual(['no signal energy']);
      expect(fp.metadata.f0Hz).toBeNull();
    });

    it('flags near-silent clips', () => {
      const fp = analyze(sine(3000, 1, 1e-4), SR);
      expect(fp.confidence).toBe('low');
      expect(fp.lowConfidenceReasons).toEqual(['near-silent (RMS -83.0 dBFS)']);
      expect(fp.pad.x).toBeCloseTo(0.2, 6);
    });

    it('flags clipping', () => {
      const clipped = sine(440, 1, 4).map((v) => Math.max(-1, Math.min(1, v)));
      const fp = analyze(clipped, SR);
      expect(fp.confidence).toBe('low');
      expect(fp.lowConfidenceReasons[0]).toMatch(/^clipped \(\d+\.\d% of samples at full scale\)$/);
    });

    it('flags a head band beyond Nyquist', () => {
      const fp = analyze(sine(1000, 1, 0.5, 8000), 8000);
      expect(fp.lowConfidenceReasons).toEqual(['head band reaches 5000 Hz but Nyquist is 4000 Hz']);
    });

    it('leaves frames with non-finite samples out of the average', () => {
      const clip = sine(3000, 1);
      clip[8000] = Infinity; // inside frames 6 and 7
      const fp = analyze(clip, SR);
      expect(fp.pad.x).toBeCloseTo(0.2, 6);
      expect(fp.pad.y).toBe(1);
      expect(fp.lowConfidenceReasons).toEqual(['1 non-finite sample(s); 2 of 14 frame(s) left out']);
      expect(fp.metadata.peakDbfs).toBeCloseTo(20 * Math.log10(0.5), 1);
    });

    it('drops a NaN sample under a zero window weight', () => {
      const clip = sine(3000, 1);
      clip[0] = NaN;
      const fp = analyze(clip, SR);
      expect(fp.centroidHz).toBeCloseTo(3000, 6);
      expect(fp.lowConfidenceReasons).toEqual(['1 non-finite sample(s); 1 of 14 frame(s) left out']);
    });

    it('zero-pads clips shorter than one frame', () => {
      const fp = analyze(sine(3000, 0.1), SR);
      expect(fp.metadata.frameCount).toBe(1);
      expect(fp.lowConfidenceReasons).toEqual(['shorter than one analysis frame']);
    });
  });

  it('fails EMPTY_SIGNAL below the minimum duration', () => {
    let code: string | undefined;
    let message: string | undefined;
    try {
      analyze(sine(3000, 0.04), SR);
    } catch (err) {
      if (isEngineError(err)) {
        code = err.code;
        message = err.message;
      }
    }
    expect(code).toBe('EMPTY_SIGNAL');
    expect(message).toBe('Signal is 40.0 ms; at least 50 ms required');
  });

  it('fails UNSUPPORTED_FORMAT for a nonsensical sample rate', () => {
    expect(() => analyze(new Float64Array(100), 0)).toThrow('Invalid sample rate 0');
  });
});
