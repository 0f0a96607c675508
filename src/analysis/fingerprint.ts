/**
 * Coarse spectral fingerprint: spectral centroid (brightness, pad x) and
 * head/chest band balance (vocal colour, pad y) of a whole clip.
 *
 * This is not formant detection. The clip is cut into 50%-overlapping
 * periodic-Hann frames, the magnitude spectra are averaged with frame
 * energy as weight, and two scalars are read off the averaged spectrum.
 */

import { DEFAULT_FINGERPRINT, type FingerprintConstants } from '../config.js';
import { EngineError } from '../errors.js';
import { clamp, linearToDb, powerRatioToDb, toBipolar } from '../engine/curves.js';
import { hannWindow, magnitudeSpectrum } from '../dsp/fft.js';
import { findPitchYin } from '../dsp/pitch.js';
import type { Fingerprint, FingerprintConfidence } from '../types/formant.js';

const MIN_FRAME = 2048;
const MAX_FRAME = 16384;
const MAX_BIN_SPACING_HZ = 12;
const CLIP_LEVEL = 0.999;
const MAX_CLIP_FRACTION = 0.01;

/** Smallest power of two with bin spacing <= 12 Hz, within [2048, 16384]. */
export function frameSizeFor(sampleRate: number): number {
  let n = MIN_FRAME;
  while (sampleRate / n > MAX_BIN_SPACING_HZ && n < MAX_FRAME) n <<= 1;
  return n;
}

/** Number of frames at 50% overlap; short signals get one zero-padded frame. */
export function frameCountFor(length: number, frameSize: number): number {
  if (length <= frameSize) return 1;
  const hop = frameSize / 2;
  return 1 + Math.floor((length - frameSize) / hop);
}

export function assertAnalyzable(samples: ArrayLike<number>, sampleRate: number, constants: FingerprintConstants): void {
  if (!Number.isFinite(sampleRate) || sampleRate <= 0) {
    throw new EngineError('UNSUPPORTED_FORMAT', `Invalid sample rate ${sampleRate}`);
  }
  const durationSec = samples.length / sampleRate;
  if (durationSec < constants.minDurationSec) {
    throw new EngineError('EMPTY_SIGNAL', `Signal is ${(durationSec * 1000).toFixed(1)} ms; at least ${constants.minDurationSec * 1000} ms required`, {
      details: { durationSec },
    });
  }
}

/**
 * Frame-by-frame energy-weighted spectrum average. `step()` can be called
 * in slices so long clips don't monopolise the event loop.
 */
export class SpectrumAccumulator {
  readonly frameSize: number;
  readonly hop: number;
  readonly frameCount: number;
  readonly bins: number;

  private readonly samples: ArrayLike<number>;
  private readonly sampleRate: number;
  private readonly window: Float64Array;
  private readonly scratch: { real: Float64Array; imag: Float64Array };
  private readonly mag: Float64Array;
  private readonly weighted: Float64Array;
  private energySum = 0;
  private framesDone = 0;
  private loudestStart = 0;
  private loudestEnergy = -1;
  /** Frames left out of the average because they held NaN or infinite samples. */
  private skippedFrames = 0;

  constructor(samples: ArrayLike<number>, sampleRate: number) {
    this.samples = samples;
    this.sampleRate = sampleRate;
    this.frameSize = frameSizeFor(sampleRate);
    this.hop = this.frameSize / 2;
    this.frameCount = frameCountFor(samples.length, this.frameSize);
    this.bins = this.frameSize / 2 + 1;
    this.window = hannWindow(this.frameSize);
    this.scratch = { real: new Float64Array(this.frameSize), imag: new Float64Array(this.frameSize) };
    this.mag = new Float64Array(this.bins);
    this.weighted = new Float64Array(this.bins);
  }

  get done(): boolean {
    return this.framesDone >= this.frameCount;
  }

  get progress(): number {
    return this.framesDone / this.frameCount;
  }

  /** Process up to `maxFrames` frames; returns how many were processed. */
  step(maxFrames: number = Infinity): number {
    let processed = 0;
    const frame = new Float64Array(this.frameSize);
    while (!this.done && processed < maxFrames) {
      const start = this.framesDone * this.hop;
      let energy = 0;
      for (let i = 0; i < this.frameSize; i++) {
        const idx = start + i;
        const s = idx < this.samples.length ? this.samples[idx] : 0;
        frame[i] = s;
        const w = s * this.window[i];
        energy += w * w;
      }

      if (!Number.isFinite(energy)) {
        this.skippedFrames++;
      } else if (energy > 0) {
        magnitudeSpectrum(frame, this.window, this.scratch, this.mag);
        for (let k = 0; k < this.bins; k++) this.weighted[k] += energy * this.mag[k];
        this.energySum += energy;
      }
      if (Number.isFinite(energy) && energy > this.loudestEnergy) {
        this.loudestEnergy = energy;
        this.loudestStart = start;
      }

      this.framesDone++;
      processed++;
    }
    return processed;
  }

  /** Energy-weighted mean magnitude spectrum (all zeros for silence). */
  spectrum(): Float64Array {
    const out = new Float64Array(this.bins);
    if (this.energySum > 0) {
      for (let k = 0; k < this.bins; k++) out[k] = this.weighted[k] / this.energySum;
    }
    return out;
  }

  binHz(k: number): number {
    return (k * this.sampleRate) / this.frameSize;
  }

  finish(constants: FingerprintConstants = DEFAULT_FINGERPRINT): Fingerprint {
    if (!this.done) this.step();

    const spectrum = this.spectrum();
    const nyquist = this.sampleRate / 2;
    const reasons: string[] = [];

    let peak = 0;
    let sumSq = 0;
    let clipped = 0;
    let nonFinite = 0;
    for (let i = 0; i < this.samples.length; i++) {
      const s = this.samples[i];
      if (!Number.isFinite(s)) {
        nonFinite++;
        continue;
      }
      const a = Math.abs(s);
      if (a > peak) peak = a;
      if (a >= CLIP_LEVEL) clipped++;
      sumSq += s * s;
    }
    const rmsDbfs = linearToDb(Math.sqrt(sumSq / this.samples.length));
    const peakDbfs = linearToDb(peak);

    let magSum = 0;
    let freqMagSum = 0;
    let chestPower = 0;
    let headPower = 0;
    let totalPower = 0;
    const [chestLo, chestHi] = constants.chestBandHz;
    const [headLo, headHi] = constants.headBandHz;
    for (let k = 0; k < this.bins; k++) {
      const m = spectrum[k];
      const f = this.binHz(k);
      const p = m * m;
      magSum += m;
      freqMagSum += f * m;
      totalPower += p;
      if (f >= chestLo && f <= chestHi) chestPower += p;
      if (f >= headLo && f <= headHi) headPower += p;
    }

    let centroidHz = 0;
    let bandBalanceDb = 0;
    let x = 0;
    let y = 0;
    if (magSum > 0) {
      centroidHz = freqMagSum / magSum;
      // Relative floor keeps the ratio finite when one band is empty
      const floor = 1e-12 * totalPower;
      bandBalanceDb = powerRatioToDb((headPower + floor) / (chestPower + floor));
      x = toBipolar(centroidHz, constants.centroidLowHz, constants.centroidHighHz);
      y = clamp(bandBalanceDb / constants.balanceSpanDb, -1, 1);
    } else if (this.skippedFrames === 0) {
      reasons.push('no signal energy');
    }

    if (nonFinite > 0) {
      reasons.push(`${nonFinite} non-finite sample(s); ${this.skippedFrames} of ${this.frameCount} frame(s) left out`);
    }

    if (magSum > 0 && rmsDbfs < constants.silenceDbfs) {
      reasons.push(`near-silent (RMS ${rmsDbfs.toFixed(1)} dBFS)`);
    }
    if (clipped / this.samples.length > MAX_CLIP_FRACTION) {
      reasons.push(`clipped (${((100 * clipped) / this.samples.length).toFixed(1)}% of samples at full scale)`);
    }
    if (headHi > nyquist) {
      reasons.push(`head band reaches ${headHi} Hz but Nyquist is ${nyquist} Hz`);
    }
    if (this.samples.length < this.frameSize) {
      reasons.push('shorter than one analysis frame');
    }

    let f0Hz: number | null = null;
    if (this.energySum > 0) {
      const frame = new Float64Array(this.frameSize);
      for (let i = 0; i < this.frameSize; i++) {
        const idx = this.loudestStart + i;
        frame[i] = idx < this.samples.length ? this.samples[idx] : 0;
      }
      f0Hz = findPitchYin(frame, this.sampleRate);
    }

    const confidence: FingerprintConfidence = reasons.length > 0 ? 'low' : 'normal';
    return Object.freeze({
      pad: Object.freeze({ x, y }),
      centroidHz,
      bandBalanceDb,
      confidence,
      lowConfidenceReasons: Object.freeze(reasons),
      metadata: Object.freeze({
        sampleRate: this.sampleRate,
        frameSize: this.frameSize,
        frameCount: this.frameCount,
        durationSec: this.samples.length / this.sampleRate,
        rmsDbfs,
        peakDbfs,
        energy: this.energySum,
        f0Hz,
      }),
    });
  }
}

/** Synchronous analysis of a whole clip. */
export function analyze(
  samples: ArrayLike<number>,
  sampleRate: number,
  constants: FingerprintConstants = DEFAULT_FINGERPRINT
): Fingerprint {
  assertAnalyzable(samples, sampleRate, constants);
  const acc = new SpectrumAccumulator(samples, sampleRate);
  acc.step();
  return acc.finish(constants);
}
