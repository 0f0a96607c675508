/**
 * Write calibration clips for the fingerprint extractor to ref/.
 *
 * Pure tones pin the x axis (centroid) and harmonic stacks with a low or
 * high spectral emphasis pin the y axis (head/chest balance).
 */
import wavefile from 'wavefile';
const { WaveFile } = wavefile;
import { writeFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';

const SAMPLE_RATE = 48000;
const DURATION_SEC = 2;

function render(partials: Array<{ hz: number; gain: number }>): Int16Array {
  const n = SAMPLE_RATE * DURATION_SEC;
  const buffer = new Float64Array(n);
  for (let i = 0; i < n; i++) {
    const t = i / SAMPLE_RATE;
    let sample = 0;
    for (const p of partials) sample += p.gain * Math.sin(2 * Math.PI * p.hz * t);
    buffer[i] = sample;
  }

  // Normalize to -3 dBFS
  let maxVal = 0;
  for (let i = 0; i < n; i++) maxVal = Math.max(maxVal, Math.abs(buffer[i]));
  const gain = maxVal > 0 ? 0.7079 / maxVal : 0;
  const pcm = new Int16Array(n);
  for (let i = 0; i < n; i++) pcm[i] = Math.round(buffer[i] * gain * 32767);
  return pcm;
}

function harmonics(f0: number, count: number, emphasisHz: number): Array<{ hz: number; gain: number }> {
  const partials: Array<{ hz: number; gain: number }> = [];
  for (let k = 1; k <= count; k++) {
    const hz = k * f0;
    // Single resonance bump on top of a 1/k roll-off
    const bump = Math.exp(-Math.pow(hz - emphasisHz, 2) / 400000);
    partials.push({ hz, gain: 1 / k + 2 * bump });
  }
  return partials;
}

async function main() {
  const clips: Record<string, Int16Array> = {
    'tone_300hz.wav': render([{ hz: 300, gain: 1 }]),
    'tone_3000hz.wav': render([{ hz: 3000, gain: 1 }]),
    'chest_220hz.wav': render(harmonics(220, 20, 500)),
    'head_220hz.wav': render(harmonics(220, 20, 3000)),
  };

  await mkdir('ref', { recursive: true });
  for (const [name, pcm] of Object.entries(clips)) {
    const wav = new WaveFile();
    wav.fromScratch(1, SAMPLE_RATE, '16', pcm);
    await writeFile(join('ref', name), wav.toBuffer());
    console.log(`Generated ref/${name}`);
  }
}

main().catch(console.error);
