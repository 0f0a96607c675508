import wavefile from 'wavefile';
const { WaveFile } = wavefile;
import { z } from 'zod';
import { EngineError, errorMessage } from '../errors.js';

const WAVE_FORMAT_PCM = 1;
const WAVE_FORMAT_IEEE_FLOAT = 3;

const FmtChunkSchema = z.object({
  audioFormat: z.number(),
  numChannels: z.number(),
  sampleRate: z.number(),
  bitsPerSample: z.number(),
});

export interface DecodedWav {
  /** Mono samples normalized to [-1, 1). */
  samples: Float64Array;
  sampleRate: number;
  bitDepth: number;
  audioFormat: 'pcm' | 'float';
}

/**
 * Decode a mono linear-PCM WAV (integer or IEEE float). Multi-channel,
 * compressed and extensible files are rejected rather than downmixed.
 */
export function decodeWav(bytes: Uint8Array): DecodedWav {
  let wav: InstanceType<typeof WaveFile>;
  try {
    wav = new WaveFile(bytes);
  } catch (err) {
    throw new EngineError('UNSUPPORTED_FORMAT', `Not a readable WAV file: ${errorMessage(err)}`, { cause: err });
  }

  const fmt = FmtChunkSchema.safeParse(wav.fmt);
  if (!fmt.success) {
    throw new EngineError('UNSUPPORTED_FORMAT', 'WAV file has no usable fmt chunk');
  }
  const { audioFormat, numChannels, sampleRate, bitsPerSample } = fmt.data;

  if (audioFormat !== WAVE_FORMAT_PCM && audioFormat !== WAVE_FORMAT_IEEE_FLOAT) {
    throw new EngineError('UNSUPPORTED_FORMAT', `Unsupported WAV encoding (format tag ${audioFormat}); expected linear PCM`, {
      details: { audioFormat },
    });
  }
  if (numChannels !== 1) {
    throw new EngineError('UNSUPPORTED_FORMAT', `Expected a mono WAV, got ${numChannels} channels`, {
      details: { numChannels },
    });
  }
  if (!(sampleRate > 0)) {
    throw new EngineError('UNSUPPORTED_FORMAT', `Invalid sample rate ${sampleRate}`);
  }

  const raw = wav.getSamples(true, Float64Array);
  const samples = new Float64Array(raw.length);
  if (audioFormat === WAVE_FORMAT_IEEE_FLOAT) {
    samples.set(raw);
  } else if (bitsPerSample === 8) {
    // 8-bit PCM is unsigned
    for (let i = 0; i < raw.length; i++) samples[i] = (raw[i] - 128) / 128;
  } else {
    const scale = Math.pow(2, bitsPerSample - 1);
    for (let i = 0; i < raw.length; i++) samples[i] = raw[i] / scale;
  }

  return {
    samples,
    sampleRate,
    bitDepth: bitsPerSample,
    audioFormat: audioFormat === WAVE_FORMAT_PCM ? 'pcm' : 'float',
  };
}
