/**
 * Fingerprint one or more WAV files.
 *
 * Usage: npx tsx src/cli/analyze.ts <input.wav>... [--json]
 */
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { loadConfig } from '../config.js';
import { analyze } from '../analysis/fingerprint.js';
import { decodeWav } from '../analysis/wavInput.js';
import { errorMessage } from '../errors.js';
import { parseArgs } from './args.js';

async function main() {
  const args = parseArgs(process.argv.slice(2), []);
  if (args.positional.length === 0) {
    console.error('Usage: npx tsx src/cli/analyze.ts <input.wav>... [--json]');
    process.exit(1);
  }

  const { fingerprint: constants } = loadConfig();
  let failed = 0;

  for (const file of args.positional) {
    try {
      const wav = decodeWav(await readFile(resolve(file)));
      const fp = analyze(wav.samples, wav.sampleRate, constants);

      if (args.switches.has('json')) {
        console.log(JSON.stringify({ file, ...fp }, null, 2));
        continue;
      }

      const m = fp.metadata;
      console.log(`${file}`);
      console.log(`  ${m.sampleRate} Hz ${wav.bitDepth}-bit ${wav.audioFormat}, ${m.durationSec.toFixed(2)}s, ${m.frameCount} frames of ${m.frameSize}`);
      console.log(`  RMS ${m.rmsDbfs.toFixed(1)} dBFS, peak ${m.peakDbfs.toFixed(1)} dBFS, F0 ${m.f0Hz === null ? 'n/a' : `${m.f0Hz.toFixed(1)} Hz`}`);
      console.log(`  centroid ${fp.centroidHz.toFixed(0)} Hz -> x = ${fp.pad.x.toFixed(3)}`);
      console.log(`  head/chest ${fp.bandBalanceDb.toFixed(1)} dB -> y = ${fp.pad.y.toFixed(3)}`);
      if (fp.confidence === 'low') {
        console.log(`  LOW CONFIDENCE: ${fp.lowConfidenceReasons.join('; ')}`);
      }
    } catch (err) {
      failed++;
      console.error(`[analyze] ${file}: ${errorMessage(err)}`);
    }
  }

  if (failed > 0) process.exit(1);
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
