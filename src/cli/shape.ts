/**
 * Compute a processed formant vector from a base and a pad position, and
 * optionally send it.
 *
 * Usage: npx tsx src/cli/shape.ts (--base-slot <n> | --base <vector.json>)
 *          [--profile Tenor] [--x 0] [--y 0] [--brightness 0] [--resonance 0]
 *          [--send dry-run|dlin] [--save-slot <n>]
 */
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { loadConfig } from '../config.js';
import { DryRunSink, type CommandSink } from '../dispatch/CommandSink.js';
import { DispatchThrottler, type DispatchReport } from '../dispatch/DispatchThrottler.js';
import { DlinCommandSink, DlinLibrarian, createDlinRunner } from '../dispatch/dlin.js';
import { compute } from '../engine/interpolate.js';
import { errorMessage } from '../errors.js';
import { getProfile, loadProfileTable } from '../profile/table.js';
import { JsonSlotStore } from '../slots/slotStore.js';
import { FORMANT_FIELDS, formantVector, FormantVectorSchema, type FormantVector } from '../types/formant.js';
import { numberFlag, parseArgs, type ParsedArgs } from './args.js';

const USAGE = 'Usage: npx tsx src/cli/shape.ts (--base-slot <n> | --base <vector.json>) [--profile <name>] [--x n] [--y n] [--brightness n] [--resonance n] [--send dry-run|dlin] [--save-slot <n>]';

async function readBase(args: ParsedArgs, slots: JsonSlotStore): Promise<FormantVector> {
  const file = args.flags.get('base');
  if (file) {
    const json: unknown = JSON.parse(await readFile(resolve(file), 'utf-8'));
    return formantVector(FormantVectorSchema.parse(json));
  }
  const slot = args.flags.get('base-slot');
  if (slot === undefined) throw new Error(USAGE);
  return (await slots.readSlot(Number(slot))).vector;
}

async function main() {
  const args = parseArgs(process.argv.slice(2), ['base', 'base-slot', 'profile', 'x', 'y', 'brightness', 'resonance', 'send', 'save-slot']);
  const config = loadConfig();
  const table = loadProfileTable(config.profileTablePath);
  const slots = new JsonSlotStore(config.slotDir);

  const base = await readBase(args, slots);
  const profile = getProfile(args.flags.get('profile') ?? 'Neutral', table);
  const pad = { x: numberFlag(args, 'x', 0), y: numberFlag(args, 'y', 0) };
  const processed = compute(
    base,
    pad,
    profile,
    numberFlag(args, 'brightness', 0),
    numberFlag(args, 'resonance', 0),
    config.shaping
  );

  console.log(`profile ${profile.name}, pad (${pad.x}, ${pad.y})`);
  console.log('field      base  processed');
  for (const field of FORMANT_FIELDS) {
    console.log(`${field.padEnd(5)} ${base[field].toFixed(1).padStart(9)} ${processed[field].toFixed(1).padStart(10)}`);
  }

  const saveSlot = args.flags.get('save-slot');
  if (saveSlot !== undefined) {
    const record = await slots.writeSlot(Number(saveSlot), processed, `${profile.name} (${pad.x}, ${pad.y})`);
    console.log(`saved to slot ${record.slot} ("${record.name}")`);
  }

  const send = args.flags.get('send');
  if (!send) return;

  let sink: CommandSink;
  if (send === 'dry-run') sink = new DryRunSink();
  else if (send === 'dlin') sink = new DlinCommandSink(new DlinLibrarian(createDlinRunner(config.librarian)), config.shaping.ranges.frequencyHz);
  else throw new Error(`--send must be dry-run or dlin, got '${send}'`);

  const reports: DispatchReport[] = [];
  const throttler = new DispatchThrottler(sink, {
    ranges: config.shaping.ranges,
    minIntervalMs: config.dispatch.minIntervalMs,
    diff: false,
    onReport: (report) => reports.push(report),
  });
  throttler.submit(processed, { full: true });
  await throttler.idle();

  const failure = reports.find((r) => r.status === 'failed');
  if (failure) {
    console.error(`sent ${failure.sent.length}/${FORMANT_FIELDS.length} commands before failing: ${failure.error?.message ?? 'unknown error'}`);
    process.exit(1);
  }
  console.log(`sent ${reports.reduce((n, r) => n + r.sent.length, 0)} commands`);
}

main().catch((err: unknown) => {
  console.error(`[shape] ${errorMessage(err)}`);
  process.exit(1);
});
