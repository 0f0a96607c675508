/**
 * Adapter for the `d-lin` librarian CLI, which talks to the instrument over
 * a serial link. Every call is one subprocess; serial access may need sudo.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { hzToKnobValue } from '../engine/curves.js';
import { fieldKind, type ParamCommand, type ValueRange } from '../types/formant.js';
import type { LibrarianSettings } from '../config.js';
import type { CommandSink } from './CommandSink.js';

const execFileAsync = promisify(execFile);

export interface DlinResult {
  stdout: string;
  stderr: string;
}

/** Runs `d-lin` with the given arguments. Rejects when the process fails. */
export type DlinRunner = (args: readonly string[]) => Promise<DlinResult>;

export function createDlinRunner(settings: LibrarianSettings): DlinRunner {
  return async (args) => {
    const file = settings.useSudo ? 'sudo' : settings.dlinPath;
    const argv = settings.useSudo ? [settings.dlinPath, ...args] : [...args];
    console.log(`[dlin] >> ${[file, ...argv].join(' ')}`);
    const { stdout, stderr } = await execFileAsync(file, argv, { encoding: 'utf-8' });
    if (stdout.trim()) console.log(`[dlin] ${stdout.trim()}`);
    if (stderr.trim()) console.warn(`[dlin] ${stderr.trim()}`);
    return { stdout, stderr };
  };
}

/** Knob number on a formant page for each field kind. */
const KNOB_FOR_KIND = { frequency: 2, level: 3, resonance: 6 } as const;

const COPY_TEMP_NAME = '_formant_pad_copy';

function assertSlot(slot: number): void {
  if (!Number.isInteger(slot) || slot < 0) {
    throw new RangeError(`Invalid slot number ${slot}`);
  }
}

/** Default sink frequency range; the knob scale spans it end to end. */
const DEFAULT_FREQUENCY_RANGE: ValueRange = { min: 200, max: 4000 };

/**
 * `<page>:<knob>:<value>` for one formant command, e.g. `0f:2:1234`.
 * Frequencies are scaled onto the knob over `frequencyHz`, the same range
 * the dispatch path clamps against.
 */
export function knobAddress(command: ParamCommand, frequencyHz: ValueRange = DEFAULT_FREQUENCY_RANGE): string {
  const index = Number(command.param.slice(1));
  const kind = fieldKind(command.param);
  const value = kind === 'frequency'
    ? hzToKnobValue(command.value, frequencyHz.min, frequencyHz.max)
    : Math.round(command.value);
  return `${index - 1}f:${KNOB_FOR_KIND[kind]}:${value}`;
}

export class DlinLibrarian {
  constructor(private readonly run: DlinRunner) {}

  async setKnob(pageKnobValue: string): Promise<void> {
    await this.run(['knob', '-pkv', pageKnobValue]);
  }

  /** Dump a whole slot preset to `<name>.dlp`. */
  async dump(slot: number, name: string): Promise<void> {
    assertSlot(slot);
    await this.run(['dump', '-s', String(slot), '-f', name]);
  }

  /** Dump the live knob state to a file. */
  async dumpKnobs(file: string): Promise<void> {
    await this.run(['dump', '-k', '-f', file]);
  }

  /** Restore knob state previously written by dumpKnobs. */
  async pumpKnobs(file: string): Promise<void> {
    await this.run(['pump', '-k', '-f', file]);
  }

  async pump(name: string, slot: number): Promise<void> {
    assertSlot(slot);
    await this.run(['pump', '-f', name, '-s', String(slot)]);
  }

  async copySlot(src: number, dst: number): Promise<void> {
    await this.dump(src, COPY_TEMP_NAME);
    await this.pump(COPY_TEMP_NAME, dst);
  }
}

/** Sends formant commands as individual knob changes. */
export class DlinCommandSink implements CommandSink {
  constructor(
    private readonly librarian: DlinLibrarian,
    private readonly frequencyHz: ValueRange = DEFAULT_FREQUENCY_RANGE
  ) {}

  async send(command: ParamCommand): Promise<void> {
    await this.librarian.setKnob(knobAddress(command, this.frequencyHz));
  }
}
