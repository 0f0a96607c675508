import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { EngineError, errorMessage } from '../errors.js';
import { FormantVectorSchema, formantVector, type FormantVector } from '../types/formant.js';

export interface SlotRecord {
  slot: number;
  name: string;
  savedAt: string;
  vector: FormantVector;
}

export type SlotMeta = Omit<SlotRecord, 'vector'>;

/** Persisted formant vectors keyed by instrument slot number. */
export interface SlotStore {
  readSlot(slot: number): Promise<SlotRecord>;
  writeSlot(slot: number, vector: FormantVector, name?: string): Promise<SlotRecord>;
  listSlots(): Promise<SlotMeta[]>;
}

const SlotFileSchema = z.object({
  slot: z.number().int().nonnegative(),
  name: z.string(),
  savedAt: z.string(),
  vector: FormantVectorSchema,
});

const SLOT_FILE = /^slot-(\d+)\.json$/;

export function assertSlotId(slot: number): void {
  if (!Number.isInteger(slot) || slot < 0) {
    throw new EngineError('SLOT_NOT_FOUND', `Invalid slot number ${slot}`, { details: { slot } });
  }
}

/** One `slot-<n>.json` file per slot under `dir`. */
export class JsonSlotStore implements SlotStore {
  readonly root: string;

  constructor(dir: string) {
    this.root = path.resolve(dir);
  }

  private fileFor(slot: number) {
    return path.join(this.root, `slot-${slot}.json`);
  }

  private async readFile(file: string, slot: number): Promise<SlotRecord> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(file, 'utf-8');
    } catch (err) {
      throw new EngineError('SLOT_NOT_FOUND', `Slot ${slot} has no saved vector`, { cause: err, details: { slot } });
    }
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new EngineError('SLOT_NOT_FOUND', `Slot ${slot} file is corrupt: ${errorMessage(err)}`, { cause: err, details: { slot, file } });
    }
    const parsed = SlotFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new EngineError('SLOT_NOT_FOUND', `Slot ${slot} file is corrupt: ${parsed.error.issues[0]?.message ?? 'invalid'}`, {
        details: { slot, file },
      });
    }
    return { ...parsed.data, vector: formantVector(parsed.data.vector) };
  }

  async readSlot(slot: number): Promise<SlotRecord> {
    assertSlotId(slot);
    return this.readFile(this.fileFor(slot), slot);
  }

  async writeSlot(slot: number, vector: FormantVector, name?: string): Promise<SlotRecord> {
    assertSlotId(slot);
    await fs.promises.mkdir(this.root, { recursive: true });
    const record: SlotRecord = {
      slot,
      name: name?.trim() || `Slot ${slot}`,
      savedAt: new Date().toISOString(),
      vector,
    };
    const file = this.fileFor(slot);
    // Write-then-rename so a crash never leaves a half-written slot
    const tmp = `${file}.tmp`;
    await fs.promises.writeFile(tmp, JSON.stringify(record, null, 2));
    await fs.promises.rename(tmp, file);
    return record;
  }

  async listSlots(): Promise<SlotMeta[]> {
    let entries: string[];
    try {
      entries = await fs.promises.readdir(this.root);
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
      throw err;
    }

    const metas: SlotMeta[] = [];
    for (const entry of entries) {
      const match = SLOT_FILE.exec(entry);
      if (!match) continue;
      const slot = Number(match[1]);
      try {
        const { vector: _vector, ...meta } = await this.readFile(path.join(this.root, entry), slot);
        metas.push(meta);
      } catch (err) {
        console.warn(`[slots] skipping ${entry}: ${errorMessage(err)}`);
      }
    }
    return metas.sort((a, b) => a.slot - b.slot);
  }
}
