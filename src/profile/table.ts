import { readFileSync } from 'node:fs';
import { loadConfig } from '../config.js';
import { EngineError } from '../errors.js';
import { FORMANT_INDICES, formantVector, frequenciesAscending, frequencyField } from '../types/formant.js';
import type { FrequencyField, ValueRange } from '../types/formant.js';
import {
  PROFILE_NAMES,
  VoiceProfileTableSchema,
  type ProfileIssue,
  type ProfileName,
  type VoiceProfile,
} from './schema.js';

export interface ProfileTable {
  readonly version: string;
  readonly profiles: ReadonlyMap<ProfileName, VoiceProfile>;
  readonly issues: readonly ProfileIssue[];
}

/**
 * Check the soft invariants of each canonical vector. Instruments sometimes
 * break strict formant ordering on purpose, so these are reported, never
 * thrown.
 */
export function validateProfiles(profiles: Iterable<VoiceProfile>): ProfileIssue[] {
  const issues: ProfileIssue[] = [];
  for (const p of profiles) {
    const c = p.canonical;
    if (!frequenciesAscending(c)) {
      issues.push({
        profile: p.name,
        kind: 'formant_order',
        message: `${p.name}: formants not ascending (F1=${c.F1}, F2=${c.F2}, F3=${c.F3}, F4=${c.F4})`,
      });
    }
    for (const i of FORMANT_INDICES) {
      const field = frequencyField(i);
      const range = p.ranges[field];
      if (range && (c[field] < range.min || c[field] > range.max)) {
        issues.push({
          profile: p.name,
          kind: 'out_of_range',
          message: `${p.name}: ${field}=${c[field]} outside [${range.min}, ${range.max}]`,
        });
      }
    }
  }
  return issues;
}

/** Parse a profile table document. Throws INVALID_PROFILE_TABLE on schema errors. */
export function parseProfileTable(json: unknown, source = 'profile table'): ProfileTable {
  const parsed = VoiceProfileTableSchema.safeParse(json);
  if (!parsed.success) {
    throw new EngineError('INVALID_PROFILE_TABLE', `${source}: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
  }

  const profiles = new Map<ProfileName, VoiceProfile>();
  for (const entry of parsed.data.profiles) {
    if (profiles.has(entry.name)) {
      throw new EngineError('INVALID_PROFILE_TABLE', `${source}: duplicate profile '${entry.name}'`);
    }
    const ranges: Partial<Record<FrequencyField, ValueRange>> = {};
    for (const i of FORMANT_INDICES) {
      const field = frequencyField(i);
      const r = entry.ranges?.[field];
      if (r) ranges[field] = Object.freeze({ min: r.min, max: r.max });
    }
    profiles.set(entry.name, Object.freeze({
      name: entry.name,
      description: entry.description ?? '',
      canonical: formantVector(entry.canonical),
      ranges: Object.freeze(ranges),
    }));
  }

  return Object.freeze({
    version: parsed.data.version,
    profiles,
    issues: Object.freeze(validateProfiles(profiles.values())),
  });
}

export function loadProfileTable(path: string): ProfileTable {
  let json: unknown;
  try {
    json = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new EngineError('INVALID_PROFILE_TABLE', `Cannot read profile table at ${path}`, { cause: err });
  }
  const table = parseProfileTable(json, path);
  for (const issue of table.issues) {
    console.warn(`[profiles] ${issue.message}`);
  }
  return table;
}

let defaultTable: ProfileTable | null = null;

/** Process-wide table, loaded on first use from PROFILE_TABLE_PATH. */
export function defaultProfileTable(): ProfileTable {
  if (!defaultTable) {
    defaultTable = loadProfileTable(loadConfig().profileTablePath);
  }
  return defaultTable;
}

export function profilesByName(table: ProfileTable = defaultProfileTable()): ReadonlyMap<ProfileName, VoiceProfile> {
  return table.profiles;
}

/** Case-insensitive lookup. Unknown names are an error, never a fallback. */
export function getProfile(name: string, table: ProfileTable = defaultProfileTable()): VoiceProfile {
  const wanted = name.trim().toLowerCase();
  const canonicalName = PROFILE_NAMES.find((n) => n.toLowerCase() === wanted);
  const profile = canonicalName ? table.profiles.get(canonicalName) : undefined;
  if (!profile) {
    throw new EngineError('UNKNOWN_PROFILE', `Unknown voice profile '${name}'`, {
      details: { available: [...table.profiles.keys()] },
    });
  }
  return profile;
}
