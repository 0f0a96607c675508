import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { EngineError } from '../../errors.js';
import { formantVector } from '../../types/formant.js';
import type { VoiceProfile } from '../schema.js';
import { getProfile, loadProfileTable, parseProfileTable, profilesByName, validateProfiles } from '../table.js';

const TENOR_VECTOR = {
  F1: 565, F2: 1200, F3: 2250, F4: 2900,
  L1: 55, L2: 45, L3: 32, L4: 25,
  R1: 5, R2: 5, R3: 5, R4: 5,
};

function tableJson(profiles: unknown[]) {
  return { schema: 'formant-pad.voiceprofiles', version: '9.9.9', profiles };
}

describe('VoiceProfile table', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('loads all seven bundled profiles', () => {
    const profiles = profilesByName();
    expect([...profiles.keys()]).toEqual(['Bass', 'Baritone', 'Tenor', 'Alto', 'Mezzo', 'Soprano', 'Neutral']);
    expect(profiles.get('Tenor')?.canonical).toEqual(TENOR_VECTOR);
  });

  it('returns deeply frozen profiles', () => {
    const tenor = getProfile('Tenor');
    expect(Object.isFrozen(tenor)).toBe(true);
    expect(Object.isFrozen(tenor.canonical)).toBe(true);
    expect(Object.isFrozen(tenor.ranges)).toBe(true);
  });

  it('looks names up case-insensitively', () => {
    expect(getProfile('tenor').name).toBe('Tenor');
    expect(getProfile(' SOPRANO ').name).toBe('Soprano');
  });

  it('fails UNKNOWN_PROFILE instead of falling back to Neutral', () => {
    let caught: unknown;
    try {
      getProfile('Castrato');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(EngineError);
    expect(caught).toMatchObject({ code: 'UNKNOWN_PROFILE', message: "Unknown voice profile 'Castrato'" });
  });

  it('bundled table has no ordering or range issues', () => {
    const table = loadProfileTable(join(process.cwd(), 'profiles', 'voice-profiles.json'));
    expect(table.version).toBe('1.0.0');
    expect(table.issues).toEqual([]);
  });

  describe('validateProfiles', () => {
    function profile(overrides: Partial<typeof TENOR_VECTOR>, ranges: VoiceProfile['ranges'] = {}): VoiceProfile {
      return { name: 'Tenor', description: '', canonical: formantVector({ ...TENOR_VECTOR, ...overrides }), ranges };
    }

    it('accepts an ascending in-range profile', () => {
      expect(validateProfiles([profile({}, { F1: { min: 380, max: 750 } })])).toEqual([]);
    });

    it('reports non-ascending formants', () => {
      expect(validateProfiles([profile({ F1: 1300 })])).toEqual([
        {
          profile: 'Tenor',
          kind: 'formant_order',
          message: 'Tenor: formants not ascending (F1=1300, F2=1200, F3=2250, F4=2900)',
        },
      ]);
    });

    it('reports canonical values outside the declared range', () => {
      const issues = validateProfiles([profile({ F1: 800 }, { F1: { min: 380, max: 750 } })]);
      expect(issues).toEqual([
        { profile: 'Tenor', kind: 'out_of_range', message: 'Tenor: F1=800 outside [380, 750]' },
      ]);
    });
  });

  describe('parseProfileTable', () => {
    it('rejects documents that fail the schema', () => {
      expect(() => parseProfileTable({ schema: 'something-else', version: '1', profiles: [] }, 'bad.json')).toThrow(EngineError);
    });

    it('rejects duplicate profile names', () => {
      const json = tableJson([
        { name: 'Bass', canonical: TENOR_VECTOR },
        { name: 'Bass', canonical: TENOR_VECTOR },
      ]);
      expect(() => parseProfileTable(json, 'dup.json')).toThrow("dup.json: duplicate profile 'Bass'");
    });

    it('keeps soft violations as issues instead of throwing', () => {
      const table = parseProfileTable(tableJson([{ name: 'Alto', canonical: { ...TENOR_VECTOR, F3: 3000 } }]));
      expect(table.issues.map((i) => i.kind)).toEqual(['formant_order']);
      expect(table.profiles.get('Alto')?.description).toBe('');
    });
  });

  it('logs each issue when loading from disk', () => {
    const dir = mkdtempSync(join(tmpdir(), 'formant-profiles-'));
    try {
      const file = join(dir, 'table.json');
      writeFileSync(file, JSON.stringify(tableJson([{ name: 'Bass', canonical: { ...TENOR_VECTOR, F2: 500 } }])));
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

      const table = loadProfileTable(file);

      expect(table.issues).toHaveLength(1);
      expect(warn).toHaveBeenCalledWith('[profiles] Bass: formants not ascending (F1=565, F2=500, F3=2250, F4=2900)');
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('wraps unreadable files as INVALID_PROFILE_TABLE', () => {
    expect(() => loadProfileTable('/nonexistent/voice-profiles.json')).toThrow('Cannot read profile table at /nonexistent/voice-profiles.json');
  });
});
