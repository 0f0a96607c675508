import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG, loadConfig } from '../config.js';

describe('loadConfig', () => {
  it('falls back to calibrated defaults with an empty environment', () => {
    const config = loadConfig({});
    expect(config.shaping).toMatchObject({ kBright: 0.15, kRes: 0.5, kResQ: 0.25 });
    expect(config.shaping.ranges).toEqual({
      frequencyHz: { min: 200, max: 4000 },
      level: { min: 0, max: 99 },
      resonance: { min: 0, max: 15 },
    });
    expect(config.fingerprint.minDurationSec).toBe(0.05);
    expect(config.fingerprint.chestBandHz).toEqual([100, 800]);
    expect(config.fingerprint.headBandHz).toEqual([2000, 5000]);
    expect(config.dispatch).toEqual({ minIntervalMs: 150, diff: true });
    expect(config.librarian).toEqual({ dlinPath: './d-lin', useSudo: false });
    expect(config.server).toEqual({ port: 4321, authToken: undefined, rateLimitRpm: 20 });
    expect(config.profileTablePath.endsWith('voice-profiles.json')).toBe(true);
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      FORMANT_K_BRIGHT: '0.2',
      DISPATCH_DIFF: 'false',
      DISPATCH_INTERVAL_MS: '0',
      DLIN_USE_SUDO: 'yes',
      PORT: '8080',
      AUTH_TOKEN: 'test-secret',
    });
    expect(config.shaping.kBright).toBe(0.2);
    expect(config.dispatch).toEqual({ minIntervalMs: 0, diff: false });
    expect(config.librarian.useSudo).toBe(true);
    expect(config.server.port).toBe(8080);
    expect(config.server.authToken).toBe('test-secret');
  });

  it('rejects values outside their bounds', () => {
    expect(() => loadConfig({ FORMANT_K_BRIGHT: '0.9' })).toThrow(/^Invalid configuration: FORMANT_K_BRIGHT/);
    expect(() => loadConfig({ DISPATCH_DIFF: 'maybe' })).toThrow(/Invalid configuration: DISPATCH_DIFF/);
  });

  it('rejects inverted ranges', () => {
    expect(() => loadConfig({ FORMANT_F_MIN_HZ: '5000' })).toThrow(
      'Invalid configuration: env: FORMANT_F_MIN_HZ must be below FORMANT_F_MAX_HZ'
    );
    expect(() => loadConfig({ FP_HEAD_LOW_HZ: '6000' })).toThrow('head band is empty');
  });

  it('freezes the result', () => {
    expect(Object.isFrozen(DEFAULT_CONFIG)).toBe(true);
    expect(Object.isFrozen(DEFAULT_CONFIG.shaping.ranges.level)).toBe(true);
  });
});
