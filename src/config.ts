import { z } from 'zod';
import { fileURLToPath } from 'node:url';
import type { ParamRanges } from './types/formant.js';

/**
 * Runtime configuration, read from the environment once at startup.
 *
 * The shaping and fingerprint constants are calibration values, not
 * derived quantities: tune them against the instrument.
 */

const DEFAULT_PROFILE_TABLE = fileURLToPath(new URL('../profiles/voice-profiles.json', import.meta.url));

const bool = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

const EnvSchema = z.object({
  FORMANT_K_BRIGHT: z.coerce.number().min(0).max(0.45).default(0.15),
  FORMANT_K_RES: z.coerce.number().min(0).max(1).default(0.5),
  FORMANT_K_RES_Q: z.coerce.number().min(0).max(1).default(0.25),
  FORMANT_F_MIN_HZ: z.coerce.number().positive().default(200),
  FORMANT_F_MAX_HZ: z.coerce.number().positive().default(4000),
  FORMANT_L_MAX: z.coerce.number().positive().default(99),
  FORMANT_R_MIN: z.coerce.number().min(0).default(0),
  FORMANT_R_MAX: z.coerce.number().positive().default(15),

  FP_MIN_DURATION_MS: z.coerce.number().positive().default(50),
  FP_CENTROID_LOW_HZ: z.coerce.number().min(0).default(1500),
  FP_CENTROID_HIGH_HZ: z.coerce.number().positive().default(4000),
  FP_CHEST_LOW_HZ: z.coerce.number().min(0).default(100),
  FP_CHEST_HIGH_HZ: z.coerce.number().positive().default(800),
  FP_HEAD_LOW_HZ: z.coerce.number().min(0).default(2000),
  FP_HEAD_HIGH_HZ: z.coerce.number().positive().default(5000),
  FP_BALANCE_SPAN_DB: z.coerce.number().positive().default(30),
  FP_SILENCE_DBFS: z.coerce.number().max(0).default(-60),

  DISPATCH_INTERVAL_MS: z.coerce.number().int().min(0).default(150),
  DISPATCH_DIFF: bool.default('true'),
  DLIN_PATH: z.string().min(1).default('./d-lin'),
  DLIN_USE_SUDO: bool.default('false'),
  SLOT_DIR: z.string().min(1).default('.formant-pad/slots'),
  PROFILE_TABLE_PATH: z.string().min(1).default(DEFAULT_PROFILE_TABLE),

  PORT: z.coerce.number().int().positive().default(4321),
  AUTH_TOKEN: z.string().min(1).optional(),
  RATE_LIMIT_RPM: z.coerce.number().int().positive().default(20),
})
  .refine((e) => e.FORMANT_F_MIN_HZ < e.FORMANT_F_MAX_HZ, 'FORMANT_F_MIN_HZ must be below FORMANT_F_MAX_HZ')
  .refine((e) => e.FORMANT_R_MIN < e.FORMANT_R_MAX, 'FORMANT_R_MIN must be below FORMANT_R_MAX')
  .refine((e) => e.FP_CENTROID_LOW_HZ < e.FP_CENTROID_HIGH_HZ, 'FP_CENTROID_LOW_HZ must be below FP_CENTROID_HIGH_HZ')
  .refine((e) => e.FP_CHEST_LOW_HZ < e.FP_CHEST_HIGH_HZ, 'chest band is empty')
  .refine((e) => e.FP_HEAD_LOW_HZ < e.FP_HEAD_HIGH_HZ, 'head band is empty');

/** Constants of the pad interpolation. */
export interface ShapingConstants {
  /** Frequency shift per unit of pad x (at nominal brightness). */
  readonly kBright: number;
  /** Level attenuation per unit of positive resonance slider. */
  readonly kRes: number;
  /** Resonance (Q) scaling per unit of resonance slider. */
  readonly kResQ: number;
  readonly ranges: ParamRanges;
}

export interface FingerprintConstants {
  readonly minDurationSec: number;
  readonly centroidLowHz: number;
  readonly centroidHighHz: number;
  readonly chestBandHz: readonly [number, number];
  readonly headBandHz: readonly [number, number];
  readonly balanceSpanDb: number;
  readonly silenceDbfs: number;
}

export interface DispatchSettings {
  readonly minIntervalMs: number;
  readonly diff: boolean;
}

export interface LibrarianSettings {
  readonly dlinPath: string;
  readonly useSudo: boolean;
}

export interface ServerSettings {
  readonly port: number;
  readonly authToken: string | undefined;
  readonly rateLimitRpm: number;
}

export interface AppConfig {
  readonly shaping: ShapingConstants;
  readonly fingerprint: FingerprintConstants;
  readonly dispatch: DispatchSettings;
  readonly librarian: LibrarianSettings;
  readonly slotDir: string;
  readonly profileTablePath: string;
  readonly server: ServerSettings;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'env'}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;

  return Object.freeze({
    shaping: Object.freeze({
      kBright: e.FORMANT_K_BRIGHT,
      kRes: e.FORMANT_K_RES,
      kResQ: e.FORMANT_K_RES_Q,
      ranges: Object.freeze({
        frequencyHz: Object.freeze({ min: e.FORMANT_F_MIN_HZ, max: e.FORMANT_F_MAX_HZ }),
        level: Object.freeze({ min: 0, max: e.FORMANT_L_MAX }),
        resonance: Object.freeze({ min: e.FORMANT_R_MIN, max: e.FORMANT_R_MAX }),
      }),
    }),
    fingerprint: Object.freeze({
      minDurationSec: e.FP_MIN_DURATION_MS / 1000,
      centroidLowHz: e.FP_CENTROID_LOW_HZ,
      centroidHighHz: e.FP_CENTROID_HIGH_HZ,
      chestBandHz: [e.FP_CHEST_LOW_HZ, e.FP_CHEST_HIGH_HZ] as const,
      headBandHz: [e.FP_HEAD_LOW_HZ, e.FP_HEAD_HIGH_HZ] as const,
      balanceSpanDb: e.FP_BALANCE_SPAN_DB,
      silenceDbfs: e.FP_SILENCE_DBFS,
    }),
    dispatch: Object.freeze({
      minIntervalMs: e.DISPATCH_INTERVAL_MS,
      diff: e.DISPATCH_DIFF,
    }),
    librarian: Object.freeze({
      dlinPath: e.DLIN_PATH,
      useSudo: e.DLIN_USE_SUDO,
    }),
    slotDir: e.SLOT_DIR,
    profileTablePath: e.PROFILE_TABLE_PATH,
    server: Object.freeze({
      port: e.PORT,
      authToken: e.AUTH_TOKEN,
      rateLimitRpm: e.RATE_LIMIT_RPM,
    }),
  });
}

/** Defaults with no environment applied; used by tests and library callers. */
export const DEFAULT_CONFIG: AppConfig = loadConfig({});
export const DEFAULT_SHAPING: ShapingConstants = DEFAULT_CONFIG.shaping;
export const DEFAULT_FINGERPRINT: FingerprintConstants = DEFAULT_CONFIG.fingerprint;
