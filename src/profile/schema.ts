import { z } from 'zod';
import { FormantVectorSchema } from '../types/formant.js';
import type { FormantVector, FrequencyField, ValueRange } from '../types/formant.js';

export const PROFILE_NAMES = ['Bass', 'Baritone', 'Tenor', 'Alto', 'Mezzo', 'Soprano', 'Neutral'] as const;
export type ProfileName = (typeof PROFILE_NAMES)[number];

const RangeSchema = z.object({
  min: z.number().finite(),
  max: z.number().finite(),
}).refine((r) => r.min <= r.max, 'range min must not exceed max');

export const VoiceProfileTableSchema = z.object({
  schema: z.literal('formant-pad.voiceprofiles'),
  version: z.string(),
  profiles: z.array(
    z.object({
      name: z.enum(PROFILE_NAMES),
      description: z.string().optional(),
      canonical: FormantVectorSchema,
      ranges: z.object({
        F1: RangeSchema.optional(),
        F2: RangeSchema.optional(),
        F3: RangeSchema.optional(),
        F4: RangeSchema.optional(),
      }).optional(),
    })
  ).min(1),
});

export type VoiceProfileTableManifest = z.infer<typeof VoiceProfileTableSchema>;

export interface VoiceProfile {
  readonly name: ProfileName;
  readonly description: string;
  readonly canonical: FormantVector;
  /** Typical vowel-space span per frequency field, when known. */
  readonly ranges: Readonly<Partial<Record<FrequencyField, ValueRange>>>;
}

export type ProfileIssueKind = 'formant_order' | 'out_of_range';

export interface ProfileIssue {
  profile: ProfileName;
  kind: ProfileIssueKind;
  message: string;
}
