import { z } from 'zod';
import type { SuccessfulTransform } from '../types/transform';

const CandidateSchema = z.object({
  identityKey: z.string(),
  label: z.string(),
  sourceTag: z.string(),
  popularityScore: z.number(),
  flagged: z.boolean(),
  imageUrl: z.string(),
});

const SuccessfulTransformSchema = z.object({
  outcome: z.literal('success'),
  candidate: CandidateSchema,
  artifact: z.object({ name: z.string(), reference: z.string() }),
  facesSwapped: z.number().int().nonnegative(),
});

const BatchPayloadSchema = z.array(SuccessfulTransformSchema);

/**
 * Guards the batch cache file: anything that does not parse is treated as corrupt.
 */
export function isBatchPayload(value: unknown): value is SuccessfulTransform[] {
  return BatchPayloadSchema.safeParse(value).success;
}

/**
 * Public shape of one batch item in API and CLI output.
 */
export interface BatchItem {
  identityKey: string;
  label: string;
  sourceTag: string;
  popularityScore: number;
  sourceUrl: string;
  artifact: string;
  facesSwapped: number;
}

export function toBatchItem(result: SuccessfulTransform): BatchItem {
  return {
    identityKey: result.candidate.identityKey,
    label: result.candidate.label,
    sourceTag: result.candidate.sourceTag,
    popularityScore: result.candidate.popularityScore,
    sourceUrl: result.candidate.imageUrl,
    artifact: result.artifact.reference,
    facesSwapped: result.facesSwapped,
  };
}
