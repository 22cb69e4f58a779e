/**
 * Zod Schemas for persisted and service-returned data
 *
 * Runtime validation for metadata files read back from disk and for the
 * structured summary returned by the completion service.
 */
import { z } from 'zod';

/**
 * Completion payload: both language variants must be present
 */
export const SummaryResponseSchema = z.object({
  primary: z.string().trim().min(1, 'primary summary is empty'),
  secondary: z.string().trim().min(1, 'secondary summary is empty'),
});

const SummaryTextSchema = z.object({
  language: z.string().min(1),
  text: z.string(),
});

export const MetadataRecordSchema = z.object({
  id: z.string().regex(/^\d+$/, 'Story ID must be numeric'),
  rank: z.number().int().positive(),
  title: z.string(),
  url: z.string(),
  hackerNewsUrl: z.string(),
  points: z.number().int().nonnegative(),
  commentCount: z.number().int().nonnegative(),
  summaries: z.object({
    primary: SummaryTextSchema,
    secondary: SummaryTextSchema,
  }),
  audio: z.array(
    z.object({
      language: z.string().min(1),
      file: z.string().min(1),
    })
  ),
  generatedAt: z.string().datetime(),
});

/**
 * Type exports (inferred from schemas)
 */
export type SummaryResponse = z.infer<typeof SummaryResponseSchema>;
