/**
 * zod schemas for everything the pipeline persists. Artifacts are validated
 * on load so a cache written by an older build is rejected instead of trusted.
 */

import { z } from 'zod';

export const UtteranceSchema = z.object({
  speaker_id: z.string(),
  start_offset: z.number(),
  end_offset: z.number(),
  text: z.string(),
});

export const SegmentSchema = z.object({
  index: z.number().int(),
  start_offset: z.number(),
  end_offset: z.number(),
  duration: z.number(),
  first_utterance: z.number().int(),
  utterances: z.array(UtteranceSchema).min(1),
});

export const SiteProfileSchema = z.object({
  topic: z.string(),
  audience: z.string(),
  product_description: z.string(),
  product_name: z.string(),
  topic_keywords: z.array(z.string()),
  use_cases: z.array(z.string()),
});

export const ViralRationaleSchema = z.object({
  score_total_0_10: z.number(),
  strong_claim_0_5: z.number(),
  tension_resolution_0_5: z.number(),
  quotability_0_5: z.number(),
  specificity_0_5: z.number(),
  emotion_fit_0_5: z.number(),
  notes: z.string(),
});

export const ScoredSegmentSchema = SegmentSchema.extend({
  relevance_score: z.number().min(0).max(1),
  rank: z.number().int().min(1),
  app_mention_present: z.boolean(),
  hook_text: z.string(),
  on_topic_terms: z.array(z.string()),
  viral_rationale: ViralRationaleSchema,
});

export const RankingOutputSchema = z.object({
  ranked: z.array(ScoredSegmentSchema),
  detailed_report: z.object({
    candidates: z.number(),
    candidates_scored: z.number(),
    top_picks: z.array(
      z.object({ rank: z.number(), start_time: z.string(), score: z.number(), why_selected: z.string() })
    ),
    rejected: z.array(
      z.object({ index: z.number(), start_time: z.string(), score: z.number().nullable(), reason: z.string() })
    ),
  }),
});

export const EnhancedSegmentSchema = ScoredSegmentSchema.extend({
  enhancement: z.object({
    applied: z.boolean(),
    intensity: z.enum(['subtle', 'balanced', 'expressive']),
    app_mention_line: z.number().int().nullable(),
    warning: z.string().nullable(),
  }),
});

export const MediaHandleSchema = z.object({
  kind: z.enum(['audio', 'video']),
  url: z.string(),
  storage_path: z.string().optional(),
});

export const DispatchResultSchema = z.object({
  lines: z.array(
    z.object({
      line_index: z.number().int(),
      speaker: z.string(),
      audio: MediaHandleSchema,
      video: MediaHandleSchema,
    })
  ),
  composed: MediaHandleSchema.nullable(),
  captioned: MediaHandleSchema.nullable(),
  final: MediaHandleSchema.nullable(),
  warnings: z.array(z.string()),
});
