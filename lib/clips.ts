/**
 * Clips document - the ranked clip list handed to video generation
 *
 * The field set is a stable contract: a document saved by one run is loaded
 * by a later one, so both directions go through the same schema.
 */

import { z } from 'zod';
import { ViralRationaleSchema } from './schemas';
import { formatTimestamp, parseTimestamp } from './transcript/parser';
import { segmentText } from './transcript/windower';
import type { ScoredSegment, SiteProfile, Utterance } from './types';
import { estimateSpeechSeconds } from './utils';

const TimestampSchema = z.string().regex(/^\d{1,2}:[0-5]\d:[0-5]\d$/, 'expected HH:MM:SS');

export const ClipSchema = z.object({
  rank: z.number().int().min(1),
  start_time: TimestampSchema,
  end_time: TimestampSchema,
  hook_text: z.string(),
  full_30s_transcript: z.string(),
  dialogue_lines: z
    .array(
      z.object({
        speaker: z.string().min(1),
        text: z.string(),
      })
    )
    .min(1),
  app_mention_present: z.boolean(),
  on_topic_terms_found: z.array(z.string()),
  relevance_score_0_1: z.number().min(0).max(1),
  viral_rationale: ViralRationaleSchema,
});

export const ClipsDocumentSchema = z.object({
  topic: z.string(),
  audience: z.string(),
  clips_ranked: z.array(ClipSchema),
});

export type Clip = z.infer<typeof ClipSchema>;
export type ClipsDocument = z.infer<typeof ClipsDocumentSchema>;

export function toClipsDocument(profile: SiteProfile, ranked: readonly ScoredSegment[]): ClipsDocument {
  return {
    topic: profile.topic,
    audience: profile.audience,
    clips_ranked: ranked.map(segment => ({
      rank: segment.rank,
      start_time: formatTimestamp(segment.start_offset),
      end_time: formatTimestamp(segment.end_offset),
      hook_text: segment.hook_text,
      full_30s_transcript: segmentText(segment),
      dialogue_lines: segment.utterances.map(u => ({ speaker: u.speaker_id, text: u.text })),
      app_mention_present: segment.app_mention_present,
      on_topic_terms_found: [...segment.on_topic_terms],
      relevance_score_0_1: segment.relevance_score,
      viral_rationale: { ...segment.viral_rationale },
    })),
  };
}

export function serializeClipsDocument(document: ClipsDocument): string {
  return JSON.stringify(document, null, 2);
}

/**
 * Parses and validates a saved document; throws with every schema issue
 * listed when the document does not conform.
 */
export function parseClipsDocument(input: unknown): ClipsDocument {
  const raw: unknown = typeof input === 'string' ? JSON.parse(input) : input;
  const result = ClipsDocumentSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new Error(`Invalid clips document: ${issues.join('; ')}`);
  }
  return result.data;
}

/**
 * Rebuilds ranked segments from a loaded document. Per-line offsets are not
 * part of the document, so the clip's span is shared out in proportion to
 * each line's spoken length.
 */
export function segmentsFromClipsDocument(document: ClipsDocument): ScoredSegment[] {
  return document.clips_ranked.map((clip, index) => {
    const start = parseTimestamp(clip.start_time) ?? 0;
    const end = Math.max(start, parseTimestamp(clip.end_time) ?? start);
    const weights = clip.dialogue_lines.map(line => estimateSpeechSeconds(line.text));
    const totalWeight = weights.reduce((sum, w) => sum + w, 0);

    let cursor = start;
    const utterances: Utterance[] = clip.dialogue_lines.map((line, i) => {
      const isLast = i === clip.dialogue_lines.length - 1;
      const lineEnd = isLast ? end : cursor + ((end - start) * weights[i]) / totalWeight;
      const utterance = Object.freeze({
        speaker_id: line.speaker,
        start_offset: cursor,
        end_offset: lineEnd,
        text: line.text,
      });
      cursor = lineEnd;
      return utterance;
    });

    return {
      index,
      start_offset: start,
      end_offset: end,
      duration: end - start,
      first_utterance: 0,
      utterances,
      relevance_score: clip.relevance_score_0_1,
      rank: clip.rank,
      app_mention_present: clip.app_mention_present,
      hook_text: clip.hook_text,
      on_topic_terms: [...clip.on_topic_terms_found],
      viral_rationale: { ...clip.viral_rationale },
    };
  });
}
