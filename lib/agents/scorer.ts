/**
 * Relevance Scorer - Filters, scores, deduplicates and ranks candidate segments
 *
 * The relevance judgement itself comes from a ReasoningCollaborator; this
 * module owns everything around it so ranking stays deterministic.
 */

import type { ReasoningCollaborator, ScoringResult } from '../collaborators';
import { NoViableSegmentsError, ScoringUnavailableError } from '../errors';
import { formatTimestamp } from '../transcript/parser';
import { segmentText } from '../transcript/windower';
import type { KeywordFilters, ScoredSegment, Segment, SiteProfile } from '../types';
import { Logger } from '../utils';
import { RateLimiter, type RetryPolicy, withRetryPolicy } from '../utils/call-policy';

export interface ScorerOptions {
  max_clips: number;
  whitelist_boost: number;
  overlap_threshold: number;
  concurrency: number;
  retry: RetryPolicy;
}

export interface RankingOutput {
  ranked: ScoredSegment[];
  detailed_report: {
    candidates: number;
    candidates_scored: number;
    top_picks: Array<{ rank: number; start_time: string; score: number; why_selected: string }>;
    rejected: Array<{ index: number; start_time: string; score: number | null; reason: string }>;
  };
}

/**
 * Case-insensitive substring search; returns the first keyword found.
 */
export function findKeyword(text: string, keywords: readonly string[]): string | null {
  const haystack = text.toLowerCase();
  for (const keyword of keywords) {
    const needle = keyword.trim().toLowerCase();
    if (needle && haystack.includes(needle)) {
      return keyword;
    }
  }
  return null;
}

/**
 * Shared utterances as a fraction of the smaller segment's utterance count.
 */
export function utteranceOverlap(
  a: Pick<Segment, 'first_utterance' | 'utterances'>,
  b: Pick<Segment, 'first_utterance' | 'utterances'>
): number {
  const aEnd = a.first_utterance + a.utterances.length;
  const bEnd = b.first_utterance + b.utterances.length;
  const shared = Math.min(aEnd, bEnd) - Math.max(a.first_utterance, b.first_utterance);
  if (shared <= 0) return 0;
  return shared / Math.min(a.utterances.length, b.utterances.length);
}

/**
 * Descending score, then earlier start, then lower candidate index.
 */
export function compareScored(
  a: Pick<ScoredSegment, 'relevance_score' | 'start_offset' | 'index'>,
  b: Pick<ScoredSegment, 'relevance_score' | 'start_offset' | 'index'>
): number {
  if (b.relevance_score !== a.relevance_score) {
    return b.relevance_score - a.relevance_score;
  }
  if (a.start_offset !== b.start_offset) {
    return a.start_offset - b.start_offset;
  }
  return a.index - b.index;
}

export class RelevanceScorer {
  constructor(
    private readonly collaborator: ReasoningCollaborator,
    private readonly options: ScorerOptions
  ) {}

  async rank(
    segments: readonly Segment[],
    profile: SiteProfile,
    filters: KeywordFilters
  ): Promise<RankingOutput> {
    const { max_clips, whitelist_boost, overlap_threshold, concurrency, retry } = this.options;
    const rejected: RankingOutput['detailed_report']['rejected'] = [];

    // Blacklist is absolute and is applied before any scoring call
    const eligible = segments.filter(segment => {
      const hit = findKeyword(segmentText(segment), filters.blacklist);
      if (hit) {
        rejected.push({
          index: segment.index,
          start_time: formatTimestamp(segment.start_offset),
          score: null,
          reason: `Blacklisted keyword "${hit}"`,
        });
      }
      return !hit;
    });

    Logger.info('Scoring candidate segments', {
      candidates: segments.length,
      eligible: eligible.length,
      blacklisted: segments.length - eligible.length,
    });

    if (eligible.length === 0) {
      throw new NoViableSegmentsError(
        `All ${segments.length} candidate segments contain blacklisted keywords`,
        'scoring'
      );
    }

    const limiter = new RateLimiter(concurrency, 0);
    const settled = await Promise.allSettled(
      eligible.map(segment =>
        limiter.execute(() =>
          withRetryPolicy(
            'reasoning',
            () =>
              this.collaborator.scoreSegment({
                segment_text: segmentText(segment),
                dialogue: segment.utterances.map(u => ({ speaker: u.speaker_id, text: u.text })),
                profile,
                whitelist: filters.whitelist,
                blacklist: filters.blacklist,
              }),
            retry
          )
        )
      )
    );

    // Every call has settled before anything is ranked
    const scored: ScoredSegment[] = settled.map((outcome, i) => {
      const segment = eligible[i];
      if (outcome.status === 'rejected') {
        const reason = outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason);
        throw new ScoringUnavailableError(
          `Scoring failed for segment ${segment.index} (${formatTimestamp(segment.start_offset)}): ${reason}`,
          outcome.reason
        );
      }
      return this.toScored(segment, outcome.value, filters.whitelist, whitelist_boost);
    });

    scored.sort(compareScored);

    const kept: ScoredSegment[] = [];
    for (const candidate of scored) {
      const duplicateOf = kept.find(k => utteranceOverlap(k, candidate) > overlap_threshold);
      if (duplicateOf) {
        rejected.push({
          index: candidate.index,
          start_time: formatTimestamp(candidate.start_offset),
          score: candidate.relevance_score,
          reason: `Overlaps higher-ranked segment ${duplicateOf.index}`,
        });
        continue;
      }
      if (kept.length >= max_clips) {
        rejected.push({
          index: candidate.index,
          start_time: formatTimestamp(candidate.start_offset),
          score: candidate.relevance_score,
          reason: `Below the top ${max_clips}`,
        });
        continue;
      }
      kept.push(candidate);
    }

    const ranked = kept.map((segment, i) => ({ ...segment, rank: i + 1 }));

    Logger.info('Ranking complete', {
      ranked: ranked.length,
      top_score: ranked[0]?.relevance_score,
      rejected: rejected.length,
    });

    return {
      ranked,
      detailed_report: {
        candidates: segments.length,
        candidates_scored: scored.length,
        top_picks: ranked.map(r => ({
          rank: r.rank,
          start_time: formatTimestamp(r.start_offset),
          score: Math.round(r.relevance_score * 1000) / 1000,
          why_selected: r.viral_rationale.notes,
        })),
        rejected,
      },
    };
  }

  private toScored(
    segment: Segment,
    result: ScoringResult,
    whitelist: readonly string[],
    boost: number
  ): ScoredSegment {
    if (!Number.isFinite(result.relevance_score)) {
      throw new ScoringUnavailableError(
        `Reasoning collaborator returned a non-numeric score for segment ${segment.index}`
      );
    }

    const boosted = findKeyword(segmentText(segment), whitelist) !== null;
    const base = Math.min(1, Math.max(0, result.relevance_score));
    const score = boosted ? Math.min(1, base + boost) : base;

    return {
      ...segment,
      relevance_score: score,
      rank: 0,
      app_mention_present: result.app_mention_present,
      hook_text: result.hook_text || segment.utterances[0].text,
      on_topic_terms: result.on_topic_terms,
      viral_rationale: result.viral_rationale,
    };
  }
}
