/**
 * Shared fixtures and stub collaborators for the test suites
 */

import type {
  EnhancementCollaborator,
  EnhancementRequest,
  EnhancementResult,
  ReasoningCollaborator,
  ScoringRequest,
  ScoringResult,
  SiteAnalysisCollaborator,
} from '../lib/collaborators';
import type { Segment, SiteProfile, Utterance, ViralRationale } from '../lib/types';
import type { RetryPolicy } from '../lib/utils/call-policy';

export const NO_DELAY_RETRY: RetryPolicy = { max_attempts: 3, initial_delay_ms: 0 };

export const PROFILE: SiteProfile = {
  topic: 'podcast editing, short-form video',
  audience: 'Indie podcasters: solo hosts who edit their own shows',
  product_description: 'Clipwise turns long podcast episodes into short captioned clips.',
  product_name: 'Clipwise',
  topic_keywords: ['podcast editing', 'short-form video'],
  use_cases: ['Find the best 30 seconds of an episode'],
};

export function rationale(notes = ''): ViralRationale {
  return {
    score_total_0_10: 5,
    strong_claim_0_5: 3,
    tension_resolution_0_5: 3,
    quotability_0_5: 3,
    specificity_0_5: 3,
    emotion_fit_0_5: 3,
    notes,
  };
}

/**
 * A segment of consecutive 10-second utterances, alternating speakers.
 */
export function makeSegment(index: number, firstUtterance: number, texts: string[]): Segment {
  const utterances: Utterance[] = texts.map((text, i) => ({
    speaker_id: (firstUtterance + i) % 2 === 0 ? 'Speaker A' : 'Speaker B',
    start_offset: (firstUtterance + i) * 10,
    end_offset: (firstUtterance + i + 1) * 10,
    text,
  }));
  const start = firstUtterance * 10;
  const end = (firstUtterance + texts.length) * 10;

  return {
    index,
    start_offset: start,
    end_offset: end,
    duration: end - start,
    first_utterance: firstUtterance,
    utterances,
  };
}

type ScoreFn = (request: ScoringRequest, call: number) => number | Error | Partial<ScoringResult>;

export class StubReasoning implements ReasoningCollaborator {
  readonly calls: ScoringRequest[] = [];

  constructor(private readonly score: ScoreFn) {}

  async scoreSegment(request: ScoringRequest): Promise<ScoringResult> {
    this.calls.push(request);
    const outcome = this.score(request, this.calls.length);
    if (outcome instanceof Error) {
      throw outcome;
    }
    const base: ScoringResult = {
      relevance_score: 0,
      app_mention_present: false,
      hook_text: request.dialogue[0]?.text ?? '',
      on_topic_terms: [],
      viral_rationale: rationale(),
    };
    return typeof outcome === 'number' ? { ...base, relevance_score: outcome } : { ...base, ...outcome };
  }
}

type EnhanceFn = (request: EnhancementRequest, call: number) => EnhancementResult | Error;

export class StubEnhancement implements EnhancementCollaborator {
  readonly calls: EnhancementRequest[] = [];

  constructor(private readonly respond: EnhanceFn) {}

  async enhanceDialogue(request: EnhancementRequest): Promise<EnhancementResult> {
    this.calls.push(request);
    const outcome = this.respond(request, this.calls.length);
    if (outcome instanceof Error) {
      throw outcome;
    }
    return outcome;
  }
}

export class StubSiteAnalysis implements SiteAnalysisCollaborator {
  readonly calls: string[] = [];

  constructor(
    private readonly profile: SiteProfile = PROFILE,
    private readonly onCall: () => void = () => undefined
  ) {}

  async analyzeSite(url: string): Promise<SiteProfile> {
    this.calls.push(url);
    this.onCall();
    return this.profile;
  }
}
