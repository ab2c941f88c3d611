/**
 * Core type definitions for the clip generation pipeline
 */

/** Offsets and durations are in seconds from the start of the episode. */
export interface Utterance {
  readonly speaker_id: string;
  readonly start_offset: number;
  readonly end_offset: number;
  readonly text: string;
}

export interface Segment {
  index: number;
  start_offset: number;
  end_offset: number;
  duration: number;
  first_utterance: number; // position of utterances[0] in the parsed transcript
  utterances: Utterance[];
}

export interface SiteProfile {
  topic: string;
  audience: string;
  product_description: string;
  product_name: string;
  topic_keywords: string[];
  use_cases: string[];
}

export interface ViralRationale {
  score_total_0_10: number;
  strong_claim_0_5: number;
  tension_resolution_0_5: number;
  quotability_0_5: number;
  specificity_0_5: number;
  emotion_fit_0_5: number;
  notes: string;
}

export interface ScoredSegment extends Segment {
  relevance_score: number;
  rank: number;
  app_mention_present: boolean;
  hook_text: string;
  on_topic_terms: string[];
  viral_rationale: ViralRationale;
}

export type EnhancementIntensity = 'subtle' | 'balanced' | 'expressive';

export interface EnhancementInfo {
  applied: boolean;
  intensity: EnhancementIntensity;
  app_mention_line: number | null;
  warning: string | null;
}

export interface EnhancedSegment extends ScoredSegment {
  enhancement: EnhancementInfo;
}

export interface DialogueLine {
  speaker: string;
  text: string;
}

export interface KeywordFilters {
  whitelist: string[];
  blacklist: string[];
}

export type PipelineStage =
  | 'crawling'
  | 'parsing'
  | 'windowing'
  | 'scoring'
  | 'enhancing'
  | 'dispatching';

export type PipelineState = PipelineStage | 'done' | 'failed';

export interface PipelineArtifact<T> {
  key: string;
  stage: PipelineStage;
  schema_version: number;
  created_at: string;
  data: T;
}

export type ClipSelection =
  | { mode: 'rank'; rank: number }
  | { mode: 'index'; index: number };

export interface MediaHandle {
  kind: 'audio' | 'video';
  url: string;
  storage_path?: string;
}

export interface LineMedia {
  line_index: number;
  speaker: string;
  audio: MediaHandle;
  video: MediaHandle;
}

export interface DispatchResult {
  lines: LineMedia[];
  composed: MediaHandle | null;
  captioned: MediaHandle | null;
  final: MediaHandle | null;
  warnings: string[];
}

export interface StateTransition {
  state: PipelineState;
  at: string;
  cached?: boolean;
  detail?: string;
}
