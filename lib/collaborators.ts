/**
 * Capability interfaces for the external services the pipeline calls, and
 * the factory that wires the production implementations from a config value.
 *
 * Each interface is one request in, one result out; failures are thrown as
 * CollaboratorTransportError (retryable) or CollaboratorRequestError.
 */

import OpenAI from 'openai';
import type { PipelineConfig } from './config';
import type {
  DialogueLine,
  EnhancementIntensity,
  MediaHandle,
  SiteProfile,
  ViralRationale,
} from './types';
import { SiteAnalystAgent } from './agents/site-analyst-agent';
import { ClipJudgeAgent } from './agents/clip-judge-agent';
import { DialogueEnhancerAgent } from './agents/dialogue-enhancer-agent';
import { FirecrawlTool } from './tools/firecrawl';
import { StorageTool } from './tools/storage';
import { TtsTool } from './tools/tts';
import { SyncLipSyncTool } from './tools/lipsync';
import { ZapCapTool } from './tools/captions';
import { Logger } from './utils';

export interface SiteAnalysisCollaborator {
  analyzeSite(url: string): Promise<SiteProfile>;
}

export interface ScoringRequest {
  segment_text: string;
  dialogue: DialogueLine[];
  profile: SiteProfile;
  whitelist: string[];
  blacklist: string[];
}

export interface ScoringResult {
  relevance_score: number;
  app_mention_present: boolean;
  hook_text: string;
  on_topic_terms: string[];
  viral_rationale: ViralRationale;
}

export interface ReasoningCollaborator {
  scoreSegment(request: ScoringRequest): Promise<ScoringResult>;
}

export interface EnhancementRequest {
  lines: DialogueLine[];
  profile: SiteProfile;
  intensity: EnhancementIntensity;
  include_app_mention: boolean;
  emotion_tags: readonly string[];
}

export interface EnhancementResult {
  lines: DialogueLine[];
}

export interface EnhancementCollaborator {
  enhanceDialogue(request: EnhancementRequest): Promise<EnhancementResult>;
}

export interface SpeechSynthesizer {
  synthesize(request: { speaker: string; text: string; key: string }): Promise<MediaHandle>;
}

export interface LipSyncCollaborator {
  lipSync(request: { speaker: string; audio: MediaHandle; key: string }): Promise<MediaHandle>;
}

export interface VideoCompositor {
  compose(request: { clips: MediaHandle[]; key: string }): Promise<MediaHandle>;
}

export interface Captioner {
  caption(request: { video: MediaHandle; key: string }): Promise<MediaHandle>;
}

/** Captions are burned into the composed video, so a captioner needs a compositor. */
export type MediaCollaborators = {
  speech: SpeechSynthesizer;
  lipSync: LipSyncCollaborator;
} & (
  | { compositor: VideoCompositor; captioner?: Captioner }
  | { compositor?: undefined; captioner?: undefined }
);

export interface Collaborators {
  siteAnalysis: SiteAnalysisCollaborator;
  reasoning: ReasoningCollaborator;
  enhancement: EnhancementCollaborator;
  media?: MediaCollaborators;
}

export interface CollaboratorOptions {
  /** Host-supplied compositor; captions are only burned into a composed video. */
  compositor?: VideoCompositor;
}

/**
 * Production wiring. Media collaborators are only created when the speaker
 * base videos and the lip-sync key are configured and media lands in Vercel
 * Blob, since the hosted lip-sync and caption services fetch it by URL.
 */
export function createCollaborators(
  config: PipelineConfig,
  storage: StorageTool,
  options: CollaboratorOptions = {}
): Collaborators {
  // Retries are owned by the pipeline's call policy, not the SDK
  const client = new OpenAI({ apiKey: config.credentials.openai_api_key, maxRetries: 0 });

  const collaborators: Collaborators = {
    siteAnalysis: new SiteAnalystAgent(client, config.models.analysis, new FirecrawlTool(config.credentials.firecrawl_api_key)),
    reasoning: new ClipJudgeAgent(client, config.models.scoring),
    enhancement: new DialogueEnhancerAgent(client, config.models.enhancement),
  };

  const hasVideos = Object.keys(config.media.speaker_videos).length > 0;
  if (!hasVideos || !config.credentials.sync_api_key) {
    return collaborators;
  }

  if (config.storage.backend !== 'vercel-blob') {
    Logger.warn('Media generation disabled: hosted lip-sync needs the vercel-blob storage backend', {
      backend: config.storage.backend,
    });
    return collaborators;
  }

  const lineMedia = {
    speech: new TtsTool(client, storage, config.models.speech, config.media.voices),
    lipSync: new SyncLipSyncTool(config.credentials.sync_api_key, config.media),
  };
  const { compositor } = options;

  collaborators.media = compositor
    ? {
        ...lineMedia,
        compositor,
        captioner: config.credentials.zapcap_api_key
          ? new ZapCapTool(config.credentials.zapcap_api_key, config.media)
          : undefined,
      }
    : lineMedia;

  return collaborators;
}
