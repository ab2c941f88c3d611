/**
 * Orchestrator - Drives one clip run through the pipeline state machine
 *
 *   crawling → parsing → windowing → scoring → enhancing → dispatching → done
 *
 * Any stage can end the run in `failed`. Every stage output is committed to the
 * artifact store under a key hashed from that stage's inputs, so a repeated run
 * over the same inputs reuses the work and a late failure restarts cheaply.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { Collaborators, MediaCollaborators } from './collaborators';
import type { PipelineConfig } from './config';
import {
  parseClipsDocument,
  segmentsFromClipsDocument,
  serializeClipsDocument,
  toClipsDocument,
  type ClipsDocument,
} from './clips';
import {
  CollaboratorRequestError,
  EnhancementRejectedError,
  PipelineCancelledError,
  PipelineError,
  type PipelineErrorKind,
} from './errors';
import { DialogueEnhancer, unenhancedSegment } from './agents/enhancer';
import { RelevanceScorer, type RankingOutput } from './agents/scorer';
import {
  DispatchResultSchema,
  EnhancedSegmentSchema,
  RankingOutputSchema,
  SegmentSchema,
  SiteProfileSchema,
  UtteranceSchema,
} from './schemas';
import { ArtifactStore } from './tools/artifact-store';
import { progressTracker } from './tools/progress-tracker';
import type { StorageTool } from './tools/storage';
import { buildCandidateSegments } from './transcript/windower';
import { formatTimestamp, parseTranscript } from './transcript/parser';
import type {
  ClipSelection,
  DispatchResult,
  EnhancedSegment,
  LineMedia,
  MediaHandle,
  PipelineStage,
  ScoredSegment,
  Segment,
  SiteProfile,
  StateTransition,
  Utterance,
} from './types';
import { Crypto, Logger } from './utils';
import { withRetryPolicy } from './utils/call-policy';

export interface OrchestratorInput {
  url: string;
  transcript?: string;
  // A previously saved clips document; replaces parsing, windowing and scoring
  clips?: ClipsDocument;
  selection?: ClipSelection;
  signal?: AbortSignal;
  run_id?: string;
}

export interface PipelineMetrics {
  total_time_ms: number;
  stage_times: Partial<Record<PipelineStage, number>>;
  cache_hits: PipelineStage[];
}

export type FailureKind = PipelineErrorKind | 'Internal';

export type OrchestratorOutput =
  | {
      success: true;
      state: 'done';
      run_id: string;
      run_key: string;
      clips_path: string;
      clip: EnhancedSegment;
      media: DispatchResult | null;
      warnings: string[];
      history: StateTransition[];
      metrics: PipelineMetrics;
    }
  | {
      success: false;
      state: 'failed';
      run_id: string;
      failed_stage: PipelineStage;
      error: { kind: FailureKind; message: string };
      history: StateTransition[];
      metrics: PipelineMetrics;
    };

export interface OrchestratorDeps {
  config: PipelineConfig;
  collaborators: Collaborators;
  storage: StorageTool;
}

interface RunContext {
  runId: string;
  signal?: AbortSignal;
  stage: PipelineStage;
  history: StateTransition[];
  warnings: string[];
  stageTimes: Partial<Record<PipelineStage, number>>;
  cacheHits: PipelineStage[];
}

interface StageResult<T> {
  data: T;
  key: string | null;
}

/**
 * Picks the clip a run should enhance. A selection outside the ranked list
 * falls back to rank 1 and says so.
 */
export function selectClip(
  ranked: readonly ScoredSegment[],
  selection: ClipSelection
): { clip: ScoredSegment; warning: string | null } {
  if (ranked.length === 0) {
    throw new Error('No ranked clips to select from');
  }

  const chosen =
    selection.mode === 'rank'
      ? ranked.find(r => r.rank === selection.rank)
      : ranked[selection.index];

  if (chosen) {
    return { clip: chosen, warning: null };
  }

  const requested = selection.mode === 'rank' ? `rank ${selection.rank}` : `index ${selection.index}`;
  return {
    clip: ranked[0],
    warning: `Clip ${requested} not available (${ranked.length} ranked), using rank 1`,
  };
}

export function validateSiteUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error) {
    throw new CollaboratorRequestError('site-analysis', `not a valid URL: ${url}`, undefined, error);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new CollaboratorRequestError('site-analysis', `URL must use http or https: ${url}`);
  }
  return parsed.toString();
}

function freezeUtterances(utterances: Utterance[]): Utterance[] {
  return utterances.map(u => Object.freeze({ ...u }));
}

export class PipelineOrchestrator {
  private readonly config: PipelineConfig;
  private readonly collaborators: Collaborators;
  private readonly storage: StorageTool;
  private readonly artifacts: ArtifactStore;

  constructor(deps: OrchestratorDeps) {
    this.config = deps.config;
    this.collaborators = deps.collaborators;
    this.storage = deps.storage;
    this.artifacts = new ArtifactStore(deps.storage);
  }

  async run(input: OrchestratorInput): Promise<OrchestratorOutput> {
    const startTime = Date.now();
    const ctx: RunContext = {
      runId: input.run_id ?? Crypto.uuid(),
      signal: input.signal,
      stage: 'crawling',
      history: [],
      warnings: [],
      stageTimes: {},
      cacheHits: [],
    };

    const metrics = (): PipelineMetrics => ({
      total_time_ms: Date.now() - startTime,
      stage_times: ctx.stageTimes,
      cache_hits: ctx.cacheHits,
    });

    Logger.info('Pipeline run starting', {
      run_id: ctx.runId,
      url: input.url,
      resumed_from_clips: input.clips !== undefined,
    });

    try {
      const { config } = this;

      // 1. CRAWLING
      const site = await this.stage(
        ctx,
        'crawling',
        Crypto.contentId({ stage: 'crawling', url: validateSiteUrl(input.url), model: config.models.analysis }),
        data => SiteProfileSchema.parse(data),
        () =>
          withRetryPolicy(
            'site-analysis',
            () => this.collaborators.siteAnalysis.analyzeSite(input.url),
            config.retry
          )
      );
      const profile: SiteProfile = site.data;
      Logger.info('Site profile ready', { product: profile.product_name, topic: profile.topic });

      if (config.output.save_analysis) {
        await this.writeDebugFile(`analysis_${site.key}.json`, JSON.stringify(profile, null, 2));
      }

      // 2-4. PARSING, WINDOWING, SCORING
      const ranking = input.clips
        ? await this.rankingFromClips(ctx, input.clips)
        : await this.rankingFromTranscript(ctx, input.transcript ?? '', profile, site.key);

      const { ranked } = ranking.data;
      const clipsDocument = toClipsDocument(profile, ranked);
      const clipsPath = `clips/${ranking.key}.json`;
      if (!(await this.storage.exists(clipsPath))) {
        await this.storage.put(clipsPath, serializeClipsDocument(clipsDocument), 'application/json');
      }
      if (config.output.save_clips) {
        await this.writeDebugFile(`clips_${ranking.key}.json`, serializeClipsDocument(clipsDocument));
      }

      // 5. ENHANCING
      const { clip: selected, warning: selectionWarning } = selectClip(
        ranked,
        input.selection ?? { mode: 'rank', rank: 1 }
      );
      if (selectionWarning) {
        ctx.warnings.push(selectionWarning);
        Logger.warn(selectionWarning, { run_id: ctx.runId });
      }
      Logger.info('Clip selected', {
        rank: selected.rank,
        start: formatTimestamp(selected.start_offset),
        end: formatTimestamp(selected.end_offset),
        score: selected.relevance_score,
      });

      const enhanced = await this.enhance(ctx, selected, profile, ranking.key);

      // 6. DISPATCHING
      const media = await this.dispatch(ctx, enhanced.data, enhanced.key ?? ranking.key);

      const runKey = Crypto.contentId({ ranking: ranking.key, clip: enhanced.key ?? selected.rank });

      ctx.history.push({ state: 'done', at: new Date().toISOString() });
      progressTracker.addUpdate(ctx.runId, {
        phase: 'done',
        status: 'completed',
        message: `Clip rank ${enhanced.data.rank} ready`,
      });

      Logger.info('Pipeline run complete', {
        run_id: ctx.runId,
        run_key: runKey,
        rank: enhanced.data.rank,
        enhanced: enhanced.data.enhancement.applied,
        final_video: media?.final?.url ?? null,
        warnings: ctx.warnings.length,
        total_time_ms: Date.now() - startTime,
      });

      return {
        success: true,
        state: 'done',
        run_id: ctx.runId,
        run_key: runKey,
        clips_path: clipsPath,
        clip: enhanced.data,
        media,
        warnings: ctx.warnings,
        history: ctx.history,
        metrics: metrics(),
      };
    } catch (error) {
      // Cancellation names the stage that was about to start
      const failedStage = error instanceof PipelineError && error.stage ? error.stage : ctx.stage;
      const kind: FailureKind = error instanceof PipelineError ? error.kind : 'Internal';
      const message = error instanceof Error ? error.message : String(error);

      ctx.history.push({ state: 'failed', at: new Date().toISOString(), detail: `${failedStage}: ${kind}` });
      progressTracker.addUpdate(ctx.runId, {
        phase: 'failed',
        status: 'failed',
        message: `${failedStage} failed: ${message}`,
      });

      Logger.error('Pipeline run failed', {
        run_id: ctx.runId,
        stage: failedStage,
        kind,
        error: message,
        cause: error instanceof Error && error.cause instanceof Error ? error.cause.message : undefined,
      });

      return {
        success: false,
        state: 'failed',
        run_id: ctx.runId,
        failed_stage: failedStage,
        error: { kind, message },
        history: ctx.history,
        metrics: metrics(),
      };
    }
  }

  /**
   * Enters a stage: checks for cancellation, records the transition, then
   * either reuses the committed artifact for `key` or computes and commits it.
   * A null key means the output is not cached; `commit` can veto caching
   * an output that is usable but not a success.
   */
  private async stage<T>(
    ctx: RunContext,
    stage: PipelineStage,
    key: string | null,
    decode: (data: unknown) => T,
    compute: () => Promise<T>,
    commit: (data: T) => boolean = () => true
  ): Promise<StageResult<T>> {
    if (ctx.signal?.aborted) {
      throw new PipelineCancelledError(stage);
    }

    ctx.stage = stage;
    const transition: StateTransition = { state: stage, at: new Date().toISOString() };
    ctx.history.push(transition);
    const stageStart = Date.now();

    if (key) {
      const cached = await this.artifacts.load(stage, key, decode);
      if (cached) {
        transition.cached = true;
        ctx.cacheHits.push(stage);
        ctx.stageTimes[stage] = Date.now() - stageStart;
        Logger.info(`Stage ${stage} reused cached artifact`, { run_id: ctx.runId, key });
        progressTracker.addUpdate(ctx.runId, {
          phase: stage,
          status: 'running',
          message: `Reusing cached ${stage} output`,
          cached: true,
        });
        return { data: cached.data, key };
      }
    }

    Logger.info(`Stage ${stage} starting`, { run_id: ctx.runId, key });
    progressTracker.addUpdate(ctx.runId, { phase: stage, status: 'running', message: `Running ${stage}` });

    const data = await compute();
    let committedKey: string | null = null;
    if (key !== null && commit(data)) {
      await this.artifacts.commit(stage, key, data);
      committedKey = key;
    }

    ctx.stageTimes[stage] = Date.now() - stageStart;
    return { data, key: committedKey };
  }

  private async rankingFromTranscript(
    ctx: RunContext,
    transcript: string,
    profile: SiteProfile,
    siteKey: string | null
  ): Promise<StageResult<RankingOutput> & { key: string }> {
    const { parsing, windowing, scoring, retry, models } = this.config;

    const parsed = await this.stage(
      ctx,
      'parsing',
      Crypto.contentId({ stage: 'parsing', transcript: Crypto.sha256(transcript), parsing }),
      data => freezeUtterances(UtteranceSchema.array().parse(data)),
      async () => parseTranscript(transcript, parsing)
    );
    Logger.info('Transcript parsed', { utterances: parsed.data.length });

    const windowed = await this.stage<Segment[]>(
      ctx,
      'windowing',
      Crypto.contentId({ stage: 'windowing', parsed: parsed.key, windowing }),
      data => SegmentSchema.array().parse(data),
      async () => buildCandidateSegments(parsed.data, windowing)
    );
    Logger.info('Candidate segments built', { candidates: windowed.data.length });

    const scoringKey = Crypto.contentId({
      stage: 'scoring',
      site: siteKey,
      windowed: windowed.key,
      model: models.scoring,
      max_clips: scoring.max_clips,
      whitelist: scoring.whitelist,
      blacklist: scoring.blacklist,
      whitelist_boost: scoring.whitelist_boost,
      overlap_threshold: scoring.overlap_threshold,
    });

    const scorer = new RelevanceScorer(this.collaborators.reasoning, {
      max_clips: scoring.max_clips,
      whitelist_boost: scoring.whitelist_boost,
      overlap_threshold: scoring.overlap_threshold,
      concurrency: scoring.concurrency,
      retry,
    });

    const ranking = await this.stage(
      ctx,
      'scoring',
      scoringKey,
      data => RankingOutputSchema.parse(data),
      () =>
        scorer.rank(windowed.data, profile, {
          whitelist: scoring.whitelist,
          blacklist: scoring.blacklist,
        })
    );

    return { data: ranking.data, key: scoringKey };
  }

  private async rankingFromClips(
    ctx: RunContext,
    clips: ClipsDocument
  ): Promise<StageResult<RankingOutput> & { key: string }> {
    for (const stage of ['parsing', 'windowing'] as const) {
      if (ctx.signal?.aborted) {
        throw new PipelineCancelledError(stage);
      }
      ctx.stage = stage;
      ctx.history.push({ state: stage, at: new Date().toISOString(), detail: 'skipped: clips document supplied' });
    }

    const document = parseClipsDocument(clips);
    const key = Crypto.contentId({ stage: 'scoring', clips: document });

    const ranking = await this.stage(
      ctx,
      'scoring',
      null,
      data => RankingOutputSchema.parse(data),
      async (): Promise<RankingOutput> => {
        const ranked = segmentsFromClipsDocument(document);
        if (ranked.length === 0) {
          throw new CollaboratorRequestError('clips', 'clips document has no ranked clips');
        }
        return {
          ranked,
          detailed_report: {
            candidates: ranked.length,
            candidates_scored: 0,
            top_picks: ranked.map(r => ({
              rank: r.rank,
              start_time: formatTimestamp(r.start_offset),
              score: r.relevance_score,
              why_selected: r.viral_rationale.notes,
            })),
            rejected: [],
          },
        };
      }
    );

    ctx.history[ctx.history.length - 1].detail = 'loaded from clips document';
    return { data: ranking.data, key };
  }

  private async enhance(
    ctx: RunContext,
    clip: ScoredSegment,
    profile: SiteProfile,
    rankingKey: string
  ): Promise<StageResult<EnhancedSegment>> {
    const { enhancement, retry, models } = this.config;

    if (!enhancement.enabled) {
      return this.stage(ctx, 'enhancing', null, data => EnhancedSegmentSchema.parse(data), async () =>
        unenhancedSegment(clip, profile, enhancement.intensity, null)
      );
    }

    const key = Crypto.contentId({
      stage: 'enhancing',
      ranking: rankingKey,
      rank: clip.rank,
      model: models.enhancement,
      enhancement,
    });

    const enhancer = new DialogueEnhancer(this.collaborators.enhancement);

    const result = await this.stage(
      ctx,
      'enhancing',
      key,
      data => EnhancedSegmentSchema.parse(data),
      async () => {
        try {
          return await enhancer.enhance(clip, profile, {
            intensity: enhancement.intensity,
            include_app_mention: enhancement.include_app_mention,
            retry,
          });
        } catch (error) {
          if (!(error instanceof EnhancementRejectedError)) {
            throw error;
          }
          return unenhancedSegment(
            clip,
            profile,
            enhancement.intensity,
            `Enhancement rejected, using the unenhanced clip: ${error.message}`
          );
        }
      },
      // A fallback is not cached, so the next run asks the collaborator again
      data => data.enhancement.applied
    );

    const fallbackWarning = result.data.enhancement.warning;
    if (!result.data.enhancement.applied && fallbackWarning) {
      ctx.warnings.push(fallbackWarning);
      ctx.history[ctx.history.length - 1].detail = 'fell back to unenhanced clip';
      Logger.warn('Enhancement fell back to the unenhanced clip', { run_id: ctx.runId, rank: clip.rank });
    }

    return result;
  }

  private async dispatch(
    ctx: RunContext,
    clip: EnhancedSegment,
    upstreamKey: string
  ): Promise<DispatchResult | null> {
    const media = this.collaborators.media;
    const { config } = this;

    if (!media) {
      if (ctx.signal?.aborted) {
        throw new PipelineCancelledError('dispatching');
      }
      ctx.stage = 'dispatching';
      ctx.history.push({
        state: 'dispatching',
        at: new Date().toISOString(),
        detail: 'skipped: no media collaborators configured',
      });
      Logger.info('No media collaborators configured; artifacts are ready for external media generation', {
        run_id: ctx.runId,
      });
      return null;
    }

    const key = Crypto.contentId({
      stage: 'dispatching',
      upstream: upstreamKey,
      lines: clip.utterances.map(u => ({ speaker: u.speaker_id, text: u.text })),
      voices: config.media.voices,
      videos: config.media.speaker_videos,
      model: config.models.speech,
      composed: media.compositor !== undefined,
      captioned: media.captioner !== undefined,
    });

    const result = await this.stage(ctx, 'dispatching', key, data => DispatchResultSchema.parse(data), () =>
      this.generateMedia(ctx, media, clip, key)
    );

    ctx.warnings.push(...result.data.warnings);
    return result.data;
  }

  private async generateMedia(
    ctx: RunContext,
    media: MediaCollaborators,
    clip: EnhancedSegment,
    key: string
  ): Promise<DispatchResult> {
    const { retry } = this.config;
    const warnings: string[] = [];
    const lines: LineMedia[] = [];

    for (const [lineIndex, utterance] of clip.utterances.entries()) {
      const lineKey = `${key}/line-${lineIndex}`;

      const audio = await withRetryPolicy(
        'speech',
        () => media.speech.synthesize({ speaker: utterance.speaker_id, text: utterance.text, key: lineKey }),
        retry
      );
      const video = await withRetryPolicy(
        'lipsync',
        () => media.lipSync.lipSync({ speaker: utterance.speaker_id, audio, key: lineKey }),
        retry
      );

      lines.push({ line_index: lineIndex, speaker: utterance.speaker_id, audio, video });
      Logger.info('Line media ready', { run_id: ctx.runId, line: lineIndex + 1, of: clip.utterances.length });
    }

    let composed: MediaHandle | null = null;
    let captioned: MediaHandle | null = null;

    const compositor = media.compositor;
    if (compositor) {
      composed = await withRetryPolicy(
        'compositor',
        () => compositor.compose({ clips: lines.map(l => l.video), key }),
        retry
      );

      const captioner = media.captioner;
      if (captioner) {
        const video = composed;
        try {
          captioned = await withRetryPolicy('captioner', () => captioner.caption({ video, key }), retry);
        } catch (error) {
          const warning = `Captioning failed, using the uncaptioned video: ${error instanceof Error ? error.message : String(error)}`;
          warnings.push(warning);
          Logger.warn(warning, { run_id: ctx.runId });
        }
      }
    } else {
      warnings.push('No video compositor configured; per-line videos are left for external compositing');
    }

    return {
      lines,
      composed,
      captioned,
      final: captioned ?? composed,
      warnings,
    };
  }

  private async writeDebugFile(name: string, content: string): Promise<void> {
    const dir = path.resolve(this.config.output.output_dir);
    await fs.mkdir(dir, { recursive: true });
    const target = path.join(dir, name);
    await fs.writeFile(target, content, 'utf-8');
    Logger.info('Debug file saved', { path: target });
  }
}
