/**
 * Lip-sync Tool - Animates a speaker's base video to a line of audio (Sync.so v2)
 */

import { z } from 'zod';
import type { LipSyncCollaborator } from '../collaborators';
import type { PipelineConfig } from '../config';
import { CollaboratorRequestError } from '../errors';
import type { MediaHandle } from '../types';
import { Logger } from '../utils';
import { HttpTool, pollUntil } from './http';

const SYNC_API_BASE = 'https://api.sync.so/v2';

const GenerationSchema = z.object({
  id: z.string(),
  status: z.string(),
  outputUrl: z.string().nullish(),
  error: z.string().nullish(),
});

const FAILED_STATUSES = new Set(['ERROR', 'FAILED', 'REJECTED', 'CANCELED']);

export class SyncLipSyncTool implements LipSyncCollaborator {
  constructor(
    private readonly apiKey: string,
    private readonly media: Pick<PipelineConfig['media'], 'speaker_videos' | 'poll_interval_ms' | 'poll_timeout_ms'>
  ) {}

  async lipSync(request: { speaker: string; audio: MediaHandle; key: string }): Promise<MediaHandle> {
    const videoUrl = this.media.speaker_videos[request.speaker];
    if (!videoUrl) {
      throw new CollaboratorRequestError('lipsync', `no base video configured for speaker "${request.speaker}"`);
    }

    const created = GenerationSchema.parse(
      await HttpTool.requestJson('lipsync', `${SYNC_API_BASE}/generate`, {
        method: 'POST',
        headers: { 'x-api-key': this.apiKey },
        body: {
          model: 'lipsync-2',
          input: [
            { type: 'video', url: videoUrl },
            { type: 'audio', url: request.audio.url },
          ],
        },
      })
    );

    Logger.info('Lip-sync generation created', { speaker: request.speaker, id: created.id, key: request.key });

    const outputUrl = await pollUntil(
      'lipsync',
      `generation ${created.id}`,
      async () => {
        const generation = GenerationSchema.parse(
          await HttpTool.requestJson('lipsync', `${SYNC_API_BASE}/generate/${created.id}`, {
            headers: { 'x-api-key': this.apiKey },
          })
        );

        if (FAILED_STATUSES.has(generation.status)) {
          throw new CollaboratorRequestError(
            'lipsync',
            `generation ${generation.id} ended with ${generation.status}${generation.error ? `: ${generation.error}` : ''}`
          );
        }
        if (generation.status !== 'COMPLETED') {
          return null;
        }
        if (!generation.outputUrl) {
          throw new CollaboratorRequestError('lipsync', `generation ${generation.id} completed without an output URL`);
        }
        return generation.outputUrl;
      },
      { interval_ms: this.media.poll_interval_ms, timeout_ms: this.media.poll_timeout_ms }
    );

    return { kind: 'video', url: outputUrl };
  }
}
