/**
 * Caption Tool - Burns animated captions into the final clip (ZapCap)
 */

import { z } from 'zod';
import type { Captioner } from '../collaborators';
import type { PipelineConfig } from '../config';
import { CollaboratorRequestError } from '../errors';
import type { MediaHandle } from '../types';
import { Logger } from '../utils';
import { HttpTool, pollUntil } from './http';

const ZAPCAP_API_BASE = 'https://api.zapcap.ai';

const UploadSchema = z.object({ id: z.string() });
const TaskSchema = z.object({ taskId: z.string() });
const TaskStatusSchema = z.object({
  status: z.string(),
  downloadUrl: z.string().nullish(),
  error: z.string().nullish(),
});

export class ZapCapTool implements Captioner {
  constructor(
    private readonly apiKey: string,
    private readonly media: Pick<PipelineConfig['media'], 'caption_template_id' | 'poll_interval_ms' | 'poll_timeout_ms'>
  ) {}

  async caption(request: { video: MediaHandle; key: string }): Promise<MediaHandle> {
    const headers = { 'x-api-key': this.apiKey };

    const upload = UploadSchema.parse(
      await HttpTool.requestJson('captioner', `${ZAPCAP_API_BASE}/videos/url`, {
        method: 'POST',
        headers,
        body: { url: request.video.url },
      })
    );

    const task = TaskSchema.parse(
      await HttpTool.requestJson('captioner', `${ZAPCAP_API_BASE}/videos/${upload.id}/task`, {
        method: 'POST',
        headers,
        body: {
          templateId: this.media.caption_template_id,
          autoApprove: true,
          language: 'en',
        },
      })
    );

    Logger.info('Caption task created', { video_id: upload.id, task_id: task.taskId, key: request.key });

    const downloadUrl = await pollUntil(
      'captioner',
      `caption task ${task.taskId}`,
      async () => {
        const status = TaskStatusSchema.parse(
          await HttpTool.requestJson('captioner', `${ZAPCAP_API_BASE}/videos/${upload.id}/task/${task.taskId}`, {
            headers,
          })
        );

        if (status.status === 'failed') {
          throw new CollaboratorRequestError('captioner', `caption task failed: ${status.error ?? 'unknown error'}`);
        }
        if (status.status !== 'completed') {
          return null;
        }
        if (!status.downloadUrl) {
          throw new CollaboratorRequestError('captioner', 'caption task completed without a download URL');
        }
        return status.downloadUrl;
      },
      { interval_ms: this.media.poll_interval_ms, timeout_ms: this.media.poll_timeout_ms }
    );

    return { kind: 'video', url: downloadUrl };
  }
}
