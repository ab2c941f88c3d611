/**
 * Main API endpoint - Runs the clip pipeline for one site and transcript
 *
 * POST /api/run
 * Body: { url, transcript | clips, clip_index?, clip_rank?, clip_max?, whitelist_keywords?, ... }
 */

import type { VercelRequest, VercelResponse } from '@vercel/node';
import { z } from 'zod';
import { ClipsDocumentSchema } from '../lib/clips';
import { createPipeline, overridesFromOptions, RunOptionsSchema } from '../lib/pipeline';
import { progressTracker } from '../lib/tools/progress-tracker';
import type { ClipSelection } from '../lib/types';
import { Crypto, Logger } from '../lib/utils';

const RunRequestSchema = RunOptionsSchema.extend({
  url: z.string().url(),
  transcript: z.string().optional(),
  clips: ClipsDocumentSchema.optional(),
}).refine(body => body.transcript !== undefined || body.clips !== undefined, {
  message: 'Either transcript or clips is required',
});

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (req.method !== 'POST') {
    return res.status(405).json({ error: 'Method not allowed' });
  }

  const parsed = RunRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({
      error: 'Invalid request body',
      issues: parsed.error.issues.map(i => `${i.path.join('.') || '(body)'}: ${i.message}`),
    });
  }

  const body = parsed.data;
  const runId = Crypto.uuid();

  Logger.info('API /run triggered', {
    run_id: runId,
    url: body.url,
    transcript_chars: body.transcript?.length ?? 0,
    from_clips: body.clips !== undefined,
  });

  try {
    const { orchestrator } = createPipeline(overridesFromOptions(body));

    const selection: ClipSelection =
      body.clip_rank !== undefined
        ? { mode: 'rank', rank: body.clip_rank }
        : { mode: 'index', index: body.clip_index ?? 0 };

    const signal = progressTracker.startRun(runId);
    const result = await orchestrator.run({
      url: body.url,
      transcript: body.transcript,
      clips: body.clips,
      selection,
      signal,
      run_id: runId,
    });

    if (result.success) {
      return res.status(200).json(result);
    }

    const status = result.error.kind === 'Cancelled' ? 409 : result.error.kind === 'MalformedTranscript' ? 422 : 500;
    return res.status(status).json(result);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    Logger.error('API /run failed', { run_id: runId, error: message });
    return res.status(500).json({ success: false, run_id: runId, error: message });
  }
}
