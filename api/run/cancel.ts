/**
 * Cancel API - Stops a running clip generation at its next stage boundary
 *
 * POST /api/run/cancel  { runId }
 */

import type { VercelRequest, VercelResponse } from '@vercel/node';
import { z } from 'zod';
import { progressTracker } from '../../lib/tools/progress-tracker';
import { Logger } from '../../lib/utils';

const CancelRequestSchema = z.object({ runId: z.string().min(1) });

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (req.method !== 'POST') {
    return res.status(405).json({ error: 'Method not allowed' });
  }

  const parsed = CancelRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({ error: 'Missing runId' });
  }

  const { runId } = parsed.data;
  Logger.info('Cancel requested', { runId });

  if (!progressTracker.cancel(runId)) {
    return res.status(404).json({ error: 'Run not found or not running', runId });
  }

  return res.status(202).json({ success: true, runId, message: 'Run will stop before its next stage' });
}
