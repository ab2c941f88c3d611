/**
 * Progress API - Get stage-by-stage progress for a clip run
 *
 * GET /api/progress?runId=<uuid|latest>
 */

import type { VercelRequest, VercelResponse } from '@vercel/node';
import { progressTracker } from '../lib/tools/progress-tracker';

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (req.method !== 'GET') {
    return res.status(405).json({ error: 'Method not allowed' });
  }

  const runId = typeof req.query.runId === 'string' ? req.query.runId : '';

  if (!runId) {
    return res.status(400).json({ error: 'Missing runId parameter' });
  }

  const progress = progressTracker.getProgress(runId);

  if (!progress) {
    return res.status(404).json({ error: 'Run not found' });
  }

  // Clean up old runs
  progressTracker.clearOldRuns();

  return res.status(200).json(progress);
}
