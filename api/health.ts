/**
 * Health Check API endpoint
 *
 * GET /api/health
 * Reports storage reachability and which collaborators are configured
 */

import type { VercelRequest, VercelResponse } from '@vercel/node';
import { Config } from '../lib/config';
import { StorageTool } from '../lib/tools/storage';
import { Logger } from '../lib/utils';

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (req.method !== 'GET') {
    return res.status(405).json({ error: 'Method not allowed' });
  }

  const config = Config.getPipelineConfig();
  const storage = new StorageTool({ backend: config.storage.backend, local_root: config.storage.local_root });

  let storageOk = false;
  let cachedClips = 0;
  try {
    cachedClips = (await storage.list('clips/')).length;
    storageOk = true;
  } catch (error) {
    Logger.warn('Storage check failed', {
      error: error instanceof Error ? error.message : String(error),
    });
  }

  const { credentials, media } = config;
  const openaiConfigured = credentials.openai_api_key.length > 0;
  const firecrawlConfigured = credentials.firecrawl_api_key.length > 0;

  const health = {
    status: storageOk && openaiConfigured && firecrawlConfigured ? 'healthy' : 'degraded',
    timestamp: new Date().toISOString(),
    version: '1.0.0',
    checks: {
      storage: storageOk ? 'ok' : 'error',
      openai: openaiConfigured ? 'ok' : 'not configured',
      firecrawl: firecrawlConfigured ? 'ok' : 'not configured',
      lipsync: credentials.sync_api_key && Object.keys(media.speaker_videos).length > 0 ? 'ok' : 'not configured',
      captions: credentials.zapcap_api_key ? 'ok' : 'not configured',
    },
    cached_clip_documents: cachedClips,
    config: {
      storage_backend: config.storage.backend,
      window_sec: config.windowing.window_sec,
      max_clips: config.scoring.max_clips,
    },
  };

  return res.status(health.status === 'healthy' ? 200 : 503).json(health);
}
