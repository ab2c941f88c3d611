/**
 * Tests for run progress tracking and cancellation
 */

import { describe, it, expect } from 'vitest';
import { Config } from '../lib/config';
import { PipelineOrchestrator } from '../lib/orchestrator';
import { progressTracker } from '../lib/tools/progress-tracker';
import { StorageTool } from '../lib/tools/storage';
import { StubEnhancement, StubReasoning, StubSiteAnalysis } from './helpers';

describe('progressTracker', () => {
  it('should track the furthest phase reached', () => {
    progressTracker.startRun('progress-phases');
    progressTracker.addUpdate('progress-phases', { phase: 'scoring', status: 'running', message: 'Running scoring' });
    progressTracker.addUpdate('progress-phases', { phase: 'parsing', status: 'running', message: 'late update' });

    expect(progressTracker.getProgress('progress-phases')).toMatchObject({
      status: 'running',
      currentPhase: 'parsing',
      progress: 50,
    });
  });

  it('should finish at 100 percent and refuse to cancel a finished run', () => {
    progressTracker.startRun('progress-done');
    progressTracker.addUpdate('progress-done', { phase: 'done', status: 'completed', message: 'ready' });

    expect(progressTracker.getProgress('progress-done')).toMatchObject({ status: 'completed', progress: 100 });
    expect(progressTracker.cancel('progress-done')).toBe(false);
  });

  it('should abort the run signal and mark the run cancelled once it fails', () => {
    const signal = progressTracker.startRun('progress-cancel');

    expect(progressTracker.cancel('progress-cancel')).toBe(true);
    expect(signal.aborted).toBe(true);

    progressTracker.addUpdate('progress-cancel', { phase: 'failed', status: 'failed', message: 'cancelled' });
    expect(progressTracker.getProgress('progress-cancel')?.status).toBe('cancelled');
    expect(progressTracker.cancel('progress-cancel')).toBe(false);
  });

  it('should know nothing about unregistered runs', () => {
    expect(progressTracker.cancel('progress-unknown')).toBe(false);
    expect(progressTracker.getProgress('progress-unknown')).toBeNull();
  });

  it('should stop a pipeline run that was cancelled before it started', async () => {
    const signal = progressTracker.startRun('progress-pipeline');
    progressTracker.cancel('progress-pipeline');
    const siteAnalysis = new StubSiteAnalysis();

    const orchestrator = new PipelineOrchestrator({
      config: Config.getPipelineConfig({ retry: { max_attempts: 1, initial_delay_ms: 0 } }),
      storage: StorageTool.inMemory(),
      collaborators: {
        siteAnalysis,
        reasoning: new StubReasoning(() => 0.5),
        enhancement: new StubEnhancement(request => ({ lines: request.lines })),
      },
    });

    const result = await orchestrator.run({
      url: 'https://clipwise.example',
      transcript: '00:00:00 Speaker A: Hi.',
      signal,
      run_id: 'progress-pipeline',
    });

    expect(result.success).toBe(false);
    expect(siteAnalysis.calls).toHaveLength(0);
    expect(progressTracker.getProgress('progress-pipeline')).toMatchObject({
      status: 'cancelled',
      currentPhase: 'failed',
      cancelRequested: true,
    });
  });
});
