/**
 * Progress Tracker - Simple in-memory progress tracking for runs
 */

import type { PipelineState } from '../types';

export interface ProgressUpdate {
  phase: PipelineState;
  status: 'running' | 'completed' | 'failed';
  message: string;
  cached?: boolean;
  timestamp: string;
}

export interface RunProgress {
  runId: string;
  startedAt: string;
  status: 'running' | 'completed' | 'failed' | 'cancelled';
  currentPhase: PipelineState | 'starting';
  progress: number; // 0-100
  cancelRequested: boolean;
  updates: ProgressUpdate[];
}

const PHASE_PROGRESS: Record<PipelineState, number> = {
  crawling: 10,
  parsing: 20,
  windowing: 30,
  scoring: 50,
  enhancing: 70,
  dispatching: 85,
  done: 100,
  failed: 100,
};

class ProgressTracker {
  private runs: Map<string, RunProgress> = new Map();
  private controllers: Map<string, AbortController> = new Map();

  /**
   * Registers a run and returns the signal that cancel() aborts.
   */
  startRun(runId: string): AbortSignal {
    const controller = new AbortController();
    this.controllers.set(runId, controller);
    this.runs.set(runId, {
      runId,
      startedAt: new Date().toISOString(),
      status: 'running',
      currentPhase: 'starting',
      progress: 0,
      cancelRequested: false,
      updates: [],
    });
    return controller.signal;
  }

  addUpdate(runId: string, update: Omit<ProgressUpdate, 'timestamp'>) {
    const run = this.runs.get(runId);
    if (!run) return;

    run.updates.push({
      ...update,
      timestamp: new Date().toISOString(),
    });

    run.currentPhase = update.phase;
    run.progress = Math.max(run.progress, PHASE_PROGRESS[update.phase]);

    if (update.status === 'completed') {
      run.status = 'completed';
      run.progress = 100;
    } else if (update.status === 'failed') {
      run.status = run.cancelRequested ? 'cancelled' : 'failed';
    }

    if (run.status !== 'running') {
      this.controllers.delete(runId);
    }
  }

  /**
   * Requests cancellation; the run stops at its next stage boundary.
   * Returns false for unknown or finished runs.
   */
  cancel(runId: string): boolean {
    const run = this.runs.get(runId);
    const controller = this.controllers.get(runId);
    if (!run || !controller || run.status !== 'running') {
      return false;
    }
    run.cancelRequested = true;
    controller.abort();
    return true;
  }

  getProgress(runId: string): RunProgress | null {
    // Support 'latest' to get the most recent run
    if (runId === 'latest') {
      const allRuns = Array.from(this.runs.values()).sort(
        (a, b) => new Date(b.startedAt).getTime() - new Date(a.startedAt).getTime()
      );
      return allRuns[0] || null;
    }

    return this.runs.get(runId) || null;
  }

  clearOldRuns() {
    // Clear finished runs older than 1 hour
    const oneHourAgo = Date.now() - 60 * 60 * 1000;

    for (const [runId, run] of this.runs.entries()) {
      if (run.status !== 'running' && new Date(run.startedAt).getTime() < oneHourAgo) {
        this.runs.delete(runId);
        this.controllers.delete(runId);
      }
    }
  }
}

export const progressTracker = new ProgressTracker();
