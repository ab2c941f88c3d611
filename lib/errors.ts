/**
 * Error taxonomy for the clip pipeline
 */

import type { PipelineStage } from './types';

export type PipelineErrorKind =
  | 'MalformedTranscript'
  | 'NoViableSegments'
  | 'ScoringUnavailable'
  | 'EnhancementRejected'
  | 'CollaboratorTransport'
  | 'CollaboratorRequest'
  | 'Cancelled';

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;
  readonly stage?: PipelineStage;

  constructor(message: string, options: { stage?: PipelineStage; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.stage = options.stage;
  }
}

export class MalformedTranscriptError extends PipelineError {
  readonly kind = 'MalformedTranscript' as const;

  constructor(
    readonly lineNumber: number,
    readonly lineText: string,
    reason: string
  ) {
    super(`Malformed transcript at line ${lineNumber}: ${reason} (${JSON.stringify(lineText)})`, {
      stage: 'parsing',
    });
  }
}

export class NoViableSegmentsError extends PipelineError {
  readonly kind = 'NoViableSegments' as const;

  constructor(message: string, stage: PipelineStage = 'windowing') {
    super(message, { stage });
  }
}

export class ScoringUnavailableError extends PipelineError {
  readonly kind = 'ScoringUnavailable' as const;

  constructor(message: string, cause?: unknown) {
    super(message, { stage: 'scoring', cause });
  }
}

export class EnhancementRejectedError extends PipelineError {
  readonly kind = 'EnhancementRejected' as const;

  constructor(message: string, readonly problems: string[] = [], cause?: unknown) {
    super(message, { stage: 'enhancing', cause });
  }
}

/**
 * Network-level failure talking to an external service. Timeouts, rate limits
 * and 5xx responses are retryable; the caller's retry policy decides.
 */
export class CollaboratorTransportError extends PipelineError {
  readonly kind = 'CollaboratorTransport' as const;
  readonly retryable = true;

  constructor(
    readonly collaborator: string,
    message: string,
    readonly status?: number,
    cause?: unknown
  ) {
    super(`${collaborator}: ${message}`, { cause });
  }
}

/**
 * The service understood the call and refused it (bad request, auth, not
 * found, unusable response). Never retried.
 */
export class CollaboratorRequestError extends PipelineError {
  readonly kind = 'CollaboratorRequest' as const;
  readonly retryable = false;

  constructor(
    readonly collaborator: string,
    message: string,
    readonly status?: number,
    cause?: unknown
  ) {
    super(`${collaborator}: ${message}`, { cause });
  }
}

export class PipelineCancelledError extends PipelineError {
  readonly kind = 'Cancelled' as const;

  constructor(stage: PipelineStage) {
    super(`Run cancelled before ${stage}`, { stage });
  }
}

export function isRetryable(error: unknown): boolean {
  return error instanceof CollaboratorTransportError;
}

const RETRYABLE_STATUSES = new Set([408, 409, 425, 429, 500, 502, 503, 504]);

/**
 * Maps an HTTP status (or its absence) to the collaborator error kind.
 */
export function errorForStatus(collaborator: string, status: number, message: string): PipelineError {
  if (RETRYABLE_STATUSES.has(status)) {
    return new CollaboratorTransportError(collaborator, message, status);
  }
  return new CollaboratorRequestError(collaborator, message, status);
}

/**
 * Normalizes anything thrown by an SDK or fetch into a collaborator error.
 * Pipeline errors pass through untouched.
 */
export function classifyError(collaborator: string, error: unknown): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const status = statusOf(error);

  if (status !== undefined) {
    return RETRYABLE_STATUSES.has(status)
      ? new CollaboratorTransportError(collaborator, message, status, error)
      : new CollaboratorRequestError(collaborator, message, status, error);
  }

  const name = error instanceof Error ? error.name : '';
  const code = codeOf(error);
  const transient =
    name === 'AbortError' ||
    name === 'TimeoutError' ||
    name === 'APIConnectionError' ||
    name === 'APIConnectionTimeoutError' ||
    code === 'ECONNRESET' ||
    code === 'ETIMEDOUT' ||
    code === 'ECONNREFUSED' ||
    code === 'rate_limit_exceeded' ||
    /rate limit|timed? ?out|socket hang up|fetch failed/i.test(message);

  return transient
    ? new CollaboratorTransportError(collaborator, message, undefined, error)
    : new CollaboratorRequestError(collaborator, message, undefined, error);
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const { status } = error;
    return typeof status === 'number' ? status : undefined;
  }
  return undefined;
}

function codeOf(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
