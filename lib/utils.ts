/**
 * Utility functions
 */

import { createHash } from 'crypto';
import { v4 as uuidv4 } from 'uuid';

type LogLevel = 'info' | 'warn' | 'error' | 'debug';

export class Logger {
  static log(level: LogLevel, message: string, obj?: Record<string, unknown>) {
    const timestamp = new Date().toISOString();
    const logEntry = {
      timestamp,
      level,
      message,
      ...(obj && { data: obj }),
    };

    if (level === 'error') {
      console.error(JSON.stringify(logEntry));
    } else if (level === 'warn') {
      console.warn(JSON.stringify(logEntry));
    } else {
      console.log(JSON.stringify(logEntry));
    }
  }

  static info(message: string, obj?: Record<string, unknown>) {
    this.log('info', message, obj);
  }

  static warn(message: string, obj?: Record<string, unknown>) {
    this.log('warn', message, obj);
  }

  static error(message: string, obj?: Record<string, unknown>) {
    this.log('error', message, obj);
  }

  static debug(message: string, obj?: Record<string, unknown>) {
    this.log('debug', message, obj);
  }
}

/**
 * JSON serialization with object keys sorted at every depth, so that two
 * structurally equal values always hash the same.
 */
export function stableStringify(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }

  if (Array.isArray(value)) {
    return `[${value.map(item => stableStringify(item)).join(',')}]`;
  }

  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`);

  return `{${entries.join(',')}}`;
}

export class Crypto {
  static sha256(input: string | Buffer): string {
    return createHash('sha256').update(input).digest('hex');
  }

  static contentId(obj: unknown): string {
    return this.sha256(stableStringify(obj)).substring(0, 16);
  }

  static uuid(): string {
    return uuidv4();
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export interface RetryOptions {
  maxRetries?: number;
  delayMs?: number;
  backoff?: boolean;
  // Errors for which this returns false are rethrown without another attempt
  shouldRetry?: (error: Error) => boolean;
  onError?: (error: Error, attempt: number) => void;
}

export async function retry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxRetries = 3,
    delayMs = 1000,
    backoff = true,
    shouldRetry = () => true,
    onError,
  } = options;

  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (onError) {
        onError(lastError, attempt);
      }

      if (!shouldRetry(lastError)) {
        throw lastError;
      }

      if (attempt < maxRetries) {
        const delay = backoff ? delayMs * Math.pow(2, attempt - 1) : delayMs;
        Logger.warn(`Retry attempt ${attempt}/${maxRetries} after ${delay}ms`, {
          error: lastError.message,
        });
        await sleep(delay);
      }
    }
  }

  throw lastError || new Error('Max retries exceeded');
}

export function truncate(text: string, maxLength: number, suffix = '...'): string {
  if (!text) {
    return '';
  }
  if (text.length <= maxLength) {
    return text;
  }
  return text.substring(0, maxLength - suffix.length) + suffix;
}

export function cleanText(text: string): string {
  if (!text) {
    return '';
  }
  return text
    .replace(/\s+/g, ' ')
    .replace(/[\r\n]+/g, ' ')
    .trim();
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

/**
 * Spoken duration at 150 words per minute, never shorter than one second.
 */
export function estimateSpeechSeconds(text: string): number {
  return Math.max(1, Math.ceil(countWords(text) / 2.5));
}
