/**
 * @file Core utility functions shared across the project.
 */

import { ApplicationError, CancellationError } from './errors';

/**
 * Cuts `text` to at most `maxLength` characters. Text already within the limit
 * is returned unchanged.
 */
export function truncateText(text: string, maxLength: number): string {
  if (maxLength < 0 || text.length <= maxLength) {
    return text;
  }
  return text.substring(0, maxLength);
}

/**
 * Rough token estimate (about four characters per token). Good enough for
 * budgeting context windows without a tokenizer dependency.
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/**
 * Splits text into consecutive pieces of `size` characters for chunked delivery.
 * Empty text yields no pieces.
 */
export function chunkText(text: string, size: number): string[] {
  if (size <= 0) {
    return text.length > 0 ? [text] : [];
  }
  const pieces: string[] = [];
  for (let i = 0; i < text.length; i += size) {
    pieces.push(text.substring(i, i + size));
  }
  return pieces;
}

/**
 * Resolves after `ms` milliseconds. Rejects with the signal's reason (or a
 * CancellationError) as soon as `signal` aborts.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * The error an aborted signal should surface: its reason when that is one of the
 * library's errors (a TimeoutError, say), otherwise a CancellationError.
 */
export function abortReason(signal?: AbortSignal): ApplicationError {
  const reason: unknown = signal?.reason;
  return reason instanceof ApplicationError ? reason : new CancellationError();
}

/**
 * Throws the abort reason if `signal` has already been aborted.
 */
export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw abortReason(signal);
  }
}

/**
 * Narrows an unknown value to a plain object record.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Extracts a readable message from any thrown value.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}
