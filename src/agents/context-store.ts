// src/agents/context-store.ts

/**
 * @file ContextStore - ordered conversation history of one session, and the
 * bounded windows of it that are sent to the model.
 */

import { ValidationError } from '../core/errors';
import { errorMessage, estimateTokens } from '../core/utils';
import { createMessageObject } from '../sessions/message';
import { IMessage } from '../sessions/types';
import { ExtractiveSummarizer, IContextSummarizer } from './summarizer';

export const SUMMARY_HEADER = '======== CONVERSATION HISTORY SUMMARY ========';
export const SUMMARY_FOOTER = '======== END OF SUMMARY ========';

export interface ContextStoreConfig {
  /**
   * History length beyond which turns older than the window are replaced by a
   * summary message instead of being dropped.
   */
  summarizationThreshold: number;
  summarizer?: IContextSummarizer;
}

interface CachedSummary {
  /** Number of leading turns the summary covers. */
  coveredCount: number;
  message: IMessage;
}

export class ContextStore {
  private readonly messages: IMessage[] = [];
  private readonly summarizer: IContextSummarizer;
  private readonly fallbackSummarizer = new ExtractiveSummarizer();
  private cachedSummary: CachedSummary | null = null;

  constructor(
    public readonly sessionId: string,
    private readonly config: ContextStoreConfig,
    history: IMessage[] = []
  ) {
    this.summarizer = config.summarizer ?? this.fallbackSummarizer;
    history.forEach((m) => this.append(m));
  }

  get size(): number {
    return this.messages.length;
  }

  /**
   * Appends a message to the history.
   * @throws ValidationError if the message belongs to another session.
   */
  append(message: IMessage): void {
    if (message.sessionId !== this.sessionId) {
      throw new ValidationError(
        `Message "${message.id}" belongs to session "${message.sessionId}", not "${this.sessionId}".`
      );
    }
    this.messages.push(message);
  }

  /** Full history, oldest first. */
  history(): IMessage[] {
    return [...this.messages];
  }

  /**
   * The most recent `maxMessages` turns, preceded by a summary of the older ones
   * once the history exceeds the summarization threshold. Oldest turns are then
   * dropped until the estimated token count fits `maxTokens`; the summary and
   * the latest turn are always kept.
   */
  async window(maxMessages: number, maxTokens: number, signal?: AbortSignal): Promise<IMessage[]> {
    const keep = Math.max(1, maxMessages);
    const recent = this.messages.slice(-keep);
    const older = this.messages.slice(0, this.messages.length - recent.length);

    const window: IMessage[] = [];
    if (older.length > 0 && this.messages.length > this.config.summarizationThreshold) {
      window.push(await this.summaryFor(older, signal));
    }
    window.push(...recent);

    const pinned = window.length > 0 && window[0].metadata.isSummary ? 1 : 0;
    let tokens = window.reduce((sum, m) => sum + estimateTokens(m.content), 0);
    while (tokens > maxTokens && window.length > pinned + 1) {
      const [dropped] = window.splice(pinned, 1);
      tokens -= estimateTokens(dropped.content);
    }
    return window;
  }

  private async summaryFor(older: IMessage[], signal?: AbortSignal): Promise<IMessage> {
    if (this.cachedSummary && this.cachedSummary.coveredCount === older.length) {
      return this.cachedSummary.message;
    }

    let text = '';
    try {
      text = await this.summarizer.summarize(older, signal);
    } catch (error: unknown) {
      if (signal?.aborted) {
        throw error;
      }
      console.warn(`[ContextStore] Summarization failed for session ${this.sessionId}: ${errorMessage(error)}`);
    }
    if (!text.trim()) {
      text = await this.fallbackSummarizer.summarize(older);
    }

    const message = createMessageObject(this.sessionId, 'system', `${SUMMARY_HEADER}\n${text.trim()}\n${SUMMARY_FOOTER}`, {
      isSummary: true,
    });
    this.cachedSummary = { coveredCount: older.length, message };
    console.info(`[ContextStore] Session ${this.sessionId}: summarized ${older.length} older turn(s).`);
    return message;
  }
}
