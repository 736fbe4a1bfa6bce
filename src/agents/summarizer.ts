// src/agents/summarizer.ts

/**
 * @file Summarizers that condense older conversation turns into one message.
 */

import { ModelRouter } from '../llm/model-router';
import { LLMMessage } from '../llm/types';
import { truncateText } from '../core/utils';
import { IMessage } from '../sessions/types';

/**
 * Produces the text of the summary that replaces older turns in a context window.
 */
export interface IContextSummarizer {
  summarize(messages: IMessage[], signal?: AbortSignal): Promise<string>;
}

/**
 * Digest made of each turn's role and the start of its content. Needs no model.
 */
export class ExtractiveSummarizer implements IContextSummarizer {
  constructor(private readonly maxCharsPerMessage: number = 200) {}

  async summarize(messages: IMessage[]): Promise<string> {
    return messages.map((m) => `[${m.role}]: ${truncateText(m.content, this.maxCharsPerMessage)}`).join('\n');
  }
}

export interface ModelSummarizerOptions {
  model?: string;
  /** Target length of the summary. @default 1000 */
  summaryTargetTokens?: number;
}

/**
 * Asks a model for the summary.
 */
export class ModelSummarizer implements IContextSummarizer {
  private readonly summaryTargetTokens: number;

  constructor(
    private readonly router: ModelRouter,
    private readonly options: ModelSummarizerOptions = {}
  ) {
    this.summaryTargetTokens = options.summaryTargetTokens ?? 1000;
  }

  async summarize(messages: IMessage[], signal?: AbortSignal): Promise<string> {
    if (messages.length === 0) {
      return '';
    }
    const prompt: LLMMessage[] = [
      {
        role: 'system',
        content: `You are a summarization assistant. Condense the following conversation history into a concise summary.
The summary must keep the key facts, decisions, tool results and the latest state of the task.
Output ONLY the summary text.`,
      },
      {
        role: 'user',
        content: messages.map((m) => `${m.role}: ${m.content}`).join('\n\n'),
      },
    ];
    const text = await this.router.query(prompt, {
      model: this.options.model,
      maxTokens: this.summaryTargetTokens,
      temperature: 0.2,
      signal,
    });
    return text.trim();
  }
}
