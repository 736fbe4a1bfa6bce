// src/llm/adapters/openai/openai-adapter.ts

/**
 * @file Model provider backed by the OpenAI Chat Completions API (streaming).
 */

import OpenAI from 'openai';
import { IModelProvider, LLMMessage, ModelRequest } from '../../types';
import { ConfigurationError, ProviderError } from '../../../core/errors';
import { parseRetryAfter } from '../../retry-policy';

type ChatCompletionChunk = OpenAI.Chat.Completions.ChatCompletionChunk;
type StreamingParams = OpenAI.Chat.Completions.ChatCompletionCreateParamsStreaming;

/**
 * Opens a streaming completion. Defaults to the SDK client; tests inject their own.
 */
export type CreateCompletionStream = (
  body: StreamingParams,
  signal?: AbortSignal
) => Promise<AsyncIterable<ChatCompletionChunk>>;

/**
 * Configuration options for the OpenAIAdapter.
 */
export interface OpenAIAdapterOptions {
  apiKey?: string;
  organizationId?: string;
  baseURL?: string;
  /** Registry provider key this adapter answers to. */
  name?: string;
  createCompletionStream?: CreateCompletionStream;
}

const RETRYABLE_HTTP_STATUSES = new Set([408, 409, 429, 500, 502, 503, 504]);

export class OpenAIAdapter implements IModelProvider {
  public readonly name: string;
  private readonly createCompletionStream: CreateCompletionStream;

  constructor(options: OpenAIAdapterOptions = {}) {
    this.name = options.name ?? 'openai';

    if (options.createCompletionStream) {
      this.createCompletionStream = options.createCompletionStream;
    } else {
      const apiKey = options.apiKey || process.env.OPENAI_API_KEY;
      if (!apiKey) {
        throw new ConfigurationError(
          'OpenAI API key is required. Provide it in options or set OPENAI_API_KEY environment variable.'
        );
      }
      const openai = new OpenAI({
        apiKey,
        organization: options.organizationId || process.env.OPENAI_ORG_ID,
        baseURL: options.baseURL,
        // Retries are owned by the ModelRouter.
        maxRetries: 0,
      });
      this.createCompletionStream = (body, signal) => openai.chat.completions.create(body, { signal });
    }

    console.info(`[OpenAIAdapter] Initialized. BaseURL: ${options.baseURL || 'OpenAI Default'}`);
  }

  async *stream(request: ModelRequest, signal?: AbortSignal): AsyncGenerator<string, void, undefined> {
    const body: StreamingParams = {
      model: request.model,
      messages: request.messages.map((m) => this.mapToOpenAIMessageParam(m)),
      temperature: request.temperature,
      max_tokens: request.maxTokens,
      stream: true,
    };

    let completion: AsyncIterable<ChatCompletionChunk>;
    try {
      completion = await this.createCompletionStream(body, signal);
    } catch (error: unknown) {
      throw this.mapOpenAIError(error);
    }

    try {
      for await (const chunk of completion) {
        const content = chunk.choices[0]?.delta?.content;
        if (content) {
          yield content;
        }
      }
    } catch (error: unknown) {
      throw this.mapOpenAIError(error);
    }
  }

  /**
   * Tool observations travel as user turns: this core does not use native
   * function calling, so there is no tool_call_id to attach.
   */
  private mapToOpenAIMessageParam(message: LLMMessage): OpenAI.Chat.Completions.ChatCompletionMessageParam {
    switch (message.role) {
      case 'system':
        return { role: 'system', content: message.content };
      case 'user':
        return { role: 'user', content: message.content };
      case 'assistant':
        return { role: 'assistant', content: message.content };
      case 'tool':
        return { role: 'user', content: `[Tool observation]\n${message.content}` };
    }
  }

  /**
   * Converts SDK failures into ProviderError, keeping status and Retry-After.
   */
  private mapOpenAIError(error: unknown): ProviderError {
    if (error instanceof ProviderError) {
      return error;
    }
    if (error instanceof OpenAI.APIError) {
      const status = error.status;
      const retryAfterHeader = error.headers?.['retry-after'];
      const retryAfterMs = parseRetryAfter(typeof retryAfterHeader === 'string' ? retryAfterHeader : undefined);
      // No status means the request never got a response (connection failure).
      const retryable = status === undefined || RETRYABLE_HTTP_STATUSES.has(status);
      console.error(`[OpenAIAdapter] OpenAI API Error (Status: ${status ?? 'none'}): ${error.message}`);
      return new ProviderError(error.message, { status, retryable, retryAfterMs }, { provider: this.name });
    }
    const message = error instanceof Error ? error.message : String(error);
    console.error('[OpenAIAdapter] Unexpected SDK or network error:', message);
    return new ProviderError(message || 'Unknown OpenAI error.', { retryable: true }, { provider: this.name });
  }
}
