// src/llm/adapters/gateway/gateway-adapter.ts

/**
 * @file Model provider for an HTTP streaming gateway. The gateway takes a single
 * rendered prompt (`{ text, provider, model }`) and answers with `data:` lines.
 */

import { IModelProvider, LLMMessage, ModelRequest } from '../../types';
import { ConfigurationError, ProviderError } from '../../../core/errors';
import { parseRetryAfter } from '../../retry-policy';
import { decodeEventStream } from '../../stream-decoder';

interface ByteStreamReader {
  read(): Promise<{ done: boolean; value?: Uint8Array }>;
  releaseLock(): void;
}

/** The subset of a fetch `Response` the adapter relies on. */
export interface GatewayResponse {
  ok: boolean;
  status: number;
  headers: { get(name: string): string | null };
  body: { getReader(): ByteStreamReader } | null;
  text(): Promise<string>;
}

export type GatewayFetch = (
  url: string,
  init: { method: string; headers: Record<string, string>; body: string; signal?: AbortSignal }
) => Promise<GatewayResponse>;

export interface GatewayAdapterOptions {
  /** Base URL of the gateway; falls back to TASKLOOP_GATEWAY_URL. */
  baseUrl?: string;
  /** Upstream provider label forwarded in the payload. */
  upstreamProvider?: string;
  name?: string;
  fetch?: GatewayFetch;
}

const RETRYABLE_HTTP_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504]);

/**
 * Renders chat messages as one prompt string, one block per message.
 */
export function renderPrompt(messages: LLMMessage[]): string {
  return messages
    .map((message) => {
      switch (message.role) {
        case 'system':
          return `[System]: ${message.content}`;
        case 'user':
          return `User: ${message.content}`;
        case 'assistant':
          return `Assistant: ${message.content}`;
        case 'tool':
          return `[Observation]: ${message.content}`;
      }
    })
    .join('\n\n');
}

async function* readBody(body: { getReader(): ByteStreamReader }): AsyncGenerator<Uint8Array, void, undefined> {
  const reader = body.getReader();
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        return;
      }
      if (value) {
        yield value;
      }
    }
  } finally {
    reader.releaseLock();
  }
}

export class GatewayAdapter implements IModelProvider {
  public readonly name: string;
  private readonly streamUrl: string;
  private readonly upstreamProvider: string;
  private readonly fetchFn: GatewayFetch;

  constructor(options: GatewayAdapterOptions = {}) {
    const baseUrl = options.baseUrl || process.env.TASKLOOP_GATEWAY_URL;
    if (!baseUrl) {
      throw new ConfigurationError(
        'Gateway base URL is required. Provide it in options or set TASKLOOP_GATEWAY_URL environment variable.'
      );
    }
    this.name = options.name ?? 'gateway';
    this.streamUrl = `${baseUrl.replace(/\/+$/, '')}/stream`;
    this.upstreamProvider = options.upstreamProvider ?? 'default';
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
    console.info(`[GatewayAdapter] Initialized. Stream URL: ${this.streamUrl}`);
  }

  async *stream(request: ModelRequest, signal?: AbortSignal): AsyncGenerator<string, void, undefined> {
    const payload = {
      text: renderPrompt(request.messages),
      provider: this.upstreamProvider,
      model: request.model,
    };

    let response: GatewayResponse;
    try {
      response = await this.fetchFn(this.streamUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Accept: 'text/event-stream' },
        body: JSON.stringify(payload),
        signal,
      });
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ProviderError(`Network error calling gateway: ${message}`, { retryable: true }, { provider: this.name });
    }

    if (!response.ok) {
      const detail = (await response.text().catch(() => '')).slice(0, 200);
      throw new ProviderError(
        `Gateway responded with HTTP ${response.status}${detail ? `: ${detail}` : ''}`,
        {
          status: response.status,
          retryable: RETRYABLE_HTTP_STATUSES.has(response.status),
          retryAfterMs: parseRetryAfter(response.headers.get('retry-after')),
        },
        { provider: this.name }
      );
    }
    if (!response.body) {
      throw new ProviderError('Gateway response has no body.', { status: response.status, retryable: true });
    }

    yield* decodeEventStream(readBody(response.body));
  }
}
