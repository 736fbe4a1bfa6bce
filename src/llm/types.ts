// src/llm/types.ts

/**
 * @file Types shared by the model router and its provider adapters.
 */

export type LLMMessageRole = 'system' | 'user' | 'assistant' | 'tool';

/**
 * A single message in the prompt sent to a model.
 */
export interface LLMMessage {
  role: LLMMessageRole;
  content: string;
}

export type ModelCategory = 'thinking' | 'reasoning' | 'general' | 'research' | 'labs';

/**
 * A model known to the registry.
 */
export interface ModelDescriptor {
  id: string;
  name: string;
  /** Key of the provider adapter that serves this model. */
  provider: string;
  category: ModelCategory;
  description: string;
}

/**
 * One request as seen by a provider adapter.
 */
export interface ModelRequest {
  model: string;
  messages: LLMMessage[];
  temperature?: number;
  maxTokens?: number;
}

/**
 * A model provider (wire client). Implementations stream plain text chunks and
 * reject with `ProviderError` on failure.
 */
export interface IModelProvider {
  readonly name: string;
  stream(request: ModelRequest, signal?: AbortSignal): AsyncIterable<string>;
}

/**
 * Per-call options for `ModelRouter.query` and `ModelRouter.stream`.
 */
export interface ModelCallOptions {
  /** Overrides the currently selected model for this call only. */
  model?: string;
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

/**
 * Counters kept by the router across requests.
 */
export interface RouterStats {
  totalRequests: number;
  totalRetries: number;
  totalFailures: number;
  rotations: number;
  lastError: string | null;
  lastRotation: { from: string; to: string } | null;
  modelErrors: Record<string, number>;
}
