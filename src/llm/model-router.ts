// src/llm/model-router.ts

/**
 * @file ModelRouter - sends prompts to the selected model and keeps requests alive
 * across provider failures.
 *
 * For every request the router walks an ordered list of candidate models (the
 * selected one, then ModelState's fallback order). Each candidate gets up to
 * `retryPolicy.maxAttempts` attempts; retryable failures wait on a capped,
 * non-decreasing backoff schedule. A non-retryable failure, or running out of
 * attempts, rotates to the next candidate. Callers only ever see the eventual
 * text or the final `ProviderError`.
 */

import { ConfigurationError, ProviderError } from '../core/errors';
import { abortReason, delay, errorMessage, throwIfAborted } from '../core/utils';
import { ModelRegistry } from './model-registry';
import { ModelState, ModelStateSnapshot, getModelState } from './model-state';
import { BackoffSchedule, RetryPolicy, isRetryableStatus, resolveRetryPolicy } from './retry-policy';
import {
  IModelProvider,
  LLMMessage,
  ModelCallOptions,
  ModelCategory,
  ModelDescriptor,
  ModelRequest,
  RouterStats,
} from './types';

export interface ModelRouterOptions {
  /** Provider adapters keyed by the `provider` field of the registry entries. */
  providers: Record<string, IModelProvider>;
  registry?: ModelRegistry;
  /** Defaults to the process-wide state. */
  modelState?: ModelState;
  retryPolicy?: Partial<RetryPolicy>;
  /** How many alternate models may be tried after the first. Defaults to all. */
  maxFallbacks?: number;
  /** Injectable for tests. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
}

interface AttemptContext {
  schedule: BackoffSchedule;
  signal?: AbortSignal;
}

export class ModelRouter {
  private readonly providers: Record<string, IModelProvider>;
  private readonly registry: ModelRegistry;
  private readonly modelState: ModelState;
  private readonly retryPolicy: RetryPolicy;
  private readonly maxFallbacks: number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly random: () => number;
  private stats: RouterStats = {
    totalRequests: 0,
    totalRetries: 0,
    totalFailures: 0,
    rotations: 0,
    lastError: null,
    lastRotation: null,
    modelErrors: {},
  };

  constructor(options: ModelRouterOptions) {
    if (Object.keys(options.providers).length === 0) {
      throw new ConfigurationError('ModelRouter requires at least one provider.');
    }
    this.providers = options.providers;
    this.registry = options.registry ?? new ModelRegistry();
    this.modelState = options.modelState ?? getModelState();
    this.retryPolicy = resolveRetryPolicy(options.retryPolicy);
    this.maxFallbacks = options.maxFallbacks ?? Number.POSITIVE_INFINITY;
    this.sleep = options.sleep ?? delay;
    this.random = options.random ?? Math.random;
  }

  // --- Registry and selection ---

  listModels(category?: ModelCategory): ModelDescriptor[] {
    return this.registry.list(category);
  }

  listCategories(): Partial<Record<ModelCategory, string>> {
    return this.registry.categories();
  }

  currentModel(): ModelDescriptor & { state: ModelStateSnapshot } {
    const state = this.modelState.snapshot();
    const descriptor = this.registry.get(state.modelId);
    if (!descriptor) {
      throw new ConfigurationError(`Selected model "${state.modelId}" is not in the router's registry.`);
    }
    return { ...descriptor, state };
  }

  /**
   * Explicitly switches the process-wide model.
   * @throws ConfigurationError for an unknown model or one without a provider.
   */
  switchModel(modelId: string): ModelDescriptor {
    const descriptor = this.registry.get(modelId);
    if (!descriptor) {
      throw new ConfigurationError(`Unknown model "${modelId}".`, { modelId });
    }
    this.providerFor(descriptor);
    this.modelState.select(modelId);
    return descriptor;
  }

  getStats(): RouterStats {
    return {
      ...this.stats,
      lastRotation: this.stats.lastRotation ? { ...this.stats.lastRotation } : null,
      modelErrors: { ...this.stats.modelErrors },
    };
  }

  // --- Requests ---

  /**
   * Sends the messages and resolves with the complete response text.
   */
  async query(messages: LLMMessage[], options: ModelCallOptions = {}): Promise<string> {
    let text = '';
    for await (const chunk of this.stream(messages, options)) {
      text += chunk;
    }
    return text;
  }

  /**
   * Streams response text. Retries and rotation only happen before the first
   * chunk has been yielded; a failure mid-stream is surfaced as-is.
   */
  async *stream(messages: LLMMessage[], options: ModelCallOptions = {}): AsyncGenerator<string, void, undefined> {
    this.stats.totalRequests++;
    const candidates = this.modelState.candidatesFor(options.model).slice(0, this.maxFallbacks + 1);
    const context: AttemptContext = {
      schedule: new BackoffSchedule(this.retryPolicy, this.random),
      signal: options.signal,
    };
    let lastError: ProviderError | null = null;

    for (let index = 0; index < candidates.length; index++) {
      const modelId = candidates[index];
      if (index > 0) {
        this.recordRotation(candidates[index - 1], modelId);
      }

      for (let attempt = 1; attempt <= this.retryPolicy.maxAttempts; attempt++) {
        throwIfAborted(options.signal);
        let emitted = false;
        try {
          for await (const chunk of this.attempt(modelId, messages, options)) {
            emitted = true;
            yield chunk;
          }
          this.modelState.recordSuccess(modelId);
          return;
        } catch (error: unknown) {
          const providerError = this.toProviderError(error, modelId, options.signal);
          this.recordModelError(modelId, providerError);
          lastError = providerError;
          if (emitted) {
            this.stats.totalFailures++;
            throw providerError;
          }

          const hasAttemptsLeft = attempt < this.retryPolicy.maxAttempts;
          if (!providerError.retryable || !hasAttemptsLeft) {
            console.warn(
              `[ModelRouter] Giving up on model "${modelId}" after ${attempt} attempt(s): ${providerError.message}`
            );
            break;
          }
          await this.waitBeforeRetry(modelId, attempt, providerError, context);
        }
      }
    }

    this.stats.totalFailures++;
    throw (
      lastError ??
      new ProviderError('No model candidates were available for the request.', { retryable: false })
    );
  }

  private async *attempt(
    modelId: string,
    messages: LLMMessage[],
    options: ModelCallOptions
  ): AsyncGenerator<string, void, undefined> {
    const descriptor = this.registry.get(modelId);
    if (!descriptor) {
      throw new ProviderError(`Model "${modelId}" is not registered.`, { retryable: false });
    }
    const provider = this.providerFor(descriptor);
    const request: ModelRequest = {
      model: modelId,
      messages,
      temperature: options.temperature,
      maxTokens: options.maxTokens,
    };
    console.debug(`[ModelRouter] Requesting model "${modelId}" via provider "${provider.name}".`);
    for await (const chunk of provider.stream(request, options.signal)) {
      if (chunk.length > 0) {
        yield chunk;
      }
    }
  }

  private async waitBeforeRetry(
    modelId: string,
    attempt: number,
    error: ProviderError,
    context: AttemptContext
  ): Promise<void> {
    const delayMs = context.schedule.next(error.retryAfterMs);
    this.stats.totalRetries++;
    console.warn(
      `[ModelRouter] ${error.status ?? 'network'} from "${modelId}" ` +
        `(attempt ${attempt}/${this.retryPolicy.maxAttempts}), retrying in ${delayMs}ms: ${error.message}`
    );
    await this.sleep(delayMs, context.signal);
  }

  private providerFor(descriptor: ModelDescriptor): IModelProvider {
    const provider = this.providers[descriptor.provider];
    if (!provider) {
      throw new ConfigurationError(
        `No provider adapter registered for "${descriptor.provider}" (model "${descriptor.id}").`
      );
    }
    return provider;
  }

  private toProviderError(error: unknown, modelId: string, signal?: AbortSignal): ProviderError {
    if (signal?.aborted) {
      // Cancellation and request timeouts bypass retry handling entirely.
      throw abortReason(signal);
    }
    if (error instanceof ProviderError) {
      const retryable = error.retryable || isRetryableStatus(this.retryPolicy, error.status);
      return retryable === error.retryable
        ? error
        : new ProviderError(error.message, { status: error.status, retryable, retryAfterMs: error.retryAfterMs }, error.metadata);
    }
    if (error instanceof ConfigurationError) {
      return new ProviderError(error.message, { retryable: false }, { modelId });
    }
    // Anything else is a transport-level failure (connection reset, DNS, ...).
    return new ProviderError(errorMessage(error), { retryable: true }, { modelId, cause: errorMessage(error) });
  }

  private recordModelError(modelId: string, error: ProviderError): void {
    this.modelState.recordFailure(modelId);
    this.stats.modelErrors[modelId] = (this.stats.modelErrors[modelId] ?? 0) + 1;
    this.stats.lastError = error.message;
  }

  private recordRotation(from: string, to: string): void {
    this.stats.rotations++;
    this.stats.lastRotation = { from, to };
    console.warn(`[ModelRouter] Rotating from model "${from}" to fallback "${to}".`);
  }
}
