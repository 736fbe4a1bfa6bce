// src/llm/model-state.ts

/**
 * @file Process-wide model selection shared by every session.
 * All mutations are synchronous, so a read-modify-write never interleaves with
 * another session's update on the event loop. Readers get frozen snapshots.
 */

import { ConfigurationError } from '../core/errors';
import { ModelRegistry } from './model-registry';
import { ModelCategory } from './types';

export interface ModelStateSnapshot {
  readonly modelId: string;
  readonly category: ModelCategory;
  readonly fallbackCandidates: readonly string[];
  /** Consecutive failures per model id; an entry is cleared on success. */
  readonly failureCounts: Readonly<Record<string, number>>;
  /** Incremented on every mutation. */
  readonly version: number;
}

export class ModelState {
  private modelId: string;
  private fallbackCandidates: string[];
  private failureCounts = new Map<string, number>();
  private version = 0;

  constructor(
    private readonly registry: ModelRegistry,
    initialModel: string = registry.defaultModel,
    fallbackCandidates: readonly string[] = registry.fallbackOrder
  ) {
    this.assertKnown(initialModel);
    fallbackCandidates.forEach((id) => this.assertKnown(id));
    this.modelId = initialModel;
    this.fallbackCandidates = [...fallbackCandidates];
  }

  snapshot(): ModelStateSnapshot {
    const model = this.registry.get(this.modelId);
    if (!model) {
      throw new ConfigurationError(`Selected model "${this.modelId}" is missing from the registry.`);
    }
    return Object.freeze({
      modelId: this.modelId,
      category: model.category,
      fallbackCandidates: Object.freeze([...this.fallbackCandidates]),
      failureCounts: Object.freeze(Object.fromEntries(this.failureCounts)),
      version: this.version,
    });
  }

  get currentModelId(): string {
    return this.modelId;
  }

  /**
   * Switches the process-wide selection.
   * @throws ConfigurationError for a model the registry does not know.
   */
  select(modelId: string): ModelStateSnapshot {
    this.assertKnown(modelId);
    this.modelId = modelId;
    this.version++;
    console.info(`[ModelState] Selected model: ${modelId}`);
    return this.snapshot();
  }

  /**
   * Replaces the fallback order used by `candidatesFor`.
   * @throws ConfigurationError when any id is unknown; the current order is kept.
   */
  setFallbackCandidates(modelIds: readonly string[]): void {
    modelIds.forEach((id) => this.assertKnown(id));
    this.fallbackCandidates = [...modelIds];
    this.version++;
  }

  /**
   * Models to try for one request, in order: the preferred (or selected) model,
   * then the fallback candidates without duplicates.
   */
  candidatesFor(preferred: string = this.modelId): string[] {
    this.assertKnown(preferred);
    return [preferred, ...this.fallbackCandidates.filter((id) => id !== preferred)];
  }

  recordFailure(modelId: string): number {
    const next = (this.failureCounts.get(modelId) ?? 0) + 1;
    this.failureCounts.set(modelId, next);
    this.version++;
    return next;
  }

  recordSuccess(modelId: string): void {
    if (this.failureCounts.delete(modelId)) {
      this.version++;
    }
  }

  failureCount(modelId: string): number {
    return this.failureCounts.get(modelId) ?? 0;
  }

  private assertKnown(modelId: string): void {
    if (!this.registry.has(modelId)) {
      throw new ConfigurationError(`Unknown model "${modelId}".`, { modelId });
    }
  }
}

let processModelState: ModelState | null = null;

/**
 * The process-wide ModelState, created on first use with the bundled registry
 * and its default model.
 */
export function getModelState(): ModelState {
  if (!processModelState) {
    processModelState = new ModelState(new ModelRegistry());
  }
  return processModelState;
}

/**
 * Replaces the process-wide ModelState (explicit init with a custom registry or
 * default model).
 */
export function initModelState(state: ModelState): ModelState {
  processModelState = state;
  return state;
}
