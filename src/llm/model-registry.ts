// src/llm/model-registry.ts

/**
 * @file Registry of the models the router may select, grouped into categories.
 * The bundled catalog is read from `models.json`; hosts can supply their own.
 */

import { ConfigurationError } from '../core/errors';
import { isRecord } from '../core/utils';
import { ModelCategory, ModelDescriptor } from './types';
import bundledCatalog from './models.json';

const MODEL_CATEGORIES: readonly ModelCategory[] = ['thinking', 'reasoning', 'general', 'research', 'labs'];

/**
 * A validated catalog of models.
 */
export interface ModelCatalog {
  defaultModel: string;
  /** Order in which alternate models are tried after the selected one fails. */
  fallbackOrder: string[];
  categories: Partial<Record<ModelCategory, string>>;
  models: ModelDescriptor[];
}

function isModelCategory(value: unknown): value is ModelCategory {
  return typeof value === 'string' && MODEL_CATEGORIES.some((c) => c === value);
}

function readString(source: Record<string, unknown>, key: string, where: string): string {
  const value = source[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigurationError(`Model catalog: "${key}" must be a non-empty string (${where}).`);
  }
  return value;
}

/**
 * Validates raw catalog data (for example parsed JSON) into a `ModelCatalog`.
 * @throws ConfigurationError when the data is malformed or references unknown models.
 */
export function parseModelCatalog(raw: unknown): ModelCatalog {
  if (!isRecord(raw)) {
    throw new ConfigurationError('Model catalog must be an object.');
  }
  if (!Array.isArray(raw.models) || raw.models.length === 0) {
    throw new ConfigurationError('Model catalog must list at least one model.');
  }

  const models: ModelDescriptor[] = raw.models.map((entry: unknown, index: number) => {
    if (!isRecord(entry)) {
      throw new ConfigurationError(`Model catalog entry #${index} must be an object.`);
    }
    const where = `models[${index}]`;
    const category = entry.category;
    if (!isModelCategory(category)) {
      throw new ConfigurationError(`Model catalog: unknown category "${String(category)}" (${where}).`, {
        allowed: MODEL_CATEGORIES,
      });
    }
    return {
      id: readString(entry, 'id', where),
      name: readString(entry, 'name', where),
      provider: readString(entry, 'provider', where),
      category,
      description: typeof entry.description === 'string' ? entry.description : '',
    };
  });

  const ids = new Set(models.map((m) => m.id));
  if (ids.size !== models.length) {
    throw new ConfigurationError('Model catalog contains duplicate model ids.');
  }

  const defaultModel = readString(raw, 'defaultModel', 'catalog');
  if (!ids.has(defaultModel)) {
    throw new ConfigurationError(`Model catalog: default model "${defaultModel}" is not listed.`);
  }

  const fallbackOrder: string[] = [];
  if (raw.fallbackOrder !== undefined) {
    if (!Array.isArray(raw.fallbackOrder)) {
      throw new ConfigurationError('Model catalog: "fallbackOrder" must be an array of model ids.');
    }
    for (const id of raw.fallbackOrder) {
      if (typeof id !== 'string' || !ids.has(id)) {
        throw new ConfigurationError(`Model catalog: fallback model "${String(id)}" is not listed.`);
      }
      fallbackOrder.push(id);
    }
  }

  const categories: Partial<Record<ModelCategory, string>> = {};
  if (isRecord(raw.categories)) {
    for (const [key, description] of Object.entries(raw.categories)) {
      if (isModelCategory(key) && typeof description === 'string') {
        categories[key] = description;
      }
    }
  }

  return { defaultModel, fallbackOrder, categories, models };
}

export class ModelRegistry {
  private readonly catalog: ModelCatalog;
  private readonly byId: Map<string, ModelDescriptor>;

  constructor(catalog: ModelCatalog = parseModelCatalog(bundledCatalog)) {
    this.catalog = catalog;
    this.byId = new Map(catalog.models.map((m) => [m.id, m]));
  }

  get defaultModel(): string {
    return this.catalog.defaultModel;
  }

  get fallbackOrder(): readonly string[] {
    return this.catalog.fallbackOrder;
  }

  has(modelId: string): boolean {
    return this.byId.has(modelId);
  }

  get(modelId: string): ModelDescriptor | undefined {
    const model = this.byId.get(modelId);
    return model ? { ...model } : undefined;
  }

  /**
   * Lists models, optionally restricted to one category, in catalog order.
   */
  list(category?: ModelCategory): ModelDescriptor[] {
    return this.catalog.models.filter((m) => !category || m.category === category).map((m) => ({ ...m }));
  }

  /**
   * Category descriptions, keyed by category.
   */
  categories(): Partial<Record<ModelCategory, string>> {
    return { ...this.catalog.categories };
  }
}
