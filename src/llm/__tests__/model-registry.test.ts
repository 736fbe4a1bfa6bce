import { ConfigurationError } from '../../core/errors';
import { ModelRegistry, parseModelCatalog } from '../model-registry';

describe('ModelRegistry', () => {
  const registry = new ModelRegistry();

  it('should load the bundled catalog', () => {
    expect(registry.defaultModel).toBe('gpt-4o');
    expect(registry.fallbackOrder).toEqual(['gpt-4o', 'gpt-4.1', 'gpt-4o-mini', 'o3-mini']);
    expect(registry.has('o3')).toBe(true);
    expect(registry.get('missing')).toBeUndefined();
  });

  it('should list models by category', () => {
    expect(registry.list('thinking').map((m) => m.id)).toEqual(['o1', 'o3']);
    expect(registry.list('labs').map((m) => m.provider)).toEqual(['gateway']);
    expect(registry.list()).toHaveLength(10);
  });

  it('should describe all five categories', () => {
    expect(Object.keys(registry.categories())).toEqual(['thinking', 'reasoning', 'general', 'research', 'labs']);
  });

  describe('parseModelCatalog', () => {
    const model = { id: 'm1', name: 'M1', provider: 'openai', category: 'general' };

    it('should accept a minimal catalog', () => {
      const catalog = parseModelCatalog({ defaultModel: 'm1', models: [model] });
      expect(catalog.models).toEqual([{ ...model, description: '' }]);
      expect(catalog.fallbackOrder).toEqual([]);
    });

    it('should reject an unknown category', () => {
      expect(() => parseModelCatalog({ defaultModel: 'm1', models: [{ ...model, category: 'fast' }] })).toThrow(
        'Model catalog: unknown category "fast" (models[0]).'
      );
    });

    it('should reject a default model that is not listed', () => {
      expect(() => parseModelCatalog({ defaultModel: 'm2', models: [model] })).toThrow(ConfigurationError);
    });

    it('should reject duplicate ids and unknown fallbacks', () => {
      expect(() => parseModelCatalog({ defaultModel: 'm1', models: [model, model] })).toThrow(
        'Model catalog contains duplicate model ids.'
      );
      expect(() => parseModelCatalog({ defaultModel: 'm1', fallbackOrder: ['m9'], models: [model] })).toThrow(
        'Model catalog: fallback model "m9" is not listed.'
      );
    });
  });
});
