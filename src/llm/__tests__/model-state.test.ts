import { ConfigurationError } from '../../core/errors';
import { ModelRegistry } from '../model-registry';
import { ModelState, getModelState, initModelState } from '../model-state';

describe('ModelState', () => {
  const registry = new ModelRegistry();
  let state: ModelState;

  beforeEach(() => {
    state = new ModelState(registry);
  });

  it('should start on the registry default', () => {
    const snapshot = state.snapshot();
    expect(snapshot.modelId).toBe('gpt-4o');
    expect(snapshot.category).toBe('general');
    expect(snapshot.version).toBe(0);
    expect(Object.isFrozen(snapshot)).toBe(true);
  });

  it('should switch the selection and bump the version', () => {
    const snapshot = state.select('o3');
    expect(snapshot.modelId).toBe('o3');
    expect(snapshot.category).toBe('thinking');
    expect(snapshot.version).toBe(1);
  });

  it('should reject unknown models', () => {
    expect(() => state.select('nope')).toThrow(ConfigurationError);
    expect(() => new ModelState(registry, 'nope')).toThrow('Unknown model "nope".');
  });

  it('should order candidates with the preferred model first and no duplicates', () => {
    expect(state.candidatesFor()).toEqual(['gpt-4o', 'gpt-4.1', 'gpt-4o-mini', 'o3-mini']);
    expect(state.candidatesFor('o3-mini')).toEqual(['o3-mini', 'gpt-4o', 'gpt-4.1', 'gpt-4o-mini']);
  });

  it('should replace the fallback order', () => {
    state.setFallbackCandidates(['o3-mini', 'gpt-4.1']);
    expect(state.candidatesFor()).toEqual(['gpt-4o', 'o3-mini', 'gpt-4.1']);
    expect(state.snapshot().fallbackCandidates).toEqual(['o3-mini', 'gpt-4.1']);
    expect(state.snapshot().version).toBe(1);
  });

  it('should keep the fallback order when a replacement names an unknown model', () => {
    expect(() => state.setFallbackCandidates(['o3-mini', 'nope'])).toThrow(ConfigurationError);
    expect(state.candidatesFor()).toEqual(['gpt-4o', 'gpt-4.1', 'gpt-4o-mini', 'o3-mini']);
    expect(state.snapshot().version).toBe(0);
  });

  it('should count consecutive failures and reset them on success', () => {
    state.recordFailure('gpt-4o');
    expect(state.recordFailure('gpt-4o')).toBe(2);
    expect(state.snapshot().failureCounts).toEqual({ 'gpt-4o': 2 });
    state.recordSuccess('gpt-4o');
    expect(state.failureCount('gpt-4o')).toBe(0);
  });

  it('should replace the process-wide state', () => {
    const custom = new ModelState(registry, 'o1');
    expect(initModelState(custom)).toBe(custom);
    expect(getModelState().currentModelId).toBe('o1');
  });
});
