// src/facades/__tests__/taskloop.test.ts

import { ConfigurationError, InvalidStateError, ProviderError } from '../../core/errors';
import { FakeProvider, sequence } from '../../llm/__tests__/fake-provider';
import { FunctionTool } from '../../tools/function-tool';
import { AgentEvent } from '../../agents/types';
import { TaskLoop, TaskLoopInternal } from '../taskloop';

const shellTool = new FunctionTool(
  {
    name: 'shell_tool',
    description: 'Runs a shell command.',
    parameters: [{ name: 'command', type: 'string', description: 'Command line', required: true }],
  },
  async () => 'Linux test-host'
);

describe('TaskLoop facade', () => {
  const savedEnv = { ...process.env };

  beforeEach(() => {
    delete process.env.OPENAI_API_KEY;
    delete process.env.TASKLOOP_GATEWAY_URL;
    delete process.env.TASKLOOP_MAX_ITERATIONS;
    delete process.env.TASKLOOP_MODEL;
    jest.spyOn(console, 'info').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    TaskLoop.reset();
    process.env = { ...savedEnv };
    jest.restoreAllMocks();
  });

  it('should be a singleton', () => {
    expect(TaskLoopInternal.getInstance()).toBe(TaskLoopInternal.getInstance());
  });

  it('should refuse use before initialization', async () => {
    const message = 'TaskLoop not initialized. Call TaskLoop.initialize() first.';
    await expect(TaskLoop.createSession()).rejects.toThrow(message);
    await expect(TaskLoop.runTurn('s1', 'hello').next()).rejects.toBeInstanceOf(InvalidStateError);
    expect(() => TaskLoop.getRouter()).toThrow(message);
  });

  it('should require a model provider', async () => {
    await expect(TaskLoop.initialize()).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('should build the OpenAI adapter from options', async () => {
    await TaskLoop.initialize({ openai: { apiKey: 'test-secret' }, model: 'gpt-4.1' });
    expect(TaskLoop.getRouter().currentModel().id).toBe('gpt-4.1');
  });

  it('should rotate through the configured fallback models', async () => {
    const provider = new FakeProvider((request) =>
      request.model === 'gpt-4o' ? new ProviderError('Bad request', { status: 400, retryable: false }) : [`from ${request.model}`]
    );
    await TaskLoop.initialize({ providers: { openai: provider }, fallbackModels: ['o3-mini'] });

    await expect(TaskLoop.getRouter().query([{ role: 'user', content: 'Hello' }])).resolves.toBe('from o3-mini');
    expect(provider.requests.map((r) => r.model)).toEqual(['gpt-4o', 'o3-mini']);
  });

  it('should reject invalid loop configuration', async () => {
    const provider = new FakeProvider(sequence('unused'));
    await expect(
      TaskLoop.initialize({ providers: { openai: provider }, loopConfig: { maxIterations: 0 } })
    ).rejects.toThrow('AgentLoopConfig.maxIterations must be a positive integer.');
  });

  it('should run a turn end to end', async () => {
    const provider = new FakeProvider(sequence('Checking.', '{"action":"done"}', 'The host runs Linux.'));
    await TaskLoop.initialize({ providers: { openai: provider }, tools: [shellTool] });
    const session = await TaskLoop.createSession();

    const events: AgentEvent[] = [];
    for await (const event of TaskLoop.runTurn(session.id, 'run uname -a')) {
      events.push(event);
    }

    const last = events[events.length - 1];
    expect(last.type).toBe('done');
    expect(last.data).toEqual(expect.objectContaining({ content: 'The host runs Linux.', iterations: 1 }));
    expect(TaskLoop.isSessionBusy(session.id)).toBe(false);
    const history = await TaskLoop.getStorage().loadHistory(session.id);
    expect(history).toHaveLength(2);
  });

  it('should validate turn arguments', async () => {
    await TaskLoop.initialize({ providers: { openai: new FakeProvider(sequence('unused')) } });
    await expect(TaskLoop.runTurn('s1', '   ').next()).rejects.toThrow('userMessage must be a non-empty string.');
    await expect(TaskLoop.runTurn('', 'hello').next()).rejects.toThrow('sessionId must be a non-empty string.');
  });

  it('should register tools after initialization', async () => {
    await TaskLoop.initialize({ providers: { openai: new FakeProvider(sequence('unused')) } });
    const definition = await TaskLoop.registerTool(shellTool);
    expect(definition.name).toBe('shell_tool');
    await expect(TaskLoop.registerTool(shellTool)).rejects.toThrow('Tool "shell_tool" is already registered.');
  });

  it('should read loop limits from the environment', async () => {
    process.env.TASKLOOP_MAX_ITERATIONS = 'many';
    await expect(
      TaskLoop.initialize({ providers: { openai: new FakeProvider(sequence('unused')) } })
    ).rejects.toThrow('TASKLOOP_MAX_ITERATIONS must be an integer, got "many".');
  });

  it('should title sessions that are created with one', async () => {
    await TaskLoop.initialize({ providers: { openai: new FakeProvider(sequence('unused')) } });
    const session = await TaskLoop.createSession('Deploy review');
    expect(session.title).toBe('Deploy review');
  });
});
