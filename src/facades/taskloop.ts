
/**
 * @file TaskLoop - a high-level facade for setting up the agent loop with its
 * model router, tool registry and session storage, and running turns against it.
 */

import { ConfigurationError, InvalidStateError } from '../core/errors';
import { ITool, IToolDefinition, IToolProvider } from '../core/tool';
import { GatewayAdapter, GatewayAdapterOptions } from '../llm/adapters/gateway/gateway-adapter';
import { OpenAIAdapter, OpenAIAdapterOptions } from '../llm/adapters/openai/openai-adapter';
import { ModelRegistry } from '../llm/model-registry';
import { ModelRouter, ModelRouterOptions } from '../llm/model-router';
import { ModelState, initModelState } from '../llm/model-state';
import { IModelProvider } from '../llm/types';
import { AgentLoop, AgentRunOptions } from '../agents/agent-loop';
import { AgentLoopConfig, agentLoopConfigFromEnv, resolveAgentLoopConfig } from '../agents/config';
import { SessionLock } from '../agents/session-lock';
import { IContextSummarizer } from '../agents/summarizer';
import { AgentEvent } from '../agents/types';
import { MemoryStorage } from '../sessions/storage/memory-storage';
import { ISession, ISessionStorage } from '../sessions/types';
import { ToolRegistry } from '../tools/tool-registry';

export interface TaskLoopInitializationOptions {
  /** Provider adapters keyed by registry provider name. Replaces the default adapters entirely. */
  providers?: Record<string, IModelProvider>;
  openai?: OpenAIAdapterOptions;
  /** Gateway adapter options; also enabled when TASKLOOP_GATEWAY_URL is set. */
  gateway?: GatewayAdapterOptions;
  registry?: ModelRegistry;
  /** Initial process-wide model. */
  model?: string;
  /** Models tried, in order, after the selected one fails. Defaults to the registry's fallback order. */
  fallbackModels?: string[];
  storage?: ISessionStorage;
  summarizer?: IContextSummarizer;
  loopConfig?: Partial<AgentLoopConfig>;
  routerOptions?: Omit<ModelRouterOptions, 'providers' | 'registry' | 'modelState'>;
  tools?: ITool[];
}

export class TaskLoopInternal {
  private static instance: TaskLoopInternal;

  private router: ModelRouter | null = null;
  private storage: ISessionStorage | null = null;
  private toolRegistry = new ToolRegistry();
  private loop: AgentLoop | null = null;
  private readonly sessionLock = new SessionLock();
  private isInitialized = false;

  private constructor() {}

  public static getInstance(): TaskLoopInternal {
    if (!TaskLoopInternal.instance) {
      TaskLoopInternal.instance = new TaskLoopInternal();
    }
    return TaskLoopInternal.instance;
  }

  private assertInitialized(): void {
    if (!this.isInitialized) {
      throw new InvalidStateError('TaskLoop not initialized. Call TaskLoop.initialize() first.');
    }
  }

  public async initialize(options: TaskLoopInitializationOptions = {}): Promise<void> {
    if (this.isInitialized) {
      console.warn('[TaskLoop] Already initialized. Re-initializing replaces the router, storage and tools.');
    }

    const registry = options.registry ?? new ModelRegistry();
    const modelState = initModelState(new ModelState(registry, options.model ?? registry.defaultModel));
    if (options.fallbackModels) {
      modelState.setFallbackCandidates(options.fallbackModels);
    }
    const providers = options.providers ?? this.createDefaultProviders(options);
    if (Object.keys(providers).length === 0) {
      throw new ConfigurationError(
        'No model provider is configured. Set OPENAI_API_KEY or TASKLOOP_GATEWAY_URL, or pass providers.'
      );
    }
    this.router = new ModelRouter({ ...options.routerOptions, providers, registry, modelState });
    this.storage = options.storage ?? new MemoryStorage();
    this.toolRegistry = new ToolRegistry();
    for (const tool of options.tools ?? []) {
      await this.toolRegistry.register(tool);
    }

    const loopConfig = resolveAgentLoopConfig({ ...agentLoopConfigFromEnv(), ...options.loopConfig });
    this.loop = new AgentLoop(
      {
        router: this.router,
        toolProvider: this.toolRegistry,
        persistence: this.storage,
        sessionLock: this.sessionLock,
        summarizer: options.summarizer,
      },
      loopConfig
    );
    this.isInitialized = true;
    console.info(
      `[TaskLoop] Initialized. Model: ${modelState.currentModelId}. Providers: ${Object.keys(providers).join(', ')}. ` +
        `Tools: ${options.tools?.length ?? 0}`
    );
  }

  private createDefaultProviders(options: TaskLoopInitializationOptions): Record<string, IModelProvider> {
    const providers: Record<string, IModelProvider> = {};
    if (options.openai || process.env.OPENAI_API_KEY) {
      const openai = new OpenAIAdapter(options.openai);
      providers[openai.name] = openai;
    }
    if (options.gateway || process.env.TASKLOOP_GATEWAY_URL) {
      const gateway = new GatewayAdapter(options.gateway);
      providers[gateway.name] = gateway;
    }
    return providers;
  }

  public async registerTool(tool: ITool): Promise<IToolDefinition> {
    this.assertInitialized();
    const definition = await this.toolRegistry.register(tool);
    console.info(`[TaskLoop] Registered tool "${definition.name}".`);
    return definition;
  }

  public registerToolProvider(provider: IToolProvider): void {
    this.assertInitialized();
    this.toolRegistry.addProvider(provider);
  }

  public async createSession(title?: string): Promise<ISession> {
    return this.getStorage().createSession(title ? { title } : undefined);
  }

  /**
   * Runs one user turn and streams its events. The stream ends with `done` or
   * `error`, or silently when `options.signal` aborts.
   */
  public async *runTurn(
    sessionId: string,
    userMessage: string,
    options: AgentRunOptions = {}
  ): AsyncGenerator<AgentEvent, void, undefined> {
    this.assertInitialized();
    if (!sessionId.trim()) {
      throw new ConfigurationError('sessionId must be a non-empty string.');
    }
    if (!userMessage.trim()) {
      throw new ConfigurationError('userMessage must be a non-empty string.');
    }
    if (!this.loop) {
      throw new InvalidStateError('TaskLoop has no agent loop.');
    }
    yield* this.loop.run(sessionId, userMessage, options);
  }

  public getRouter(): ModelRouter {
    this.assertInitialized();
    if (!this.router) {
      throw new InvalidStateError('TaskLoop has no model router.');
    }
    return this.router;
  }

  public getStorage(): ISessionStorage {
    this.assertInitialized();
    if (!this.storage) {
      throw new InvalidStateError('TaskLoop has no session storage.');
    }
    return this.storage;
  }

  public isSessionBusy(sessionId: string): boolean {
    return this.sessionLock.isLocked(sessionId);
  }

  /** Drops all state. Intended for tests. */
  public reset(): void {
    this.router = null;
    this.storage = null;
    this.loop = null;
    this.toolRegistry = new ToolRegistry();
    this.isInitialized = false;
  }
}

const taskLoop = TaskLoopInternal.getInstance();

/**
 * Static entry points over the TaskLoop singleton.
 */
export const TaskLoop = {
  initialize: (options?: TaskLoopInitializationOptions): Promise<void> => taskLoop.initialize(options),
  registerTool: (tool: ITool): Promise<IToolDefinition> => taskLoop.registerTool(tool),
  registerToolProvider: (provider: IToolProvider): void => taskLoop.registerToolProvider(provider),
  createSession: (title?: string): Promise<ISession> => taskLoop.createSession(title),
  runTurn: (sessionId: string, userMessage: string, options?: AgentRunOptions): AsyncGenerator<AgentEvent, void, undefined> =>
    taskLoop.runTurn(sessionId, userMessage, options),
  getRouter: (): ModelRouter => taskLoop.getRouter(),
  getStorage: (): ISessionStorage => taskLoop.getStorage(),
  isSessionBusy: (sessionId: string): boolean => taskLoop.isSessionBusy(sessionId),
  reset: (): void => taskLoop.reset(),
};
