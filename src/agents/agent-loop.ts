// src/agents/agent-loop.ts

/**
 * @file AgentLoop - drives one request through Planning, Executing, Reflecting and
 * Synthesizing, streaming typed events as it goes.
 *
 * The loop runs under a per-session lock and a request-level AbortController.
 * The controller fires when the request timeout elapses (terminal `error` event)
 * or when the caller aborts or closes the event stream (no further events).
 */

import { v4 as uuidv4 } from 'uuid';
import { ApplicationError, CancellationError, SessionBusyError, StorageError, TimeoutError } from '../core/errors';
import { IToolDefinition, IToolProvider, ToolExecution } from '../core/tool';
import { chunkText, errorMessage, throwIfAborted, truncateText } from '../core/utils';
import { ModelRouter } from '../llm/model-router';
import { sanitizeModelOutput } from '../llm/sanitize';
import { LLMMessage, ModelCallOptions } from '../llm/types';
import { createMessageObject, mapMessageToLLMMessage } from '../sessions/message';
import { deriveSessionTitle } from '../sessions/session';
import { IAgentPersistence, ISession } from '../sessions/types';
import { AgentLoopConfig, resolveAgentLoopConfig } from './config';
import { ContextStore } from './context-store';
import { PhaseMachine } from './phase-machine';
import { Plan } from './plan';
import {
  buildExecutionPrompt,
  buildPlanningPrompt,
  buildReflectionPrompt,
  buildSynthesisPrompt,
  buildSystemPrompt,
} from './prompt-builder';
import { ResponseParser } from './response-parser';
import { SessionLock, SessionRelease } from './session-lock';
import { IContextSummarizer } from './summarizer';
import { ToolDispatcher } from './tool-dispatcher';
import {
  Action,
  AgentEvent,
  AgentEventData,
  AgentEventType,
  MultiStepAction,
  UseToolAction,
  assertNever,
} from './types';

export interface AgentLoopDependencies {
  router: ModelRouter;
  toolProvider: IToolProvider;
  persistence: IAgentPersistence;
  parser?: ResponseParser;
  dispatcher?: ToolDispatcher;
  /** Share one lock between loops that serve the same sessions. */
  sessionLock?: SessionLock;
  summarizer?: IContextSummarizer;
}

export interface AgentRunOptions {
  /** Aborting it cancels the request; the stream then ends without further events. */
  signal?: AbortSignal;
  runId?: string;
  /** Model for this request only. */
  model?: string;
}

/**
 * Mutable state of one in-flight request.
 */
interface LoopState {
  readonly runId: string;
  readonly sessionId: string;
  readonly userMessage: string;
  readonly signal: AbortSignal;
  readonly phase: PhaseMachine;
  readonly context: ContextStore;
  readonly executions: ToolExecution[];
  readonly callOptions: ModelCallOptions;
  systemPrompt: LLMMessage;
  iteration: number;
  goal: string;
  plan: Plan | null;
  pendingAction: Action | null;
  finalText: string | null;
}

type ReflectionOutcome = 'complete' | 'continue';

export class AgentLoop {
  private readonly config: AgentLoopConfig;
  private readonly router: ModelRouter;
  private readonly toolProvider: IToolProvider;
  private readonly persistence: IAgentPersistence;
  private readonly parser: ResponseParser;
  private readonly dispatcher: ToolDispatcher;
  private readonly sessionLock: SessionLock;
  private readonly summarizer?: IContextSummarizer;

  constructor(dependencies: AgentLoopDependencies, config: Partial<AgentLoopConfig> = {}) {
    this.config = resolveAgentLoopConfig(config);
    this.router = dependencies.router;
    this.toolProvider = dependencies.toolProvider;
    this.persistence = dependencies.persistence;
    this.parser = dependencies.parser ?? new ResponseParser();
    this.dispatcher =
      dependencies.dispatcher ?? new ToolDispatcher(dependencies.toolProvider, { defaultTimeoutMs: this.config.toolTimeoutMs });
    this.sessionLock = dependencies.sessionLock ?? new SessionLock();
    this.summarizer = dependencies.summarizer;
  }

  /**
   * Runs one request against a session. The last event is `done` or `error`,
   * except on caller cancellation, which ends the stream with no further events.
   *
   * @param session The session (or its id) the request belongs to.
   * @param userMessage The user's message for this turn.
   */
  public async *run(
    session: ISession | string,
    userMessage: string,
    options: AgentRunOptions = {}
  ): AsyncGenerator<AgentEvent, void, undefined> {
    const runId = options.runId ?? uuidv4();
    const sessionId = typeof session === 'string' ? session : session.id;
    const ids = { runId, sessionId };

    if (options.signal?.aborted) {
      console.info(`[AgentLoop: ${runId}] Request was cancelled before it started.`);
      return;
    }

    const controller = new AbortController();
    const onCallerAbort = (): void => controller.abort(new CancellationError());
    options.signal?.addEventListener('abort', onCallerAbort, { once: true });
    const timeoutMs = this.config.requestTimeoutMs;
    const timer = setTimeout(() => {
      controller.abort(new TimeoutError(`Request timed out after ${timeoutMs}ms`, timeoutMs, { runId, sessionId }));
    }, timeoutMs);
    let release: SessionRelease | undefined;

    try {
      try {
        release = await this.sessionLock.acquire(sessionId, this.config.busyPolicy, controller.signal);
      } catch (error: unknown) {
        if (error instanceof SessionBusyError) {
          console.warn(`[AgentLoop: ${runId}] ${error.message}`);
          yield this.createEvent('error', ids, { content: error.message, errorType: error.name });
          return;
        }
        throw error;
      }

      yield* this.process(session, userMessage, ids, controller.signal, options.model);
    } catch (error: unknown) {
      if (controller.signal.aborted) {
        const reason: unknown = controller.signal.reason;
        if (reason instanceof TimeoutError) {
          console.warn(`[AgentLoop: ${runId}] ${reason.message}`);
          yield this.createEvent('error', ids, { content: reason.message, errorType: reason.name });
        } else {
          console.info(`[AgentLoop: ${runId}] Request cancelled.`);
        }
        return;
      }
      console.error(`[AgentLoop: ${runId}] Run failed for session ${sessionId}:`, error);
      const errorType = error instanceof ApplicationError ? error.name : 'Error';
      yield this.createEvent('error', ids, { content: errorMessage(error), errorType });
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onCallerAbort);
      if (!controller.signal.aborted) {
        // Reaches anything still listening when the consumer closes the stream early.
        controller.abort(new CancellationError());
      }
      release?.();
      console.info(`[AgentLoop: ${runId}] Run for session ${sessionId} has concluded.`);
    }
  }

  private async *process(
    session: ISession | string,
    userMessage: string,
    ids: { runId: string; sessionId: string },
    signal: AbortSignal,
    modelOverride?: string
  ): AsyncGenerator<AgentEvent, void, undefined> {
    const { runId, sessionId } = ids;
    const sessionRecord = typeof session === 'string' ? await this.persistence.getSession(sessionId) : session;
    if (!sessionRecord) {
      throw new StorageError(`Session "${sessionId}" not found.`, { sessionId });
    }

    const history = await this.persistence.loadHistory(sessionId);
    const state: LoopState = {
      runId,
      sessionId,
      userMessage,
      signal,
      phase: new PhaseMachine(),
      context: new ContextStore(
        sessionId,
        { summarizationThreshold: this.config.summarizationThreshold, summarizer: this.summarizer },
        history
      ),
      executions: [],
      callOptions: { model: modelOverride ?? this.config.model, temperature: this.config.temperature, signal },
      systemPrompt: buildSystemPrompt(await this.toolDefinitions(), this.config.systemPrompt),
      iteration: 0,
      goal: userMessage,
      plan: null,
      pendingAction: null,
      finalText: null,
    };

    // Persisted first so the turn survives even if the request fails later.
    const userRecord = createMessageObject(sessionId, 'user', userMessage, { runId });
    await this.persistence.saveMessage(sessionId, userRecord);
    state.context.append(userRecord);
    if (!sessionRecord.title) {
      await this.persistence.updateSessionTitle(sessionId, deriveSessionTitle(userMessage, this.config.titleMaxLength));
    }

    const model = state.callOptions.model ?? this.router.currentModel().id;
    yield this.createEvent('status', ids, { content: `Processing request with ${model}...`, model });

    // --- Planning ---
    const directAnswer = yield* this.plan(state);
    if (directAnswer !== null) {
      state.phase.transition('done', 'direct answer');
      const answer = this.clientText(directAnswer);
      for (const piece of chunkText(answer, this.config.responseChunkSize)) {
        yield this.createEvent('chunk', ids, { content: piece });
      }
      yield* this.finish(state, answer);
      return;
    }

    // --- Executing / Reflecting ---
    state.phase.transition('executing', state.pendingAction ? 'immediate action' : 'plan ready');
    yield this.createEvent('phase', ids, { phase: 'executing', content: 'Starting execution...' });

    let running = true;
    while (running) {
      if (state.iteration >= this.config.maxIterations) {
        console.warn(`[AgentLoop: ${runId}] Reached max iterations (${this.config.maxIterations}). Synthesizing.`);
        break;
      }
      state.iteration++;
      yield this.createEvent('phase', ids, { phase: 'executing', content: `Running step ${state.iteration}...` });
      state.plan?.startCurrent();

      const action = state.pendingAction ?? (await this.nextAction(state));
      state.pendingAction = null;

      switch (action.type) {
        case 'use_tool':
        case 'multi_step': {
          const steps = action.type === 'use_tool' ? [action] : action.steps;
          const batch: ToolExecution[] = [];
          for (const step of steps) {
            batch.push(yield* this.dispatch(state, step));
          }
          state.phase.transition('reflecting', 'tool results available');
          yield this.createEvent('phase', ids, { phase: 'reflecting', content: 'Analyzing results...' });
          const outcome = yield* this.reflect(state, steps, batch);
          if (outcome === 'complete') {
            running = false;
          } else {
            state.phase.transition('executing', 'more steps needed');
          }
          break;
        }
        case 'think':
          yield this.createEvent('thinking', ids, { content: action.text });
          state.context.append(createMessageObject(sessionId, 'assistant', `Thinking: ${action.text}`, { runId }));
          break;
        case 'plan':
          if (action.steps.length > 0) {
            yield* this.adoptPlan(state, action.goal || state.goal, action.steps);
          }
          break;
        case 'respond':
          state.finalText = action.text.trim() ? action.text : null;
          running = false;
          break;
        default:
          assertNever(action);
      }
    }

    // --- Synthesizing ---
    state.phase.transition('synthesizing', state.finalText ? 'final answer available' : 'summarize observations');
    yield this.createEvent('phase', ids, { phase: 'synthesizing', content: 'Creating final response...' });
    const content = yield* this.synthesize(state);
    state.phase.transition('done', 'answer delivered');
    yield* this.finish(state, content);
  }

  /**
   * Planning phase. Returns the text of a direct answer, or null when execution
   * should follow (with a plan, a pending action, or an implicit single step).
   */
  private async *plan(state: LoopState): AsyncGenerator<AgentEvent, string | null, undefined> {
    const ids = { runId: state.runId, sessionId: state.sessionId };
    yield this.createEvent('phase', ids, { phase: 'planning', content: 'Analyzing request...' });
    yield this.createEvent('planning', ids, { content: 'Creating plan...' });

    const raw = await this.queryModel(state, buildPlanningPrompt());
    const action = this.parser.parse(raw, state.userMessage);

    switch (action.type) {
      case 'respond':
        if (action.text.trim()) {
          return action.text;
        }
        break;
      case 'plan':
        if (action.steps.length > 0) {
          yield* this.adoptPlan(state, action.goal || state.userMessage, action.steps);
        }
        break;
      case 'use_tool':
      case 'multi_step':
        state.pendingAction = action;
        break;
      case 'think':
        yield this.createEvent('thinking', ids, { content: action.text });
        state.context.append(
          createMessageObject(state.sessionId, 'assistant', `Thinking: ${action.text}`, { runId: state.runId })
        );
        break;
      default:
        assertNever(action);
    }
    return null;
  }

  private async *adoptPlan(state: LoopState, goal: string, steps: string[]): AsyncGenerator<AgentEvent, void, undefined> {
    state.plan = new Plan(goal, steps);
    state.goal = goal;
    yield this.createEvent('plan', { runId: state.runId, sessionId: state.sessionId }, { goal, steps: [...steps] });
    state.context.append(createMessageObject(state.sessionId, 'assistant', state.plan.describe(), { runId: state.runId }));
  }

  private async nextAction(state: LoopState): Promise<Action> {
    const raw = await this.queryModel(
      state,
      buildExecutionPrompt({
        iteration: state.iteration,
        maxIterations: this.config.maxIterations,
        currentStep: state.plan?.currentStepText(),
      })
    );
    // The user's words only stand in for a missing decision until a tool has run.
    const hint = state.executions.length === 0 ? state.userMessage : undefined;
    return this.parser.parse(raw, hint);
  }

  /**
   * Dispatches one tool call, persisting its record and adding the observation to context.
   */
  private async *dispatch(state: LoopState, step: UseToolAction): AsyncGenerator<AgentEvent, ToolExecution, undefined> {
    const ids = { runId: state.runId, sessionId: state.sessionId };
    yield this.createEvent('tool_start', ids, { tool: step.tool, params: step.params });

    const record = await this.dispatcher.execute(
      step.tool,
      step.params,
      this.config.toolTimeoutMs,
      state.signal,
      state.sessionId
    );
    state.executions.push(record);
    await this.persistence.saveToolExecution(state.sessionId, record);
    throwIfAborted(state.signal);

    yield this.createEvent('tool_result', ids, {
      tool: record.tool,
      result: truncateText(record.result, this.config.eventResultLimit),
      durationMs: record.durationMs,
      status: record.status,
    });
    const label = record.status === 'success' ? 'Result' : 'Error';
    state.context.append(
      createMessageObject(state.sessionId, 'tool', `[${label} ${record.tool}]:\n${record.result}`, {
        runId: state.runId,
        toolExecutionId: record.id,
      })
    );
    return record;
  }

  /**
   * Reflecting phase: asks whether the goal is satisfied after the last batch.
   */
  private async *reflect(
    state: LoopState,
    steps: UseToolAction[],
    batch: ToolExecution[]
  ): AsyncGenerator<AgentEvent, ReflectionOutcome, undefined> {
    const ids = { runId: state.runId, sessionId: state.sessionId };
    state.plan?.completeCurrent();

    let raw: string;
    try {
      raw = await this.queryModel(
        state,
        buildReflectionPrompt(
          {
            goal: state.goal,
            completedStep: steps.map((s) => `Used ${s.tool} with params ${JSON.stringify(s.params)}`).join('; '),
            result: batch.map((r) => `[${r.tool}] ${r.result}`).join('\n'),
            remainingSteps: state.plan?.remainingSteps() ?? [],
          },
          this.config.eventResultLimit
        )
      );
    } catch (error: unknown) {
      throwIfAborted(state.signal);
      console.warn(`[AgentLoop: ${state.runId}] Reflection failed: ${errorMessage(error)}`);
      return 'continue';
    }

    const parsed = this.parser.parseDetailed(raw);
    const action = parsed.action;
    if (parsed.source === 'fallback') {
      // Unstructured prose is a thought, not a decision.
      const content = raw.trim() || 'No reflection was produced.';
      yield this.createEvent('reflection', ids, { content, decision: 'continue' });
      state.context.append(createMessageObject(state.sessionId, 'assistant', `Reflection: ${content}`, { runId: state.runId }));
      return 'continue';
    }

    switch (action.type) {
      case 'respond':
        state.finalText = action.text.trim() ? action.text : null;
        yield this.createEvent('reflection', ids, { content: action.text.trim() || 'Goal satisfied.', decision: 'complete' });
        return 'complete';
      case 'use_tool':
      case 'multi_step':
        state.pendingAction = action;
        yield this.createEvent('reflection', ids, { content: `Next: ${this.describeToolAction(action)}`, decision: 'continue' });
        state.context.append(
          createMessageObject(state.sessionId, 'system', `[Reflection]: Next action determined - ${this.describeToolAction(action)}`, {
            runId: state.runId,
          })
        );
        return 'continue';
      case 'think':
        yield this.createEvent('reflection', ids, { content: action.text, decision: 'continue' });
        state.context.append(createMessageObject(state.sessionId, 'assistant', `Reflection: ${action.text}`, { runId: state.runId }));
        return 'continue';
      case 'plan':
        if (action.steps.length > 0) {
          yield* this.adoptPlan(state, action.goal || state.goal, action.steps);
        }
        yield this.createEvent('reflection', ids, { content: 'Plan revised.', decision: 'continue' });
        return 'continue';
      default:
        return assertNever(action);
    }
  }

  /**
   * Synthesizing phase: streams the final answer and returns its full text.
   */
  private async *synthesize(state: LoopState): AsyncGenerator<AgentEvent, string, undefined> {
    const ids = { runId: state.runId, sessionId: state.sessionId };
    if (state.finalText !== null) {
      const answer = this.clientText(state.finalText);
      for (const piece of chunkText(answer, this.config.responseChunkSize)) {
        yield this.createEvent('chunk', ids, { content: piece });
      }
      return answer;
    }

    let content = '';
    try {
      const messages = await this.promptMessages(state, buildSynthesisPrompt());
      for await (const raw of this.router.stream(messages, state.callOptions)) {
        const piece = this.clientText(raw);
        if (!piece) {
          continue;
        }
        content += piece;
        yield this.createEvent('chunk', ids, { content: piece });
      }
    } catch (error: unknown) {
      throwIfAborted(state.signal);
      if (content) {
        throw error;
      }
      console.warn(`[AgentLoop: ${state.runId}] Synthesis failed, using tool digest: ${errorMessage(error)}`);
    }

    if (!content.trim()) {
      content = this.clientText(this.digest(state.executions));
      for (const piece of chunkText(content, this.config.responseChunkSize)) {
        yield this.createEvent('chunk', ids, { content: piece });
      }
    }
    return content;
  }

  private async *finish(state: LoopState, content: string): AsyncGenerator<AgentEvent, void, undefined> {
    const toolExecutions = [...state.executions];
    const assistantRecord = createMessageObject(state.sessionId, 'assistant', content, {
      runId: state.runId,
      toolExecutions,
      ...(state.plan && { plan: state.plan.toJSON() }),
    });
    await this.persistence.saveMessage(state.sessionId, assistantRecord);
    state.context.append(assistantRecord);
    yield this.createEvent(
      'done',
      { runId: state.runId, sessionId: state.sessionId },
      { content, toolExecutions, iterations: state.iteration }
    );
  }

  /** Text on its way to the client. Parsing always sees the raw model output. */
  private clientText(text: string): string {
    return this.config.sanitizeOutput ? sanitizeModelOutput(text) : text;
  }

  /** Plain answer built from tool results when the model produced none. */
  private digest(executions: ToolExecution[]): string {
    if (executions.length === 0) {
      return 'No answer could be produced for this request.';
    }
    const lines = executions.map((te) => `[${te.tool}]: ${truncateText(te.result, 500)}`);
    return `Tools finished running.\n\n${lines.join('\n')}`;
  }

  private describeToolAction(action: UseToolAction | MultiStepAction): string {
    const steps = action.type === 'use_tool' ? [action] : action.steps;
    return `use ${steps.map((s) => s.tool).join(', ')}`;
  }

  private async queryModel(state: LoopState, instruction: LLMMessage): Promise<string> {
    const messages = await this.promptMessages(state, instruction);
    return this.router.query(messages, state.callOptions);
  }

  private async promptMessages(state: LoopState, instruction: LLMMessage): Promise<LLMMessage[]> {
    const window = await state.context.window(this.config.contextMaxMessages, this.config.contextMaxTokens, state.signal);
    return [state.systemPrompt, ...window.map(mapMessageToLLMMessage), instruction];
  }

  private async toolDefinitions(): Promise<IToolDefinition[]> {
    const tools = await this.toolProvider.getTools();
    return Promise.all(tools.map((tool) => tool.getDefinition()));
  }

  /**
   * Helper to create standardized AgentEvent objects.
   */
  private createEvent<T extends AgentEventType>(
    type: T,
    ids: { runId: string; sessionId: string },
    data: AgentEventData<T>
  ): Extract<AgentEvent, { type: T }> {
    return {
      type,
      timestamp: new Date(),
      runId: ids.runId,
      sessionId: ids.sessionId,
      data,
    } as unknown as Extract<AgentEvent, { type: T }>;
  }
}
