/**
 * @file Entry point for the taskloop agent core.
 * Exports the loop, its collaborators and the interfaces applications implement
 * (tools, model providers, persistence).
 */

// --- Core Abstractions ---
export type {
  ITool,
  IToolDefinition,
  IToolParameter,
  IToolProvider,
  ToolExecution,
  ToolExecutionContext,
  ToolExecutionStatus,
  ToolParams,
} from './core/tool';
export { truncateText, estimateTokens, chunkText } from './core/utils';
export {
  ApplicationError,
  ToolNotFoundError,
  ConfigurationError,
  InvalidStateError,
  SessionBusyError,
  StorageError,
  ValidationError,
  ParseFailure,
  ProviderError,
  ToolError,
  TimeoutError,
  CancellationError,
} from './core/errors';

// --- Model Routing ---
export type {
  LLMMessage,
  LLMMessageRole,
  ModelCategory,
  ModelDescriptor,
  ModelRequest,
  IModelProvider,
  ModelCallOptions,
  RouterStats,
} from './llm/types';
export { ModelRegistry, parseModelCatalog } from './llm/model-registry';
export type { ModelCatalog } from './llm/model-registry';
export { ModelState, getModelState, initModelState } from './llm/model-state';
export type { ModelStateSnapshot } from './llm/model-state';
export {
  DEFAULT_RETRY_POLICY,
  BackoffSchedule,
  computeBackoffDelay,
  equalJitter,
  noJitter,
  parseRetryAfter,
} from './llm/retry-policy';
export type { RetryPolicy, JitterFunction } from './llm/retry-policy';
export { decodeEventStream, decodeFramePayload, parseStreamLine, STREAM_DONE_MARKER } from './llm/stream-decoder';
export { sanitizeModelOutput, FILTERED_PLACEHOLDER } from './llm/sanitize';
export { ModelRouter } from './llm/model-router';
export type { ModelRouterOptions } from './llm/model-router';
export { OpenAIAdapter } from './llm/adapters/openai/openai-adapter';
export type { OpenAIAdapterOptions, CreateCompletionStream } from './llm/adapters/openai/openai-adapter';
export { GatewayAdapter, renderPrompt } from './llm/adapters/gateway/gateway-adapter';
export type { GatewayAdapterOptions, GatewayFetch, GatewayResponse } from './llm/adapters/gateway/gateway-adapter';

// --- Sessions and Persistence ---
export type {
  IMessage,
  IMessageMetadata,
  ISession,
  IAgentPersistence,
  ISessionStorage,
  ISessionListOptions,
} from './sessions/types';
export { createMessageObject, mapMessageToLLMMessage } from './sessions/message';
export { createSessionObject, deriveSessionTitle, DEFAULT_SESSION_TITLE } from './sessions/session';
export { MemoryStorage } from './sessions/storage/memory-storage';

// --- Tools ---
export { ToolRegistry } from './tools/tool-registry';
export { FunctionTool } from './tools/function-tool';
export type { ToolHandler } from './tools/function-tool';

// --- Agent Loop ---
export type {
  Action,
  UseToolAction,
  MultiStepAction,
  ThinkAction,
  PlanAction,
  RespondAction,
  AgentPhase,
  AgentEvent,
  AgentEventType,
  AgentEventData,
  IAgentEventStatus,
  IAgentEventPhase,
  IAgentEventPlanning,
  IAgentEventPlan,
  IAgentEventThinking,
  IAgentEventReflection,
  IAgentEventToolStart,
  IAgentEventToolResult,
  IAgentEventChunk,
  IAgentEventDone,
  IAgentEventError,
} from './agents/types';
export { formatServerSentEvent } from './agents/types';
export {
  DEFAULT_AGENT_LOOP_CONFIG,
  resolveAgentLoopConfig,
  agentLoopConfigFromEnv,
} from './agents/config';
export type { AgentLoopConfig, BusySessionPolicy } from './agents/config';
export { PhaseMachine } from './agents/phase-machine';
export { Plan } from './agents/plan';
export type { PlanStep, PlanStepStatus, PlanSnapshot } from './agents/plan';
export { ResponseParser, actionFromObject, extractBraceBlocks, extractFencedBlocks } from './agents/response-parser';
export type { ParseResult, ParseSource } from './agents/response-parser';
export { IntentDetector, parseIntentRuleSet } from './agents/intent-detector';
export type { DetectedIntent, IntentRule, IntentRuleSet } from './agents/intent-detector';
export { ContextStore, SUMMARY_HEADER, SUMMARY_FOOTER } from './agents/context-store';
export type { ContextStoreConfig } from './agents/context-store';
export { ExtractiveSummarizer, ModelSummarizer } from './agents/summarizer';
export type { IContextSummarizer, ModelSummarizerOptions } from './agents/summarizer';
export { ToolDispatcher, buildParametersSchema } from './agents/tool-dispatcher';
export type { ToolDispatcherOptions } from './agents/tool-dispatcher';
export { SessionLock } from './agents/session-lock';
export type { SessionRelease } from './agents/session-lock';
export {
  buildSystemPrompt,
  buildPlanningPrompt,
  buildExecutionPrompt,
  buildReflectionPrompt,
  buildSynthesisPrompt,
  formatToolsForPrompt,
} from './agents/prompt-builder';
export { AgentLoop } from './agents/agent-loop';
export type { AgentLoopDependencies, AgentRunOptions } from './agents/agent-loop';

// --- Facade ---
export { TaskLoop } from './facades/taskloop';
export type { TaskLoopInitializationOptions } from './facades/taskloop';
