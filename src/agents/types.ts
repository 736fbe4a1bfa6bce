// src/agents/types.ts

/**
 * @file Core types for the agent loop: actions produced by the parser, loop
 * phases and the events streamed to the transport.
 */

import { ToolExecution, ToolExecutionStatus, ToolParams } from '../core/tool';

// --- Actions ---

export interface UseToolAction {
  type: 'use_tool';
  tool: string;
  params: ToolParams;
}

export interface MultiStepAction {
  type: 'multi_step';
  steps: UseToolAction[];
}

export interface ThinkAction {
  type: 'think';
  text: string;
}

export interface PlanAction {
  type: 'plan';
  goal: string;
  steps: string[];
}

export interface RespondAction {
  type: 'respond';
  /** Empty text means "done, synthesize from the observations". */
  text: string;
}

/**
 * The structured decision taken from one model response.
 */
export type Action = UseToolAction | MultiStepAction | ThinkAction | PlanAction | RespondAction;

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}

// --- Phases ---

export type AgentPhase = 'planning' | 'executing' | 'reflecting' | 'synthesizing' | 'done';

// --- Events ---

/**
 * Base interface for events emitted by the loop during a run.
 */
export interface IAgentEventBase {
  type: string;
  timestamp: Date;
  runId: string;
  sessionId: string;
}

export interface IAgentEventStatus extends IAgentEventBase {
  type: 'status';
  data: { content: string; model: string };
}

export interface IAgentEventPhase extends IAgentEventBase {
  type: 'phase';
  data: { phase: AgentPhase; content: string };
}

export interface IAgentEventPlanning extends IAgentEventBase {
  type: 'planning';
  data: { content: string };
}

export interface IAgentEventPlan extends IAgentEventBase {
  type: 'plan';
  data: { goal: string; steps: string[] };
}

export interface IAgentEventThinking extends IAgentEventBase {
  type: 'thinking';
  data: { content: string };
}

export interface IAgentEventReflection extends IAgentEventBase {
  type: 'reflection';
  data: { content: string; decision: 'continue' | 'complete' };
}

export interface IAgentEventToolStart extends IAgentEventBase {
  type: 'tool_start';
  data: { tool: string; params: ToolParams };
}

export interface IAgentEventToolResult extends IAgentEventBase {
  type: 'tool_result';
  data: { tool: string; result: string; durationMs: number; status: ToolExecutionStatus };
}

export interface IAgentEventChunk extends IAgentEventBase {
  type: 'chunk';
  data: { content: string };
}

export interface IAgentEventDone extends IAgentEventBase {
  type: 'done';
  data: { content: string; toolExecutions: ToolExecution[]; iterations: number };
}

export interface IAgentEventError extends IAgentEventBase {
  type: 'error';
  data: { content: string; errorType: string };
}

export type AgentEvent =
  | IAgentEventStatus
  | IAgentEventPhase
  | IAgentEventPlanning
  | IAgentEventPlan
  | IAgentEventThinking
  | IAgentEventReflection
  | IAgentEventToolStart
  | IAgentEventToolResult
  | IAgentEventChunk
  | IAgentEventDone
  | IAgentEventError;

export type AgentEventType = AgentEvent['type'];

/** Payload type for a given event type. */
export type AgentEventData<T extends AgentEventType> = Extract<AgentEvent, { type: T }>['data'];

/**
 * Renders an event as one server-push frame (`data: <json>\n\n`).
 */
export function formatServerSentEvent(event: AgentEvent): string {
  return `data: ${JSON.stringify({ type: event.type, runId: event.runId, sessionId: event.sessionId, ...event.data })}\n\n`;
}
