// src/sessions/types.ts

/**
 * @file Session, message and persistence contracts used by the agent loop.
 */

import { ToolExecution } from '../core/tool';
import { LLMMessageRole } from '../llm/types';
import { PlanSnapshot } from '../agents/plan';

/**
 * Metadata attached to a stored message.
 */
export interface IMessageMetadata {
  /** Tool executions that produced this (assistant) message. */
  toolExecutions?: ToolExecution[];
  /** The plan that was followed, as it stood when the answer was produced. */
  plan?: PlanSnapshot;
  runId?: string;
  /** Set on the synthesized summary that replaces older turns in a context window. */
  isSummary?: boolean;
  [key: string]: unknown;
}

/**
 * One turn of a conversation. Never mutated once appended.
 */
export interface IMessage {
  readonly id: string;
  readonly sessionId: string;
  readonly role: LLMMessageRole;
  readonly content: string;
  readonly createdAt: Date;
  readonly metadata: Readonly<IMessageMetadata>;
}

/**
 * A conversation. The agent loop borrows a session for the duration of one request.
 */
export interface ISession {
  id: string;
  title?: string;
  createdAt: Date;
  updatedAt: Date;
  metadata: Record<string, unknown>;
}

/**
 * What the agent loop needs from persistence.
 */
export interface IAgentPersistence {
  saveMessage(sessionId: string, message: IMessage): Promise<void>;
  saveToolExecution(sessionId: string, record: ToolExecution): Promise<void>;
  /** Messages in conversational (insertion) order. */
  loadHistory(sessionId: string): Promise<IMessage[]>;
  updateSessionTitle(sessionId: string, title: string): Promise<void>;
  getSession(sessionId: string): Promise<ISession | null>;
}

export interface ISessionListOptions {
  limit?: number;
  offset?: number;
}

/**
 * Full session storage: persistence for the loop plus session management.
 */
export interface ISessionStorage extends IAgentPersistence {
  createSession(sessionData?: Partial<Pick<ISession, 'title' | 'metadata'>> & { id?: string }): Promise<ISession>;
  /** Most recently updated first. */
  listSessions(options?: ISessionListOptions): Promise<ISession[]>;
  deleteSession(sessionId: string): Promise<void>;
  /** Tool executions in dispatch order. */
  getToolExecutions(sessionId: string): Promise<ToolExecution[]>;
}
