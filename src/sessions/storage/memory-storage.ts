/**
 * @file In-memory implementation of ISessionStorage.
 * Useful for testing, development, or simple applications without a persistent database.
 * NOT SUITABLE FOR PRODUCTION USE due to data loss on application restart.
 */

import { ToolExecution } from '../../core/tool';
import { StorageError, ValidationError } from '../../core/errors';
import { createSessionObject } from '../session';
import { IMessage, ISession, ISessionListOptions, ISessionStorage } from '../types';

/**
 * Stores sessions, messages and tool executions in memory. Data is lost when the application stops.
 */
export class MemoryStorage implements ISessionStorage {
  private sessions: Map<string, ISession> = new Map();
  private messages: Map<string, IMessage[]> = new Map(); // sessionId -> messages
  private toolExecutions: Map<string, ToolExecution[]> = new Map(); // sessionId -> executions

  constructor() {
    console.warn('[MemoryStorage] Initialized. Data will be lost on application restart. Not for production.');
  }

  // --- Sessions ---

  async createSession(sessionData?: Partial<Pick<ISession, 'title' | 'metadata'>> & { id?: string }): Promise<ISession> {
    if (sessionData?.id && this.sessions.has(sessionData.id)) {
      throw new StorageError(`Session with ID "${sessionData.id}" already exists.`);
    }
    const session = createSessionObject(sessionData?.title, sessionData?.metadata, sessionData?.id);
    this.sessions.set(session.id, session);
    this.messages.set(session.id, []);
    this.toolExecutions.set(session.id, []);
    return { ...session };
  }

  async getSession(sessionId: string): Promise<ISession | null> {
    const session = this.sessions.get(sessionId);
    return session ? { ...session } : null;
  }

  async updateSessionTitle(sessionId: string, title: string): Promise<void> {
    const session = this.requireSession(sessionId);
    session.title = title;
    session.updatedAt = new Date();
  }

  async listSessions(options?: ISessionListOptions): Promise<ISession[]> {
    const all = Array.from(this.sessions.values()).sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime());
    const offset = options?.offset || 0;
    const limit = options?.limit || all.length;
    return all.slice(offset, offset + limit).map((s) => ({ ...s }));
  }

  async deleteSession(sessionId: string): Promise<void> {
    if (!this.sessions.has(sessionId)) {
      console.warn(`[MemoryStorage] Attempted to delete non-existent session: ${sessionId}`);
      return;
    }
    this.sessions.delete(sessionId);
    this.messages.delete(sessionId);
    this.toolExecutions.delete(sessionId);
  }

  // --- Messages ---

  async saveMessage(sessionId: string, message: IMessage): Promise<void> {
    if (message.sessionId !== sessionId) {
      throw new ValidationError(`Message "${message.id}" belongs to session "${message.sessionId}", not "${sessionId}".`);
    }
    const session = this.requireSession(sessionId);
    this.messages.get(sessionId)?.push(message);
    session.updatedAt = new Date();
  }

  async loadHistory(sessionId: string): Promise<IMessage[]> {
    this.requireSession(sessionId);
    return [...(this.messages.get(sessionId) ?? [])];
  }

  // --- Tool executions ---

  async saveToolExecution(sessionId: string, record: ToolExecution): Promise<void> {
    this.requireSession(sessionId);
    this.toolExecutions.get(sessionId)?.push(record);
  }

  async getToolExecutions(sessionId: string): Promise<ToolExecution[]> {
    this.requireSession(sessionId);
    return [...(this.toolExecutions.get(sessionId) ?? [])];
  }

  private requireSession(sessionId: string): ISession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new StorageError(`Session with ID "${sessionId}" not found.`, { sessionId });
    }
    return session;
  }
}
