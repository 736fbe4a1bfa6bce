// src/sessions/message.ts

/**
 * @file Helpers for creating messages and mapping them to model prompts.
 */

import { v4 as uuidv4 } from 'uuid';
import { LLMMessage, LLMMessageRole } from '../llm/types';
import { IMessage, IMessageMetadata } from './types';

/**
 * Creates a frozen message.
 *
 * @param sessionId The session this message belongs to.
 * @param metadata Optional metadata (tool executions, plan, run id).
 * @param id Optional pre-defined id.
 */
export function createMessageObject(
  sessionId: string,
  role: LLMMessageRole,
  content: string,
  metadata?: IMessageMetadata,
  id?: string
): IMessage {
  return Object.freeze({
    id: id || uuidv4(),
    sessionId,
    role,
    content,
    createdAt: new Date(),
    metadata: Object.freeze({ ...metadata }),
  });
}

/**
 * Maps a stored message to the shape sent to a model.
 */
export function mapMessageToLLMMessage(message: IMessage): LLMMessage {
  return { role: message.role, content: message.content };
}
