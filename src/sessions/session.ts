// src/sessions/session.ts

/**
 * @file Helpers for session objects.
 */

import { v4 as uuidv4 } from 'uuid';
import { ISession } from './types';

export const DEFAULT_SESSION_TITLE = 'New session';

/**
 * Creates a new session object with defaults.
 */
export function createSessionObject(title?: string, metadata?: ISession['metadata'], id?: string): ISession {
  const now = new Date();
  return {
    id: id || uuidv4(),
    title,
    createdAt: now,
    updatedAt: now,
    metadata: metadata || {},
  };
}

/**
 * Title derived from a user's first message: whitespace collapsed, cut to
 * `maxLength` characters.
 */
export function deriveSessionTitle(text: string, maxLength: number): string {
  const collapsed = text.replace(/\s+/g, ' ').trim();
  return collapsed.substring(0, maxLength).trim() || DEFAULT_SESSION_TITLE;
}
