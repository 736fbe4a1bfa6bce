// src/agents/session-lock.ts

/**
 * @file Per-session mutual exclusion: at most one agent loop runs per session.
 */

import { SessionBusyError } from '../core/errors';
import { abortReason } from '../core/utils';
import { BusySessionPolicy } from './config';

/** Releases a held session. Calling it more than once is a no-op. */
export type SessionRelease = () => void;

interface Waiter {
  grant: () => void;
}

interface LockEntry {
  waiters: Waiter[];
}

export class SessionLock {
  private readonly held = new Map<string, LockEntry>();

  isLocked(sessionId: string): boolean {
    return this.held.has(sessionId);
  }

  /** Number of requests waiting for the session. */
  queueLength(sessionId: string): number {
    return this.held.get(sessionId)?.waiters.length ?? 0;
  }

  /**
   * Acquires the session.
   * With 'reject', a busy session fails immediately with SessionBusyError.
   * With 'queue', the call waits (first come, first served) until the holder
   * releases, or rejects with the signal's reason when `signal` aborts first.
   */
  async acquire(sessionId: string, policy: BusySessionPolicy = 'reject', signal?: AbortSignal): Promise<SessionRelease> {
    if (signal?.aborted) {
      throw abortReason(signal);
    }
    const entry = this.held.get(sessionId);
    if (!entry) {
      this.held.set(sessionId, { waiters: [] });
      return this.releaser(sessionId);
    }
    if (policy === 'reject') {
      throw new SessionBusyError(sessionId);
    }

    console.debug(`[SessionLock] Session ${sessionId} is busy; queueing request.`);
    return new Promise<SessionRelease>((resolve, reject) => {
      const waiter: Waiter = {
        grant: () => {
          signal?.removeEventListener('abort', onAbort);
          resolve(this.releaser(sessionId));
        },
      };
      const onAbort = (): void => {
        const index = entry.waiters.indexOf(waiter);
        if (index !== -1) {
          entry.waiters.splice(index, 1);
        }
        reject(abortReason(signal));
      };
      entry.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private releaser(sessionId: string): SessionRelease {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      const entry = this.held.get(sessionId);
      const next = entry?.waiters.shift();
      if (next) {
        next.grant();
      } else {
        this.held.delete(sessionId);
      }
    };
  }
}
