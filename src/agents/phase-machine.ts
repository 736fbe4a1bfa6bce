// src/agents/phase-machine.ts

/**
 * @file Phase state machine of the agent loop.
 *
 * ```
 *   planning ──► executing ──► reflecting ──► synthesizing ──► done
 *      │  │          ▲  │          │               ▲
 *      │  │          └──┼──────────┘               │
 *      │  └─────────────┼──────────────────────────┤
 *      └────────────────┴──► done                  │
 *                       └──────────────────────────┘
 * ```
 */

import { InvalidStateError } from '../core/errors';
import { AgentPhase } from './types';

/**
 * Valid transitions from each phase.
 */
const VALID_TRANSITIONS: ReadonlyMap<AgentPhase, ReadonlyArray<AgentPhase>> = new Map<AgentPhase, AgentPhase[]>([
  ['planning', ['executing', 'synthesizing', 'done']],
  ['executing', ['reflecting', 'synthesizing']],
  ['reflecting', ['executing', 'synthesizing']],
  ['synthesizing', ['done']],
  ['done', []],
]);

export interface PhaseHistoryEntry {
  readonly phase: AgentPhase;
  readonly enteredAt: Date;
  readonly reason: string;
}

export class PhaseMachine {
  private phase: AgentPhase = 'planning';
  private readonly history: PhaseHistoryEntry[] = [];

  constructor() {
    this.history.push({ phase: this.phase, enteredAt: new Date(), reason: 'request received' });
  }

  get current(): AgentPhase {
    return this.phase;
  }

  get isTerminal(): boolean {
    return this.phase === 'done';
  }

  canTransition(to: AgentPhase): boolean {
    return (VALID_TRANSITIONS.get(this.phase) ?? []).includes(to);
  }

  /**
   * Moves to `to`.
   * @throws InvalidStateError when the table has no such edge.
   */
  transition(to: AgentPhase, reason = ''): void {
    if (!this.canTransition(to)) {
      throw new InvalidStateError(`Invalid phase transition: ${this.phase} -> ${to}`, { from: this.phase, to });
    }
    this.phase = to;
    this.history.push({ phase: to, enteredAt: new Date(), reason });
  }

  getHistory(): ReadonlyArray<PhaseHistoryEntry> {
    return [...this.history];
  }
}
