// src/agents/plan.ts

/**
 * @file Execution plan created during Planning. Step statuses only move forward:
 * pending -> running -> completed.
 */

import { InvalidStateError } from '../core/errors';

export type PlanStepStatus = 'pending' | 'running' | 'completed';

export interface PlanStep {
  readonly text: string;
  status: PlanStepStatus;
}

export interface PlanSnapshot {
  goal: string;
  steps: Array<{ text: string; status: PlanStepStatus }>;
}

const NEXT_STATUS: Record<PlanStepStatus, PlanStepStatus | null> = {
  pending: 'running',
  running: 'completed',
  completed: null,
};

export class Plan {
  private readonly steps: PlanStep[];

  constructor(
    public readonly goal: string,
    stepTexts: string[]
  ) {
    this.steps = stepTexts.map((text) => ({ text, status: 'pending' }));
  }

  get length(): number {
    return this.steps.length;
  }

  /** Index of the first step that is not completed, or -1 when all are. */
  get currentIndex(): number {
    return this.steps.findIndex((s) => s.status !== 'completed');
  }

  get isComplete(): boolean {
    return this.currentIndex === -1;
  }

  /** Marks the current step as running. No-op if it already runs or the plan is complete. */
  startCurrent(): void {
    const index = this.currentIndex;
    if (index !== -1 && this.steps[index].status === 'pending') {
      this.advance(index, 'running');
    }
  }

  /** Completes the current running step. No-op when no step is running. */
  completeCurrent(): void {
    const index = this.currentIndex;
    if (index !== -1 && this.steps[index].status === 'running') {
      this.advance(index, 'completed');
    }
  }

  /**
   * Moves step `index` to `status`.
   * @throws InvalidStateError for backward or skipped moves.
   */
  advance(index: number, status: PlanStepStatus): void {
    const step = this.steps[index];
    if (!step) {
      throw new InvalidStateError(`Plan has no step #${index}.`, { index, length: this.steps.length });
    }
    if (NEXT_STATUS[step.status] !== status) {
      throw new InvalidStateError(`Plan step #${index} cannot move from ${step.status} to ${status}.`, {
        index,
        from: step.status,
        to: status,
      });
    }
    step.status = status;
  }

  /** Texts of the steps that have not completed yet. */
  remainingSteps(): string[] {
    return this.steps.filter((s) => s.status !== 'completed').map((s) => s.text);
  }

  currentStepText(): string | undefined {
    const index = this.currentIndex;
    return index === -1 ? undefined : this.steps[index].text;
  }

  toJSON(): PlanSnapshot {
    return { goal: this.goal, steps: this.steps.map((s) => ({ text: s.text, status: s.status })) };
  }

  /** Human readable listing, one numbered step per line. */
  describe(): string {
    return [`Plan: ${this.goal}`, ...this.steps.map((s, i) => `  ${i + 1}. ${s.text}`)].join('\n');
  }
}
