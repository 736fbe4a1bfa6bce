// src/agents/response-parser.ts

/**
 * @file ResponseParser - turns raw model output (JSON, fenced JSON, JSON embedded in
 * prose, or plain prose) into a structured Action. `parse` never throws: every
 * decode failure is recovered locally and the worst case is a `respond` action
 * carrying the raw text.
 *
 * Candidate order:
 *  1. the whole trimmed payload
 *  2. fenced code blocks, in order
 *  3. balanced `{...}` substrings, in order of their opening brace (string aware,
 *     trailing commas tolerated)
 * The first candidate that decodes to an object with a recognizable action key
 * wins. Without one, intent detection runs on the user's input (never on the
 * model's text).
 */

import { ParseFailure } from '../core/errors';
import { ToolParams } from '../core/tool';
import { errorMessage, isRecord } from '../core/utils';
import { IntentDetector } from './intent-detector';
import { Action, UseToolAction } from './types';

export type ParseSource = 'json' | 'fenced' | 'embedded' | 'intent' | 'fallback';

export interface ParseResult {
  action: Action;
  source: ParseSource;
  /** Candidates that were tried and rejected before the result was found. */
  failures: ParseFailure[];
  /** Id of the intent rule that produced the action, for `intent` results. */
  intentRuleId?: string;
}

interface Candidate {
  text: string;
  source: 'json' | 'fenced' | 'embedded';
}

const FENCED_BLOCK = /```[ \t]*([A-Za-z0-9_-]*)[ \t]*\r?\n?([\s\S]*?)```/g;
const TRAILING_COMMA = /,(\s*[}\]])/g;

const TEXT_KEYS = ['message', 'response', 'text', 'content', 'answer'] as const;
const THOUGHT_KEYS = ['thought', 'text', 'content', 'reasoning'] as const;
const STEP_TEXT_KEYS = ['description', 'text', 'step', 'title'] as const;

function firstString(record: Record<string, unknown>, keys: ReadonlyArray<string>): string | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'string') {
      return value;
    }
  }
  return undefined;
}

function toParams(value: unknown): ToolParams | null {
  if (value === undefined || value === null) {
    return {};
  }
  return isRecord(value) ? { ...value } : null;
}

function toUseTool(record: Record<string, unknown>): UseToolAction | null {
  const tool = typeof record.tool === 'string' ? record.tool.trim() : typeof record.name === 'string' ? record.name.trim() : '';
  if (!tool) {
    return null;
  }
  const params = toParams(record.params ?? record.parameters ?? record.arguments);
  return params ? { type: 'use_tool', tool, params } : null;
}

function toToolSteps(value: unknown): UseToolAction[] | null {
  if (!Array.isArray(value) || value.length === 0) {
    return null;
  }
  const steps: UseToolAction[] = [];
  for (const item of value) {
    const step = isRecord(item) ? toUseTool(item) : null;
    if (!step) {
      return null;
    }
    steps.push(step);
  }
  return steps;
}

function toStepTexts(value: unknown): string[] | null {
  if (!Array.isArray(value)) {
    return null;
  }
  const texts: string[] = [];
  for (const item of value) {
    const text = typeof item === 'string' ? item : isRecord(item) ? firstString(item, STEP_TEXT_KEYS) : undefined;
    if (text === undefined) {
      return null;
    }
    if (text.trim()) {
      texts.push(text.trim());
    }
  }
  return texts;
}

/**
 * Maps a decoded object to an Action, or null when it carries no recognizable
 * action key.
 */
export function actionFromObject(record: Record<string, unknown>): Action | null {
  if (typeof record.action === 'string') {
    switch (record.action.trim().toLowerCase()) {
      case 'use_tool':
      case 'tool':
      case 'tool_call':
        return toUseTool(record);
      case 'multi_step': {
        const steps = toToolSteps(record.steps);
        return steps ? { type: 'multi_step', steps } : null;
      }
      case 'respond':
      case 'final':
      case 'answer':
      case 'done':
      case 'complete':
        return { type: 'respond', text: firstString(record, TEXT_KEYS) ?? '' };
      case 'think':
        return { type: 'think', text: firstString(record, THOUGHT_KEYS) ?? '' };
      case 'plan': {
        const steps = toStepTexts(record.steps);
        return steps ? { type: 'plan', goal: typeof record.goal === 'string' ? record.goal : '', steps } : null;
      }
      default:
        return null;
    }
  }

  if (typeof record.tool === 'string') {
    return toUseTool(record);
  }
  if (Array.isArray(record.steps)) {
    if (typeof record.goal === 'string') {
      const texts = toStepTexts(record.steps);
      if (texts) {
        return { type: 'plan', goal: record.goal, steps: texts };
      }
    }
    const steps = toToolSteps(record.steps);
    return steps ? { type: 'multi_step', steps } : null;
  }
  if (typeof record.thought === 'string') {
    return { type: 'think', text: record.thought };
  }
  if (typeof record.message === 'string') {
    return { type: 'respond', text: record.message };
  }
  return null;
}

interface BraceSpan {
  start: number;
  end: number;
  text: string;
}

/**
 * Index of the `}` closing the block that opens at `start`, or -1 when it never
 * closes. Braces inside string literals are ignored.
 */
function matchBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}

/**
 * Balanced blocks in order of their opening brace. Every `{` starts its own scan,
 * so an unclosed brace or a stray quote in earlier prose does not hide later blocks.
 */
function* braceSpans(text: string): Generator<BraceSpan, void, undefined> {
  for (let start = text.indexOf('{'); start !== -1; start = text.indexOf('{', start + 1)) {
    const end = matchBrace(text, start);
    if (end !== -1) {
      yield { start, end, text: text.substring(start, end + 1) };
    }
  }
}

/**
 * Balanced `{...}` substrings, nested ones included, in order of their opening brace.
 */
export function extractBraceBlocks(text: string): string[] {
  return Array.from(braceSpans(text), (span) => span.text);
}

/** Contents of fenced code blocks, in order of appearance. */
export function extractFencedBlocks(text: string): string[] {
  const blocks: string[] = [];
  for (const match of text.matchAll(FENCED_BLOCK)) {
    const body = match[2].trim();
    if (body) {
      blocks.push(body);
    }
  }
  return blocks;
}

function decodeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (strictError: unknown) {
    const relaxed = text.replace(TRAILING_COMMA, '$1');
    if (relaxed === text) {
      throw strictError;
    }
    return JSON.parse(relaxed);
  }
}

export class ResponseParser {
  private readonly intentDetector: IntentDetector;

  constructor(intentDetector: IntentDetector = new IntentDetector()) {
    this.intentDetector = intentDetector;
  }

  /**
   * Parses model output into an Action. Never throws.
   * @param rawText The model's response text.
   * @param userInputHint The user's message, used for intent detection only.
   */
  parse(rawText: string, userInputHint?: string): Action {
    return this.parseDetailed(rawText, userInputHint).action;
  }

  /**
   * Same as `parse`, also reporting where the action came from and which
   * candidates were rejected on the way.
   */
  parseDetailed(rawText: string, userInputHint?: string): ParseResult {
    const text = typeof rawText === 'string' ? rawText.trim() : '';
    const failures: ParseFailure[] = [];

    if (text) {
      const whole = this.decodeCandidate({ text, source: 'json' }, failures);
      if (whole.action) {
        return { action: whole.action, source: 'json', failures };
      }

      for (const block of extractFencedBlocks(text)) {
        const fenced = this.decodeCandidate({ text: block, source: 'fenced' }, failures);
        if (fenced.action) {
          return { action: fenced.action, source: 'fenced', failures };
        }
      }

      // Blocks nested inside an object that decoded without an action are its fields, not candidates.
      let coveredUntil = whole.isObject ? text.length : -1;
      for (const span of braceSpans(text)) {
        if (span.start < coveredUntil || span.text === text) {
          continue;
        }
        const embedded = this.decodeCandidate({ text: span.text, source: 'embedded' }, failures);
        if (embedded.action) {
          return { action: embedded.action, source: 'embedded', failures };
        }
        if (embedded.isObject) {
          coveredUntil = span.end;
        }
      }
    }

    if (userInputHint && !this.intentDetector.isQuestion(userInputHint)) {
      try {
        const intent = this.intentDetector.detect(userInputHint);
        if (intent) {
          return { action: intent.action, source: 'intent', failures, intentRuleId: intent.ruleId };
        }
      } catch (error: unknown) {
        console.warn(`[ResponseParser] Intent detection failed: ${errorMessage(error)}`);
      }
    }

    return { action: { type: 'respond', text }, source: 'fallback', failures };
  }

  private decodeCandidate(candidate: Candidate, failures: ParseFailure[]): { action: Action | null; isObject: boolean } {
    let decoded: unknown;
    try {
      decoded = decodeJson(candidate.text);
    } catch (error: unknown) {
      // Whole-payload prose is the common case; only structured-looking candidates are worth reporting.
      if (candidate.source !== 'json' || candidate.text.startsWith('{')) {
        this.recordFailure(failures, `Invalid JSON (${errorMessage(error)})`, candidate);
      }
      return { action: null, isObject: false };
    }

    if (!isRecord(decoded)) {
      this.recordFailure(failures, 'Decoded value is not an object', candidate);
      return { action: null, isObject: false };
    }
    const action = actionFromObject(decoded);
    if (!action) {
      this.recordFailure(failures, 'Object has no recognizable action', candidate);
    }
    return { action, isObject: true };
  }

  private recordFailure(failures: ParseFailure[], message: string, candidate: Candidate): void {
    const failure = new ParseFailure(message, candidate.text, { source: candidate.source });
    failures.push(failure);
    console.debug(`[ResponseParser] Rejected ${candidate.source} candidate: ${message}`);
  }
}
