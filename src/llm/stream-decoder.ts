// src/llm/stream-decoder.ts

/**
 * @file Decodes server-push (`data:` line) streams from a model gateway into plain
 * text chunks.
 *
 * Two framings of the same event are accepted:
 *  - a raw structured payload, e.g. `data: {"content":"Hel"}`
 *  - a quoted string payload, e.g. `data: "{\"content\":\"Hel\"}"` or `data: "Hel"`,
 *    which needs one more decode step before it yields text.
 */

import { TextDecoder } from 'util';
import { isRecord } from '../core/utils';

export const STREAM_DONE_MARKER = '[DONE]';

export type StreamLine = { kind: 'data'; payload: string } | { kind: 'done' };

const TEXT_KEYS = ['content', 'text', 'message'] as const;

function textFromObject(value: Record<string, unknown>): string {
  for (const key of TEXT_KEYS) {
    const candidate = value[key];
    if (typeof candidate === 'string' && candidate.length > 0) {
      return candidate;
    }
  }
  return JSON.stringify(value);
}

function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function looksStructured(text: string): boolean {
  const trimmed = text.trim();
  return trimmed.startsWith('{') || trimmed.startsWith('"');
}

/**
 * Normalizes one frame payload to plain text. Payloads that are not JSON are
 * passed through as-is.
 */
export function decodeFramePayload(payload: string): string {
  const first = tryParseJson(payload);
  if (!first.ok) {
    return payload;
  }

  let value = first.value;
  if (typeof value === 'string' && looksStructured(value)) {
    const second = tryParseJson(value);
    if (second.ok) {
      value = second.value;
    }
  }

  if (typeof value === 'string') {
    return value;
  }
  if (isRecord(value)) {
    return textFromObject(value);
  }
  if (value === null || value === undefined) {
    return '';
  }
  return typeof value === 'object' ? JSON.stringify(value) : String(value);
}

/**
 * Classifies one line of the stream. Blank lines, comments and non-data fields
 * return null.
 */
export function parseStreamLine(line: string): StreamLine | null {
  const trimmed = line.replace(/\r$/, '');
  if (!trimmed.startsWith('data:')) {
    return null;
  }
  const payload = trimmed.slice(5).replace(/^ /, '');
  if (payload.trim() === STREAM_DONE_MARKER) {
    return { kind: 'done' };
  }
  return { kind: 'data', payload };
}

/**
 * Turns a byte (or string) stream into decoded text chunks. Stops at the
 * `[DONE]` marker; empty chunks are skipped.
 */
export async function* decodeEventStream(
  source: AsyncIterable<Uint8Array | string>
): AsyncGenerator<string, void, undefined> {
  const decoder = new TextDecoder('utf-8');
  let buffer = '';

  for await (const piece of source) {
    buffer += typeof piece === 'string' ? piece : decoder.decode(piece, { stream: true });
    let newlineIndex = buffer.indexOf('\n');
    while (newlineIndex !== -1) {
      const line = buffer.slice(0, newlineIndex);
      buffer = buffer.slice(newlineIndex + 1);
      const parsed = parseStreamLine(line);
      if (parsed?.kind === 'done') {
        return;
      }
      if (parsed) {
        const text = decodeFramePayload(parsed.payload);
        if (text.length > 0) {
          yield text;
        }
      }
      newlineIndex = buffer.indexOf('\n');
    }
  }

  buffer += decoder.decode();
  const tail = parseStreamLine(buffer);
  if (tail?.kind === 'data') {
    const text = decodeFramePayload(tail.payload);
    if (text.length > 0) {
      yield text;
    }
  }
}
