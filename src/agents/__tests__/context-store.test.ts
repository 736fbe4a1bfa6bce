import { ValidationError } from '../../core/errors';
import { createMessageObject } from '../../sessions/message';
import { IMessage } from '../../sessions/types';
import { ContextStore, SUMMARY_FOOTER, SUMMARY_HEADER } from '../context-store';
import { IContextSummarizer } from '../summarizer';

const SESSION = 'session-1';

function turns(...contents: string[]): IMessage[] {
  return contents.map((content, i) => createMessageObject(SESSION, i % 2 === 0 ? 'user' : 'assistant', content));
}

describe('ContextStore', () => {
  it('should keep the full history in order', () => {
    const store = new ContextStore(SESSION, { summarizationThreshold: 15 }, turns('m1', 'm2'));
    store.append(createMessageObject(SESSION, 'user', 'm3'));
    expect(store.size).toBe(3);
    expect(store.history().map((m) => m.content)).toEqual(['m1', 'm2', 'm3']);
  });

  it('should refuse messages from another session', () => {
    const store = new ContextStore(SESSION, { summarizationThreshold: 15 });
    expect(() => store.append(createMessageObject('other', 'user', 'x'))).toThrow(ValidationError);
  });

  it('should return the most recent turns below the summarization threshold', async () => {
    const store = new ContextStore(SESSION, { summarizationThreshold: 15 }, turns('m1', 'm2', 'm3'));
    const window = await store.window(2, 10_000);
    expect(window.map((m) => m.content)).toEqual(['m2', 'm3']);
  });

  it('should replace older turns with one summary above the threshold', async () => {
    const store = new ContextStore(SESSION, { summarizationThreshold: 3 }, turns('m1', 'm2', 'm3', 'm4', 'm5'));
    const window = await store.window(2, 10_000);

    expect(window).toHaveLength(3);
    expect(window[0].role).toBe('system');
    expect(window[0].metadata.isSummary).toBe(true);
    expect(window[0].content).toBe(`${SUMMARY_HEADER}\n[user]: m1\n[assistant]: m2\n[user]: m3\n${SUMMARY_FOOTER}`);
    expect(window.slice(1).map((m) => m.content)).toEqual(['m4', 'm5']);
  });

  it('should reuse the summary while the covered turns are unchanged', async () => {
    const summarize = jest.fn().mockResolvedValue('They talked.');
    const summarizer: IContextSummarizer = { summarize };
    const store = new ContextStore(SESSION, { summarizationThreshold: 3, summarizer }, turns('m1', 'm2', 'm3', 'm4', 'm5'));

    const first = await store.window(2, 10_000);
    const second = await store.window(2, 10_000);

    expect(summarize).toHaveBeenCalledTimes(1);
    expect(second[0]).toBe(first[0]);
    expect(first[0].content).toBe(`${SUMMARY_HEADER}\nThey talked.\n${SUMMARY_FOOTER}`);
  });

  it('should fall back to the extractive digest when the summarizer fails', async () => {
    const summarizer: IContextSummarizer = { summarize: jest.fn().mockRejectedValue(new Error('model down')) };
    const store = new ContextStore(SESSION, { summarizationThreshold: 2, summarizer }, turns('m1', 'm2', 'm3'));

    const window = await store.window(1, 10_000);
    expect(window[0].content).toBe(`${SUMMARY_HEADER}\n[user]: m1\n[assistant]: m2\n${SUMMARY_FOOTER}`);
  });

  it('should drop the oldest turns until the token budget fits', async () => {
    const long = 'x'.repeat(40);
    const store = new ContextStore(SESSION, { summarizationThreshold: 100 }, turns(`a${long}`, `b${long}`, `c${long}`, `d${long}`));

    // 41 characters estimate to 11 tokens each.
    const window = await store.window(10, 25);
    expect(window.map((m) => m.content[0])).toEqual(['c', 'd']);
  });

  it('should always keep the latest turn', async () => {
    const store = new ContextStore(SESSION, { summarizationThreshold: 100 }, turns('x'.repeat(400)));
    const window = await store.window(10, 1);
    expect(window).toHaveLength(1);
  });
});
