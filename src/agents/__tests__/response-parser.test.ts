import { ResponseParser, actionFromObject, extractBraceBlocks, extractFencedBlocks } from '../response-parser';
import { Action } from '../types';

// Small seeded generator so the generated cases are the same on every run.
function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

// No commas: the trailing-comma repair must not meet one inside a string value.
const ALPHABET = 'abcdefghijklmnopqrstuvwxyz0123456789 -_./:{}"\\';

interface GeneratedCase {
  label: string;
  text: string;
  expected: Action;
}

function buildGeneratedCases(count: number): GeneratedCase[] {
  const random = seededRandom(20240501);
  const pick = <T>(items: ArrayLike<T>): T => items[Math.floor(random() * items.length)];
  const word = (min: number, max: number): string => {
    const length = min + Math.floor(random() * (max - min + 1));
    let out = '';
    for (let i = 0; i < length; i++) {
      out += pick('abcdefghijklmnopqrstuvwxyz');
    }
    return out;
  };
  const phrase = (): string => {
    let out = pick('abcdefghijklmnopqrstuvwxyz');
    const length = Math.floor(random() * 12);
    for (let i = 0; i < length; i++) {
      out += pick(ALPHABET);
    }
    return out + pick('abcdefghijklmnopqrstuvwxyz');
  };
  const params = (): Record<string, unknown> => {
    const result: Record<string, unknown> = {};
    const size = Math.floor(random() * 3);
    for (let i = 0; i < size; i++) {
      result[word(3, 8)] = pick(['text', 'number', 'flag']) === 'text' ? phrase() : random() < 0.5 ? Math.floor(random() * 1000) : random() < 0.5;
    }
    return result;
  };

  const generators: Array<() => { object: Record<string, unknown>; expected: Action }> = [
    () => {
      const tool = `${word(3, 6)}_tool`;
      const p = params();
      return { object: { action: 'use_tool', tool, params: p }, expected: { type: 'use_tool', tool, params: p } };
    },
    () => {
      const steps = [0, 1].map(() => ({ tool: `${word(3, 6)}_tool`, params: params() }));
      return {
        object: { action: 'multi_step', steps },
        expected: { type: 'multi_step', steps: steps.map((s) => ({ type: 'use_tool', tool: s.tool, params: s.params })) },
      };
    },
    () => {
      const message = phrase();
      return { object: { action: 'respond', message }, expected: { type: 'respond', text: message } };
    },
    () => {
      const thought = phrase();
      return { object: { action: 'think', thought }, expected: { type: 'think', text: thought } };
    },
    () => {
      const goal = phrase();
      const steps = [phrase(), phrase()];
      return { object: { action: 'plan', goal, steps }, expected: { type: 'plan', goal, steps } };
    },
  ];

  const framings: Array<[string, (json: string) => string]> = [
    ['bare', (json) => json],
    ['fenced', (json) => `Here is my decision:\n\`\`\`json\n${json}\n\`\`\``],
    ['prose', (json) => `Sure. ${json} Let me know.`],
    ['trailing comma', (json) => `Decision: ${json.slice(0, -1)},}`],
    ['unclosed brace', (json) => `Use the {placeholder syntax. Now: ${json} done`],
    ['stray quote', (json) => `Result {a "quoted} b} then ${json}`],
  ];

  const cases: GeneratedCase[] = [];
  for (let i = 0; i < count; i++) {
    const { object, expected } = pick(generators)();
    const [name, frame] = pick(framings);
    cases.push({ label: `#${i} ${expected.type} (${name})`, text: frame(JSON.stringify(object)), expected });
  }
  return cases;
}

describe('ResponseParser', () => {
  const parser = new ResponseParser();

  it('should decode a whole JSON payload', () => {
    const result = parser.parseDetailed('{"action":"use_tool","tool":"shell_tool","params":{"command":"ls"}}');
    expect(result.action).toEqual({ type: 'use_tool', tool: 'shell_tool', params: { command: 'ls' } });
    expect(result.source).toBe('json');
    expect(result.failures).toEqual([]);
  });

  it('should decode a fenced block', () => {
    const result = parser.parseDetailed('Here you go:\n```json\n{"action": "respond", "message": "Hi"}\n```');
    expect(result.action).toEqual({ type: 'respond', text: 'Hi' });
    expect(result.source).toBe('fenced');
  });

  it('should extract JSON embedded in prose', () => {
    const result = parser.parseDetailed(
      'I will run it now {"tool": "shell_tool", "params": {"command": "uname -a"}} and report back.'
    );
    expect(result.action).toEqual({ type: 'use_tool', tool: 'shell_tool', params: { command: 'uname -a' } });
    expect(result.source).toBe('embedded');
  });

  it('should tolerate trailing commas', () => {
    expect(parser.parse('{"action": "think", "thought": "check disk",}')).toEqual({ type: 'think', text: 'check disk' });
  });

  it('should take the first block that maps to an action and record the rejected ones', () => {
    const result = parser.parseDetailed(
      '{"note": 1} then {"action":"respond","message":"first"} and {"action":"respond","message":"second"}'
    );
    expect(result.action).toEqual({ type: 'respond', text: 'first' });
    expect(result.failures).toHaveLength(2);
    expect(result.failures[0].message).toMatch(/^Invalid JSON \(/);
    expect(result.failures[1].message).toBe('Object has no recognizable action');
    expect(result.failures[1].candidate).toBe('{"note": 1}');
  });

  it('should find a block after an unclosed brace in the prose', () => {
    const result = parser.parseDetailed('Use the {placeholder syntax. Now: {"tool":"shell_tool","params":{"command":"ls"}} done');
    expect(result.action).toEqual({ type: 'use_tool', tool: 'shell_tool', params: { command: 'ls' } });
    expect(result.source).toBe('embedded');
  });

  it('should find a block after a stray quote inside earlier braces', () => {
    const result = parser.parseDetailed('Result {a "quoted} b} then {"tool":"shell_tool","params":{"command":"ls"}}');
    expect(result.action).toEqual({ type: 'use_tool', tool: 'shell_tool', params: { command: 'ls' } });
    expect(result.source).toBe('embedded');
  });

  it('should look inside braces that do not decode', () => {
    expect(parser.parse('Note {see {"action":"think","thought":"check logs"} here}')).toEqual({
      type: 'think',
      text: 'check logs',
    });
  });

  it('should not treat fields of a decoded object as candidates', () => {
    const result = parser.parseDetailed('Payload {"data": {"tool": "shell_tool"}} end');
    expect(result.source).toBe('fallback');
    expect(result.action).toEqual({ type: 'respond', text: 'Payload {"data": {"tool": "shell_tool"}} end' });
  });

  describe('generated action texts', () => {
    it.each(buildGeneratedCases(60).map((c) => [c.label, c] as const))('should recover %s', (_label, generated) => {
      expect(parser.parse(generated.text)).toEqual(generated.expected);
    });
  });

  it.each([
    'Bagaimana cara jalankan perintah ls?',
    'What does run command uname -a do?',
    'apa itu https://example.com',
    'Siapa yang bisa cari skill python?',
    'How do I open github.com in a browser?',
    'Kenapa buat file notes.txt gagal?',
  ])('should never pick a tool for the question "%s"', (question) => {
    const result = parser.parseDetailed('Let me explain.', question);
    expect(result.action.type).not.toBe('use_tool');
    expect(result.action.type).not.toBe('multi_step');
    expect(result.source).toBe('fallback');
  });

  it('should not detect intents for interrogative hints', () => {
    const result = parser.parseDetailed('I think you want to know.', 'Apa itu shell?');
    expect(result.action).toEqual({ type: 'respond', text: 'I think you want to know.' });
    expect(result.source).toBe('fallback');
  });

  it('should fall back to intent detection on the user input', () => {
    const result = parser.parseDetailed('Sure, running it.', 'Jalankan perintah uname -a di terminal');
    expect(result.action).toEqual({ type: 'use_tool', tool: 'shell_tool', params: { command: 'uname -a' } });
    expect(result.source).toBe('intent');
    expect(result.intentRuleId).toBe('shell.command');
  });

  it('should respond with the raw text when nothing else applies', () => {
    expect(parser.parse('  Plain answer.  ')).toEqual({ type: 'respond', text: 'Plain answer.' });
    expect(parser.parse('')).toEqual({ type: 'respond', text: '' });
  });

  describe('actionFromObject', () => {
    it('should map action aliases', () => {
      expect(actionFromObject({ action: 'done' })).toEqual({ type: 'respond', text: '' });
      expect(actionFromObject({ action: 'final', response: 'ok' })).toEqual({ type: 'respond', text: 'ok' });
      expect(actionFromObject({ action: 'use_tool', name: 'x', arguments: { a: 1 } })).toEqual({
        type: 'use_tool',
        tool: 'x',
        params: { a: 1 },
      });
      expect(actionFromObject({ action: 'PLAN', steps: [{ description: 's1' }] })).toEqual({
        type: 'plan',
        goal: '',
        steps: ['s1'],
      });
    });

    it('should infer the action from keys when it is missing', () => {
      expect(actionFromObject({ goal: 'g', steps: ['a', 'b'] })).toEqual({ type: 'plan', goal: 'g', steps: ['a', 'b'] });
      expect(actionFromObject({ steps: [{ tool: 'a' }] })).toEqual({
        type: 'multi_step',
        steps: [{ type: 'use_tool', tool: 'a', params: {} }],
      });
      expect(actionFromObject({ thought: 'hmm' })).toEqual({ type: 'think', text: 'hmm' });
      expect(actionFromObject({ message: 'hello' })).toEqual({ type: 'respond', text: 'hello' });
    });

    it('should reject invalid shapes', () => {
      expect(actionFromObject({ action: 'use_tool', tool: 'x', params: 'bad' })).toBeNull();
      expect(actionFromObject({ action: 'multi_step', steps: [] })).toBeNull();
      expect(actionFromObject({ action: 'dance' })).toBeNull();
      expect(actionFromObject({ name: 'x' })).toBeNull();
    });
  });

  describe('block extraction', () => {
    it('should ignore braces inside strings', () => {
      expect(extractBraceBlocks('a {"x":"}"} b {"y":{"z":1}}')).toEqual(['{"x":"}"}', '{"y":{"z":1}}', '{"z":1}']);
    });

    it('should skip braces that never close', () => {
      expect(extractBraceBlocks('a { b {"c":1} d')).toEqual(['{"c":1}']);
    });

    it('should list fenced blocks with or without a language tag', () => {
      expect(extractFencedBlocks('```json\n{"a":1}\n```\ntext\n```\n{"b":2}\n```')).toEqual(['{"a":1}', '{"b":2}']);
    });
  });
});
