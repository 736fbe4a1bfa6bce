import { ConfigurationError } from '../../core/errors';
import { IntentDetector, parseIntentRuleSet } from '../intent-detector';

describe('IntentDetector', () => {
  const detector = new IntentDetector();

  it('should detect a shell command and strip the terminal suffix', () => {
    expect(detector.detect('Jalankan perintah uname -a di terminal')).toEqual({
      action: { type: 'use_tool', tool: 'shell_tool', params: { command: 'uname -a' } },
      ruleId: 'shell.command',
    });
  });

  it('should prefix bare domains with https and drop trailing punctuation', () => {
    expect(detector.detect('buka google.com.')).toEqual({
      action: { type: 'use_tool', tool: 'browser_tool', params: { action: 'navigate', url: 'https://google.com' } },
      ruleId: 'browser.navigate',
    });
  });

  it('should detect a search query', () => {
    expect(detector.detect('cari informasi tentang harga emas.')?.action).toEqual({
      type: 'use_tool',
      tool: 'search_tool',
      params: { query: 'harga emas' },
    });
  });

  it('should fall back to a default for an optional capture', () => {
    expect(detector.detect('tulis file notes.txt')?.action).toEqual({
      type: 'use_tool',
      tool: 'file_tool',
      params: { operation: 'write', path: 'notes.txt', content: '# New file\n' },
    });
  });

  it('should lower-case transformed captures', () => {
    expect(detector.detect('buat proyek web toko dengan React')?.action).toEqual({
      type: 'use_tool',
      tool: 'webdev_tool',
      params: { action: 'init', name: 'toko', framework: 'react' },
    });
  });

  it('should expand the demo rule into a multi-step action', () => {
    const intent = detector.detect('demo semua tools');
    expect(intent?.ruleId).toBe('demo.all_tools');
    expect(intent?.action.type).toBe('multi_step');
    if (intent?.action.type === 'multi_step') {
      expect(intent.action.steps.map((s) => s.tool)).toEqual([
        'shell_tool',
        'file_tool',
        'search_tool',
        'message_tool',
        'skill_manager',
        'schedule_tool',
      ]);
    }
  });

  it('should ignore questions', () => {
    expect(detector.isQuestion('Jelaskan apa itu AI')).toBe(true);
    expect(detector.isQuestion('What is uname?')).toBe(true);
    expect(detector.detect('Jelaskan apa itu AI')).toBeNull();
    expect(detector.detect('how do I run command ls')).toBeNull();
  });

  it('should ignore very short inputs', () => {
    expect(detector.detect('ls')).toBeNull();
  });

  it('should discard matches whose parameters come out empty', () => {
    expect(detector.detect('jalankan perintah')).toBeNull();
  });

  describe('parseIntentRuleSet', () => {
    it('should reject rule sets without rules', () => {
      expect(() => parseIntentRuleSet({ questionPattern: '^why' })).toThrow(ConfigurationError);
    });

    it('should reject invalid expressions', () => {
      expect(() =>
        parseIntentRuleSet({
          questionPattern: '^why',
          rules: [{ id: 'broken', tool: 't', patterns: ['('], params: { a: '$1' } }],
        })
      ).toThrow('Intent rule "broken" has an invalid pattern: (');
    });

    it('should accept a custom rule set', () => {
      const custom = new IntentDetector(
        parseIntentRuleSet({
          questionPattern: '^why',
          rules: [{ id: 'echo', tool: 'echo_tool', patterns: ['^say (.+)'], params: { text: '$1' } }],
        })
      );
      expect(custom.detect('say hello')?.action).toEqual({ type: 'use_tool', tool: 'echo_tool', params: { text: 'hello' } });
      expect(custom.detect('why say hello')).toBeNull();
    });
  });
});
