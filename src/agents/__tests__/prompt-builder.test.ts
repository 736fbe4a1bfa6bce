// src/agents/__tests__/prompt-builder.test.ts

import { IToolDefinition } from '../../core/tool';
import {
  buildExecutionPrompt,
  buildPlanningPrompt,
  buildReflectionPrompt,
  buildSynthesisPrompt,
  buildSystemPrompt,
  formatToolParameterForPrompt,
  formatToolsForPrompt,
} from '../prompt-builder';

const shellTool: IToolDefinition = {
  name: 'shell_tool',
  description: ' Runs a shell command. ',
  parameters: [
    { name: 'command', type: 'string', description: 'Command line', required: true },
    {
      name: 'shell',
      type: 'string',
      description: 'Shell to use',
      required: false,
      schema: { type: 'string', enum: ['bash', 'sh'], default: 'bash' },
    },
  ],
};

describe('prompt-builder', () => {
  describe('formatToolParameterForPrompt', () => {
    it('should include enum and default values', () => {
      expect(formatToolParameterForPrompt(shellTool.parameters[1])).toBe(
        '- "shell" (type: string): Shell to use (Enum: "bash", "sh") (Default: "bash")'
      );
    });
  });

  describe('formatToolsForPrompt', () => {
    it('should list each tool with its parameters', () => {
      expect(formatToolsForPrompt([shellTool])).toBe(
        '\nTool Name: "shell_tool"\n' +
          '  Description: Runs a shell command.\n' +
          '  Parameters:\n' +
          '    - "command" (type: string, required): Command line\n' +
          '    - "shell" (type: string): Shell to use (Enum: "bash", "sh") (Default: "bash")\n'
      );
    });

    it('should note tools without parameters', () => {
      expect(formatToolsForPrompt([{ name: 'clock', description: 'Current time', parameters: [] }])).toBe(
        '\nTool Name: "clock"\n  Description: Current time\n  Parameters: This tool does not require any parameters.\n'
      );
    });

    it('should say when no tools exist', () => {
      expect(formatToolsForPrompt([])).toBe('No tools are currently available. Answer directly.\n');
    });
  });

  describe('buildSystemPrompt', () => {
    it('should produce a system message with the action formats and tools', () => {
      const message = buildSystemPrompt([shellTool]);
      expect(message.role).toBe('system');
      expect(message.content).toContain('{"action": "use_tool", "tool": "<tool name>", "params": { ... }}');
      expect(message.content).toContain('Available tools:\n\nTool Name: "shell_tool"');
    });

    it('should replace the default instructions with custom ones', () => {
      const message = buildSystemPrompt([], '  Be brief.  ');
      expect(message.content.startsWith('Be brief.\n\nReply with exactly ONE JSON object')).toBe(true);
      expect(message.content.endsWith('Available tools:\nNo tools are currently available. Answer directly.\n')).toBe(true);
    });
  });

  it('should build the planning prompt', () => {
    expect(buildPlanningPrompt().content.startsWith('[Planning] Read the latest user message.')).toBe(true);
  });

  it('should build the execution prompt with and without a step', () => {
    expect(buildExecutionPrompt({ iteration: 2, maxIterations: 10, currentStep: 'Read the log' }).content).toBe(
      '[Executing 2/10] Current step: Read the log\nDecide the next action. If the task is already complete, reply with the respond action.'
    );
    expect(buildExecutionPrompt({ iteration: 1, maxIterations: 10 }).content).toBe(
      '[Executing 1/10] Decide the next action. If the task is already complete, reply with the respond action.'
    );
  });

  describe('buildReflectionPrompt', () => {
    it('should list the remaining steps', () => {
      const content = buildReflectionPrompt({
        goal: 'Inspect the host',
        completedStep: 'Used shell_tool with params {"command":"uname -a"}',
        result: '[shell_tool] Linux test-host',
        remainingSteps: ['Check disk', 'Report'],
      }).content;
      expect(content).toBe(
        '[Reflecting]\n' +
          'Goal: Inspect the host\n' +
          'Completed step: Used shell_tool with params {"command":"uname -a"}\n' +
          'Result:\n' +
          '[shell_tool] Linux test-host\n' +
          'Remaining steps:\n' +
          '  1. Check disk\n' +
          '  2. Report\n' +
          '\n' +
          'Is the goal satisfied?\n' +
          '- If yes, reply {"action": "respond", "message": "<final answer>"} or {"action": "done"}.\n' +
          '- If not, reply with the next use_tool or multi_step action, or {"action": "think", "thought": "..."}.'
      );
    });

    it('should mark an empty step list', () => {
      const content = buildReflectionPrompt({ goal: 'g', completedStep: 's', result: 'r', remainingSteps: [] }).content;
      expect(content).toContain('Remaining steps:\n  (none)\n');
    });
  });

  it('should ask for plain text when synthesizing', () => {
    expect(buildSynthesisPrompt().content).toContain('Reply in plain text, not JSON.');
  });
});
