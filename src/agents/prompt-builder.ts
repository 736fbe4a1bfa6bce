// src/agents/prompt-builder.ts

/**
 * @file Builds the instructions sent to the model in each phase of the agent loop.
 * The model answers with one JSON action object; the formats described here are
 * the ones the ResponseParser recognizes.
 */

import { IToolDefinition, IToolParameter } from '../core/tool';
import { truncateText } from '../core/utils';
import { LLMMessage } from '../llm/types';

/**
 * Formats an IToolParameter for inclusion in a prompt.
 */
export function formatToolParameterForPrompt(param: IToolParameter): string {
  let details = `- "${param.name}" (type: ${param.type || 'any'}${param.required ? ', required' : ''})`;
  if (param.description) {
    details += `: ${param.description.trim()}`;
  }
  if (param.schema) {
    if (param.schema.enum) {
      details += ` (Enum: ${param.schema.enum.map((v) => JSON.stringify(v)).join(', ')})`;
    }
    if (param.schema.default !== undefined) {
      details += ` (Default: ${JSON.stringify(param.schema.default)})`;
    }
  }
  return details;
}

/**
 * Lists the tools with their parameters.
 */
export function formatToolsForPrompt(toolDefinitions: IToolDefinition[]): string {
  if (toolDefinitions.length === 0) {
    return 'No tools are currently available. Answer directly.\n';
  }
  let text = '';
  for (const toolDef of toolDefinitions) {
    text += `\nTool Name: "${toolDef.name}"\n`;
    text += `  Description: ${toolDef.description.trim()}\n`;
    if (toolDef.parameters.length > 0) {
      text += `  Parameters:\n`;
      toolDef.parameters.forEach((param) => {
        text += `    ${formatToolParameterForPrompt(param)}\n`;
      });
    } else {
      text += `  Parameters: This tool does not require any parameters.\n`;
    }
  }
  return text;
}

const ACTION_FORMATS = `Reply with exactly ONE JSON object and nothing else, using one of these forms:
  {"action": "use_tool", "tool": "<tool name>", "params": { ... }}
  {"action": "multi_step", "steps": [{"tool": "<tool name>", "params": { ... }}, ...]}
  {"action": "think", "thought": "<your reasoning>"}
  {"action": "plan", "goal": "<goal>", "steps": ["<step>", ...]}
  {"action": "respond", "message": "<final answer for the user>"}`;

/**
 * System prompt: operating instructions plus the available tools.
 */
export function buildSystemPrompt(toolDefinitions: IToolDefinition[], customInstructions?: string): LLMMessage {
  let prompt = customInstructions?.trim()
    ? `${customInstructions.trim()}\n`
    : `You are an autonomous assistant that completes tasks by using tools.
Work step by step: decide the next action, observe its result, and continue until the task is done.
Use a tool whenever the task needs real data or a real side effect; never pretend to have run one.
For questions that need no tool, answer directly.
`;
  prompt += `\n${ACTION_FORMATS}\n\nAvailable tools:\n${formatToolsForPrompt(toolDefinitions)}`;
  return { role: 'system', content: prompt };
}

/**
 * Planning: ask for a plan, an immediate action, or a direct answer.
 */
export function buildPlanningPrompt(): LLMMessage {
  return {
    role: 'system',
    content: `[Planning] Read the latest user message.
- If it can be answered without tools, reply {"action": "respond", "message": "..."}.
- If it needs several steps, reply {"action": "plan", "goal": "...", "steps": ["...", "..."]}.
- If a single tool call is enough, reply with that use_tool action.`,
  };
}

export interface ExecutionPromptInput {
  iteration: number;
  maxIterations: number;
  currentStep?: string;
}

/**
 * Executing: ask for the next action for the current step.
 */
export function buildExecutionPrompt(input: ExecutionPromptInput): LLMMessage {
  const step = input.currentStep ? `Current step: ${input.currentStep}\n` : '';
  return {
    role: 'system',
    content: `[Executing ${input.iteration}/${input.maxIterations}] ${step}Decide the next action. If the task is already complete, reply with the respond action.`,
  };
}

export interface ReflectionPromptInput {
  goal: string;
  completedStep: string;
  result: string;
  remainingSteps: string[];
}

/**
 * Reflecting: ask whether the goal is satisfied after the last tool result.
 */
export function buildReflectionPrompt(input: ReflectionPromptInput, resultLimit = 2000): LLMMessage {
  const remaining =
    input.remainingSteps.length > 0 ? input.remainingSteps.map((s, i) => `  ${i + 1}. ${s}`).join('\n') : '  (none)';
  return {
    role: 'system',
    content: `[Reflecting]
Goal: ${input.goal}
Completed step: ${input.completedStep}
Result:
${truncateText(input.result, resultLimit)}
Remaining steps:
${remaining}

Is the goal satisfied?
- If yes, reply {"action": "respond", "message": "<final answer>"} or {"action": "done"}.
- If not, reply with the next use_tool or multi_step action, or {"action": "think", "thought": "..."}.`,
  };
}

/**
 * Synthesizing: plain-text answer from everything observed so far.
 */
export function buildSynthesisPrompt(): LLMMessage {
  return {
    role: 'system',
    content: `[Synthesizing] Write the final answer for the user based on the tool results above. Summarize what was done and what was found. Reply in plain text, not JSON.`,
  };
}
