// src/tools/function-tool.ts

import { ITool, IToolDefinition, ToolExecutionContext, ToolParams } from '../core/tool';

export type ToolHandler = (params: ToolParams, context: ToolExecutionContext) => Promise<string> | string;

/**
 * Wraps a plain function as an ITool.
 *
 * @example
 * const echo = new FunctionTool(
 *   { name: 'echo_tool', description: 'Repeats its input.', parameters: [{ name: 'text', type: 'string', description: 'Text to repeat', required: true }] },
 *   async ({ text }) => String(text)
 * );
 */
export class FunctionTool implements ITool {
  constructor(
    private readonly definition: IToolDefinition,
    private readonly handler: ToolHandler
  ) {}

  getDefinition(): IToolDefinition {
    return this.definition;
  }

  async execute(params: ToolParams, context: ToolExecutionContext): Promise<string> {
    return this.handler(params, context);
  }
}
