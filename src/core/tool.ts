// src/core/tool.ts

/**
 * @file Tool contracts consumed by the orchestration core.
 * Tool business logic lives in the host application; the core only looks tools up
 * by name, validates their parameters and runs them under a timeout.
 */

import { JSONSchema7 } from 'json-schema';

/** Parameters passed to a tool, keyed by parameter name. */
export type ToolParams = Record<string, unknown>;

/**
 * Describes one parameter of a tool, for prompts and for validation.
 */
export interface IToolParameter {
  name: string;
  /** JSON type name (string, number, boolean, object, array). */
  type: string;
  description: string;
  required: boolean;
  /** Optional JSON schema the argument value must satisfy. */
  schema?: JSONSchema7;
}

/**
 * The name, description and parameters of a tool.
 */
export interface IToolDefinition {
  name: string;
  description: string;
  parameters: IToolParameter[];
}

/**
 * Ambient information handed to a tool for one call.
 */
export interface ToolExecutionContext {
  /** Aborted when the call times out or the request is cancelled. */
  signal: AbortSignal;
  sessionId?: string;
}

/**
 * A tool registered by the host application. Tools enforce their own internal
 * safety checks (path or command blocklists); the dispatcher only enforces
 * timeouts and converts failures.
 */
export interface ITool {
  getDefinition(): IToolDefinition | Promise<IToolDefinition>;
  /**
   * Runs the tool and returns its textual result. Throwing signals failure.
   */
  execute(params: ToolParams, context: ToolExecutionContext): Promise<string>;
}

/**
 * Supplies tools by name.
 */
export interface IToolProvider {
  getTools(): Promise<ITool[]>;
  getTool(toolName: string): Promise<ITool | undefined>;
}

export type ToolExecutionStatus = 'success' | 'error';

/**
 * Immutable record of one dispatched tool call.
 */
export interface ToolExecution {
  readonly id: string;
  readonly tool: string;
  readonly params: Readonly<ToolParams>;
  readonly result: string;
  readonly status: ToolExecutionStatus;
  readonly durationMs: number;
  readonly startedAt: Date;
}
