// src/agents/tool-dispatcher.ts

/**
 * @file ToolDispatcher - runs one tool call and always comes back with a
 * ToolExecution record. Unknown tools, invalid parameters, tool exceptions,
 * timeouts and cancellation all become records with status `error`.
 */

import Ajv, { ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { JSONSchema7, JSONSchema7TypeName } from 'json-schema';
import { v4 as uuidv4 } from 'uuid';
import { ITool, IToolDefinition, IToolParameter, IToolProvider, ToolExecution, ToolExecutionStatus, ToolParams } from '../core/tool';
import { CancellationError, TimeoutError, ToolNotFoundError } from '../core/errors';
import { abortReason, errorMessage } from '../core/utils';

const JSON_TYPES: ReadonlyArray<JSONSchema7TypeName> = ['string', 'number', 'integer', 'boolean', 'object', 'array', 'null'];

function isJsonTypeName(type: string): type is JSONSchema7TypeName {
  return JSON_TYPES.some((t) => t === type);
}

type ParametersSchema = {
  type: 'object';
  properties: Record<string, JSONSchema7>;
  required: string[];
  additionalProperties: boolean;
};

/**
 * Object schema for a tool's parameter list. A parameter's own `schema` wins
 * over its `type` name; unknown type names accept any value.
 */
export function buildParametersSchema(parameters: IToolParameter[]): ParametersSchema {
  const properties: Record<string, JSONSchema7> = {};
  for (const param of parameters) {
    if (param.schema) {
      properties[param.name] = param.schema;
    } else if (isJsonTypeName(param.type)) {
      properties[param.name] = { type: param.type };
    } else {
      properties[param.name] = {};
    }
  }
  return {
    type: 'object',
    properties,
    required: parameters.filter((p) => p.required).map((p) => p.name),
    additionalProperties: true,
  };
}

export interface ToolDispatcherOptions {
  /** Used when `execute` is called without a timeout. @default 60000 */
  defaultTimeoutMs?: number;
  /** Validate parameters against the tool definition before running it. @default true */
  validateParameters?: boolean;
}

export class ToolDispatcher {
  private readonly ajv: Ajv;
  private readonly validators = new WeakMap<ITool, { definition: IToolDefinition; validate: ValidateFunction }>();
  private readonly defaultTimeoutMs: number;
  private readonly validateParameters: boolean;

  constructor(
    private readonly toolProvider: IToolProvider,
    options: ToolDispatcherOptions = {}
  ) {
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 60_000;
    this.validateParameters = options.validateParameters ?? true;
    this.ajv = new Ajv({ allErrors: true, strict: false, allowUnionTypes: true });
    addFormats(this.ajv);
  }

  /**
   * Runs `toolName` with `params` under a timeout. Never throws.
   *
   * @param timeoutMs Per-call budget; the tool's abort signal fires when it runs out.
   * @param signal Request-level signal; aborting it cancels the call.
   */
  async execute(
    toolName: string,
    params: ToolParams,
    timeoutMs: number = this.defaultTimeoutMs,
    signal?: AbortSignal,
    sessionId?: string
  ): Promise<ToolExecution> {
    const startedAt = new Date();
    const start = Date.now();
    const finish = (status: ToolExecutionStatus, result: string): ToolExecution => {
      const record: ToolExecution = Object.freeze({
        id: uuidv4(),
        tool: toolName,
        params: Object.freeze({ ...params }),
        result,
        status,
        durationMs: Math.max(0, Date.now() - start),
        startedAt,
      });
      const level = status === 'success' ? 'info' : 'warn';
      console[level](`[ToolDispatcher] ${toolName} finished with ${status} in ${record.durationMs}ms.`);
      return record;
    };

    if (signal?.aborted) {
      return finish('error', `Tool "${toolName}" was cancelled.`);
    }

    let tool: ITool | undefined;
    try {
      tool = await this.toolProvider.getTool(toolName);
    } catch (error: unknown) {
      return finish('error', `Error looking up tool "${toolName}": ${errorMessage(error)}`);
    }
    if (!tool) {
      return finish('error', new ToolNotFoundError(toolName).message);
    }

    if (this.validateParameters) {
      try {
        const problem = await this.validate(tool, params);
        if (problem) {
          return finish('error', `Invalid parameters for tool "${toolName}": ${problem}`);
        }
      } catch (error: unknown) {
        return finish('error', `Could not validate parameters for tool "${toolName}": ${errorMessage(error)}`);
      }
    }

    const controller = new AbortController();
    const onAbort = (): void => controller.abort(abortReason(signal));
    signal?.addEventListener('abort', onAbort, { once: true });
    if (signal?.aborted) {
      onAbort();
    }
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timedOut = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new TimeoutError(`Tool "${toolName}" timed out after ${timeoutMs}ms`, timeoutMs, { toolName });
        controller.abort(error);
        reject(error);
      }, timeoutMs);
    });
    const aborted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener('abort', () => reject(abortReason(controller.signal)), { once: true });
    });

    console.info(`[ToolDispatcher] Executing ${toolName} (timeout ${timeoutMs}ms).`);
    try {
      const result = await Promise.race([
        tool.execute(params, { signal: controller.signal, sessionId }),
        timedOut,
        aborted,
      ]);
      return finish('success', typeof result === 'string' ? result : String(result));
    } catch (error: unknown) {
      if (error instanceof TimeoutError) {
        return finish('error', error.message);
      }
      if (error instanceof CancellationError) {
        return finish('error', `Tool "${toolName}" was cancelled.`);
      }
      return finish('error', `Error executing ${toolName}: ${errorMessage(error)}`);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  /** Returns a description of the violations, or null when the params are valid. */
  private async validate(tool: ITool, params: ToolParams): Promise<string | null> {
    const definition = await tool.getDefinition();
    let entry = this.validators.get(tool);
    if (!entry || entry.definition !== definition) {
      entry = { definition, validate: this.ajv.compile(buildParametersSchema(definition.parameters)) };
      this.validators.set(tool, entry);
    }
    if (entry.validate(params)) {
      return null;
    }
    return this.ajv.errorsText(entry.validate.errors, { dataVar: 'params' });
  }
}
