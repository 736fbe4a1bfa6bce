// src/agents/config.ts

/**
 * @file Configuration for the agent loop and its collaborators.
 */

import { ConfigurationError } from '../core/errors';

/**
 * What to do when a request arrives for a session that is already running.
 * - 'reject': the new request ends immediately with a single `error` event.
 * - 'queue': the new request waits until the session is free.
 */
export type BusySessionPolicy = 'reject' | 'queue';

export interface AgentLoopConfig {
  /**
   * Maximum Executing iterations per request. Reaching it forces Synthesizing.
   * @default 10
   */
  maxIterations: number;

  /**
   * Wall-clock budget for a whole request, in milliseconds.
   * @default 180000
   */
  requestTimeoutMs: number;

  /**
   * Per tool call timeout, in milliseconds.
   * @default 60000
   */
  toolTimeoutMs: number;

  /** Most recent turns included in each prompt. @default 20 */
  contextMaxMessages: number;

  /** Token budget (estimated) of each prompt's history. @default 128000 */
  contextMaxTokens: number;

  /**
   * History length beyond which older turns are replaced by a summary.
   * @default 15
   */
  summarizationThreshold: number;

  /** @default 'reject' */
  busyPolicy: BusySessionPolicy;

  /** Tool results are cut to this many characters in `tool_result` events. @default 2000 */
  eventResultLimit: number;

  /** Session titles are taken from this many leading characters of the first message. @default 50 */
  titleMaxLength: number;

  /** Size of the `chunk` events used to stream an already complete answer. @default 24 */
  responseChunkSize: number;

  /**
   * Replace executable fragments in the answer text sent to clients with `[FILTERED]`.
   * Model output is parsed before this runs, so tool parameters are untouched.
   * @default true
   */
  sanitizeOutput: boolean;

  /** Model override for this loop; the process-wide selection is used otherwise. */
  model?: string;

  temperature?: number;

  /** Replaces the built-in operating instructions sent as the system prompt. */
  systemPrompt?: string;
}

export const DEFAULT_AGENT_LOOP_CONFIG: Readonly<AgentLoopConfig> = {
  maxIterations: 10,
  requestTimeoutMs: 180_000,
  toolTimeoutMs: 60_000,
  contextMaxMessages: 20,
  contextMaxTokens: 128_000,
  summarizationThreshold: 15,
  busyPolicy: 'reject',
  eventResultLimit: 2000,
  titleMaxLength: 50,
  responseChunkSize: 24,
  sanitizeOutput: true,
};

const POSITIVE_INTEGER_KEYS = [
  'maxIterations',
  'requestTimeoutMs',
  'toolTimeoutMs',
  'contextMaxMessages',
  'contextMaxTokens',
  'summarizationThreshold',
  'eventResultLimit',
  'titleMaxLength',
  'responseChunkSize',
] as const;

/**
 * Merges overrides onto the defaults and validates the result.
 * @throws ConfigurationError on non-positive or non-integer limits, or an unknown busy policy.
 */
export function resolveAgentLoopConfig(overrides: Partial<AgentLoopConfig> = {}): AgentLoopConfig {
  const config: AgentLoopConfig = { ...DEFAULT_AGENT_LOOP_CONFIG, ...overrides };
  for (const key of POSITIVE_INTEGER_KEYS) {
    const value = config[key];
    if (!Number.isInteger(value) || value < 1) {
      throw new ConfigurationError(`AgentLoopConfig.${key} must be a positive integer.`, { [key]: value });
    }
  }
  if (config.busyPolicy !== 'reject' && config.busyPolicy !== 'queue') {
    throw new ConfigurationError(`AgentLoopConfig.busyPolicy must be 'reject' or 'queue'.`, {
      busyPolicy: config.busyPolicy,
    });
  }
  return config;
}

const ENV_KEYS: Record<string, (typeof POSITIVE_INTEGER_KEYS)[number]> = {
  TASKLOOP_MAX_ITERATIONS: 'maxIterations',
  TASKLOOP_REQUEST_TIMEOUT_MS: 'requestTimeoutMs',
  TASKLOOP_TOOL_TIMEOUT_MS: 'toolTimeoutMs',
};

/**
 * Reads loop overrides from environment variables. Unset variables are skipped;
 * values that are not integers raise ConfigurationError.
 */
export function agentLoopConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<AgentLoopConfig> {
  const overrides: Partial<AgentLoopConfig> = {};
  for (const [variable, key] of Object.entries(ENV_KEYS)) {
    const raw = env[variable];
    if (raw === undefined || raw.trim() === '') {
      continue;
    }
    const value = Number(raw);
    if (!Number.isInteger(value)) {
      throw new ConfigurationError(`${variable} must be an integer, got "${raw}".`);
    }
    overrides[key] = value;
  }
  if (env.TASKLOOP_MODEL) {
    overrides.model = env.TASKLOOP_MODEL;
  }
  return overrides;
}
