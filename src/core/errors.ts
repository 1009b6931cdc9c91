/**
 * Error taxonomy shared by the executor, planners, tools and config loader.
 */

export type AgentLoopErrorCode =
  | 'INPUT_NOT_STRING'
  | 'UNPARSABLE_OUTPUT'
  | 'AGENT_NO_RETURN'
  | 'NOT_FINISHED'
  | 'CANCELLED'
  | 'TOOL_REGISTRY'
  | 'TOOL_INPUT'
  | 'CONFIG';

export class AgentLoopError extends Error {
  constructor(
    message: string,
    public readonly code: AgentLoopErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AgentLoopError';
  }
}

/**
 * An executor input value was not a string.
 */
export class InputNotStringError extends AgentLoopError {
  constructor(public readonly key: string) {
    super(`input values to executor must be strings: ${key}`, 'INPUT_NOT_STRING');
    this.name = 'InputNotStringError';
  }
}

/**
 * The planner produced output it could not turn into actions or a finish.
 */
export class UnparsableOutputError extends AgentLoopError {
  constructor(public readonly output: string) {
    super(`unable to parse agent output: ${output}`, 'UNPARSABLE_OUTPUT');
    this.name = 'UnparsableOutputError';
  }
}

export class AgentNoReturnError extends AgentLoopError {
  constructor() {
    super('no actions or finish was returned by the agent', 'AGENT_NO_RETURN');
    this.name = 'AgentNoReturnError';
  }
}

export class NotFinishedError extends AgentLoopError {
  constructor(public readonly outputs: Record<string, unknown> = {}) {
    super('agent not finished before max iterations', 'NOT_FINISHED');
    this.name = 'NotFinishedError';
  }
}

export class ExecutionCancelledError extends AgentLoopError {
  constructor(reason?: unknown) {
    super('agent execution cancelled', 'CANCELLED', { cause: reason });
    this.name = 'ExecutionCancelledError';
  }
}

export class ToolRegistryError extends AgentLoopError {
  constructor(message: string) {
    super(message, 'TOOL_REGISTRY');
    this.name = 'ToolRegistryError';
  }
}

export class ToolInputError extends AgentLoopError {
  constructor(
    public readonly toolName: string,
    detail: string
  ) {
    super(`Invalid input for ${toolName}: ${detail}`, 'TOOL_INPUT');
    this.name = 'ToolInputError';
  }
}

export class ConfigError extends AgentLoopError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONFIG', options);
    this.name = 'ConfigError';
  }
}

export function isAgentLoopError(
  value: unknown,
  code?: AgentLoopErrorCode
): value is AgentLoopError {
  if (!(value instanceof AgentLoopError)) {
    return false;
  }
  return code === undefined || value.code === code;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
