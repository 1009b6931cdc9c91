/**
 * Executor Types
 */

import type { Logger } from '../../core/logger.js';
import type { Memory } from '../../memory/types.js';
import type { ExecutorObserver } from '../callbacks/types.js';
import type { AgentStep } from '../planning/types.js';
import type { ErrorRecoveryPolicy } from './recovery.js';

/**
 * Options for an executor. Fixed for the executor's lifetime.
 */
export interface ExecutorOptions {
  /** Upper bound on planner invocations per call (default 15) */
  maxIterations?: number;

  /** Add the ledger to the outputs under `intermediateSteps` (default false) */
  returnIntermediateSteps?: boolean;

  /** Recover from unparsable planner output; such output is fatal without one */
  errorPolicy?: ErrorRecoveryPolicy;

  observer?: ExecutorObserver;

  /**
   * Handed to the planner on every round; LlmPlanner reads the history from
   * it. Nothing is saved unless the call goes through callWithMemory.
   */
  memory?: Memory;

  logger?: Logger;
}

export interface ExecutorCallOptions {
  signal?: AbortSignal;
}

/**
 * How a run ended.
 *
 * - `finished`: the planner produced a finish
 * - `repeated_action`: the planner repeated an earlier action; the call stops
 *   with empty outputs and no error
 * - `not_finished`: the iteration budget ran out
 */
export type ExecutorStatus = 'finished' | 'repeated_action' | 'not_finished';

export interface ExecutorRunResult {
  status: ExecutorStatus;
  outputs: Record<string, unknown>;
  steps: readonly AgentStep[];
  /** Planner invocations made */
  iterations: number;
}
