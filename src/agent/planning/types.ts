/**
 * Planning Types
 *
 * Defines the structures exchanged between the executor and a planner.
 */

import type { Tool } from '../tools/types.js';
import type { Memory } from '../../memory/types.js';

/**
 * A requested invocation of a named tool.
 */
export interface AgentAction {
  /** Tool name, matched case-insensitively */
  tool: string;

  /** Raw input handed to the tool */
  toolInput: string;

  /** Planner text that produced the action */
  log: string;
}

/**
 * One completed action/observation round-trip.
 */
export type AgentStep = Readonly<{
  action: Readonly<AgentAction>;
  observation: string;
}>;

/**
 * Terminal payload produced by a planner. Carries `output` by convention.
 */
export interface AgentFinish {
  returnValues: Record<string, unknown>;
  log?: string;
}

/**
 * What a planner returns for one round.
 */
export interface PlanResult {
  actions: AgentAction[];
  finish?: AgentFinish | null;
}

/**
 * Per-call context handed to the planner.
 */
export interface PlanContext {
  signal?: AbortSignal;
  memory?: Memory;
}

/**
 * Decides the next actions, or declares completion.
 *
 * Implementations must not keep per-call mutable state: one planner may serve
 * concurrent executor calls.
 */
export interface Planner {
  /** Tools the planner intends to use */
  readonly tools: readonly Tool[];

  /** Input keys the planner expects, often `input` */
  readonly inputKeys: readonly string[];

  /** Output keys of the planner's finish */
  readonly outputKeys: readonly string[];

  plan(
    steps: readonly AgentStep[],
    inputs: Readonly<Record<string, string>>,
    ctx: PlanContext
  ): Promise<PlanResult>;
}

/**
 * Action used for synthetic ledger entries (parse recovery, hints).
 */
export const EMPTY_ACTION: Readonly<AgentAction> = Object.freeze({
  tool: '',
  toolInput: '',
  log: '',
});
