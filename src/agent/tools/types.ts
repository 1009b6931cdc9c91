/**
 * Tool Types
 *
 * Defines the interface for agent tools and registry lookups.
 */

import type { AgentStep } from '../planning/types.js';

/**
 * Context passed to a tool call.
 */
export interface ToolCallContext {
  /** Cancellation signal of the executor call */
  signal?: AbortSignal;

  /** Read-only snapshot of the ledger at dispatch time */
  steps: readonly AgentStep[];
}

/**
 * A capability invocable by name with a string input.
 *
 * Tools are shared by concurrent executor calls and must not keep per-call
 * mutable fields. A rejected call is fatal to the executor call.
 */
export interface Tool {
  /** Unique tool name (case-insensitive) */
  readonly name: string;

  /** Human-readable description shown to the planner */
  readonly description: string;

  call(input: string, ctx: ToolCallContext): Promise<string>;
}

/**
 * Outcome of resolving a requested tool name.
 */
export type ToolResolution =
  | { kind: 'tool'; tool: Tool }
  | { kind: 'final_answer' }
  | { kind: 'unknown'; name: string };
