/**
 * Agent Types
 *
 * Shared types re-exported for external consumers.
 */

// Planning types
export type {
  AgentAction,
  AgentFinish,
  AgentStep,
  PlanContext,
  PlanResult,
  Planner,
} from './planning/types.js';

// Tool types
export type { Tool, ToolCallContext, ToolResolution } from './tools/types.js';

// Callback types
export type { ExecutorObserver } from './callbacks/types.js';

// Executor types
export type {
  ExecutorOptions,
  ExecutorCallOptions,
  ExecutorStatus,
  ExecutorRunResult,
} from './executor/types.js';
export type { ErrorRecoveryPolicy } from './executor/recovery.js';
