/**
 * Agent Module
 *
 * The executor loop, the planner and tool abstractions it drives, and the
 * built-in implementations.
 *
 * @example
 * ```typescript
 * import { Executor, LlmPlanner, systemTools } from './agent/index.js';
 *
 * const planner = new LlmPlanner({ llm, tools: systemTools });
 * const executor = new Executor(planner, { maxIterations: 5 });
 *
 * const { output } = await executor.call({ input: 'What is 12 * (3 + 4)?' });
 * ```
 */

// === Executor (main entry point) ===
export {
  Executor,
  createExecutor,
  executorOptionsFromConfig,
  inputsToString,
  INTERMEDIATE_STEPS_KEY,
  NOT_FINISHED_MESSAGE,
  DEFAULT_MAX_ITERATIONS,
} from './executor/executor.js';
export { callWithMemory } from './executor/with-memory.js';
export {
  StepLedger,
  findRepeatedAction,
  isRepeatedAction,
  invalidToolObservation,
  REPEATED_ACTION_OBSERVATION,
  FINAL_ANSWER_OBSERVATION,
  LAST_CHANCE_OBSERVATION,
} from './executor/ledger.js';
export { createErrorRecoveryPolicy, createStaticMessagePolicy } from './executor/recovery.js';

// === Callbacks ===
export { notifyObserver, createLoggingObserver, combineObservers } from './callbacks/observer.js';

// === Planning ===
export { LlmPlanner, buildScratchpad } from './planning/planner.js';
export { parseReActOutput, FINAL_ANSWER_MARKER } from './planning/parser.js';
export { EMPTY_ACTION } from './planning/types.js';

// === Tools ===
export { ToolRegistry, FINAL_ANSWER_TOOL, isFinalAnswerTool } from './tools/registry.js';
export { defineTool, defineSchemaTool } from './tools/define.js';
export {
  systemTools,
  currentTimeTool,
  calculatorTool,
  stepHistoryTool,
  allTools,
  createAllTools,
  registerAllTools,
} from './tools/adapters/index.js';

// === Types ===
export * from './types.js';
