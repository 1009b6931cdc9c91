/**
 * Agent Executor
 *
 * Drives the plan -> act -> observe loop for one planner:
 *   inputs + steps -> planner -> actions -> tools -> observations -> steps
 * until the planner finishes, repeats itself, or the iteration budget runs out.
 */

import { z } from 'zod';

import type { AgentLoopConfig } from '../../core/config.js';
import {
  AgentNoReturnError,
  ConfigError,
  ExecutionCancelledError,
  InputNotStringError,
  NotFinishedError,
  UnparsableOutputError,
} from '../../core/errors.js';
import { Logger } from '../../core/logger.js';
import type { Memory } from '../../memory/types.js';
import { notifyObserver } from '../callbacks/observer.js';
import type { ExecutorObserver } from '../callbacks/types.js';
import type {
  AgentAction,
  AgentFinish,
  AgentStep,
  Planner,
  PlanResult,
} from '../planning/types.js';
import { ToolRegistry } from '../tools/registry.js';
import {
  FINAL_ANSWER_OBSERVATION,
  LAST_CHANCE_OBSERVATION,
  REPEATED_ACTION_OBSERVATION,
  StepLedger,
  findRepeatedAction,
  invalidToolObservation,
} from './ledger.js';
import {
  createErrorRecoveryPolicy,
  createStaticMessagePolicy,
  type ErrorRecoveryPolicy,
} from './recovery.js';
import type {
  ExecutorCallOptions,
  ExecutorOptions,
  ExecutorRunResult,
} from './types.js';

/**
 * Output key the steps are returned under when returnIntermediateSteps is set.
 */
export const INTERMEDIATE_STEPS_KEY = 'intermediateSteps';

export const NOT_FINISHED_MESSAGE = 'agent not finished before max iterations';

export const DEFAULT_MAX_ITERATIONS = 15;

const ExecutorSettingsSchema = z.object({
  maxIterations: z.number().int().positive().default(DEFAULT_MAX_ITERATIONS),
  returnIntermediateSteps: z.boolean().default(false),
});

/**
 * Per-call state. Never shared between calls.
 */
interface CallState {
  inputs: Readonly<Record<string, string>>;
  ledger: StepLedger;
  signal?: AbortSignal;
}

function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new ExecutionCancelledError(signal.reason);
  }
}

/**
 * Find an UnparsableOutputError on the error or its cause chain.
 */
function findUnparsableOutput(error: unknown): UnparsableOutputError | null {
  let current: unknown = error;
  for (let depth = 0; depth < 8 && current instanceof Error; depth++) {
    if (current instanceof UnparsableOutputError) {
      return current;
    }
    current = current.cause;
  }
  return null;
}

/**
 * Check that every input value is a string.
 */
export function inputsToString(
  inputValues: Readonly<Record<string, unknown>>
): Record<string, string> {
  const inputs: Record<string, string> = {};
  for (const [key, value] of Object.entries(inputValues)) {
    if (typeof value !== 'string') {
      throw new InputNotStringError(key);
    }
    inputs[key] = value;
  }
  return inputs;
}

export class Executor {
  readonly maxIterations: number;
  readonly returnIntermediateSteps: boolean;
  readonly errorPolicy?: ErrorRecoveryPolicy;
  readonly observer?: ExecutorObserver;
  readonly memory?: Memory;
  private logger: Logger;
  // Read-only after construction, so concurrent calls share it.
  private registry: ToolRegistry;

  /**
   * Builds the tool registry from `planner.tools` once. Throws ConfigError on
   * invalid options and ToolRegistryError when a tool uses the reserved name.
   */
  constructor(
    readonly planner: Planner,
    options: ExecutorOptions = {}
  ) {
    const settings = ExecutorSettingsSchema.safeParse({
      maxIterations: options.maxIterations,
      returnIntermediateSteps: options.returnIntermediateSteps,
    });
    if (!settings.success) {
      throw new ConfigError(
        `Invalid executor options: ${settings.error.issues
          .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
          .join('; ')}`
      );
    }
    this.maxIterations = settings.data.maxIterations;
    this.returnIntermediateSteps = settings.data.returnIntermediateSteps;
    this.errorPolicy = options.errorPolicy;
    this.observer = options.observer;
    this.memory = options.memory;
    this.logger = (options.logger ?? new Logger('info')).child('executor');
    this.registry = ToolRegistry.fromTools(planner.tools, this.logger);
  }

  /**
   * Input keys the planner expects. Often `input`.
   */
  get inputKeys(): readonly string[] {
    return this.planner.inputKeys;
  }

  get outputKeys(): readonly string[] {
    return this.planner.outputKeys;
  }

  /**
   * Run the planner to completion and return its outputs.
   *
   * Resolves with `{}` when the planner repeats an action. Rejects with
   * NotFinishedError (carrying the outputs) when the iteration budget runs
   * out, and with any planner, tool or cancellation error unchanged.
   */
  async call(
    inputValues: Readonly<Record<string, unknown>>,
    options?: ExecutorCallOptions
  ): Promise<Record<string, unknown>> {
    const result = await this.run(inputValues, options);
    if (result.status === 'not_finished') {
      throw new NotFinishedError(result.outputs);
    }
    return result.outputs;
  }

  /**
   * Same loop as `call`, reporting how it ended instead of rejecting on an
   * exhausted budget.
   */
  async run(
    inputValues: Readonly<Record<string, unknown>>,
    options: ExecutorCallOptions = {}
  ): Promise<ExecutorRunResult> {
    const inputs = inputsToString(inputValues);
    throwIfCancelled(options.signal);

    const state: CallState = {
      inputs,
      ledger: new StepLedger(),
      signal: options.signal,
    };

    for (let i = 0; i < this.maxIterations; i++) {
      this.logger.debug(`Iteration ${i + 1}/${this.maxIterations}`, { steps: state.ledger.length });

      const result = await this.doIteration(state, i + 1);
      if (result) {
        return result;
      }

      if (this.maxIterations > 2 && i === this.maxIterations - 2) {
        state.ledger.appendObservation(LAST_CHANCE_OBSERVATION);
      }
    }

    const steps = state.ledger.snapshot();
    this.logger.warn(`Stopped after ${this.maxIterations} iteration(s) without a final answer`);
    const finish: AgentFinish = { returnValues: { output: NOT_FINISHED_MESSAGE } };
    notifyObserver('onFinish', () => this.observer?.onFinish?.(finish, steps), this.logger);

    return {
      status: 'not_finished',
      outputs: this.getReturn({}, steps),
      steps,
      iterations: this.maxIterations,
    };
  }

  private async doIteration(
    state: CallState,
    iteration: number
  ): Promise<ExecutorRunResult | null> {
    const plan = await this.plan(state);
    if (!plan) {
      return null;
    }

    if (plan.actions.length === 0 && !plan.finish) {
      throw new AgentNoReturnError();
    }

    if (plan.finish) {
      const finish = plan.finish;
      const steps = state.ledger.snapshot();
      this.logger.debug('Planner finished', { iteration, steps: steps.length });
      notifyObserver('onFinish', () => this.observer?.onFinish?.(finish, steps), this.logger);
      return {
        status: 'finished',
        outputs: this.getReturn(finish.returnValues, steps),
        steps,
        iterations: iteration,
      };
    }

    for (const action of plan.actions) {
      if (findRepeatedAction(state.ledger.snapshot(), action)) {
        this.logger.warn(`Repeated action ${action.tool}, stopping`, { input: action.toolInput });
        state.ledger.append(action, REPEATED_ACTION_OBSERVATION);
        return {
          status: 'repeated_action',
          outputs: {},
          steps: state.ledger.snapshot(),
          iterations: iteration,
        };
      }

      await this.doAction(state, action);
    }

    return null;
  }

  /**
   * Ask the planner for the next round. Returns null when an unparsable
   * output was turned into an observation.
   */
  private async plan(state: CallState): Promise<PlanResult | null> {
    throwIfCancelled(state.signal);
    let plan: PlanResult;
    try {
      plan = await this.planner.plan(state.ledger.snapshot(), state.inputs, {
        signal: state.signal,
        memory: this.memory,
      });
    } catch (error) {
      throwIfCancelled(state.signal);
      const unparsable = findUnparsableOutput(error);
      if (unparsable && this.errorPolicy) {
        this.logger.warn('Planner output unparsable, continuing with recovery observation');
        state.ledger.appendObservation(this.errorPolicy.format(unparsable.message));
        return null;
      }
      throw error;
    }
    throwIfCancelled(state.signal);

    this.logger.debug('Planner returned', {
      actions: plan.actions.map((action) => action.tool),
      finish: Boolean(plan.finish),
    });
    return plan;
  }

  private async doAction(state: CallState, action: AgentAction): Promise<void> {
    notifyObserver('onAction', () => this.observer?.onAction?.(action), this.logger);

    const resolution = this.registry.resolve(action.tool);
    if (resolution.kind === 'final_answer') {
      state.ledger.append(action, FINAL_ANSWER_OBSERVATION);
      return;
    }
    if (resolution.kind === 'unknown') {
      this.logger.warn(`Unknown tool requested: ${resolution.name}`);
      state.ledger.append(action, invalidToolObservation(action.tool));
      return;
    }

    const { tool } = resolution;
    throwIfCancelled(state.signal);
    const startTime = Date.now();
    let observation: string;
    try {
      observation = await tool.call(action.toolInput, {
        signal: state.signal,
        steps: state.ledger.snapshot(),
      });
    } catch (error) {
      throwIfCancelled(state.signal);
      throw error;
    }
    throwIfCancelled(state.signal);

    this.logger.debug(`Tool ${tool.name} returned`, {
      durationMs: Date.now() - startTime,
      chars: observation.length,
    });
    state.ledger.append(action, observation);
  }

  private getReturn(
    returnValues: Readonly<Record<string, unknown>>,
    steps: readonly AgentStep[]
  ): Record<string, unknown> {
    if (this.returnIntermediateSteps) {
      return { ...returnValues, [INTERMEDIATE_STEPS_KEY]: steps };
    }
    return { ...returnValues };
  }
}

/**
 * Create an executor for a planner.
 */
export function createExecutor(planner: Planner, options?: ExecutorOptions): Executor {
  return new Executor(planner, options);
}

/**
 * Map the `agent` section of the config file onto executor options.
 */
export function executorOptionsFromConfig(
  config: AgentLoopConfig,
  extra: Omit<ExecutorOptions, 'maxIterations' | 'returnIntermediateSteps' | 'errorPolicy'> = {}
): ExecutorOptions {
  const recovery = config.agent.parserErrorRecovery;
  let errorPolicy: ErrorRecoveryPolicy | undefined;
  if (recovery.enabled) {
    errorPolicy = recovery.message
      ? createStaticMessagePolicy(recovery.message)
      : createErrorRecoveryPolicy();
  }
  return {
    ...extra,
    maxIterations: config.agent.maxIterations,
    returnIntermediateSteps: config.agent.returnIntermediateSteps,
    errorPolicy,
  };
}
