/**
 * Step Ledger
 *
 * Append-only history of one executor call, plus the repeated-action guard.
 */

import { EMPTY_ACTION, type AgentAction, type AgentStep } from '../planning/types.js';

export const REPEATED_ACTION_OBSERVATION =
  'ATTENTION: you are repeating the same action. Now, you have just 2 options: 1. Write the final answer. 2. Write a different action';

export const FINAL_ANSWER_OBSERVATION =
  'ATTENTION: write the final answer. use the format -> Final Answer: ';

export const LAST_CHANCE_OBSERVATION =
  '\n Important: Do you have enough data to answer? Provide the final answer \n';

export function invalidToolObservation(tool: string): string {
  return `${tool} is not a valid tool, try another one`;
}

export class StepLedger {
  private steps: AgentStep[] = [];

  get length(): number {
    return this.steps.length;
  }

  append(action: Readonly<AgentAction>, observation: string): AgentStep {
    const step: AgentStep = Object.freeze({
      action: Object.freeze({ ...action }),
      observation,
    });
    this.steps.push(step);
    return step;
  }

  /**
   * Append a step that records no action (parse recovery, hints).
   */
  appendObservation(observation: string): AgentStep {
    return this.append(EMPTY_ACTION, observation);
  }

  /**
   * Point-in-time copy; later appends do not show up in it.
   */
  snapshot(): readonly AgentStep[] {
    return Object.freeze([...this.steps]);
  }
}

/**
 * Find an earlier step with the same tool and input. Tool names compare
 * case-insensitively, inputs exactly; the log and the observation are not
 * compared.
 */
export function findRepeatedAction(
  steps: readonly AgentStep[],
  action: Readonly<AgentAction>
): AgentStep | undefined {
  return steps.find(
    (step) =>
      step.action.tool.toUpperCase() === action.tool.toUpperCase() &&
      step.action.toolInput === action.toolInput
  );
}

export function isRepeatedAction(
  steps: readonly AgentStep[],
  action: Readonly<AgentAction>
): boolean {
  return findRepeatedAction(steps, action) !== undefined;
}
