/**
 * LLM Planner
 *
 * ReAct-style planner: renders the tools, the question and the steps taken so
 * far into a prompt, and parses the completion into an action or a finish.
 */

import type { ChatMessage, LlmClient } from '../../core/llm.js';
import type { Tool } from '../tools/types.js';
import { parseReActOutput } from './parser.js';
import type { AgentStep, PlanContext, PlanResult, Planner } from './types.js';

const DEFAULT_PREFIX =
  'Answer the following question as best you can. You have access to the following tools:';

/**
 * System prompt for the planner.
 */
const PLANNER_SYSTEM_PROMPT = `{PREFIX}

{TOOLS}

Use the following format:

Question: the input question you must answer
Thought: you should always think about what to do
Action: the action to take, should be one of [{TOOL_NAMES}]
Action Input: the input to the action
Observation: the result of the action
... (this Thought/Action/Action Input/Observation can repeat N times)
Thought: I now know the final answer
Final Answer: the final answer to the original input question

If no tool is needed, use "none" as the action with an empty Action Input.`;

export interface LlmPlannerOptions {
  llm: LlmClient;
  tools: readonly Tool[];
  /** First paragraph of the system prompt */
  prefix?: string;
  inputKey?: string;
  outputKey?: string;
  /** Input variable holding the rendered conversation history */
  historyKey?: string;
  temperature?: number;
}

/**
 * Render the steps taken so far as the running transcript.
 */
export function buildScratchpad(steps: readonly AgentStep[]): string {
  let scratchpad = '';
  for (const step of steps) {
    scratchpad += `\n${step.action.log}`;
    scratchpad += `\nObservation: ${step.observation}\n`;
  }
  return scratchpad;
}

export class LlmPlanner implements Planner {
  readonly tools: readonly Tool[];
  readonly inputKeys: readonly string[];
  readonly outputKeys: readonly string[];
  private llm: LlmClient;
  private prefix: string;
  private inputKey: string;
  private outputKey: string;
  private historyKey: string;
  private temperature: number;

  constructor(options: LlmPlannerOptions) {
    this.llm = options.llm;
    this.tools = [...options.tools];
    this.prefix = options.prefix ?? DEFAULT_PREFIX;
    this.inputKey = options.inputKey ?? 'input';
    this.outputKey = options.outputKey ?? 'output';
    this.historyKey = options.historyKey ?? 'history';
    this.temperature = options.temperature ?? 0.2;
    this.inputKeys = [this.inputKey];
    this.outputKeys = [this.outputKey];
  }

  async plan(
    steps: readonly AgentStep[],
    inputs: Readonly<Record<string, string>>,
    ctx: PlanContext
  ): Promise<PlanResult> {
    const messages = this.buildMessages(steps, await this.withMemory(inputs, ctx));
    const response = await this.llm.complete(messages, {
      temperature: this.temperature,
      stop: ['\nObservation:'],
      signal: ctx.signal,
    });
    return parseReActOutput(response.content, this.outputKey);
  }

  /**
   * Merge the memory variables under the inputs when the caller did not pass
   * the history itself (callWithMemory does).
   */
  private async withMemory(
    inputs: Readonly<Record<string, string>>,
    ctx: PlanContext
  ): Promise<Readonly<Record<string, string>>> {
    if (!ctx.memory || inputs[this.historyKey] !== undefined) {
      return inputs;
    }
    const variables = await ctx.memory.loadMemoryVariables(inputs);
    return { ...variables, ...inputs };
  }

  buildMessages(
    steps: readonly AgentStep[],
    inputs: Readonly<Record<string, string>>
  ): ChatMessage[] {
    const systemPrompt = PLANNER_SYSTEM_PROMPT.replace('{PREFIX}', this.prefix)
      .replace('{TOOLS}', this.tools.map((tool) => `${tool.name}: ${tool.description}`).join('\n'))
      .replace('{TOOL_NAMES}', this.tools.map((tool) => tool.name).join(', '));

    return [
      { role: 'system', content: systemPrompt },
      { role: 'user', content: this.buildUserPrompt(steps, inputs) },
    ];
  }

  private buildUserPrompt(
    steps: readonly AgentStep[],
    inputs: Readonly<Record<string, string>>
  ): string {
    const sections: string[] = [];

    const history = inputs[this.historyKey];
    if (history) {
      sections.push(`Previous conversation:\n${history}`);
    }

    sections.push(`Question: ${inputs[this.inputKey] ?? ''}`);

    return `${sections.join('\n\n')}\nThought:${buildScratchpad(steps)}`;
  }
}
