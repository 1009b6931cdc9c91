/**
 * Parses ReAct-style planner output:
 *
 *   Thought: ...
 *   Action: <tool>
 *   Action Input: <input>
 *
 * or
 *
 *   Final Answer: <answer>
 */

import { UnparsableOutputError } from '../../core/errors.js';
import type { PlanResult } from './types.js';

export const FINAL_ANSWER_MARKER = 'Final Answer:';

const ACTION_PATTERN = /Action\s*:\s*(.*?)\s*\n+\s*Action\s*Input\s*:\s*([\s\S]*)/;

// An action line with no `Action Input:` after it, e.g. `Action: none`.
const BARE_ACTION_PATTERN = /^\s*Action\s*:\s*(.*?)\s*$/m;

function trimToolInput(raw: string): string {
  const cut = raw.split(/\n\s*Observation\s*:/)[0];
  return cut.trim().replace(/^"+|"+$/g, '').trim();
}

export function parseReActOutput(text: string, outputKey = 'output'): PlanResult {
  const finalIndex = text.lastIndexOf(FINAL_ANSWER_MARKER);
  if (finalIndex !== -1) {
    const answer = text.slice(finalIndex + FINAL_ANSWER_MARKER.length).trim();
    return {
      actions: [],
      finish: { returnValues: { [outputKey]: answer }, log: text },
    };
  }

  const match = ACTION_PATTERN.exec(text) ?? BARE_ACTION_PATTERN.exec(text);
  if (!match || !match[1]) {
    throw new UnparsableOutputError(text);
  }

  return {
    actions: [
      {
        tool: match[1].trim(),
        toolInput: trimToolInput(match[2] ?? ''),
        log: text,
      },
    ],
  };
}
