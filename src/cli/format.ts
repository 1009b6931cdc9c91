import type { AgentStep } from '../agent/planning/types.js';

/**
 * Render executed steps for terminal output. Steps without an action are
 * shown as notes.
 */
export function formatSteps(steps: readonly AgentStep[]): string {
  if (steps.length === 0) {
    return 'No steps taken.';
  }
  const lines: string[] = [];
  steps.forEach((step, index) => {
    const label = step.action.tool ? `${step.action.tool}(${step.action.toolInput})` : '(note)';
    lines.push(`${index + 1}. ${label}`);
    lines.push(`   -> ${step.observation.trim()}`);
  });
  return lines.join('\n');
}
