/**
 * System Tools Adapter
 *
 * Utility tools with no external dependencies.
 */

import { z } from 'zod';

import { errorMessage } from '../../../core/errors.js';
import type { Tool } from '../types.js';
import { defineSchemaTool, defineTool } from '../define.js';

/**
 * Current time tool - get the current date/time.
 */
export const currentTimeTool: Tool = defineTool({
  name: 'current_time',
  description:
    'Get the current date and time as an ISO-8601 timestamp. Input is ignored.',
  call: async () => new Date().toISOString(),
});

const expressionSchema = z
  .string()
  .transform((value) => value.trim())
  .pipe(
    z
      .string()
      .min(1, 'Missing expression')
      .max(200, 'Expression too long')
      .regex(/^[0-9+\-*/%().\s]+$/, 'Expression contains invalid characters')
  );

const calculatorError = (message: string): string => `Error: ${message}`;

/**
 * Calculator tool - evaluate simple arithmetic expressions.
 *
 * A malformed expression is reported back as the observation so the planner
 * can correct it.
 */
export const calculatorTool: Tool = defineSchemaTool({
  name: 'calculator',
  description:
    'Evaluate a simple arithmetic expression. Supports + - * / % and parentheses. Input: the expression, e.g. "12 * (3 + 4)".',
  schema: expressionSchema,
  onInvalidInput: calculatorError,
  call: async (expression) => {
    let result: unknown;
    try {
      // Input is restricted to digits, operators and parentheses above.
      // eslint-disable-next-line no-new-func
      result = Function(`"use strict"; return (${expression});`)();
    } catch (error) {
      return calculatorError(errorMessage(error));
    }
    if (typeof result !== 'number' || !Number.isFinite(result)) {
      return calculatorError('Expression did not produce a valid number');
    }
    return String(result);
  },
});

/**
 * Step history tool - render the steps taken so far in this call.
 */
export const stepHistoryTool: Tool = defineTool({
  name: 'step_history',
  description:
    'List the actions already taken in this task and what they returned. Input is ignored.',
  call: async (_input, ctx) => {
    const taken = ctx.steps.filter((step) => step.action.tool !== '');
    if (taken.length === 0) {
      return 'No actions taken yet.';
    }
    return taken
      .map(
        (step, index) =>
          `${index + 1}. ${step.action.tool}(${step.action.toolInput}) -> ${step.observation}`
      )
      .join('\n');
  },
});

/**
 * All system tools.
 */
export const systemTools: Tool[] = [currentTimeTool, calculatorTool, stepHistoryTool];
