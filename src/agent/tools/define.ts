import type { z } from 'zod';

import { ToolInputError } from '../../core/errors.js';
import type { Tool, ToolCallContext } from './types.js';

export interface ToolSpec {
  name: string;
  description: string;
  call: (input: string, ctx: ToolCallContext) => Promise<string>;
}

export interface SchemaToolSpec<TInput> {
  name: string;
  description: string;
  /** Validates (and may transform) the raw string input before `call` */
  schema: z.ZodType<TInput, z.ZodTypeDef, string>;
  call: (input: TInput, ctx: ToolCallContext) => Promise<string>;
  /**
   * Turns a rejected input into the observation. Without it a rejected input
   * fails the call with ToolInputError.
   */
  onInvalidInput?: (message: string) => string;
}

/**
 * Build a Tool from a plain spec.
 */
export function defineTool(spec: ToolSpec): Tool {
  return {
    name: spec.name,
    description: spec.description,
    call: (input, ctx) => spec.call(input, ctx),
  };
}

/**
 * Build a Tool whose string input is validated with zod first.
 */
export function defineSchemaTool<TInput>(spec: SchemaToolSpec<TInput>): Tool {
  return {
    name: spec.name,
    description: spec.description,
    call: async (input, ctx) => {
      const parsed = spec.schema.safeParse(input);
      if (!parsed.success) {
        if (spec.onInvalidInput) {
          return spec.onInvalidInput(parsed.error.issues[0]?.message ?? 'Invalid input');
        }
        throw new ToolInputError(
          spec.name,
          parsed.error.issues.map((issue) => issue.message).join('; ')
        );
      }
      return spec.call(parsed.data, ctx);
    },
  };
}
