/**
 * Tool Registry
 *
 * Case-insensitive name lookup built once per executor call.
 */

import { ToolRegistryError } from '../../core/errors.js';
import { Logger } from '../../core/logger.js';
import type { Tool, ToolResolution } from './types.js';

/**
 * Tool name a planner uses to say "no tool, I should answer now".
 */
export const FINAL_ANSWER_TOOL = 'none';

function canonicalName(name: string): string {
  return name.toUpperCase();
}

export function isFinalAnswerTool(name: string): boolean {
  return name.toLowerCase() === FINAL_ANSWER_TOOL;
}

/**
 * Tool Registry
 *
 * Names are canonicalized to upper case. A later tool with the same name
 * replaces the earlier one. No tool may use the final-answer sentinel name.
 */
export class ToolRegistry {
  private tools: Map<string, Tool> = new Map();

  constructor(private logger: Logger = new Logger('info')) {}

  /**
   * Build a registry from a tool list.
   */
  static fromTools(tools: readonly Tool[], logger?: Logger): ToolRegistry {
    const registry = new ToolRegistry(logger);
    registry.registerAll(tools);
    return registry;
  }

  register(tool: Tool): void {
    if (isFinalAnswerTool(tool.name)) {
      throw new ToolRegistryError(`Tool name is reserved: ${tool.name}`);
    }
    const key = canonicalName(tool.name);
    const existing = this.tools.get(key);
    if (existing) {
      this.logger.warn(`Tool ${existing.name} replaced by ${tool.name}`);
    }
    this.tools.set(key, tool);
  }

  registerAll(tools: readonly Tool[]): void {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  get(name: string): Tool | undefined {
    return this.tools.get(canonicalName(name));
  }

  has(name: string): boolean {
    return this.tools.has(canonicalName(name));
  }

  /**
   * Resolve a requested tool name into a tool, the final-answer request, or
   * an unknown name.
   */
  resolve(name: string): ToolResolution {
    const tool = this.get(name);
    if (tool) {
      return { kind: 'tool', tool };
    }
    if (isFinalAnswerTool(name)) {
      return { kind: 'final_answer' };
    }
    return { kind: 'unknown', name };
  }

  list(): Tool[] {
    return Array.from(this.tools.values());
  }

  names(): string[] {
    return this.list().map((tool) => tool.name);
  }

  get size(): number {
    return this.tools.size;
  }
}
