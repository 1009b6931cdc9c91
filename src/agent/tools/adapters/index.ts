/**
 * Tool Adapters Index
 *
 * Re-exports the built-in tool adapters and provides a combined tool list.
 */

export { systemTools, currentTimeTool, calculatorTool, stepHistoryTool } from './system-tools.js';

import { systemTools } from './system-tools.js';
import type { Tool } from '../types.js';
import type { ToolRegistry } from '../registry.js';

/**
 * All built-in tools.
 */
export const allTools: Tool[] = [...systemTools];

/**
 * Create a fresh tool list.
 */
export function createAllTools(): Tool[] {
  return [...allTools];
}

/**
 * Register all built-in tools into a registry.
 */
export function registerAllTools(registry: ToolRegistry): void {
  registry.registerAll(allTools);
}
