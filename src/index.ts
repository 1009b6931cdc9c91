/**
 * agent-loop
 *
 * Main entry point for the agent-loop library.
 */

export * from './agent/index.js';

export { BufferMemory, type BufferMemoryOptions, type BufferedMessage } from './memory/buffer.js';
export type { Memory } from './memory/types.js';

export {
  AnthropicClient,
  createLlmClient,
  type AnthropicClientOptions,
  type ChatMessage,
  type LlmClient,
  type LlmClientMeta,
  type LlmClientOptions,
  type LlmResponse,
} from './core/llm.js';
export { loadConfig, parseConfig, DEFAULT_CONFIG_PATH, type AgentLoopConfig } from './core/config.js';
export { Logger, LOG_LEVELS, isLogLevel, type LogLevel } from './core/logger.js';
export * from './core/errors.js';

// Version
export const VERSION = '0.1.0';
