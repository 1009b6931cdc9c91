import type { AgentAction, AgentFinish, AgentStep } from '../planning/types.js';

/**
 * Side-channel notified by the executor. Notifications are fire-and-forget:
 * return values are ignored, returned promises are not awaited, and a throw
 * or rejection is logged and dropped.
 */
export interface ExecutorObserver {
  onAction?(action: Readonly<AgentAction>): void | Promise<void>;

  /** Called once per call, with the executed steps at termination */
  onFinish?(finish: Readonly<AgentFinish>, steps: readonly AgentStep[]): void | Promise<void>;
}
