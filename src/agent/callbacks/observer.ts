/**
 * Observer helpers: safe dispatch, logging observer and fan-out.
 */

import { errorMessage } from '../../core/errors.js';
import type { Logger } from '../../core/logger.js';
import type { ExecutorObserver } from './types.js';

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

/**
 * Run an observer hook without letting it affect the caller. Synchronous
 * throws and rejected promises are logged at warn level.
 */
export function notifyObserver(event: string, invoke: () => unknown, logger: Logger): void {
  const report = (error: unknown) =>
    logger.warn(`Observer ${event} failed: ${errorMessage(error)}`);
  try {
    const result = invoke();
    if (isPromiseLike(result)) {
      result.then(undefined, report);
    }
  } catch (error) {
    report(error);
  }
}

/**
 * Observer that logs every action and the final result.
 */
export function createLoggingObserver(logger: Logger): ExecutorObserver {
  return {
    onAction: (action) => {
      logger.info(`Action: ${action.tool}`, { input: action.toolInput });
    },
    onFinish: (finish, steps) => {
      logger.info(`Finished after ${steps.length} step(s)`, finish.returnValues);
    },
  };
}

/**
 * Fan one notification out to several observers, in order.
 */
export function combineObservers(
  observers: ReadonlyArray<ExecutorObserver | undefined>,
  logger: Logger
): ExecutorObserver {
  const active = observers.filter((observer): observer is ExecutorObserver => Boolean(observer));
  return {
    onAction: (action) => {
      for (const observer of active) {
        notifyObserver('onAction', () => observer.onAction?.(action), logger);
      }
    },
    onFinish: (finish, steps) => {
      for (const observer of active) {
        notifyObserver('onFinish', () => observer.onFinish?.(finish, steps), logger);
      }
    },
  };
}
