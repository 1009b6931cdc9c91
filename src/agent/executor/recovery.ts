/**
 * Turns an unparsable planner output into an observation the planner can
 * react to on its next round.
 */
export interface ErrorRecoveryPolicy {
  format(rawErrorMessage: string): string;
}

/**
 * Policy that passes the error message through `formatter`, or unchanged
 * when none is given.
 */
export function createErrorRecoveryPolicy(
  formatter?: (rawErrorMessage: string) => string
): ErrorRecoveryPolicy {
  return {
    format: (rawErrorMessage) => (formatter ? formatter(rawErrorMessage) : rawErrorMessage),
  };
}

/**
 * Policy that always answers with the same correction hint.
 */
export function createStaticMessagePolicy(message: string): ErrorRecoveryPolicy {
  return createErrorRecoveryPolicy(() => message);
}
