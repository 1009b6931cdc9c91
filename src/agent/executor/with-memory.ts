import type { Executor } from './executor.js';
import { inputsToString } from './executor.js';
import type { ExecutorCallOptions } from './types.js';

/**
 * Call an executor inside its memory: memory variables are merged into the
 * inputs (caller inputs win), and the exchange is saved after a successful
 * call. Without memory this is a plain `executor.call`.
 */
export async function callWithMemory(
  executor: Executor,
  inputValues: Readonly<Record<string, unknown>>,
  options?: ExecutorCallOptions
): Promise<Record<string, unknown>> {
  const memory = executor.memory;
  if (!memory) {
    return executor.call(inputValues, options);
  }

  const inputs = inputsToString(inputValues);
  const variables = await memory.loadMemoryVariables(inputs);
  const outputs = await executor.call({ ...variables, ...inputs }, options);
  await memory.saveContext(inputs, outputs);
  return outputs;
}
