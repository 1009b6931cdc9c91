/**
 * Conversation memory: named variables loaded before a call and updated
 * after it.
 */
export interface Memory {
  /** Variable names this memory contributes to the inputs */
  readonly memoryKeys: readonly string[];

  loadMemoryVariables(inputs: Readonly<Record<string, string>>): Promise<Record<string, string>>;

  saveContext(
    inputs: Readonly<Record<string, string>>,
    outputs: Readonly<Record<string, unknown>>
  ): Promise<void>;

  clear(): Promise<void>;
}
