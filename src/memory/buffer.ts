/**
 * Buffer Memory
 *
 * In-process conversation buffer. Keeps the full exchange history for one
 * conversation and renders it as `Human:` / `AI:` lines.
 */

import type { Memory } from './types.js';

export interface BufferMemoryOptions {
  /** Variable the rendered history is exposed under */
  memoryKey?: string;
  /** Input holding the human turn; the single non-memory input when unset */
  inputKey?: string;
  /** Output holding the AI turn; `output` when unset */
  outputKey?: string;
  humanPrefix?: string;
  aiPrefix?: string;
  /** Keep at most this many turns (human + AI count as two) */
  maxMessages?: number;
}

export interface BufferedMessage {
  role: 'human' | 'ai';
  content: string;
}

export class BufferMemory implements Memory {
  private messages: BufferedMessage[] = [];
  private memoryKey: string;
  private inputKey?: string;
  private outputKey: string;
  private humanPrefix: string;
  private aiPrefix: string;
  private maxMessages?: number;

  constructor(options: BufferMemoryOptions = {}) {
    this.memoryKey = options.memoryKey ?? 'history';
    this.inputKey = options.inputKey;
    this.outputKey = options.outputKey ?? 'output';
    this.humanPrefix = options.humanPrefix ?? 'Human';
    this.aiPrefix = options.aiPrefix ?? 'AI';
    this.maxMessages = options.maxMessages;
  }

  get memoryKeys(): readonly string[] {
    return [this.memoryKey];
  }

  getMessages(): BufferedMessage[] {
    return [...this.messages];
  }

  async loadMemoryVariables(_inputs: Readonly<Record<string, string>>): Promise<Record<string, string>> {
    const rendered = this.messages
      .map((msg) => `${msg.role === 'human' ? this.humanPrefix : this.aiPrefix}: ${msg.content}`)
      .join('\n');
    return { [this.memoryKey]: rendered };
  }

  async saveContext(
    inputs: Readonly<Record<string, string>>,
    outputs: Readonly<Record<string, unknown>>
  ): Promise<void> {
    const human = inputs[this.resolveInputKey(inputs)];
    const ai = outputs[this.outputKey];
    if (human === undefined || ai === undefined) {
      return;
    }
    this.messages.push(
      { role: 'human', content: human },
      { role: 'ai', content: typeof ai === 'string' ? ai : JSON.stringify(ai) }
    );
    if (this.maxMessages !== undefined && this.messages.length > this.maxMessages) {
      this.messages = this.messages.slice(-this.maxMessages);
    }
  }

  async clear(): Promise<void> {
    this.messages = [];
  }

  private resolveInputKey(inputs: Readonly<Record<string, string>>): string {
    if (this.inputKey) {
      return this.inputKey;
    }
    const candidates = Object.keys(inputs).filter((key) => key !== this.memoryKey);
    return candidates.length === 1 ? candidates[0] : 'input';
  }
}
