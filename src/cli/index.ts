#!/usr/bin/env node
import 'dotenv/config';
/**
 * agent-loop CLI
 *
 * Command-line interface for running a task through the agent executor.
 */

import { Command } from 'commander';

import { VERSION } from '../index.js';
import { loadConfig } from '../core/config.js';
import { errorMessage, isAgentLoopError } from '../core/errors.js';
import { createLlmClient } from '../core/llm.js';
import { Logger } from '../core/logger.js';
import { createLoggingObserver } from '../agent/callbacks/observer.js';
import { Executor, executorOptionsFromConfig } from '../agent/executor/executor.js';
import { LlmPlanner } from '../agent/planning/planner.js';
import { createAllTools } from '../agent/tools/adapters/index.js';
import { formatSteps } from './format.js';

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Expected a positive integer, got: ${value}`);
  }
  return parsed;
}

/**
 * Run a task that is cancelled on Ctrl-C.
 */
async function withInterrupt<T>(task: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onInterrupt = () => controller.abort(new Error('Interrupted'));
  process.once('SIGINT', onInterrupt);
  try {
    return await task(controller.signal);
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}

const program = new Command();

program
  .name('agent-loop')
  .description('Run tasks through a tool-using agent loop')
  .version(VERSION);

// ============================================================================
// Run
// ============================================================================

program
  .command('run')
  .description('Run the agent on a task')
  .argument('<task...>', 'Task or question for the agent')
  .option('-c, --config <path>', 'Config file path')
  .option('--max-iterations <n>', 'Override agent.maxIterations')
  .option('--show-steps', 'Print the steps taken')
  .option('--verbose', 'Log every action and planner round')
  .action(async (taskParts: string[], options: {
    config?: string;
    maxIterations?: string;
    showSteps?: boolean;
    verbose?: boolean;
  }) => {
    const task = taskParts.join(' ').trim();
    if (!task) {
      console.error('Task is required.');
      process.exitCode = 1;
      return;
    }

    const config = loadConfig(options.config);
    if (options.maxIterations) {
      config.agent.maxIterations = parsePositiveInt(options.maxIterations);
    }
    const logger = new Logger(options.verbose ? 'debug' : config.logging.level);

    const planner = new LlmPlanner({
      llm: createLlmClient(config, logger),
      tools: createAllTools(),
      temperature: config.llm.temperature,
    });
    const executor = new Executor(
      planner,
      executorOptionsFromConfig(config, {
        logger,
        observer: options.verbose ? createLoggingObserver(logger.child('observer')) : undefined,
      })
    );

    const result = await withInterrupt((signal) => executor.run({ input: task }, { signal }));

    if (result.status === 'finished') {
      const output = result.outputs.output;
      console.log(typeof output === 'string' ? output : JSON.stringify(result.outputs, null, 2));
    } else if (result.status === 'repeated_action') {
      console.log('The agent stopped after repeating an action without answering.');
    } else {
      console.error(`No final answer after ${result.iterations} iteration(s).`);
      process.exitCode = 1;
    }

    if (options.showSteps) {
      console.log('\nSteps:');
      console.log(formatSteps(result.steps));
    }
  });

// ============================================================================
// Tools
// ============================================================================

program
  .command('tools')
  .description('List the built-in tools')
  .action(() => {
    for (const tool of createAllTools()) {
      console.log(`${tool.name}: ${tool.description}`);
    }
  });

// ============================================================================
// Parse and Run
// ============================================================================

program.parseAsync().catch((error: unknown) => {
  const code = isAgentLoopError(error) ? ` [${error.code}]` : '';
  console.error(`Error${code}: ${errorMessage(error)}`);
  process.exitCode = 1;
});
