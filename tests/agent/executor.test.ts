import { describe, expect, it, vi } from 'vitest';

import {
  Executor,
  INTERMEDIATE_STEPS_KEY,
  NOT_FINISHED_MESSAGE,
} from '../../src/agent/executor/executor.js';
import {
  FINAL_ANSWER_OBSERVATION,
  LAST_CHANCE_OBSERVATION,
  REPEATED_ACTION_OBSERVATION,
} from '../../src/agent/executor/ledger.js';
import { createErrorRecoveryPolicy } from '../../src/agent/executor/recovery.js';
import { EMPTY_ACTION } from '../../src/agent/planning/types.js';
import { calculatorTool } from '../../src/agent/tools/adapters/system-tools.js';
import {
  AgentNoReturnError,
  ConfigError,
  ExecutionCancelledError,
  InputNotStringError,
  NotFinishedError,
  ToolRegistryError,
  UnparsableOutputError,
} from '../../src/core/errors.js';
import { Logger } from '../../src/core/logger.js';
import { BufferMemory } from '../../src/memory/buffer.js';
import { ScriptedPlanner, action, actions, fakeTool, finish } from '../helpers/fakes.js';

const quiet = new Logger('error');

describe('Executor', () => {
  describe('finishing', () => {
    it('runs a tool and returns the finish values', async () => {
      const search = fakeTool('search', () => 'Paris');
      const planner = new ScriptedPlanner(
        [actions(action('search', 'capital of France')), finish('Paris')],
        [search]
      );
      const executor = new Executor(planner, { logger: quiet });

      const outputs = await executor.call({ input: 'What is the capital of France?' });

      expect(outputs).toEqual({ output: 'Paris' });
      expect(search.calls.map((c) => c.input)).toEqual(['capital of France']);
      expect(planner.calls).toHaveLength(2);
      expect(planner.calls[1].steps).toEqual([
        { action: action('search', 'capital of France'), observation: 'Paris' },
      ]);
    });

    it('adds the steps under the reserved key when returnIntermediateSteps is set', async () => {
      const search = fakeTool('search', () => 'Paris');
      const finishValues = { output: 'Paris' };
      const planner = new ScriptedPlanner(
        [actions(action('search', 'capital of France')), { actions: [], finish: { returnValues: finishValues } }],
        [search]
      );
      const executor = new Executor(planner, { returnIntermediateSteps: true, logger: quiet });

      const outputs = await executor.call({ input: 'q' });

      expect(outputs).toEqual({
        output: 'Paris',
        [INTERMEDIATE_STEPS_KEY]: [
          { action: action('search', 'capital of France'), observation: 'Paris' },
        ],
      });
      expect(finishValues).toEqual({ output: 'Paris' });
    });

    it('stops on a finish returned alongside actions', async () => {
      const search = fakeTool('search');
      const planner = new ScriptedPlanner(
        [
          {
            actions: [action('search', 'x')],
            finish: { returnValues: { output: 'early' } },
          },
        ],
        [search]
      );
      const executor = new Executor(planner, { logger: quiet });

      await expect(executor.call({ input: 'q' })).resolves.toEqual({ output: 'early' });
      expect(search.calls).toHaveLength(0);
      expect(planner.calls).toHaveLength(1);
    });

    it('resolves the tool name case-insensitively', async () => {
      const search = fakeTool('search');
      const planner = new ScriptedPlanner(
        [actions(action('SEARCH', 'x')), finish('done')],
        [search]
      );
      const executor = new Executor(planner, { logger: quiet });

      const result = await executor.run({ input: 'q' });

      expect(result.status).toBe('finished');
      expect(result.steps[0].observation).toBe('search:x');
    });

    it('runs every action of a round in order', async () => {
      const order: string[] = [];
      const first = fakeTool('first', (input) => {
        order.push(`first:${input}`);
        return 'one';
      });
      const second = fakeTool('second', (input) => {
        order.push(`second:${input}`);
        return 'two';
      });
      const planner = new ScriptedPlanner(
        [actions(action('first', 'a'), action('second', 'b')), finish('done')],
        [first, second]
      );
      const executor = new Executor(planner, { logger: quiet });

      const result = await executor.run({ input: 'q' });

      expect(order).toEqual(['first:a', 'second:b']);
      expect(result.steps.map((step) => step.observation)).toEqual(['one', 'two']);
      expect(result.iterations).toBe(2);
    });
  });

  describe('iteration budget', () => {
    it('rejects with NotFinishedError when the planner never finishes', async () => {
      const onFinish = vi.fn();
      const planner = new ScriptedPlanner([actions(action('search', 'x'))], [fakeTool('search')]);
      const executor = new Executor(planner, {
        maxIterations: 1,
        observer: { onFinish },
        logger: quiet,
      });

      const error = await executor.call({ input: 'q' }).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(NotFinishedError);
      expect(error).toMatchObject({ code: 'NOT_FINISHED', outputs: {} });
      expect(planner.calls).toHaveLength(1);
      expect(onFinish).toHaveBeenCalledTimes(1);
      expect(onFinish).toHaveBeenCalledWith(
        { returnValues: { output: NOT_FINISHED_MESSAGE } },
        [{ action: action('search', 'x'), observation: 'search:x' }]
      );
    });

    it('invokes the planner at most maxIterations times and adds a last-chance hint', async () => {
      const planner = new ScriptedPlanner(
        [(steps) => actions(action('search', `q${steps.length}`))],
        [fakeTool('search')]
      );
      const executor = new Executor(planner, { maxIterations: 3, logger: quiet });

      const result = await executor.run({ input: 'q' });

      expect(result.status).toBe('not_finished');
      expect(result.iterations).toBe(3);
      expect(planner.calls).toHaveLength(3);
      expect(result.steps.map((step) => step.action.toolInput)).toEqual(['q0', 'q1', '', 'q3']);
      expect(result.steps[2]).toEqual({ action: EMPTY_ACTION, observation: LAST_CHANCE_OBSERVATION });
    });

    it('adds no hint when maxIterations is 2 or less', async () => {
      const planner = new ScriptedPlanner(
        [(steps) => actions(action('search', `q${steps.length}`))],
        [fakeTool('search')]
      );
      const executor = new Executor(planner, { maxIterations: 2, logger: quiet });

      const result = await executor.run({ input: 'q' });

      expect(result.steps.map((step) => step.observation)).toEqual(['search:q0', 'search:q1']);
    });

    it('returns the steps with the NotFinishedError when returnIntermediateSteps is set', async () => {
      const planner = new ScriptedPlanner([actions(action('search', 'x'))], [fakeTool('search')]);
      const executor = new Executor(planner, {
        maxIterations: 1,
        returnIntermediateSteps: true,
        logger: quiet,
      });

      const error = await executor.call({ input: 'q' }).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(NotFinishedError);
      expect(error).toMatchObject({
        outputs: {
          [INTERMEDIATE_STEPS_KEY]: [{ action: action('search', 'x'), observation: 'search:x' }],
        },
      });
    });

    it('rejects invalid options', () => {
      expect(() => new Executor(new ScriptedPlanner([]), { maxIterations: 0 })).toThrow(ConfigError);
    });

    it('rejects a planner whose tools use the reserved name at construction', () => {
      const planner = new ScriptedPlanner([finish('done')], [fakeTool('None')]);

      expect(() => new Executor(planner, { logger: quiet })).toThrow(ToolRegistryError);
      expect(planner.calls).toHaveLength(0);
    });

    it('warns about a duplicate tool name once, not on every call', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const planner = new ScriptedPlanner([finish('done')], [fakeTool('search'), fakeTool('Search')]);
      const executor = new Executor(planner, { logger: new Logger('warn') });

      await executor.call({ input: 'a' });
      await executor.call({ input: 'b' });

      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith('[warn] [executor] Tool search replaced by Search');
    });
  });

  describe('repeated actions', () => {
    it('stops with empty outputs and no error at the second occurrence', async () => {
      const calc = fakeTool('calc', () => '4');
      const planner = new ScriptedPlanner(
        [actions(action('calc', '2+2')), actions(action('calc', '2+2')), finish('never')],
        [calc]
      );
      const executor = new Executor(planner, { logger: quiet });

      await expect(executor.call({ input: 'q' })).resolves.toEqual({});
      expect(planner.calls).toHaveLength(2);
      expect(calc.calls).toHaveLength(1);
    });

    it('reports the repetition as a distinct status with a cautionary step', async () => {
      const planner = new ScriptedPlanner(
        [actions(action('calc', '2+2', 'first')), actions(action('calc', '2+2', 'second'))],
        [fakeTool('calc')]
      );
      const executor = new Executor(planner, { logger: quiet });

      const result = await executor.run({ input: 'q' });

      expect(result.status).toBe('repeated_action');
      expect(result.outputs).toEqual({});
      expect(result.steps).toHaveLength(2);
      expect(result.steps[1]).toEqual({
        action: action('calc', '2+2', 'second'),
        observation: REPEATED_ACTION_OBSERVATION,
      });
    });

    it('ignores the rest of the batch once a repetition is seen', async () => {
      const calc = fakeTool('calc');
      const other = fakeTool('other');
      const planner = new ScriptedPlanner(
        [actions(action('calc', '1'), action('calc', '1'), action('other', 'x'))],
        [calc, other]
      );
      const executor = new Executor(planner, { logger: quiet });

      const result = await executor.run({ input: 'q' });

      expect(result.status).toBe('repeated_action');
      expect(calc.calls).toHaveLength(1);
      expect(other.calls).toHaveLength(0);
    });

    it('treats the same tool with a different input as a new action', async () => {
      const planner = new ScriptedPlanner(
        [actions(action('calc', '1')), actions(action('calc', '2')), finish('3')],
        [fakeTool('calc')]
      );
      const executor = new Executor(planner, { logger: quiet });

      await expect(executor.call({ input: 'q' })).resolves.toEqual({ output: '3' });
    });
  });

  describe('tool resolution', () => {
    it('asks for a final answer when the planner picks the "none" tool', async () => {
      const planner = new ScriptedPlanner([actions(action('NONE', '')), finish('done')]);
      const executor = new Executor(planner, { logger: quiet });

      const outputs = await executor.call({ input: 'q' });

      expect(outputs).toEqual({ output: 'done' });
      expect(planner.calls[1].steps).toEqual([
        { action: action('NONE', ''), observation: FINAL_ANSWER_OBSERVATION },
      ]);
    });

    it('records an unknown tool and keeps going', async () => {
      const planner = new ScriptedPlanner([actions(action('fooTool', 'x')), finish('done')]);
      const executor = new Executor(planner, { logger: quiet });

      const outputs = await executor.call({ input: 'q' });

      expect(outputs).toEqual({ output: 'done' });
      expect(planner.calls[1].steps).toEqual([
        { action: action('fooTool', 'x'), observation: 'fooTool is not a valid tool, try another one' },
      ]);
    });

    it('appends one explanatory step per unknown action', async () => {
      const planner = new ScriptedPlanner([
        actions(action('a', '1'), action('b', '2')),
        finish('done'),
      ]);
      const executor = new Executor(planner, { logger: quiet });

      await executor.call({ input: 'q' });

      expect(planner.calls[1].steps.map((step) => step.observation)).toEqual([
        'a is not a valid tool, try another one',
        'b is not a valid tool, try another one',
      ]);
    });

    it('passes the steps so far to the tool explicitly', async () => {
      const lookup = fakeTool('lookup');
      const planner = new ScriptedPlanner(
        [actions(action('lookup', '1')), actions(action('lookup', '2')), finish('done')],
        [lookup]
      );
      const executor = new Executor(planner, { logger: quiet });

      await executor.call({ input: 'q' });

      expect(lookup.calls[0].ctx.steps).toEqual([]);
      expect(lookup.calls[1].ctx.steps).toEqual([
        { action: action('lookup', '1'), observation: 'lookup:1' },
      ]);
    });
  });

  describe('errors', () => {
    it('rejects non-string inputs before planning', async () => {
      const planner = new ScriptedPlanner([finish('done')]);
      const executor = new Executor(planner, { logger: quiet });

      const error = await executor.call({ input: 'q', count: 42 }).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(InputNotStringError);
      expect(error).toMatchObject({ key: 'count', code: 'INPUT_NOT_STRING' });
      expect(planner.calls).toHaveLength(0);
    });

    it('rejects when the planner returns neither actions nor a finish', async () => {
      const planner = new ScriptedPlanner([{ actions: [] }]);
      const executor = new Executor(planner, { logger: quiet });

      await expect(executor.call({ input: 'q' })).rejects.toBeInstanceOf(AgentNoReturnError);
    });

    it('surfaces unparsable output when no recovery policy is set', async () => {
      const parseError = new UnparsableOutputError('garbage');
      const planner = new ScriptedPlanner([parseError, finish('done')]);
      const executor = new Executor(planner, { logger: quiet });

      await expect(executor.call({ input: 'q' })).rejects.toBe(parseError);
      expect(planner.calls).toHaveLength(1);
    });

    it('turns unparsable output into an observation when a policy is set', async () => {
      const onAction = vi.fn();
      const planner = new ScriptedPlanner([new UnparsableOutputError('garbage'), finish('ok')]);
      const executor = new Executor(planner, {
        errorPolicy: createErrorRecoveryPolicy((message) => `fix: ${message}`),
        observer: { onAction },
        logger: quiet,
      });

      const outputs = await executor.call({ input: 'q' });

      expect(outputs).toEqual({ output: 'ok' });
      expect(planner.calls[1].steps).toEqual([
        { action: EMPTY_ACTION, observation: 'fix: unable to parse agent output: garbage' },
      ]);
      expect(onAction).not.toHaveBeenCalled();
    });

    it('recovers from an unparsable output wrapped as a cause', async () => {
      const wrapped = new Error('planner failed', { cause: new UnparsableOutputError('x') });
      const planner = new ScriptedPlanner([wrapped, finish('ok')]);
      const executor = new Executor(planner, {
        errorPolicy: createErrorRecoveryPolicy(),
        logger: quiet,
      });

      const result = await executor.run({ input: 'q' });

      expect(result.status).toBe('finished');
      expect(planner.calls[1].steps[0].observation).toBe('unable to parse agent output: x');
    });

    it('does not recover from other planner errors', async () => {
      const planner = new ScriptedPlanner([new Error('llm down')]);
      const executor = new Executor(planner, {
        errorPolicy: createErrorRecoveryPolicy(),
        logger: quiet,
      });

      await expect(executor.call({ input: 'q' })).rejects.toThrow('llm down');
    });

    it('keeps going after the calculator rejects an expression', async () => {
      const planner = new ScriptedPlanner(
        [actions(action('calculator', '2 + 2 =')), actions(action('calculator', '2 + 2')), finish('4')],
        [calculatorTool]
      );
      const executor = new Executor(planner, { logger: quiet });

      const result = await executor.run({ input: 'What is 2 + 2?' });

      expect(result.status).toBe('finished');
      expect(result.outputs).toEqual({ output: '4' });
      expect(result.steps.map((step) => step.observation)).toEqual([
        'Error: Expression contains invalid characters',
        '4',
      ]);
    });

    it('propagates a tool failure unchanged and stops', async () => {
      const failure = new Error('boom');
      const broken = fakeTool('broken', () => {
        throw failure;
      });
      const after = fakeTool('after');
      const planner = new ScriptedPlanner(
        [actions(action('broken', 'x'), action('after', 'y')), finish('never')],
        [broken, after]
      );
      const executor = new Executor(planner, { logger: quiet });

      await expect(executor.call({ input: 'q' })).rejects.toBe(failure);
      expect(after.calls).toHaveLength(0);
      expect(planner.calls).toHaveLength(1);
    });
  });

  describe('observer', () => {
    it('is told about each dispatched action and the finish', async () => {
      const onAction = vi.fn();
      const onFinish = vi.fn();
      const planner = new ScriptedPlanner(
        [actions(action('search', 'x'), action('missing', 'y')), finish('done')],
        [fakeTool('search')]
      );
      const executor = new Executor(planner, { observer: { onAction, onFinish }, logger: quiet });

      await executor.call({ input: 'q' });

      expect(onAction.mock.calls.map(([a]) => a.tool)).toEqual(['search', 'missing']);
      expect(onFinish).toHaveBeenCalledTimes(1);
      expect(onFinish.mock.calls[0][0]).toEqual({ returnValues: { output: 'done' } });
      expect(onFinish.mock.calls[0][1]).toHaveLength(2);
    });

    it('cannot break the call by throwing', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const planner = new ScriptedPlanner(
        [actions(action('search', 'x')), finish('done')],
        [fakeTool('search')]
      );
      const executor = new Executor(planner, {
        observer: {
          onAction: () => {
            throw new Error('boom');
          },
        },
        logger: new Logger('warn'),
      });

      await expect(executor.call({ input: 'q' })).resolves.toEqual({ output: 'done' });
      expect(warn).toHaveBeenCalledWith('[warn] [executor] Observer onAction failed: boom');
    });

    it('logs a rejected async notification without waiting for it', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const planner = new ScriptedPlanner([finish('done')]);
      const executor = new Executor(planner, {
        observer: { onFinish: async () => Promise.reject(new Error('sink offline')) },
        logger: new Logger('warn'),
      });

      await expect(executor.call({ input: 'q' })).resolves.toEqual({ output: 'done' });
      await vi.waitFor(() =>
        expect(warn).toHaveBeenCalledWith('[warn] [executor] Observer onFinish failed: sink offline')
      );
    });
  });

  describe('cancellation', () => {
    it('rejects before planning when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const planner = new ScriptedPlanner([finish('done')]);
      const executor = new Executor(planner, { logger: quiet });

      await expect(
        executor.call({ input: 'q' }, { signal: controller.signal })
      ).rejects.toBeInstanceOf(ExecutionCancelledError);
      expect(planner.calls).toHaveLength(0);
    });

    it('stops after a tool call during which the signal was aborted', async () => {
      const controller = new AbortController();
      const slow = fakeTool('slow', () => {
        controller.abort();
        return 'late';
      });
      const planner = new ScriptedPlanner([actions(action('slow', 'x')), finish('done')], [slow]);
      const executor = new Executor(planner, { logger: quiet });

      await expect(
        executor.call({ input: 'q' }, { signal: controller.signal })
      ).rejects.toBeInstanceOf(ExecutionCancelledError);
      expect(planner.calls).toHaveLength(1);
    });

    it('reports a planner failure caused by the abort as a cancellation', async () => {
      const controller = new AbortController();
      const planner = new ScriptedPlanner([
        () => {
          controller.abort();
          throw new Error('request aborted');
        },
      ]);
      const executor = new Executor(planner, { logger: quiet });

      await expect(
        executor.call({ input: 'q' }, { signal: controller.signal })
      ).rejects.toBeInstanceOf(ExecutionCancelledError);
    });

    it('hands the signal to the planner and the tools', async () => {
      const controller = new AbortController();
      const search = fakeTool('search');
      const planner = new ScriptedPlanner([actions(action('search', 'x')), finish('done')], [search]);
      const executor = new Executor(planner, { logger: quiet });

      await executor.call({ input: 'q' }, { signal: controller.signal });

      expect(planner.calls[0].ctx.signal).toBe(controller.signal);
      expect(search.calls[0].ctx.signal).toBe(controller.signal);
    });
  });

  describe('calls', () => {
    it('keeps the steps of concurrent calls apart', async () => {
      const echo = fakeTool('echo', async (input) => {
        await new Promise((resolve) => setTimeout(resolve, input === 'a' ? 5 : 0));
        return `echo:${input}`;
      });
      const planner = new ScriptedPlanner(
        [
          (steps, inputs) =>
            steps.length === 0 ? actions(action('echo', inputs.input)) : finish(steps[0].observation),
        ],
        [echo]
      );
      const executor = new Executor(planner, { logger: quiet });

      const [a, b] = await Promise.all([
        executor.call({ input: 'a' }),
        executor.call({ input: 'b' }),
      ]);

      expect(a).toEqual({ output: 'echo:a' });
      expect(b).toEqual({ output: 'echo:b' });
    });

    it('starts every call with an empty ledger', async () => {
      const planner = new ScriptedPlanner(
        [(steps) => (steps.length === 0 ? actions(action('search', 'x')) : finish('done'))],
        [fakeTool('search')]
      );
      const executor = new Executor(planner, { logger: quiet });

      await executor.call({ input: 'q' });
      const second = await executor.run({ input: 'q' });

      expect(second.status).toBe('finished');
      expect(second.steps).toHaveLength(1);
    });

    it('threads memory to the planner and delegates key accessors', async () => {
      const memory = new BufferMemory();
      const planner = new ScriptedPlanner([finish('done')]);
      const executor = new Executor(planner, { memory, logger: quiet });

      await executor.call({ input: 'q' });

      expect(planner.calls[0].ctx.memory).toBe(memory);
      expect(executor.inputKeys).toEqual(['input']);
      expect(executor.outputKeys).toEqual(['output']);
    });
  });
});
