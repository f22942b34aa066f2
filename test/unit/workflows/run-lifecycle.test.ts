import { describe, it, expect, jest } from '@jest/globals';
import { RunLifecycleController } from '../../../src/workflows/run-lifecycle';
import type { ExecutionStrategy } from '../../../src/workflows/strategies/types';
import type {
  ExecutionScope,
  RunIdentifier,
  WaitOptions,
  WaitOutcome,
} from '../../../src/domain/types';
import {
  InvalidStateError,
  ParseError,
  RunFailedError,
  RunTimeoutError,
} from '../../../src/lib/errors';
import { createMockLogger, tektonRun } from '../../__support__/utilities/mock-infrastructure';

const scope: ExecutionScope = { id: 'scope-1', mode: 'direct', namespace: 'scope-1' };
const taskRun: RunIdentifier = { kind: 'TaskRun', name: 'echo-run' };
const options: WaitOptions = { expectedCondition: 'Succeeded', timeoutMs: 1000 };

function fakeStrategy(outcome: WaitOutcome, submitError?: Error) {
  const strategy = {
    mode: 'direct' as const,
    submit: jest.fn(async (_manifestPath: string, _scope: ExecutionScope): Promise<RunIdentifier> => {
      if (submitError) throw submitError;
      return taskRun;
    }),
    wait: jest.fn(
      async (_run: RunIdentifier, _scope: ExecutionScope, _options: WaitOptions): Promise<WaitOutcome> => outcome,
    ),
    fetchDocument: jest.fn(async (_run: RunIdentifier, _scope: ExecutionScope) => 'kind: TaskRun\n'),
    fetchRun: jest.fn(async (_run: RunIdentifier, _scope: ExecutionScope) => tektonRun({ kind: 'TaskRun' })),
  } satisfies ExecutionStrategy;
  return strategy;
}

describe('RunLifecycleController', () => {
  it('walks Created -> Submitted -> Watching -> Succeeded', async () => {
    const strategy = fakeStrategy({ status: 'Succeeded' });
    const controller = new RunLifecycleController(strategy, scope, createMockLogger());

    expect(controller.state).toBe('Created');
    await expect(controller.submit('/work/run.yaml')).resolves.toEqual(taskRun);
    expect(controller.state).toBe('Submitted');
    await expect(controller.waitForCompletion(options)).resolves.toEqual({ status: 'Succeeded' });

    expect(controller.state).toBe('Succeeded');
    expect(controller.history.map(({ from, to }) => `${from}->${to}`)).toEqual([
      'Created->Submitted',
      'Submitted->Watching',
      'Watching->Succeeded',
    ]);
    expect(strategy.submit).toHaveBeenCalledWith('/work/run.yaml', scope);
    expect(strategy.wait).toHaveBeenCalledWith(taskRun, scope, options);
  });

  it('refuses to wait before submitting', async () => {
    const controller = new RunLifecycleController(fakeStrategy({ status: 'Succeeded' }), scope, createMockLogger());

    await expect(controller.waitForCompletion(options)).rejects.toThrow(InvalidStateError);
    await expect(controller.waitForCompletion(options)).rejects.toThrow('cannot wait a run in state Created');
  });

  it('refuses a second submission', async () => {
    const controller = new RunLifecycleController(fakeStrategy({ status: 'Succeeded' }), scope, createMockLogger());
    await controller.submit('/work/run.yaml');

    await expect(controller.submit('/work/run.yaml')).rejects.toThrow('cannot submit a run in state Submitted');
  });

  it('moves to Failed when submission fails', async () => {
    const controller = new RunLifecycleController(
      fakeStrategy({ status: 'Succeeded' }, new ParseError('no TaskRun or PipelineRun found in the output')),
      scope,
      createMockLogger(),
    );

    await expect(controller.submit('/work/run.yaml')).rejects.toThrow(ParseError);
    expect(controller.state).toBe('Failed');
    expect(controller.submitted).toBeUndefined();
    expect(() => controller.run).toThrow(InvalidStateError);
  });

  it('records the outcome of a failed run', async () => {
    const controller = new RunLifecycleController(
      fakeStrategy({ status: 'Failed', reason: 'TaskRunFailed' }),
      scope,
      createMockLogger(),
    );
    await controller.submit('/work/run.yaml');
    await controller.waitForCompletion(options);

    expect(controller.state).toBe('Failed');
    expect(controller.outcome).toEqual({ status: 'Failed', reason: 'TaskRunFailed' });
  });

  describe('expectSuccess', () => {
    it('throws RunFailedError carrying the reason, message and logs', async () => {
      const controller = new RunLifecycleController(
        fakeStrategy({ status: 'Failed', reason: 'Failed', message: 'step exited 1', logs: 'boom' }),
        scope,
        createMockLogger(),
      );
      await controller.submit('/work/run.yaml');

      const error = await controller.expectSuccess(options).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(RunFailedError);
      expect(error).toHaveProperty('message', 'TaskRun echo-run failed: Failed\nstep exited 1\nboom');
    });

    it('throws RunTimeoutError on a timeout', async () => {
      const controller = new RunLifecycleController(
        fakeStrategy({ status: 'TimedOut', timeoutMs: 1000 }),
        scope,
        createMockLogger(),
      );
      await controller.submit('/work/run.yaml');

      await expect(controller.expectSuccess(options)).rejects.toThrow(RunTimeoutError);
      expect(controller.state).toBe('TimedOut');
    });

    it('resolves for a successful run', async () => {
      const controller = new RunLifecycleController(fakeStrategy({ status: 'Succeeded' }), scope, createMockLogger());
      await controller.submit('/work/run.yaml');

      await expect(controller.expectSuccess(options)).resolves.toBeUndefined();
    });
  });

  it('fetches documents for the submitted run', async () => {
    const strategy = fakeStrategy({ status: 'Succeeded' });
    const controller = new RunLifecycleController(strategy, scope, createMockLogger());
    await controller.submit('/work/run.yaml');

    await expect(controller.fetchDocument()).resolves.toBe('kind: TaskRun\n');
    expect(strategy.fetchDocument).toHaveBeenCalledWith(taskRun, scope);
  });
});
