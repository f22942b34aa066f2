import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { ManagedStrategy } from '../../../src/workflows/strategies/managed';
import { Gcloud } from '../../../src/infrastructure/cli/gcloud';
import { ParseError } from '../../../src/lib/errors';
import { parseManifest } from '../../../src/lib/manifest-rewriter';
import type { ExecutionScope, RunIdentifier, WaitOptions } from '../../../src/domain/types';
import type { CommandOptions, CommandResult } from '../../../src/infrastructure/command-executor';
import { ScriptedRunner, createMockLogger } from '../../__support__/utilities/mock-infrastructure';

const scope: ExecutionScope = {
  id: 'scope-1',
  mode: 'managed',
  bundleRef: 'registry.test/catalog/echo-ab12c:scope-1',
  stepActionName: 'echo-ab12c',
};
const run: RunIdentifier = { kind: 'TaskRun', name: 'catalog-test-scope-1' };
const options: WaitOptions = { expectedCondition: 'Succeeded', timeoutMs: 2000 };
const DESCRIBE =
  'gcloud builds runs describe catalog-test-scope-1 --region=us-central1 --project=test-project --format=json';

function described(conditions: unknown[], nested = false): { stdout: string } {
  return { stdout: JSON.stringify(nested ? { status: { conditions } } : { conditions }) };
}

/**
 * Answers describe after `delayMs`, or reports a timeout when the call's own
 * timeout is shorter, the way the command executor does
 */
class SlowDescribeRunner extends ScriptedRunner {
  constructor(private readonly delayMs: number) {
    super();
  }

  override async execute(
    program: string,
    args: readonly string[],
    options: CommandOptions = {},
  ): Promise<CommandResult> {
    const result = await super.execute(program, args, options);
    const limit = options.timeout ?? this.delayMs;
    await new Promise((resolve) => setTimeout(resolve, Math.min(this.delayMs, limit)));
    return limit < this.delayMs ? { ...result, exitCode: -1, timedOut: true } : result;
  }
}

describe('ManagedStrategy', () => {
  let runner: ScriptedRunner;

  beforeEach(() => {
    runner = new ScriptedRunner();
  });

  function createStrategy(pollIntervalMs = 10): ManagedStrategy {
    return new ManagedStrategy({
      gcloud: new Gcloud(runner, {
        binary: 'gcloud',
        region: 'us-central1',
        project: 'test-project',
        timeout: 1000,
      }),
      logger: createMockLogger(),
      serviceAccount: 'runner@test-project.iam.gserviceaccount.com',
      runPrefix: 'catalog-test-',
      pollIntervalMs,
    });
  }

  describe('submit', () => {
    let workDir: string;

    beforeEach(async () => {
      workDir = await mkdtemp(path.join(tmpdir(), 'managed-submit-'));
    });

    afterEach(async () => {
      await rm(workDir, { recursive: true, force: true });
    });

    it('rewrites the run for the managed API and applies it', async () => {
      const manifestPath = path.join(workDir, 'run.yaml');
      await writeFile(
        manifestPath,
        'kind: TaskRun\nmetadata:\n  generateName: echo-\nspec:\n  taskSpec:\n    steps:\n      - ref:\n          name: echo-ab12c\n',
      );

      const submitted = await createStrategy().submit(manifestPath, scope);

      const managedPath = path.join(workDir, 'run.managed.yaml');
      expect(submitted).toEqual(run);
      expect(runner.lines).toEqual([
        `gcloud builds runs apply --file=${managedPath} --region=us-central1 --project=test-project`,
      ]);
      expect(parseManifest(await readFile(managedPath, 'utf-8'))).toEqual([
        {
          kind: 'TaskRun',
          metadata: { name: 'catalog-test-scope-1' },
          spec: {
            taskSpec: {
              steps: [
                {
                  ref: {
                    resolver: 'bundles',
                    params: [
                      { name: 'bundle', value: 'registry.test/catalog/echo-ab12c:scope-1' },
                      { name: 'name', value: 'echo-ab12c' },
                      { name: 'kind', value: 'stepaction' },
                    ],
                  },
                },
              ],
            },
            security: { serviceAccount: 'runner@test-project.iam.gserviceaccount.com' },
          },
        },
      ]);
    });
  });

  describe('wait', () => {
    it('polls until the Succeeded condition is TRUE', async () => {
      runner.on(
        'runs describe',
        described([{ type: 'Succeeded', status: 'UNKNOWN' }]),
        described([{ type: 'Succeeded', status: 'TRUE' }]),
      );

      await expect(createStrategy().wait(run, scope, options)).resolves.toEqual({ status: 'Succeeded' });
      expect(runner.lines).toEqual([DESCRIBE, DESCRIBE]);
    });

    it('fails with the reason of a FALSE condition', async () => {
      runner.on(
        'runs describe',
        described([{ type: 'Succeeded', status: 'FALSE', reason: 'TaskRunFailed', message: 'step failed' }]),
      );

      await expect(createStrategy().wait(run, scope, options)).resolves.toEqual({
        status: 'Failed',
        reason: 'TaskRunFailed',
        message: 'step failed',
      });
    });

    it('finds the Succeeded condition by type, not by position', async () => {
      runner.on(
        'runs describe',
        described([
          { type: 'Ready', status: 'FALSE' },
          { type: 'Succeeded', status: 'TRUE' },
        ]),
      );

      await expect(createStrategy().wait(run, scope, options)).resolves.toEqual({ status: 'Succeeded' });
    });

    it('reads conditions nested under status', async () => {
      runner.on('runs describe', described([{ type: 'Succeeded', status: 'TRUE' }], true));

      await expect(createStrategy().wait(run, scope, options)).resolves.toEqual({ status: 'Succeeded' });
    });

    it('does not accept the cluster casing of True', async () => {
      runner.on('runs describe', described([{ type: 'Succeeded', status: 'True' }]));

      const outcome = await createStrategy().wait(run, scope, { ...options, timeoutMs: 50 });

      expect(outcome).toEqual({ status: 'TimedOut', timeoutMs: 50 });
    });

    it('stops polling at the deadline', async () => {
      runner.on('runs describe', described([]));

      const outcome = await createStrategy(10).wait(run, scope, { ...options, timeoutMs: 60 });

      expect(outcome).toEqual({ status: 'TimedOut', timeoutMs: 60 });
      expect(runner.calls.length).toBeGreaterThanOrEqual(2);
      expect(runner.calls.length).toBeLessThanOrEqual(7);
    });

    it('gives a describe call no more than the time left before the deadline', async () => {
      runner = new SlowDescribeRunner(800);
      runner.on('runs describe', described([]));
      const startedAt = Date.now();

      const outcome = await createStrategy().wait(run, scope, { ...options, timeoutMs: 100 });

      expect(outcome).toEqual({ status: 'TimedOut', timeoutMs: 100 });
      expect(runner.calls).toHaveLength(1);
      expect(runner.calls[0]?.options.timeout).toBeLessThanOrEqual(100);
      expect(Date.now() - startedAt).toBeLessThan(500);
    });

    it('reports a failing describe command as a failed run', async () => {
      runner.on('runs describe', { exitCode: 1, stderr: 'ERROR: NOT_FOUND' });

      await expect(createStrategy().wait(run, scope, options)).resolves.toEqual({
        status: 'Failed',
        reason: 'DescribeFailed',
        message: `${DESCRIBE} exited with code 1\nERROR: NOT_FOUND`,
      });
    });

    it('times out when the caller aborts between polls', async () => {
      runner.on('runs describe', described([]));
      const abort = new AbortController();

      const pending = createStrategy(1000).wait(run, scope, { ...options, signal: abort.signal });
      setTimeout(() => abort.abort(), 20);

      await expect(pending).resolves.toEqual({ status: 'TimedOut', timeoutMs: 2000 });
      expect(runner.calls).toHaveLength(1);
    });
  });

  describe('fetching', () => {
    it('returns the describe JSON as the run document', async () => {
      runner.on('runs describe', { stdout: '{"name":"catalog-test-scope-1"}' });

      await expect(createStrategy().fetchDocument(run)).resolves.toBe('{"name":"catalog-test-scope-1"}');
    });

    it('parses step results from the description', async () => {
      runner.on('runs describe', {
        stdout: JSON.stringify({
          status: { steps: [{ name: 'echo', results: [{ name: 'out', type: 'string', value: 'hi' }] }] },
        }),
      });

      const fetched = await createStrategy().fetchRun(run);

      expect(fetched.status.steps).toEqual([
        { name: 'echo', results: [{ name: 'out', type: 'string', value: 'hi' }] },
      ]);
    });

    it('raises a ParseError on malformed JSON', async () => {
      runner.on('runs describe', { stdout: 'not json' });

      await expect(createStrategy().fetchRun(run)).rejects.toThrow(ParseError);
    });
  });
});
