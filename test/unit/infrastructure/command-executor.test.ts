import { describe, it, expect } from '@jest/globals';
import { CommandExecutor, requireStdout } from '../../../src/infrastructure/command-executor';
import { CommandFailedError } from '../../../src/lib/errors';
import { createMockLogger } from '../../__support__/utilities/mock-infrastructure';

const node = process.execPath;

function script(source: string): string[] {
  return ['-e', source];
}

describe('CommandExecutor', () => {
  const executor = new CommandExecutor(createMockLogger(), 10000);

  it('captures stdout, stderr and the exit code', async () => {
    const result = await executor.execute(
      node,
      script('process.stdout.write("out"); process.stderr.write("err"); process.exitCode = 3;'),
    );

    expect(result.stdout).toBe('out');
    expect(result.stderr).toBe('err');
    expect(result.output).toContain('out');
    expect(result.output).toContain('err');
    expect(result.output).toHaveLength(6);
    expect(result.exitCode).toBe(3);
    expect(result.timedOut).toBe(false);
  });

  it('feeds stdin to the child', async () => {
    const result = await executor.execute(
      node,
      script('let d = ""; process.stdin.on("data", (c) => (d += c)); process.stdin.on("end", () => process.stdout.write(d.toUpperCase()));'),
      { stdin: 'kind: taskrun' },
    );

    expect(result.stdout).toBe('KIND: TASKRUN');
  });

  it('terminates a command that outlives its timeout', async () => {
    const result = await executor.execute(node, script('setTimeout(() => {}, 10000);'), { timeout: 100 });

    expect(result.timedOut).toBe(true);
    expect(result.exitCode).not.toBe(0);
  });

  it('terminates a command when the signal aborts', async () => {
    const abort = new AbortController();
    const pending = executor.execute(node, script('setTimeout(() => {}, 10000);'), { signal: abort.signal });
    setTimeout(() => abort.abort(), 50);

    await expect(pending).resolves.toMatchObject({ timedOut: true });
  });

  it('does not start a command for an already aborted signal', async () => {
    const abort = new AbortController();
    abort.abort();

    await expect(executor.execute(node, script(''), { signal: abort.signal })).resolves.toEqual({
      stdout: '',
      stderr: '',
      output: '',
      exitCode: -1,
      timedOut: true,
    });
  });

  it('rejects when the program cannot be spawned', async () => {
    await expect(executor.execute('definitely-not-a-real-binary-7f3a', [])).rejects.toThrow(CommandFailedError);
  });

  describe('run', () => {
    it('returns the combined output on success', async () => {
      await expect(executor.run(node, script('console.log("namespace/demo created")'))).resolves.toBe(
        'namespace/demo created\n',
      );
    });

    it('throws with the output embedded on a non-zero exit', async () => {
      const failing = executor.run(node, script('process.stderr.write("Forbidden"); process.exit(1);'));

      await expect(failing).rejects.toThrow(CommandFailedError);
      await expect(
        executor.run(node, script('process.stderr.write("Forbidden"); process.exit(1);')),
      ).rejects.toThrow(/exited with code 1\nForbidden$/);
    });
  });
});

describe('requireStdout', () => {
  it('returns stdout of a successful command', () => {
    expect(
      requireStdout('yq', ['eval', '.a', '-'], {
        stdout: 'x\n',
        stderr: 'warning',
        output: 'x\nwarning',
        exitCode: 0,
        timedOut: false,
      }),
    ).toBe('x\n');
  });

  it('throws CommandFailedError for a failed command', () => {
    expect(() =>
      requireStdout('yq', ['eval', '.a', '-'], {
        stdout: '',
        stderr: 'Error: bad expression',
        output: 'Error: bad expression',
        exitCode: 1,
        timedOut: false,
      }),
    ).toThrow('yq eval .a - exited with code 1\nError: bad expression');
  });
});
