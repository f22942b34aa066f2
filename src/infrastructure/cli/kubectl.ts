/**
 * kubectl wrapper for the direct execution path
 */

import { DEFAULT_TIMEOUTS } from '../../config/defaults';
import { requireStdout, type CommandResult, type CommandRunner } from '../command-executor';
import { resourcePlural, type RunIdentifier } from '../../domain/types';

export interface KubectlOptions {
  binary: string;
  kubeconfig?: string;
  /** Per-command timeout in milliseconds */
  timeout: number;
}

/**
 * Source of logs for a run: the TaskRun's pod, or every pod carrying a label selector
 */
export type LogTarget = { pod: string } | { selector: string };

export class Kubectl {
  constructor(
    private readonly runner: CommandRunner,
    private readonly options: KubectlOptions,
  ) {}

  private args(args: string[]): string[] {
    return this.options.kubeconfig ? ['--kubeconfig', this.options.kubeconfig, ...args] : args;
  }

  apply(file: string, namespace: string): Promise<string> {
    return this.runner.run(this.options.binary, this.args(['apply', '-f', file, '-n', namespace]), {
      timeout: this.options.timeout,
    });
  }

  createNamespace(namespace: string): Promise<string> {
    return this.runner.run(this.options.binary, this.args(['create', 'namespace', namespace]), {
      timeout: this.options.timeout,
    });
  }

  /**
   * Deletes the namespace and everything in it
   */
  deleteNamespace(namespace: string): Promise<string> {
    return this.runner.run(this.options.binary, this.args(['delete', 'namespace', namespace]), {
      timeout: this.options.timeout,
    });
  }

  async getYaml(run: RunIdentifier, namespace: string): Promise<string> {
    const args = this.args([
      'get',
      `${resourcePlural(run.kind)}/${run.name}`,
      '-n',
      namespace,
      '-o',
      'yaml',
    ]);
    const result = await this.runner.execute(this.options.binary, args, {
      timeout: this.options.timeout,
    });
    return requireStdout(this.options.binary, args, result);
  }

  /**
   * Blocking `kubectl wait`. Resolves with the raw result so the caller can
   * tell a timeout apart from a failure.
   */
  wait(
    run: RunIdentifier,
    namespace: string,
    condition: string,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<CommandResult> {
    const seconds = Math.max(1, Math.ceil(timeoutMs / 1000));
    return this.runner.execute(
      this.options.binary,
      this.args([
        'wait',
        `--for=condition=${condition}`,
        `--timeout=${seconds}s`,
        `${resourcePlural(run.kind)}/${run.name}`,
        '-n',
        namespace,
      ]),
      // kubectl enforces its own timeout; ours is a backstop
      { timeout: timeoutMs + this.options.timeout, signal },
    );
  }

  /** Runs under the shorter of the command and log timeouts */
  logs(target: LogTarget, namespace: string): Promise<string> {
    const selector = 'pod' in target ? [target.pod] : ['-l', target.selector, '--prefix'];
    return this.runner.run(
      this.options.binary,
      this.args(['logs', ...selector, '-n', namespace, '--all-containers']),
      { timeout: Math.min(this.options.timeout, DEFAULT_TIMEOUTS.logs) },
    );
  }
}
