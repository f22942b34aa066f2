/**
 * Direct strategy - `kubectl apply` into the scope's namespace, then watch the
 * run through the Kubernetes API (or block on `kubectl wait`).
 */

import type { Logger } from 'pino';
import {
  isFail,
  type ExecutionScope,
  type RunIdentifier,
  type WaitOptions,
  type WaitOutcome,
} from '../../domain/types';
import type { TektonRunObject } from '../../domain/tekton-schemas';
import type { Kubectl, LogTarget } from '../../infrastructure/cli/kubectl';
import type { KubernetesClient, WatchHandle } from '../../infrastructure/kubernetes/client';
import {
  CONDITION_TRUE,
  SUCCEEDED_CONDITION,
  findCondition,
  isRunDone,
  meetsCondition,
} from '../../lib/conditions';
import { InvalidStateError, KubernetesError, toError } from '../../lib/errors';
import { extractRunIdentifier } from '../../lib/run-identifier';
import type { ExecutionStrategy } from './types';

export type DirectWaitMethod = 'watch' | 'kubectl';

export interface DirectStrategyDeps {
  kubectl: Kubectl;
  kubernetes: KubernetesClient;
  logger: Logger;
  waitMethod?: DirectWaitMethod;
}

type WatchVerdict =
  | { kind: 'succeeded' }
  | { kind: 'failed'; reason: string; message?: string }
  | { kind: 'error'; error: Error }
  | { kind: 'timeout' };

function namespaceOf(scope: ExecutionScope): string {
  if (!scope.namespace) {
    throw new InvalidStateError(`scope ${scope.id} has no namespace`, { scope });
  }
  return scope.namespace;
}

export class DirectStrategy implements ExecutionStrategy {
  readonly mode = 'direct' as const;
  private readonly waitMethod: DirectWaitMethod;

  constructor(private readonly deps: DirectStrategyDeps) {
    this.waitMethod = deps.waitMethod ?? 'watch';
  }

  async submit(manifestPath: string, scope: ExecutionScope): Promise<RunIdentifier> {
    const output = await this.deps.kubectl.apply(manifestPath, namespaceOf(scope));
    return extractRunIdentifier(output);
  }

  async wait(run: RunIdentifier, scope: ExecutionScope, options: WaitOptions): Promise<WaitOutcome> {
    const namespace = namespaceOf(scope);
    return this.waitMethod === 'kubectl'
      ? this.waitWithKubectl(run, namespace, options)
      : this.waitWithWatch(run, namespace, options);
  }

  fetchDocument(run: RunIdentifier, scope: ExecutionScope): Promise<string> {
    return this.deps.kubectl.getYaml(run, namespaceOf(scope));
  }

  async fetchRun(run: RunIdentifier, scope: ExecutionScope): Promise<TektonRunObject> {
    const result = await this.deps.kubernetes.getRun(run, namespaceOf(scope));
    if (isFail(result)) {
      throw new KubernetesError(result.error, { run });
    }
    return result.value;
  }

  private async waitWithWatch(
    run: RunIdentifier,
    namespace: string,
    options: WaitOptions,
  ): Promise<WaitOutcome> {
    const verdict = await this.watchUntilTerminal(run, namespace, options);

    switch (verdict.kind) {
      case 'succeeded':
        return { status: 'Succeeded' };
      case 'failed':
        return this.failed(run, namespace, verdict.reason, verdict.message);
      case 'error':
        return this.failed(run, namespace, 'WatchError', verdict.error.message);
      case 'timeout':
        return this.timedOut(run, namespace, options.timeoutMs);
    }
  }

  private watchUntilTerminal(
    run: RunIdentifier,
    namespace: string,
    { expectedCondition, timeoutMs, signal }: WaitOptions,
  ): Promise<WatchVerdict> {
    return new Promise<WatchVerdict>((resolve) => {
      let settled = false;
      let handle: WatchHandle | undefined;

      const onAbort = (): void => finish({ kind: 'timeout' });
      const timer = setTimeout(onAbort, timeoutMs);

      function finish(verdict: WatchVerdict): void {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        handle?.stop();
        resolve(verdict);
      }

      if (signal?.aborted) {
        finish({ kind: 'timeout' });
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      this.deps.kubernetes
        .watchRun(run, namespace, Math.max(1, Math.ceil(timeoutMs / 1000)), {
          onEvent: (type, object) => {
            if (type === 'DELETED') return;
            const { conditions } = object.status;
            if (!isRunDone(conditions)) return;

            if (meetsCondition(conditions, expectedCondition, CONDITION_TRUE)) {
              finish({ kind: 'succeeded' });
              return;
            }
            const succeeded = findCondition(conditions, SUCCEEDED_CONDITION);
            finish({
              kind: 'failed',
              reason: succeeded?.reason ?? `ConditionNotMet:${expectedCondition}`,
              ...(succeeded?.message ? { message: succeeded.message } : {}),
            });
          },
          onError: (error) => finish({ kind: 'error', error }),
          onClose: () => finish({ kind: 'timeout' }),
        })
        .then(
          (started) => {
            if (settled) {
              started.stop();
            } else {
              handle = started;
            }
          },
          (error: unknown) => finish({ kind: 'error', error: toError(error) }),
        );
    });
  }

  private async waitWithKubectl(
    run: RunIdentifier,
    namespace: string,
    { expectedCondition, timeoutMs, signal }: WaitOptions,
  ): Promise<WaitOutcome> {
    const result = await this.deps.kubectl.wait(run, namespace, expectedCondition, timeoutMs, signal);
    if (result.exitCode === 0 && !result.timedOut) {
      return { status: 'Succeeded' };
    }
    if (result.timedOut || /timed out/i.test(result.output)) {
      return this.timedOut(run, namespace, timeoutMs);
    }
    return this.failed(run, namespace, 'WaitFailed', result.output.trim());
  }

  private async failed(
    run: RunIdentifier,
    namespace: string,
    reason: string,
    message?: string,
  ): Promise<WaitOutcome> {
    const logs = await this.collectLogs(run, namespace);
    return {
      status: 'Failed',
      reason,
      ...(message ? { message } : {}),
      ...(logs !== undefined ? { logs } : {}),
    };
  }

  private async timedOut(run: RunIdentifier, namespace: string, timeoutMs: number): Promise<WaitOutcome> {
    const logs = await this.collectLogs(run, namespace);
    return { status: 'TimedOut', timeoutMs, ...(logs !== undefined ? { logs } : {}) };
  }

  /**
   * Best effort: a failure here is logged and the outcome carries no logs
   */
  private async collectLogs(run: RunIdentifier, namespace: string): Promise<string | undefined> {
    try {
      const target = await this.logTarget(run, namespace);
      return await this.deps.kubectl.logs(target, namespace);
    } catch (error) {
      this.deps.logger.warn(
        { run, namespace, error: toError(error).message },
        'Could not retrieve run logs',
      );
      return undefined;
    }
  }

  private async logTarget(run: RunIdentifier, namespace: string): Promise<LogTarget> {
    if (run.kind === 'PipelineRun') {
      return { selector: `tekton.dev/pipelineRun=${run.name}` };
    }
    const result = await this.deps.kubernetes.getRun(run, namespace);
    if (result.ok && result.value.status.podName) {
      return { pod: result.value.status.podName };
    }
    return { selector: `tekton.dev/taskRun=${run.name}` };
  }
}
