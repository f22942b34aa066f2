/**
 * Execution scope manager
 *
 * One scope per test: a fresh namespace on the direct path, a StepAction
 * bundle tagged with the scope ID on the managed path. Everything created is
 * paired with a finalizer; `release()` runs them in reverse order of creation.
 */

import { randomUUID } from 'node:crypto';
import path from 'node:path';
import type { Logger } from 'pino';
import type { ExecutionMode, ExecutionScope } from '../domain/types';
import type { Gcloud } from '../infrastructure/cli/gcloud';
import type { Kubectl } from '../infrastructure/cli/kubectl';
import type { Tkn } from '../infrastructure/cli/tkn';
import { ConfigurationError } from '../lib/errors';
import { FinalizerChain, type FinalizerAction, type FinalizerReport } from '../lib/finalizers';

export interface ScopeHandle {
  readonly scope: ExecutionScope;
  /** Register extra cleanup; runs before everything registered earlier */
  defer: (name: string, action: FinalizerAction) => void;
  /** Idempotent; never rejects */
  release: () => Promise<FinalizerReport>;
}

export interface AcquireOptions {
  /** StepAction file to publish as a bundle (managed mode) */
  stepActionFile?: string;
  /** Bundle repository name; defaults to the file name without extension */
  stepActionName?: string;
}

export interface ScopeManagerDeps {
  mode: ExecutionMode;
  logger: Logger;
  kubectl: Kubectl;
  gcloud: Gcloud;
  tkn: Tkn;
  bundleRegistry?: string;
  generateId?: () => string;
}

export class ScopeManager {
  private readonly generateId: () => string;

  constructor(private readonly deps: ScopeManagerDeps) {
    this.generateId = deps.generateId ?? randomUUID;
  }

  async acquire(options: AcquireOptions = {}): Promise<ScopeHandle> {
    const id = this.generateId();
    const logger = this.deps.logger.child({ scope: id });
    const chain = new FinalizerChain(logger);

    let scope: ExecutionScope;
    try {
      scope =
        this.deps.mode === 'direct'
          ? await this.createNamespace(id, chain)
          : await this.pushBundle(id, options, chain);
    } catch (error) {
      // Undo whatever was created before the failure
      await chain.run();
      throw error;
    }

    logger.info({ mode: scope.mode, namespace: scope.namespace, bundle: scope.bundleRef }, 'Scope acquired');

    return {
      scope,
      defer: (name, action) => chain.add(name, action),
      release: async () => {
        const report = await chain.run();
        if (report.failures.length > 0) {
          logger.error(
            { failed: report.failures.map((failure) => failure.name) },
            'Scope released with cleanup failures',
          );
        } else {
          logger.info({ completed: report.completed }, 'Scope released');
        }
        return report;
      },
    };
  }

  private async createNamespace(id: string, chain: FinalizerChain): Promise<ExecutionScope> {
    await this.deps.kubectl.createNamespace(id);
    chain.add(`namespace/${id}`, () => this.deps.kubectl.deleteNamespace(id));
    return { id, mode: 'direct', namespace: id };
  }

  private async pushBundle(
    id: string,
    options: AcquireOptions,
    chain: FinalizerChain,
  ): Promise<ExecutionScope> {
    const { bundleRegistry } = this.deps;
    if (!bundleRegistry) {
      throw new ConfigurationError('managed mode requires a bundle registry');
    }
    if (!options.stepActionFile) {
      throw new ConfigurationError('managed mode requires the StepAction file to publish');
    }

    const name = (options.stepActionName ?? path.basename(options.stepActionFile, '.yaml')).toLowerCase();
    const bundleRef = `${bundleRegistry.replace(/\/+$/, '')}/${name}:${id}`;

    await this.deps.tkn.bundlePush(bundleRef, options.stepActionFile);
    chain.add(`bundle/${bundleRef}`, () => this.deps.gcloud.deleteImage(bundleRef));
    return {
      id,
      mode: 'managed',
      bundleRef,
      ...(options.stepActionName ? { stepActionName: options.stepActionName } : {}),
    };
  }
}
