/**
 * Dependency Injection Container
 *
 * Builds every harness component from one frozen configuration. Tests pass
 * overrides (a scripted command runner, a fake Kubernetes client) in place of
 * the real ones.
 */

import type { Logger } from 'pino';
import { createLogger } from '../lib/logger';
import type { HarnessConfig } from '../config/app-config';
import { CommandExecutor, type CommandRunner } from '../infrastructure/command-executor';
import { Gcloud } from '../infrastructure/cli/gcloud';
import { Kubectl } from '../infrastructure/cli/kubectl';
import { Tkn } from '../infrastructure/cli/tkn';
import { YqFieldExtractor, type FieldExtractor } from '../infrastructure/cli/yq';
import { createKubernetesClient, type KubernetesClient } from '../infrastructure/kubernetes/client';
import { ScopeManager } from '../workflows/scope-manager';
import { createStrategy, type ExecutionStrategy } from '../workflows/strategies';

/**
 * All harness dependencies with their types
 */
export interface Deps {
  config: HarnessConfig;
  logger: Logger;

  // Tool wrappers
  runner: CommandRunner;
  kubectl: Kubectl;
  gcloud: Gcloud;
  tkn: Tkn;
  fieldExtractor: FieldExtractor;

  /** Present in direct mode only */
  kubernetesClient?: KubernetesClient;

  strategy: ExecutionStrategy;
  scopeManager: ScopeManager;
}

/**
 * Partial dependency overrides for testing
 */
export type DepsOverrides = Partial<Omit<Deps, 'config'>>;

export function createContainer(config: HarnessConfig, overrides: DepsOverrides = {}): Deps {
  // Create logger first as other services depend on it
  const logger =
    overrides.logger ??
    createLogger({ level: config.logging.level, pretty: config.logging.pretty });

  const runner = overrides.runner ?? new CommandExecutor(logger, config.timeouts.commandMs);

  const kubectl =
    overrides.kubectl ??
    new Kubectl(runner, {
      binary: config.binaries.kubectl,
      timeout: config.timeouts.commandMs,
      ...(config.kubeconfig ? { kubeconfig: config.kubeconfig } : {}),
    });
  const gcloud =
    overrides.gcloud ??
    new Gcloud(runner, {
      binary: config.binaries.gcloud,
      region: config.managed.region,
      timeout: config.timeouts.commandMs,
      ...(config.managed.project ? { project: config.managed.project } : {}),
    });
  const tkn =
    overrides.tkn ?? new Tkn(runner, { binary: config.binaries.tkn, timeout: config.timeouts.commandMs });
  const fieldExtractor =
    overrides.fieldExtractor ??
    new YqFieldExtractor(runner, config.binaries.yq, config.timeouts.commandMs);

  // Loading a kubeconfig fails without a cluster context; managed mode never needs one
  const kubernetesClient =
    config.mode === 'direct'
      ? (overrides.kubernetesClient ?? createKubernetesClient(logger, config.kubeconfig))
      : undefined;

  const strategy =
    overrides.strategy ??
    createStrategy(config, {
      logger,
      kubectl,
      gcloud,
      ...(kubernetesClient ? { kubernetes: kubernetesClient } : {}),
    });

  const scopeManager =
    overrides.scopeManager ??
    new ScopeManager({
      mode: config.mode,
      logger,
      kubectl,
      gcloud,
      tkn,
      ...(config.managed.bundleRegistry ? { bundleRegistry: config.managed.bundleRegistry } : {}),
    });

  logger.debug(
    {
      mode: config.mode,
      waitMethod: config.direct.waitMethod,
      region: config.mode === 'managed' ? config.managed.region : undefined,
    },
    'Dependency container created',
  );

  return {
    config,
    logger,
    runner,
    kubectl,
    gcloud,
    tkn,
    fieldExtractor,
    ...(kubernetesClient ? { kubernetesClient } : {}),
    strategy,
    scopeManager,
  };
}
