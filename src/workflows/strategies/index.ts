import type { Logger } from 'pino';
import type { HarnessConfig } from '../../config/app-config';
import type { Gcloud } from '../../infrastructure/cli/gcloud';
import type { Kubectl } from '../../infrastructure/cli/kubectl';
import type { KubernetesClient } from '../../infrastructure/kubernetes/client';
import { ConfigurationError } from '../../lib/errors';
import { DirectStrategy } from './direct';
import { ManagedStrategy } from './managed';
import type { ExecutionStrategy } from './types';

export { DirectStrategy, type DirectStrategyDeps, type DirectWaitMethod } from './direct';
export { ManagedStrategy, type ManagedStrategyDeps } from './managed';
export type { ExecutionStrategy } from './types';

export interface StrategyDeps {
  logger: Logger;
  kubectl: Kubectl;
  gcloud: Gcloud;
  /** Only needed, and only created, in direct mode */
  kubernetes?: KubernetesClient;
}

export function createStrategy(config: HarnessConfig, deps: StrategyDeps): ExecutionStrategy {
  if (config.mode === 'direct') {
    if (!deps.kubernetes) {
      throw new ConfigurationError('direct mode requires a Kubernetes client');
    }
    return new DirectStrategy({
      kubectl: deps.kubectl,
      kubernetes: deps.kubernetes,
      logger: deps.logger,
      waitMethod: config.direct.waitMethod,
    });
  }

  const { serviceAccount, runPrefix, pollIntervalMs } = config.managed;
  if (!serviceAccount) {
    throw new ConfigurationError('managed mode requires a service account');
  }
  return new ManagedStrategy({
    gcloud: deps.gcloud,
    logger: deps.logger,
    serviceAccount,
    runPrefix,
    pollIntervalMs,
  });
}
