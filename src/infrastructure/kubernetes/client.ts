/**
 * Kubernetes Client - Direct k8s API access for Tekton runs
 *
 * Reads and watches `tekton.dev/v1` TaskRuns and PipelineRuns through
 * @kubernetes/client-node. Applying manifests stays with kubectl.
 */

import * as k8s from '@kubernetes/client-node';
import type { Logger } from 'pino';
import { TEKTON_API } from '../../config/defaults';
import { Success, Failure, resourcePlural, type Result, type RunIdentifier } from '../../domain/types';
import { TektonRunSchema, type TektonRunObject } from '../../domain/tekton-schemas';

export type RunWatchEvent = 'ADDED' | 'MODIFIED' | 'DELETED';

export interface RunWatchHandlers {
  onEvent: (type: RunWatchEvent, run: TektonRunObject) => void;
  /** Stream-level error, including ERROR events sent by the API server */
  onError: (error: Error) => void;
  /** Stream ended without error (server-side timeout or connection close) */
  onClose: () => void;
}

export interface WatchHandle {
  stop: () => void;
}

export interface KubernetesClient {
  getRun: (run: RunIdentifier, namespace: string) => Promise<Result<TektonRunObject>>;
  watchRun: (
    run: RunIdentifier,
    namespace: string,
    timeoutSeconds: number,
    handlers: RunWatchHandlers,
  ) => Promise<WatchHandle>;
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'object' && error !== null && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}

/**
 * The watch request object differs between client releases; abort it when it can be aborted
 */
function abortRequest(request: unknown): void {
  if (
    typeof request === 'object' &&
    request !== null &&
    'abort' in request &&
    typeof request.abort === 'function'
  ) {
    request.abort();
  }
}

function isRunWatchEvent(phase: string): phase is RunWatchEvent {
  return phase === 'ADDED' || phase === 'MODIFIED' || phase === 'DELETED';
}

/**
 * Create a Kubernetes client. `kubeconfigPath` overrides the default loading rules.
 */
export const createKubernetesClient = (logger: Logger, kubeconfigPath?: string): KubernetesClient => {
  const kc = new k8s.KubeConfig();

  if (kubeconfigPath) {
    kc.loadFromFile(kubeconfigPath);
  } else {
    kc.loadFromDefault();
  }

  const customApi = kc.makeApiClient(k8s.CustomObjectsApi);
  const watch = new k8s.Watch(kc);

  return {
    async getRun(run: RunIdentifier, namespace: string): Promise<Result<TektonRunObject>> {
      try {
        const response = await customApi.getNamespacedCustomObject(
          TEKTON_API.group,
          TEKTON_API.version,
          namespace,
          resourcePlural(run.kind),
          run.name,
        );
        const parsed = TektonRunSchema.safeParse(response.body);
        if (!parsed.success) {
          return Failure(`Unexpected ${run.kind} ${run.name} shape: ${parsed.error.message}`);
        }
        return Success(parsed.data);
      } catch (error) {
        return Failure(`Failed to get ${run.kind} ${run.name}: ${describeError(error)}`);
      }
    },

    async watchRun(
      run: RunIdentifier,
      namespace: string,
      timeoutSeconds: number,
      handlers: RunWatchHandlers,
    ): Promise<WatchHandle> {
      const path = `/apis/${TEKTON_API.group}/${TEKTON_API.version}/namespaces/${namespace}/${resourcePlural(run.kind)}`;
      let stopped = false;

      logger.debug({ path, name: run.name, timeoutSeconds }, 'Starting watch');

      const request: unknown = await watch.watch(
        path,
        { fieldSelector: `metadata.name=${run.name}`, timeoutSeconds },
        (phase: string, apiObj: unknown) => {
          if (stopped) return;
          if (phase === 'ERROR') {
            handlers.onError(new Error(`watch error: ${describeError(apiObj)}`));
            return;
          }
          if (!isRunWatchEvent(phase)) return;

          const parsed = TektonRunSchema.safeParse(apiObj);
          if (parsed.success) {
            handlers.onEvent(phase, parsed.data);
          } else {
            logger.warn({ phase, issues: parsed.error.issues }, 'Ignoring unparseable watch event');
          }
        },
        (error: unknown) => {
          if (stopped) return;
          if (error) {
            handlers.onError(new Error(`watch stream failed: ${describeError(error)}`));
          } else {
            handlers.onClose();
          }
        },
      );

      return {
        stop: () => {
          stopped = true;
          abortRequest(request);
        },
      };
    },
  };
};
