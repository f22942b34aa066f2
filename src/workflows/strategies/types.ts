import type {
  ExecutionMode,
  ExecutionScope,
  RunIdentifier,
  WaitOptions,
  WaitOutcome,
} from '../../domain/types';
import type { TektonRunObject } from '../../domain/tekton-schemas';

/**
 * One way of running a manifest: straight against a cluster, or through the
 * managed runs API. Selected once per process from configuration.
 */
export interface ExecutionStrategy {
  readonly mode: ExecutionMode;

  submit(manifestPath: string, scope: ExecutionScope): Promise<RunIdentifier>;

  /**
   * Resolves with a terminal outcome; expected failures and timeouts are
   * outcomes, not rejections.
   */
  wait(run: RunIdentifier, scope: ExecutionScope, options: WaitOptions): Promise<WaitOutcome>;

  /** Run document as YAML or JSON text, for yq queries */
  fetchDocument(run: RunIdentifier, scope: ExecutionScope): Promise<string>;

  fetchRun(run: RunIdentifier, scope: ExecutionScope): Promise<TektonRunObject>;
}
