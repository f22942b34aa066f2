/**
 * Tekton run domain types shared by the lifecycle controller, strategies and assertions
 */

export const RUN_KINDS = ['TaskRun', 'PipelineRun'] as const;

export type RunKind = (typeof RUN_KINDS)[number];

/**
 * One submitted Tekton execution. Value type: copy freely, never mutate.
 */
export interface RunIdentifier {
  readonly name: string;
  readonly kind: RunKind;
}

export type ExecutionMode = 'direct' | 'managed';

/**
 * The isolated environment a single test runs in.
 *
 * In direct mode `namespace` equals `id`; in managed mode `bundleRef` is the
 * OCI reference of the StepAction bundle tagged with `id`.
 */
export interface ExecutionScope {
  readonly id: string;
  readonly mode: ExecutionMode;
  readonly namespace?: string;
  readonly bundleRef?: string;
  /** metadata.name of the StepAction published in `bundleRef` */
  readonly stepActionName?: string;
}

/**
 * A status condition as reported by Tekton (knative duck type) or the managed runs API
 */
export interface RunCondition {
  type: string;
  status: string;
  reason?: string;
  message?: string;
}

export type WaitOutcome =
  | { status: 'Succeeded' }
  | { status: 'Failed'; reason: string; message?: string; logs?: string }
  | { status: 'TimedOut'; timeoutMs: number; logs?: string };

export type WaitStatus = WaitOutcome['status'];

export interface WaitOptions {
  /** Condition type that must be reported with a true status */
  expectedCondition: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Convert the lower-case kind printed by `kubectl apply` to a RunKind
 */
export function toRunKind(value: string): RunKind | undefined {
  switch (value.toLowerCase()) {
    case 'taskrun':
      return 'TaskRun';
    case 'pipelinerun':
      return 'PipelineRun';
    default:
      return undefined;
  }
}

/**
 * Plural resource name used by kubectl and the Kubernetes API (`taskruns`, `pipelineruns`)
 */
export function resourcePlural(kind: RunKind): string {
  return `${kind.toLowerCase()}s`;
}
