/**
 * Domain Types - Unified exports
 */

export { Success, Failure, isFail, type Result } from './result';
export {
  RUN_KINDS,
  toRunKind,
  resourcePlural,
  type RunKind,
  type RunIdentifier,
  type ExecutionMode,
  type ExecutionScope,
  type RunCondition,
  type WaitOutcome,
  type WaitStatus,
  type WaitOptions,
} from './run';
