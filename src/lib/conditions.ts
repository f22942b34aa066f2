/**
 * Condition helpers shared by both execution paths.
 *
 * The two paths compare against different literals: Kubernetes reports
 * `"True"`, the managed runs API reports `"TRUE"`. Each caller passes its own.
 */

import type { RunCondition } from '../domain/types';

export const CONDITION_TRUE = 'True';
export const CONDITION_UNKNOWN = 'Unknown';

export const MANAGED_CONDITION_TRUE = 'TRUE';
export const MANAGED_CONDITION_FALSE = 'FALSE';

export const SUCCEEDED_CONDITION = 'Succeeded';

export function findCondition(
  conditions: readonly RunCondition[],
  type: string,
): RunCondition | undefined {
  return conditions.find((condition) => condition.type === type);
}

/**
 * Exact, case-sensitive match on both the type and the status literal
 */
export function meetsCondition(
  conditions: readonly RunCondition[],
  expectedType: string,
  trueLiteral: string = CONDITION_TRUE,
): boolean {
  return conditions.some(
    (condition) => condition.type === expectedType && condition.status === trueLiteral,
  );
}

/**
 * Tekton's IsDone: the Succeeded condition exists and is no longer Unknown
 */
export function isRunDone(conditions: readonly RunCondition[]): boolean {
  const succeeded = findCondition(conditions, SUCCEEDED_CONDITION);
  return succeeded !== undefined && succeeded.status !== CONDITION_UNKNOWN;
}
