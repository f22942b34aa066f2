/**
 * Assertion Layer
 *
 * The `check*` functions work on values already fetched and throw
 * AssertionFailedError; the `assert*` functions fetch through a run
 * inspector (normally a RunLifecycleController) first.
 */

import type { RunIdentifier } from '../domain/types';
import type { StepState, TektonRunObject } from '../domain/tekton-schemas';
import type { FieldExtractor } from '../infrastructure/cli/yq';
import { AssertionFailedError, UnsupportedOperationError } from './errors';

export interface RunInspector {
  readonly run: RunIdentifier;
  fetchDocument(): Promise<string>;
  fetchRun(): Promise<TektonRunObject>;
}

// yq prints a missing path as `null`
const EMPTY_FIELD_VALUES = new Set(['', 'null']);

export function isEmptyField(value: string): boolean {
  return EMPTY_FIELD_VALUES.has(value.trim());
}

export function checkFieldNotEmpty(value: string, expression: string): void {
  if (isEmptyField(value)) {
    throw new AssertionFailedError(`field "${expression}" is empty`, { expression, value });
  }
}

export function checkFieldEquals(value: string, expression: string, expected: string): void {
  if (value !== expected) {
    throw new AssertionFailedError(
      `field "${expression}" expected "${expected}" but got "${value}"`,
      { expression, expected, actual: value },
    );
  }
}

function isEmptyResultValue(type: string | undefined, value: unknown, resultName: string): boolean {
  switch (type) {
    case 'string':
      return value === undefined || value === null || value === '';
    case 'array':
      return !Array.isArray(value) || value.length === 0;
    case 'object':
      return (
        typeof value !== 'object' ||
        value === null ||
        Array.isArray(value) ||
        Object.keys(value).length === 0
      );
    default:
      throw new UnsupportedOperationError(
        `unsupported result type for '${resultName}': ${type ?? '(none)'}`,
        { resultName, type },
      );
  }
}

/**
 * The first result named `resultName` (inside `stepName` when given) decides.
 * Only string, array and object results can be checked; anything else,
 * including a result with no type, is unsupported.
 */
export function checkStepResults(
  steps: readonly StepState[],
  resultName: string,
  stepName?: string,
): void {
  for (const step of steps) {
    if (stepName !== undefined && step.name !== stepName) continue;

    const result = step.results.find((candidate) => candidate.name === resultName);
    if (!result) continue;

    if (isEmptyResultValue(result.type, result.value, resultName)) {
      throw new AssertionFailedError(`Step result '${resultName}' in step '${step.name}' is empty`, {
        resultName,
        step: step.name,
      });
    }
    return;
  }

  const where = stepName === undefined ? 'any step' : `step '${stepName}'`;
  throw new AssertionFailedError(`Step result '${resultName}' not found in ${where}`, {
    resultName,
    ...(stepName !== undefined ? { step: stepName } : {}),
  });
}

export async function assertFieldNotEmpty(
  inspector: RunInspector,
  extractor: FieldExtractor,
  expression: string,
): Promise<void> {
  const value = await extractor.extractField(await inspector.fetchDocument(), expression);
  checkFieldNotEmpty(value, expression);
}

export async function assertFieldEquals(
  inspector: RunInspector,
  extractor: FieldExtractor,
  expression: string,
  expected: string,
): Promise<void> {
  const value = await extractor.extractField(await inspector.fetchDocument(), expression);
  checkFieldEquals(value, expression, expected);
}

export async function assertStepResultNotEmpty(
  inspector: RunInspector,
  resultName: string,
  stepName?: string,
): Promise<void> {
  if (inspector.run.kind === 'PipelineRun') {
    throw new UnsupportedOperationError('PipelineRun not supported for verifying step-level results', {
      run: inspector.run,
    });
  }
  const run = await inspector.fetchRun();
  checkStepResults(run.status.steps, resultName, stepName);
}
