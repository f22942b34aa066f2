/**
 * Parsers for repeatable CLI expectation flags
 */

import { InvalidArgumentError } from 'commander';
import type { FieldEquality, StepResultExpectation } from '../workflows/catalog-test';

/**
 * `--expect-equals .status.phase=Done` (split at the first `=`)
 */
export function parseFieldEquality(value: string): FieldEquality {
  const separator = value.indexOf('=');
  if (separator <= 0) {
    throw new InvalidArgumentError('expected <expression>=<value>');
  }
  return { expression: value.slice(0, separator), expected: value.slice(separator + 1) };
}

/**
 * `--expect-step-result digest` or `--expect-step-result build/digest`
 */
export function parseStepResult(value: string): StepResultExpectation {
  const separator = value.indexOf('/');
  if (separator === -1) {
    if (value === '') throw new InvalidArgumentError('expected [step/]result');
    return { result: value };
  }
  const step = value.slice(0, separator);
  const result = value.slice(separator + 1);
  if (step === '' || result === '') {
    throw new InvalidArgumentError('expected [step/]result');
  }
  return { result, step };
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('expected a positive integer');
  }
  return parsed;
}

/**
 * Accumulator for repeatable options
 */
export function collect<T>(parse: (value: string) => T) {
  return (value: string, previous: T[] = []): T[] => [...previous, parse(value)];
}
