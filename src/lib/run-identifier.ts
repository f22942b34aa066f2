/**
 * Run Identifier Extractor - finds the TaskRun/PipelineRun created by `kubectl apply`
 */

import { toRunKind, type RunIdentifier } from '../domain/types';
import { ParseError } from './errors';

const CREATED_RUN_PATTERN = /^(taskrun|pipelinerun)\.tekton\.dev\/(\S+)\s+created$/gm;

/**
 * Every created run in order of appearance; empty when there is none
 */
export function findRunIdentifiers(output: string): RunIdentifier[] {
  const runs: RunIdentifier[] = [];
  for (const match of output.matchAll(CREATED_RUN_PATTERN)) {
    const [, kindText, name] = match;
    const kind = kindText ? toRunKind(kindText) : undefined;
    if (kind && name) {
      runs.push({ kind, name });
    }
  }
  return runs;
}

/**
 * All created runs. Zero matches is a failure.
 */
export function extractRunIdentifiers(output: string): RunIdentifier[] {
  const runs = findRunIdentifiers(output);
  if (runs.length === 0) {
    throw new ParseError(`no TaskRun or PipelineRun found in the output\n${output}`, { output });
  }
  return runs;
}

/**
 * The first created run. Zero matches is a failure.
 */
export function extractRunIdentifier(output: string): RunIdentifier {
  const [first] = extractRunIdentifiers(output);
  if (!first) {
    throw new ParseError(`no TaskRun or PipelineRun found in the output\n${output}`, { output });
  }
  return first;
}
