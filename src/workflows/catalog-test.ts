/**
 * Catalog test orchestration
 *
 * One catalog test = one test manifest run against the StepAction beside it,
 * inside its own execution scope. Scope release and workspace disposal run on
 * every exit path.
 */

import path from 'node:path';
import type { Deps } from '../app/container';
import type { RunIdentifier, WaitOutcome } from '../domain/types';
import {
  assertFieldEquals,
  assertFieldNotEmpty,
  assertStepResultNotEmpty,
} from '../lib/assertions';
import { CancelledError, InvalidStateError, toError } from '../lib/errors';
import type { FinalizerReport } from '../lib/finalizers';
import { findTestFiles, generateSuffix, prepareWorkspace } from '../lib/fixtures';
import { createTimer } from '../lib/logger';
import { RunLifecycleController } from './run-lifecycle';

export interface FieldEquality {
  expression: string;
  expected: string;
}

export interface StepResultExpectation {
  result: string;
  step?: string;
}

export interface Expectations {
  fieldsNotEmpty: string[];
  fieldsEqual: FieldEquality[];
  stepResults: StepResultExpectation[];
}

export const NO_EXPECTATIONS: Expectations = {
  fieldsNotEmpty: [],
  fieldsEqual: [],
  stepResults: [],
};

export interface CatalogTestOptions {
  stepActionDir: string;
  /** Path of a manifest inside `<stepActionDir>/tests` */
  testFile: string;
  expectations?: Expectations;
  /** Fixed name suffix; random when omitted and suffixing is enabled */
  suffix?: string;
  signal?: AbortSignal;
}

export interface CatalogTestReport {
  testFile: string;
  passed: boolean;
  run?: RunIdentifier;
  outcome?: WaitOutcome;
  durationMs: number;
  cleanup: FinalizerReport;
  error?: Error;
}

const NOTHING_CLEANED: FinalizerReport = { completed: [], failures: [] };

function throwIfCancelled(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw new CancelledError(`cancelled before ${stage}`, { stage });
  }
}

async function checkExpectations(
  deps: Deps,
  controller: RunLifecycleController,
  expectations: Expectations,
): Promise<void> {
  for (const expression of expectations.fieldsNotEmpty) {
    await assertFieldNotEmpty(controller, deps.fieldExtractor, expression);
  }
  for (const { expression, expected } of expectations.fieldsEqual) {
    await assertFieldEquals(controller, deps.fieldExtractor, expression, expected);
  }
  for (const { result, step } of expectations.stepResults) {
    await assertStepResultNotEmpty(controller, result, step);
  }
}

export async function runCatalogTest(deps: Deps, options: CatalogTestOptions): Promise<CatalogTestReport> {
  const { config } = deps;
  const testFile = path.resolve(options.testFile);
  const logger = deps.logger.child({ testFile: path.basename(testFile) });
  const timer = createTimer(logger, 'catalog test', { mode: config.mode });
  const startedAt = Date.now();

  const suffix = options.suffix ?? (config.fixtures.suffixNames ? generateSuffix() : undefined);
  let controller: RunLifecycleController | undefined;
  let cleanup = NOTHING_CLEANED;
  let failure: Error | undefined;

  try {
    throwIfCancelled(options.signal, 'workspace preparation');
    const workspace = await prepareWorkspace(options.stepActionDir, {
      testFiles: [testFile],
      ...(suffix ? { suffix } : {}),
    });

    try {
      throwIfCancelled(options.signal, 'scope acquisition');
      const handle = await deps.scopeManager.acquire({
        stepActionFile: workspace.stepActionFile,
        stepActionName: workspace.stepActionName,
      });

      try {
        const { scope } = handle;
        if (scope.mode === 'direct') {
          if (!scope.namespace) {
            throw new InvalidStateError(`scope ${scope.id} has no namespace`);
          }
          await deps.kubectl.apply(workspace.stepActionFile, scope.namespace);
        }

        const [manifest] = workspace.testFiles;
        if (!manifest) {
          throw new InvalidStateError(`test manifest ${testFile} was not copied into the workspace`);
        }

        throwIfCancelled(options.signal, 'submission');
        controller = new RunLifecycleController(deps.strategy, scope, logger);
        await controller.submit(manifest);
        await controller.expectSuccess({
          expectedCondition: config.direct.expectedCondition,
          timeoutMs: config.timeouts.waitMs,
          ...(options.signal ? { signal: options.signal } : {}),
        });
        await checkExpectations(deps, controller, options.expectations ?? NO_EXPECTATIONS);
      } finally {
        cleanup = await handle.release();
      }
    } finally {
      try {
        await workspace.dispose();
      } catch (error) {
        logger.warn({ workspace: workspace.root, error: toError(error).message }, 'Workspace cleanup failed');
      }
    }
  } catch (error) {
    failure = toError(error);
  }

  const run = controller?.submitted;
  const outcome = controller?.outcome;
  const report: CatalogTestReport = {
    testFile,
    passed: failure === undefined,
    durationMs: Date.now() - startedAt,
    cleanup,
    ...(run ? { run } : {}),
    ...(outcome ? { outcome } : {}),
    ...(failure ? { error: failure } : {}),
  };

  if (failure) {
    timer.error(failure, { run: run?.name });
  } else {
    timer.end({ run: run?.name });
  }
  return report;
}

/**
 * Run every manifest under `<stepActionDir>/tests`, one after the other.
 * Once `signal` aborts, the remaining tests are reported as cancelled
 * without touching the cluster.
 */
export async function runCatalog(
  deps: Deps,
  stepActionDir: string,
  expectations: Expectations = NO_EXPECTATIONS,
  signal?: AbortSignal,
): Promise<CatalogTestReport[]> {
  const testFiles = await findTestFiles(stepActionDir);
  if (testFiles.length === 0) {
    deps.logger.warn({ stepActionDir }, 'No test manifests found');
  }

  const reports: CatalogTestReport[] = [];
  for (const testFile of testFiles) {
    reports.push(
      await runCatalogTest(deps, {
        stepActionDir,
        testFile,
        expectations,
        ...(signal ? { signal } : {}),
      }),
    );
  }
  return reports;
}
