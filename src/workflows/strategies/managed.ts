/**
 * Managed strategy - submit through `gcloud builds runs apply` and poll
 * `gcloud builds runs describe` until the Succeeded condition settles.
 */

import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import type { Logger } from 'pino';
import type {
  ExecutionScope,
  RunIdentifier,
  WaitOptions,
  WaitOutcome,
} from '../../domain/types';
import {
  ManagedRunSchema,
  TektonRunSchema,
  managedConditions,
  type TektonRunObject,
} from '../../domain/tekton-schemas';
import type { Gcloud } from '../../infrastructure/cli/gcloud';
import {
  MANAGED_CONDITION_FALSE,
  MANAGED_CONDITION_TRUE,
  SUCCEEDED_CONDITION,
  findCondition,
} from '../../lib/conditions';
import { ErrorCodes, ParseError, isHarnessError, toError } from '../../lib/errors';
import { prepareManagedManifest } from '../../lib/manifest-rewriter';
import type { ExecutionStrategy } from './types';

export interface ManagedStrategyDeps {
  gcloud: Gcloud;
  logger: Logger;
  serviceAccount: string;
  runPrefix: string;
  pollIntervalMs: number;
}

function parseJson(text: string, what: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ParseError(`${what} is not valid JSON`, { text }, toError(error));
  }
}

function isTimeout(error: unknown): boolean {
  return isHarnessError(error) && error.code === ErrorCodes.TIMEOUT;
}

/**
 * Resolves false when the signal fires before the delay elapses
 */
async function pause(ms: number, signal?: AbortSignal): Promise<boolean> {
  try {
    await sleep(ms, undefined, { signal });
    return true;
  } catch (error) {
    if (signal?.aborted) return false;
    throw error;
  }
}

export class ManagedStrategy implements ExecutionStrategy {
  readonly mode = 'managed' as const;

  constructor(private readonly deps: ManagedStrategyDeps) {}

  async submit(manifestPath: string, scope: ExecutionScope): Promise<RunIdentifier> {
    const source = await readFile(manifestPath, 'utf-8');
    const manifest = prepareManagedManifest(source, {
      name: `${this.deps.runPrefix}${scope.id}`,
      serviceAccount: this.deps.serviceAccount,
      ...(scope.bundleRef && scope.stepActionName
        ? { bundle: { ref: scope.bundleRef, stepActionName: scope.stepActionName } }
        : {}),
    });

    const managedPath = path.join(
      path.dirname(manifestPath),
      `${path.basename(manifestPath, path.extname(manifestPath))}.managed.yaml`,
    );
    await writeFile(managedPath, manifest.text);
    await this.deps.gcloud.applyRun(managedPath);

    this.deps.logger.info({ run: manifest.name, kind: manifest.kind }, 'Managed run submitted');
    return { name: manifest.name, kind: manifest.kind };
  }

  async wait(run: RunIdentifier, _scope: ExecutionScope, options: WaitOptions): Promise<WaitOutcome> {
    const { timeoutMs, signal } = options;
    const deadline = Date.now() + timeoutMs;
    let attempt = 0;

    while (Date.now() < deadline && !signal?.aborted) {
      attempt++;

      // A describe call may not outlive the wait itself
      let description: string;
      try {
        description = await this.deps.gcloud.describeRun(run.name, {
          timeout: Math.max(1, deadline - Date.now()),
          ...(signal ? { signal } : {}),
        });
      } catch (error) {
        if (signal?.aborted || isTimeout(error)) break;
        return { status: 'Failed', reason: 'DescribeFailed', message: toError(error).message };
      }

      const parsed = ManagedRunSchema.safeParse(parseJson(description, `description of ${run.name}`));
      if (!parsed.success) {
        throw new ParseError(`Unexpected description of ${run.name}: ${parsed.error.message}`);
      }

      const succeeded = findCondition(managedConditions(parsed.data), SUCCEEDED_CONDITION);
      this.deps.logger.debug({ run: run.name, attempt, status: succeeded?.status }, 'Polled managed run');

      if (succeeded?.status === MANAGED_CONDITION_TRUE) {
        return { status: 'Succeeded' };
      }
      if (succeeded?.status === MANAGED_CONDITION_FALSE) {
        return {
          status: 'Failed',
          reason: succeeded.reason ?? 'Failed',
          ...(succeeded.message ? { message: succeeded.message } : {}),
        };
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) break;
      if (!(await pause(Math.min(this.deps.pollIntervalMs, remaining), signal))) break;
    }

    return { status: 'TimedOut', timeoutMs };
  }

  fetchDocument(run: RunIdentifier): Promise<string> {
    return this.deps.gcloud.describeRun(run.name);
  }

  async fetchRun(run: RunIdentifier): Promise<TektonRunObject> {
    const description = await this.deps.gcloud.describeRun(run.name);
    const parsed = TektonRunSchema.safeParse(parseJson(description, `description of ${run.name}`));
    if (!parsed.success) {
      throw new ParseError(`Unexpected description of ${run.name}: ${parsed.error.message}`);
    }
    return parsed.data;
  }
}
