/**
 * Run Lifecycle Controller
 *
 * Drives one test run through
 * `Created -> Submitted -> Watching -> Succeeded | Failed | TimedOut`.
 * Submission errors and wait errors move the run straight to Failed.
 */

import type { Logger } from 'pino';
import type {
  ExecutionScope,
  RunIdentifier,
  WaitOptions,
  WaitOutcome,
} from '../domain/types';
import type { TektonRunObject } from '../domain/tekton-schemas';
import { InvalidStateError, RunFailedError, RunTimeoutError } from '../lib/errors';
import type { ExecutionStrategy } from './strategies/types';

export type RunState = 'Created' | 'Submitted' | 'Watching' | 'Succeeded' | 'Failed' | 'TimedOut';

const TRANSITIONS: Readonly<Record<RunState, readonly RunState[]>> = {
  Created: ['Submitted', 'Failed'],
  Submitted: ['Watching', 'Failed'],
  Watching: ['Succeeded', 'Failed', 'TimedOut'],
  Succeeded: [],
  Failed: [],
  TimedOut: [],
};

export interface StateChange {
  from: RunState;
  to: RunState;
  at: Date;
}

export class RunLifecycleController {
  private current: RunState = 'Created';
  private identifier: RunIdentifier | undefined;
  private result: WaitOutcome | undefined;
  private readonly changes: StateChange[] = [];
  private readonly logger: Logger;

  constructor(
    private readonly strategy: ExecutionStrategy,
    private readonly scope: ExecutionScope,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: 'RunLifecycleController', scope: scope.id });
  }

  get state(): RunState {
    return this.current;
  }

  get history(): readonly StateChange[] {
    return this.changes;
  }

  /**
   * Identifier of the submitted run; throws before submission
   */
  get run(): RunIdentifier {
    if (!this.identifier) {
      throw new InvalidStateError('run has not been submitted', { state: this.current });
    }
    return this.identifier;
  }

  /** Identifier of the submitted run, if submission got that far */
  get submitted(): RunIdentifier | undefined {
    return this.identifier;
  }

  get outcome(): WaitOutcome | undefined {
    return this.result;
  }

  async submit(manifestPath: string): Promise<RunIdentifier> {
    this.assertState('Created', 'submit');
    try {
      this.identifier = await this.strategy.submit(manifestPath, this.scope);
    } catch (error) {
      this.transition('Failed');
      throw error;
    }
    this.transition('Submitted');
    return this.identifier;
  }

  async waitForCompletion(options: WaitOptions): Promise<WaitOutcome> {
    this.assertState('Submitted', 'wait');
    const run = this.run;
    this.transition('Watching');

    let outcome: WaitOutcome;
    try {
      outcome = await this.strategy.wait(run, this.scope, options);
    } catch (error) {
      this.transition('Failed');
      throw error;
    }

    this.result = outcome;
    this.transition(outcome.status);
    return outcome;
  }

  /**
   * Wait, then throw unless the run succeeded. The error carries any collected logs.
   */
  async expectSuccess(options: WaitOptions): Promise<void> {
    const outcome = await this.waitForCompletion(options);
    const { kind, name } = this.run;

    switch (outcome.status) {
      case 'Succeeded':
        return;
      case 'Failed':
        throw new RunFailedError(
          [
            `${kind} ${name} failed: ${outcome.reason}`,
            ...(outcome.message ? [outcome.message] : []),
            ...(outcome.logs ? [outcome.logs] : []),
          ].join('\n'),
          { run: this.run, reason: outcome.reason },
        );
      case 'TimedOut':
        throw new RunTimeoutError(
          [
            `${kind} ${name} did not complete within ${outcome.timeoutMs}ms`,
            ...(outcome.logs ? [outcome.logs] : []),
          ].join('\n'),
          { run: this.run, timeoutMs: outcome.timeoutMs },
        );
    }
  }

  fetchDocument(): Promise<string> {
    return this.strategy.fetchDocument(this.run, this.scope);
  }

  fetchRun(): Promise<TektonRunObject> {
    return this.strategy.fetchRun(this.run, this.scope);
  }

  private assertState(expected: RunState, operation: string): void {
    if (this.current !== expected) {
      throw new InvalidStateError(`cannot ${operation} a run in state ${this.current}`, {
        state: this.current,
        expected,
      });
    }
  }

  private transition(to: RunState): void {
    const from = this.current;
    if (!TRANSITIONS[from].includes(to)) {
      throw new InvalidStateError(`illegal transition ${from} -> ${to}`, { from, to });
    }
    this.current = to;
    this.changes.push({ from, to, at: new Date() });
    this.logger.info({ from, to, run: this.identifier?.name }, 'Run state changed');
  }
}
