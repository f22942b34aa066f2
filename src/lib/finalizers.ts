/**
 * Ordered cleanup actions for one execution scope.
 *
 * Finalizers run last-registered first. A failing finalizer is logged and
 * recorded; the ones after it still run.
 */

import type { Logger } from 'pino';
import { toError } from './errors';

export type FinalizerAction = () => Promise<unknown>;

export interface FinalizerFailure {
  name: string;
  error: Error;
}

export interface FinalizerReport {
  completed: string[];
  failures: FinalizerFailure[];
}

interface Finalizer {
  name: string;
  action: FinalizerAction;
}

export class FinalizerChain {
  private readonly finalizers: Finalizer[] = [];
  private report: Promise<FinalizerReport> | undefined;

  constructor(private readonly logger: Logger) {}

  get size(): number {
    return this.finalizers.length;
  }

  add(name: string, action: FinalizerAction): void {
    if (this.report) {
      throw new Error(`Cannot register finalizer "${name}" after the chain has run`);
    }
    this.finalizers.push({ name, action });
  }

  /**
   * Run every finalizer once. Repeated calls return the first report.
   */
  run(): Promise<FinalizerReport> {
    this.report ??= this.runAll();
    return this.report;
  }

  private async runAll(): Promise<FinalizerReport> {
    const report: FinalizerReport = { completed: [], failures: [] };

    for (const { name, action } of [...this.finalizers].reverse()) {
      try {
        await action();
        report.completed.push(name);
        this.logger.debug({ finalizer: name }, 'Finalizer completed');
      } catch (error) {
        const failure = { name, error: toError(error) };
        report.failures.push(failure);
        this.logger.warn({ finalizer: name, error: failure.error.message }, 'Finalizer failed');
      }
    }

    return report;
  }
}
