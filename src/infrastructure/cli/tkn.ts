/**
 * tkn wrapper - publishes StepActions as OCI bundles
 */

import type { CommandRunner } from '../command-executor';

export interface TknOptions {
  binary: string;
  timeout: number;
}

export class Tkn {
  constructor(
    private readonly runner: CommandRunner,
    private readonly options: TknOptions,
  ) {}

  bundlePush(ref: string, file: string): Promise<string> {
    return this.runner.run(this.options.binary, ['bundle', 'push', ref, '-f', file], {
      timeout: this.options.timeout,
    });
  }
}
