/**
 * gcloud wrapper for the managed execution path: Cloud Build v2 runs and
 * Artifact Registry image deletion
 */

import { requireStdout, type CommandRunner } from '../command-executor';

export interface GcloudOptions {
  binary: string;
  project?: string;
  region: string;
  timeout: number;
}

export class Gcloud {
  constructor(
    private readonly runner: CommandRunner,
    private readonly options: GcloudOptions,
  ) {}

  private location(): string[] {
    const flags = [`--region=${this.options.region}`];
    if (this.options.project) {
      flags.push(`--project=${this.options.project}`);
    }
    return flags;
  }

  /**
   * Submit a TaskRun/PipelineRun document to the managed runs API
   */
  applyRun(file: string): Promise<string> {
    return this.runner.run(
      this.options.binary,
      ['builds', 'runs', 'apply', `--file=${file}`, ...this.location()],
      { timeout: this.options.timeout },
    );
  }

  /**
   * Raw JSON description of a submitted run. A `timeout` shorter than the
   * configured command timeout takes precedence.
   */
  async describeRun(id: string, options: { timeout?: number; signal?: AbortSignal } = {}): Promise<string> {
    const args = ['builds', 'runs', 'describe', id, ...this.location(), '--format=json'];
    const result = await this.runner.execute(this.options.binary, args, {
      timeout: Math.min(options.timeout ?? this.options.timeout, this.options.timeout),
      ...(options.signal ? { signal: options.signal } : {}),
    });
    return requireStdout(this.options.binary, args, result);
  }

  deleteImage(ref: string): Promise<string> {
    return this.runner.run(
      this.options.binary,
      ['artifacts', 'docker', 'images', 'delete', ref, '--delete-tags', '--quiet'],
      { timeout: this.options.timeout },
    );
  }
}
