/**
 * Field Extractor - evaluates a yq expression against a YAML (or JSON) document
 *
 * Pure text in, text out. Callers needing several values query several times.
 */

import { requireStdout, type CommandRunner } from '../command-executor';

export interface FieldExtractor {
  extractField(document: string, expression: string): Promise<string>;
}

export class YqFieldExtractor implements FieldExtractor {
  constructor(
    private readonly runner: CommandRunner,
    private readonly binary: string = 'yq',
    private readonly timeout?: number,
  ) {}

  async extractField(document: string, expression: string): Promise<string> {
    const args = ['eval', expression, '-'];
    const result = await this.runner.execute(this.binary, args, {
      stdin: document,
      timeout: this.timeout,
    });
    return requireStdout(this.binary, args, result).trim();
  }
}
