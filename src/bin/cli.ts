#!/usr/bin/env node
/**
 * tekton-catalog-e2e CLI
 * Runs the tests of a catalog StepAction against a cluster or the managed runs API
 */

import { Command, Option } from 'commander';
import { z } from 'zod';
import packageJson from '../../package.json';
import { createContainer } from '../app/container';
import { loadConfig } from '../config/app-config';
import { collect, parseFieldEquality, parsePositiveInt, parseStepResult } from '../cli/options';
import { formatReport, summarize } from '../cli/report';
import { describeError } from '../lib/errors';
import { findRunIdentifiers } from '../lib/run-identifier';
import { runCatalog } from '../workflows/catalog-test';

const RunOptionsSchema = z.object({
  mode: z.string().optional(),
  kubeconfig: z.string().optional(),
  timeout: z.number().optional(),
  condition: z.string().optional(),
  logLevel: z.string().optional(),
  expectField: z.array(z.string()).default([]),
  expectEquals: z.array(z.object({ expression: z.string(), expected: z.string() })).default([]),
  expectStepResult: z
    .array(z.object({ result: z.string(), step: z.string().optional() }))
    .default([]),
});

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

const program = new Command();

program
  .name('tekton-catalog-e2e')
  .description('End-to-end tests for Tekton StepAction catalog entries')
  .version(packageJson.version);

program
  .command('run')
  .description('run every manifest in <stepActionDir>/tests and report PASS/FAIL per test')
  .argument('<stepActionDir>', 'directory holding one StepAction YAML file and a tests/ directory')
  .addOption(new Option('--mode <mode>', 'execution path').choices(['direct', 'managed']))
  .option('--kubeconfig <path>', 'kubeconfig file for the direct path')
  .option('--timeout <ms>', 'per-run wait timeout in milliseconds', parsePositiveInt)
  .option('--condition <type>', 'condition type that must become True')
  .option('--expect-field <expr>', 'yq expression that must not be empty (repeatable)', collect(String))
  .option(
    '--expect-equals <expr=value>',
    'yq expression that must equal value (repeatable)',
    collect(parseFieldEquality),
  )
  .option(
    '--expect-step-result <[step/]result>',
    'step result that must not be empty (repeatable)',
    collect(parseStepResult),
  )
  .addOption(
    new Option('--log-level <level>', 'logging level').choices([
      'fatal',
      'error',
      'warn',
      'info',
      'debug',
      'trace',
      'silent',
    ]),
  )
  .action(async (stepActionDir: string, _options: unknown, command: Command) => {
    const options = RunOptionsSchema.parse(command.opts());
    const config = loadConfig(process.env, {
      ...(options.mode ? { mode: options.mode } : {}),
      ...(options.kubeconfig ? { kubeconfig: options.kubeconfig } : {}),
      ...(options.logLevel ? { logLevel: options.logLevel } : {}),
      ...(options.timeout ? { waitTimeoutMs: String(options.timeout) } : {}),
      ...(options.condition ? { expectedCondition: options.condition } : {}),
    });
    const deps = createContainer(config);

    // Ctrl-C ends the current wait and cancels the tests not yet started; cleanup still runs
    const abort = new AbortController();
    process.once('SIGINT', () => abort.abort());

    const reports = await runCatalog(
      deps,
      stepActionDir,
      {
        fieldsNotEmpty: options.expectField,
        fieldsEqual: options.expectEquals,
        stepResults: options.expectStepResult,
      },
      abort.signal,
    );

    for (const report of reports) {
      console.log(formatReport(report));
    }
    console.log(summarize(reports));

    if (reports.length === 0 || reports.some((report) => !report.passed)) {
      process.exitCode = 1;
    }
  });

program
  .command('extract-run')
  .description('read `kubectl apply` output on stdin and print kind/name of each created run')
  .action(async () => {
    const runs = findRunIdentifiers(await readStdin());
    if (runs.length === 0) {
      console.error('no TaskRun or PipelineRun found in the output');
      process.exitCode = 1;
      return;
    }
    for (const run of runs) {
      console.log(`${run.kind}/${run.name}`);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(describeError(error));
  process.exitCode = 1;
});
