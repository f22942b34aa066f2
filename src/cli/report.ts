import path from 'node:path';
import { describeError } from '../lib/errors';
import type { CatalogTestReport } from '../workflows/catalog-test';

/**
 * One PASS/FAIL line per test, failure details indented beneath
 */
export function formatReport(report: CatalogTestReport, baseDir: string = process.cwd()): string {
  const name = path.relative(baseDir, report.testFile) || report.testFile;
  const run = report.run ? ` ${report.run.kind}/${report.run.name}` : '';
  const lines = [`${report.passed ? 'PASS' : 'FAIL'} ${name}${run} (${report.durationMs}ms)`];

  if (report.error) {
    lines.push(
      ...describeError(report.error)
        .split('\n')
        .map((line) => `    ${line}`),
    );
  }
  for (const failure of report.cleanup.failures) {
    lines.push(`    cleanup ${failure.name} failed: ${failure.error.message}`);
  }
  return lines.join('\n');
}

export function summarize(reports: readonly CatalogTestReport[]): string {
  const failed = reports.filter((report) => !report.passed).length;
  return `${reports.length - failed} passed, ${failed} failed, ${reports.length} total`;
}
