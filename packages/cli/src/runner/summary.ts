/**
 * Run summary printed after the exported results
 */

import { Chalk } from 'chalk';
import type { SuiteRun } from './executor.js';

export interface SummaryOptions {
  color: boolean;
}

/**
 * Format duration in human readable form
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

/**
 * Summary lines for a set of suite runs
 */
export function formatSummary(runs: SuiteRun[], options: SummaryOptions): string[] {
  const c = new Chalk({ level: options.color ? 1 : 0 });

  let totalPassed = 0;
  let totalFailed = 0;
  let totalSeconds = 0;
  const errored = runs.filter((run) => run.error);

  for (const run of runs) {
    totalPassed += run.summary.passed;
    totalFailed += run.summary.failed;
    totalSeconds += run.summary.duration;
  }

  const lines: string[] = [''];
  lines.push(
    `  ${c.bold(c.green(`${totalPassed} passing`))} ${c.gray(`(${formatDuration(Math.round(totalSeconds * 1000))})`)}`,
  );

  if (totalFailed > 0) {
    lines.push(`  ${c.bold(c.red(`${totalFailed} failing`))}`);
  }

  if (errored.length > 0) {
    lines.push(`  ${c.red(`${errored.length} errors`)}`);
    for (const run of errored) {
      lines.push(c.red(`    ${run.name}: ${run.error?.message ?? 'unknown error'}`));
    }
  }

  lines.push('');
  return lines;
}

/**
 * Get exit code based on results: 2 for errors, 1 for failures, 0 otherwise
 */
export function getExitCode(runs: SuiteRun[]): number {
  if (runs.some((run) => run.error)) return 2;
  return runs.some((run) => run.hadFailure) ? 1 : 0;
}
