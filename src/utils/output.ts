/**
 * Terminal output for the CLI
 *
 * Human mode only; JSON mode prints the command result once, in cli.ts.
 * Diagnostics (errors, verbose lines) go to stderr so stdout stays parseable.
 */

import chalk from 'chalk';
import type { CommandResult, OutputFormat } from '../types.js';
import type { FieldChange, OutcomeRecord } from '../reconcilers/types.js';
import type { ApplyManifestResult } from '../reconcilers/batch.js';

type Mark = 'ok' | 'changed' | 'failed' | 'info' | 'bullet';

const MARKS: Record<Mark, string> = {
  ok: chalk.green('✓'),
  changed: chalk.yellow('~'),
  failed: chalk.red('✗'),
  info: chalk.blue('ℹ'),
  bullet: chalk.red('  •'),
};

function outcomeMark(outcome: OutcomeRecord): Mark {
  if (outcome.failed) return 'failed';
  return outcome.changed ? 'changed' : 'ok';
}

/**
 * Print a command result: the full JSON, or a one-line status plus errors
 */
export function printResult<T>(result: CommandResult<T>, format: OutputFormat): void {
  if (format === 'json') {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  console.log(MARKS[result.success ? 'ok' : 'failed'], result.message);
  for (const err of result.errors ?? []) {
    console.log(MARKS.bullet, err);
  }
}

/**
 * One outcome per line, with field changes and the suggestion of a failure
 */
export function printOutcome(outcome: OutcomeRecord): void {
  const label = chalk.gray(`[${outcome.kind}]`);
  console.log(MARKS[outcomeMark(outcome)], label, outcome.message);

  if (outcome.failed && outcome.error?.suggestion) {
    console.log(chalk.gray(`    → ${outcome.error.suggestion}`));
  }
  for (const change of outcome.changes ?? []) {
    printChange(change);
  }
}

function printChange(change: FieldChange): void {
  console.log(
    `    ${chalk.gray(`${change.field}:`)} ${chalk.red(describeValue(change.current))} → ${chalk.green(describeValue(change.desired))}`
  );
}

/**
 * Totals for a manifest run, then the run message and its errors
 */
export function printBatch(result: ApplyManifestResult): void {
  const { stats } = result;
  const counts = [
    `${stats.total} total`,
    chalk.yellow(`${stats.changed} changed`),
    chalk.green(`${stats.unchanged} unchanged`),
  ];
  if (stats.failed > 0) counts.push(chalk.red(`${stats.failed} failed`));
  if (stats.skipped > 0) counts.push(chalk.gray(`${stats.skipped} skipped`));

  console.log(`\n${chalk.bold('Summary:')} ${counts.join(', ')} ${chalk.gray(`(${(stats.durationMs / 1000).toFixed(1)}s)`)}`);
  console.log(MARKS[result.success ? 'ok' : 'failed'], result.message);
  for (const err of result.errors) {
    console.log(MARKS.bullet, err);
  }
}

export function info(message: string): void {
  console.log(MARKS.info, message);
}

export function error(message: string): void {
  console.error(MARKS.failed, message);
}

/**
 * Debug line on stderr, printed only under --verbose
 */
export function verbose(message: string, isVerbose: boolean): void {
  if (isVerbose) {
    console.error(chalk.gray(`[verbose] ${message}`));
  }
}

export function header(title: string): void {
  console.log(chalk.bold(`\n${title}`));
}

export function dryRunNotice(): void {
  console.log(chalk.yellow.bold('[dry run] reporting changes without applying them'));
}

function describeValue(value: unknown): string {
  if (value === undefined || value === null || value === '') return '(none)';
  if (typeof value === 'string') return value.length > 60 ? `${value.slice(0, 57)}...` : value;
  return typeof value === 'object' ? JSON.stringify(value) : String(value);
}
