/**
 * apply command - Reconcile every resource in a manifest file
 */

import { InvalidArgumentError } from 'commander';
import type { CommandContext, CommandResult } from '../types.js';
import {
  loadManifest,
  ManifestLoadError,
  ManifestValidationError,
  type Manifest,
} from '../manifest/index.js';
import { applyManifest, type ApplyManifestResult } from '../reconcilers/batch.js';
import {
  header,
  info,
  verbose,
  dryRunNotice,
  printOutcome,
  printBatch,
  error as printError,
} from '../utils/output.js';
import { runOptionsFor } from './reconcile.js';

export interface ApplyOptions {
  /** Manifest path */
  file: string;
  /** Parallel invocations (default: 1) */
  concurrency?: number;
  /** Stop on first failure */
  failFast?: boolean;
}

/**
 * Parse --concurrency: a positive integer, or a usage error
 */
export function parseConcurrency(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

/**
 * Execute the apply command
 */
export async function applyCommand(
  ctx: CommandContext,
  options: ApplyOptions
): Promise<CommandResult<ApplyManifestResult>> {
  const { options: globalOpts, outputFormat } = ctx;
  const human = outputFormat === 'human';

  let manifest: Manifest;
  try {
    manifest = await loadManifest(options.file);
  } catch (err) {
    if (err instanceof ManifestValidationError) {
      if (human) {
        printError(err.message);
        console.log(err.formatErrors());
      }
      return {
        success: false,
        message: err.message,
        errors: err.result.errors.map((issue) => `${issue.path}: ${issue.message}`),
      };
    }
    if (err instanceof ManifestLoadError) {
      if (human) printError(err.message);
      return { success: false, message: err.message, errors: [err.message] };
    }
    throw err;
  }

  if (human) {
    header(`Applying ${manifest.path ?? options.file}`);
    info(`${manifest.resources.length} resource(s)`);
    if (globalOpts.dryRun) dryRunNotice();
  }
  verbose(`Concurrency: ${options.concurrency ?? 1}, fail-fast: ${options.failFast ?? false}`, globalOpts.verbose);

  const result = await applyManifest(ctx.profile, manifest.resources, {
    ...runOptionsFor(ctx),
    concurrency: options.concurrency,
    failFast: options.failFast,
    onOutcome: human ? (outcome) => printOutcome(outcome) : undefined,
  });

  if (human) {
    printBatch(result);
  }

  return {
    success: result.success,
    message: result.message,
    data: result,
    errors: result.errors.length > 0 ? result.errors : undefined,
  };
}
