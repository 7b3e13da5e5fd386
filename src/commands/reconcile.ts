/**
 * Single-resource commands (zone, record, user, group, blocked, allowed, app-config)
 *
 * Each subcommand turns its flags into a raw entry and goes through the
 * same validator as manifests, so a flag error reads like a manifest error.
 */

import type { CommandContext, CommandResult } from '../types.js';
import { parseResource, ManifestValidationError } from '../manifest/index.js';
import { runReconciliation, type RunOptions } from '../reconcilers/reconcile.js';
import type { OutcomeRecord, ResourceDescriptor } from '../reconcilers/types.js';
import { printOutcome, dryRunNotice, verbose, error as printError } from '../utils/output.js';

export interface ReconcileCommandOptions {
  /** Raw resource entry; `kind` is required */
  entry: Record<string, unknown>;
}

/**
 * Options shared by every command that talks to the server
 */
export function runOptionsFor(ctx: CommandContext): RunOptions {
  return {
    dryRun: ctx.options.dryRun,
    protectedResources: ctx.protectedResources,
    client: { debug: ctx.options.verbose },
  };
}

/**
 * Validate an entry and reconcile it
 */
export async function reconcileCommand(
  ctx: CommandContext,
  options: ReconcileCommandOptions
): Promise<CommandResult<OutcomeRecord>> {
  const { options: globalOpts, outputFormat } = ctx;
  const human = outputFormat === 'human';

  let descriptor: ResourceDescriptor;
  try {
    descriptor = parseResource(options.entry, String(options.entry.kind ?? 'resource'));
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
    throw err;
  }

  verbose(`Reconciling ${descriptor.kind} (state: ${descriptor.state})`, globalOpts.verbose);
  if (human && globalOpts.dryRun) {
    dryRunNotice();
  }

  const outcome = await runReconciliation(ctx.profile, descriptor, runOptionsFor(ctx));

  if (human) {
    printOutcome(outcome);
  }

  return {
    success: !outcome.failed,
    message: outcome.message,
    data: outcome,
    errors: outcome.failed ? [outcome.message] : undefined,
  };
}
