/**
 * flush command - Flush the DNS cache or the blocked/allowed zones
 */

import type { CommandContext, CommandResult } from '../types.js';
import { runFlush, isFlushTarget, FLUSH_TARGETS } from '../actions/flush.js';
import type { OutcomeRecord } from '../reconcilers/types.js';
import { dryRunNotice, printOutcome, error as printError } from '../utils/output.js';
import { runOptionsFor } from './reconcile.js';

export interface FlushOptions {
  target: string;
}

export async function flushCommand(
  ctx: CommandContext,
  options: FlushOptions
): Promise<CommandResult<OutcomeRecord>> {
  const human = ctx.outputFormat === 'human';

  if (!isFlushTarget(options.target)) {
    const message = `Unknown flush target "${options.target}". Use one of: ${FLUSH_TARGETS.join(', ')}`;
    if (human) printError(message);
    return { success: false, message, errors: [message] };
  }

  if (human && ctx.options.dryRun) {
    dryRunNotice();
  }

  const outcome = await runFlush(ctx.profile, options.target, runOptionsFor(ctx));
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
