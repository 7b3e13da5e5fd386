/**
 * Batch apply
 *
 * Runs one independent reconciliation per descriptor, each with its own
 * client. Descriptors run sequentially, or in chunks of `concurrency`.
 */

import type { ConnectionProfile } from '../api/types.js';
import { runReconciliation } from './reconcile.js';
import type { RunOptions } from './reconcile.js';
import type { OutcomeRecord, ResourceDescriptor } from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface ApplyManifestOptions extends RunOptions {
  /** Parallel invocations per chunk (default: 1) */
  concurrency?: number;
  /** Stop after the first chunk that contains a failure */
  failFast?: boolean;
  /** Called as each outcome arrives */
  onOutcome?: (outcome: OutcomeRecord, index: number) => void;
}

export interface ApplyStats {
  total: number;
  changed: number;
  unchanged: number;
  failed: number;
  /** Not run because the batch stopped early */
  skipped: number;
  durationMs: number;
}

export interface ApplyManifestResult {
  success: boolean;
  dryRun: boolean;
  message: string;
  startedAt: string;
  completedAt: string;
  outcomes: OutcomeRecord[];
  stats: ApplyStats;
  errors: string[];
}

// =============================================================================
// Batch Execution
// =============================================================================

/**
 * Apply every descriptor and aggregate the outcomes
 */
export async function applyManifest(
  profile: ConnectionProfile,
  descriptors: readonly ResourceDescriptor[],
  options: ApplyManifestOptions = {}
): Promise<ApplyManifestResult> {
  const startedAt = new Date().toISOString();
  const concurrency = chunkSize(options.concurrency);
  const failFast = options.failFast ?? false;
  const dryRun = options.dryRun ?? false;

  const outcomes: OutcomeRecord[] = [];
  const errors: string[] = [];
  const stats: ApplyStats = {
    total: descriptors.length,
    changed: 0,
    unchanged: 0,
    failed: 0,
    skipped: 0,
    durationMs: 0,
  };

  const runOptions: RunOptions = {
    dryRun,
    protectedResources: options.protectedResources,
    client: options.client,
  };

  for (const chunk of chunkArray(descriptors, concurrency)) {
    const offset = outcomes.length;
    const chunkResults = await Promise.all(
      chunk.map((descriptor) => runReconciliation(profile, descriptor, runOptions))
    );

    chunkResults.forEach((outcome, i) => {
      outcomes.push(outcome);
      updateStats(stats, outcome);
      if (outcome.failed) {
        errors.push(`${outcome.kind} '${outcome.resource}': ${outcome.message}`);
      }
      options.onOutcome?.(outcome, offset + i);
    });

    if (failFast && chunkResults.some((outcome) => outcome.failed)) {
      stats.skipped = descriptors.length - outcomes.length;
      if (stats.skipped > 0) {
        errors.push(`Stopped after a failure; ${stats.skipped} resource(s) not applied`);
      }
      break;
    }
  }

  const completedAt = new Date().toISOString();
  stats.durationMs = new Date(completedAt).getTime() - new Date(startedAt).getTime();

  const success = stats.failed === 0;
  return {
    success,
    dryRun,
    message: success
      ? `Applied ${stats.total} resource(s): ${stats.changed} changed, ${stats.unchanged} unchanged`
      : `Completed with ${stats.failed} failure(s)`,
    startedAt,
    completedAt,
    outcomes,
    stats,
    errors,
  };
}

function updateStats(stats: ApplyStats, outcome: OutcomeRecord): void {
  if (outcome.failed) {
    stats.failed++;
  } else if (outcome.changed) {
    stats.changed++;
  } else {
    stats.unchanged++;
  }
}

/**
 * Parallelism for a requested concurrency. Anything that is not a finite
 * number of at least 1 runs sequentially.
 */
export function chunkSize(concurrency: number | undefined): number {
  if (concurrency === undefined || !Number.isFinite(concurrency)) return 1;
  return Math.max(1, Math.floor(concurrency));
}

/**
 * Split array into chunks of specified size
 */
function chunkArray<T>(array: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < array.length; i += size) {
    chunks.push(array.slice(i, i + size));
  }
  return chunks;
}
