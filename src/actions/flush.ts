/**
 * Flush actions
 *
 * Imperative operations with no probe: every run issues exactly one call,
 * so a run always reports a change.
 */

import { createClient } from '../api/client.js';
import type { TechnitiumClient } from '../api/client.js';
import type { ConnectionProfile } from '../api/types.js';
import { assertOk } from '../api/envelope.js';
import { report, reportFailure } from '../reconcilers/report.js';
import type { RunOptions } from '../reconcilers/reconcile.js';
import type { OutcomeRecord, OutcomeSubject } from '../reconcilers/types.js';

export type FlushTarget = 'cache' | 'blocked' | 'allowed';

export const FLUSH_TARGETS: readonly FlushTarget[] = ['cache', 'blocked', 'allowed'];

const FLUSH_ENDPOINTS: Record<FlushTarget, { path: string; noun: string }> = {
  cache: { path: '/api/cache/flush', noun: 'DNS cache' },
  blocked: { path: '/api/blocked/flush', noun: 'Blocked zones' },
  allowed: { path: '/api/allowed/flush', noun: 'Allowed zones' },
};

export function isFlushTarget(value: string): value is FlushTarget {
  return FLUSH_TARGETS.some((target) => target === value);
}

function subjectOf(target: FlushTarget): OutcomeSubject {
  return { kind: 'flush', noun: FLUSH_ENDPOINTS[target].noun, resource: target };
}

/**
 * Flush one server-side store
 *
 * @throws TransportError, ProtocolError or RemoteOperationError
 */
export async function flush(
  client: TechnitiumClient,
  target: FlushTarget,
  options: { dryRun?: boolean } = {}
): Promise<OutcomeRecord> {
  const subject = subjectOf(target);
  if (options.dryRun) {
    return report('flush', true, undefined, subject);
  }
  const envelope = await client.request(FLUSH_ENDPOINTS[target].path, {}, 'POST');
  assertOk(envelope);
  return report('flush', false, envelope, subject);
}

/**
 * Flush with a client of its own. Never throws.
 */
export async function runFlush(
  profile: ConnectionProfile,
  target: FlushTarget,
  options: Pick<RunOptions, 'dryRun' | 'client'> = {}
): Promise<OutcomeRecord> {
  const client = createClient(profile, options.client);
  const dryRun = options.dryRun ?? false;
  try {
    return await flush(client, target, { dryRun });
  } catch (error) {
    return reportFailure(error, subjectOf(target), { action: 'flush', dryRun, writeIssued: true });
  } finally {
    await client.close();
  }
}
