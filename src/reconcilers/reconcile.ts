/**
 * Reconciliation engine
 *
 * probe -> diff -> decide -> (unless dry run) write -> report
 *
 * Every invocation issues its calls sequentially and performs at most one
 * mutating call. Nothing is retried.
 */

import { createClient } from '../api/client.js';
import type { TechnitiumClient } from '../api/client.js';
import type { ConnectionProfile, TechnitiumClientConfig } from '../api/types.js';
import { PolicyViolation } from '../api/errors.js';
import { assertOk } from '../api/envelope.js';
import { logger } from '../api/logger.js';
import { defaultProtectedResources } from '../config/profile.js';
import { report, reportFailure } from './report.js';
import type {
  Action,
  DesiredState,
  FieldChange,
  OutcomeAction,
  OutcomeRecord,
  OutcomeSubject,
  ReconcileOptions,
  ResourceDescriptor,
  ResourceHandler,
} from './types.js';
import { zoneHandler } from './zone.js';
import { recordHandler } from './record.js';
import { userHandler } from './user.js';
import { groupHandler } from './group.js';
import { blockedDomainHandler, allowedDomainHandler } from './domain-list.js';
import { appConfigHandler } from './app-config.js';

// =============================================================================
// Decision
// =============================================================================

/**
 * Pick the minimal action for an intent given the probed state
 *
 * | current                   | intent  | action |
 * |---------------------------|---------|--------|
 * | absent                    | present | create |
 * | absent                    | absent  | noop   |
 * | present, no field changes | present | noop   |
 * | present, field changes    | present | update |
 * | present                   | absent  | delete |
 */
export function decideAction(
  intent: DesiredState,
  current: 'present' | 'absent',
  changes: readonly FieldChange[] = []
): Action {
  if (current === 'absent') {
    return intent === 'present' ? 'create' : 'noop';
  }
  if (intent === 'absent') {
    return 'delete';
  }
  return changes.length > 0 ? 'update' : 'noop';
}

// =============================================================================
// Progress tracking
// =============================================================================

/**
 * Mutable progress marker, filled in as a reconcile advances.
 *
 * Lets a caller that catches a failure tell whether the write had been sent.
 */
export interface ReconcileProgress {
  action: OutcomeAction;
  writeIssued: boolean;
}

export function createProgress(): ReconcileProgress {
  return { action: 'noop', writeIssued: false };
}

/**
 * Wrap a client so that `writeIssued` is set when a request is sent,
 * not when a write is merely attempted
 */
export function trackWrites(client: TechnitiumClient, progress: ReconcileProgress): TechnitiumClient {
  return {
    request(path, params, method) {
      progress.writeIssued = true;
      return client.request(path, params, method);
    },
    getConfig: () => client.getConfig(),
    close: () => client.close(),
  };
}

// =============================================================================
// Generic reconcile
// =============================================================================

async function reconcileWith<D extends ResourceDescriptor, A>(
  handler: ResourceHandler<D, A>,
  client: TechnitiumClient,
  descriptor: D,
  options: ReconcileOptions,
  progress: ReconcileProgress
): Promise<OutcomeRecord> {
  const dryRun = options.dryRun ?? false;
  const subject = subjectFor(handler, descriptor);
  const noun = handler.noun.toLowerCase();
  const log = logger.child({ kind: descriptor.kind, resource: subject.resource });

  // 1. Protected identifiers are refused before anything is sent
  if (descriptor.state === 'absent' && handler.isProtected) {
    const protectedResources = options.protectedResources ?? defaultProtectedResources();
    if (handler.isProtected(descriptor, protectedResources)) {
      throw new PolicyViolation(
        `Cannot delete protected ${noun} '${subject.resource}'`,
        'Remove it from the protected list in the config file if deletion is intended'
      );
    }
  }

  // 2. Probe
  const state = await handler.probe(client, descriptor);
  log.debug('Probed current state', { status: state.status });

  // 3. Diff and decide
  const changes =
    state.status === 'present' && descriptor.state === 'present'
      ? handler.diff(descriptor, state.attributes)
      : [];

  const immutable = changes.find((change) => change.immutable);
  if (immutable) {
    throw new PolicyViolation(
      `Cannot change ${immutable.field} of ${noun} '${subject.resource}' from ` +
        `${String(immutable.current)} to ${String(immutable.desired)}`,
      `Delete the ${noun} and create it again to change its ${immutable.field}`
    );
  }

  const action = decideAction(descriptor.state, state.status, changes);
  progress.action = action;
  log.debug('Decided action', { action, changes: changes.length });

  if (action === 'noop') {
    return report('noop', dryRun, state.envelope, subject, state.status);
  }

  handler.checkWrite?.(descriptor, action);

  // 4. Dry run stops before the write
  if (dryRun) {
    return report(action, true, state.envelope, subject, state.status, changes);
  }

  // 5. Exactly one write
  const current = state.status === 'present' ? state.attributes : undefined;
  const envelope = await handler.write(trackWrites(client, progress), descriptor, action, current);
  assertOk(envelope);

  log.info(`${handler.noun} ${action}d`);
  return report(action, false, envelope, subject, state.status, changes);
}

function subjectFor<D extends ResourceDescriptor, A>(
  handler: ResourceHandler<D, A>,
  descriptor: D
): OutcomeSubject {
  return {
    kind: descriptor.kind,
    noun: handler.noun,
    resource: handler.identify(descriptor),
    presentPhrase: handler.presentPhrase,
  };
}

// =============================================================================
// Dispatch
// =============================================================================

/**
 * Reconcile one descriptor against the server
 *
 * @throws PolicyViolation, TransportError, ProtocolError or RemoteOperationError
 */
export async function reconcile(
  client: TechnitiumClient,
  descriptor: ResourceDescriptor,
  options: ReconcileOptions = {},
  progress: ReconcileProgress = createProgress()
): Promise<OutcomeRecord> {
  switch (descriptor.kind) {
    case 'zone':
      return reconcileWith(zoneHandler, client, descriptor, options, progress);
    case 'record':
      return reconcileWith(recordHandler, client, descriptor, options, progress);
    case 'user':
      return reconcileWith(userHandler, client, descriptor, options, progress);
    case 'group':
      return reconcileWith(groupHandler, client, descriptor, options, progress);
    case 'blocked-domain':
      return reconcileWith(blockedDomainHandler, client, descriptor, options, progress);
    case 'allowed-domain':
      return reconcileWith(allowedDomainHandler, client, descriptor, options, progress);
    case 'app-config':
      return reconcileWith(appConfigHandler, client, descriptor, options, progress);
  }
}

/**
 * Message subject for a descriptor, without probing
 */
export function describe(descriptor: ResourceDescriptor): OutcomeSubject {
  switch (descriptor.kind) {
    case 'zone':
      return subjectFor(zoneHandler, descriptor);
    case 'record':
      return subjectFor(recordHandler, descriptor);
    case 'user':
      return subjectFor(userHandler, descriptor);
    case 'group':
      return subjectFor(groupHandler, descriptor);
    case 'blocked-domain':
      return subjectFor(blockedDomainHandler, descriptor);
    case 'allowed-domain':
      return subjectFor(allowedDomainHandler, descriptor);
    case 'app-config':
      return subjectFor(appConfigHandler, descriptor);
  }
}

// =============================================================================
// Caller surface
// =============================================================================

export interface RunOptions extends ReconcileOptions {
  /** Passed to the client created for this invocation */
  client?: TechnitiumClientConfig;
}

/**
 * Run one reconciliation with its own client.
 *
 * Never throws: failures come back as records with `failed: true`.
 */
export async function runReconciliation(
  profile: ConnectionProfile,
  descriptor: ResourceDescriptor,
  options: RunOptions = {}
): Promise<OutcomeRecord> {
  const client = createClient(profile, options.client);
  const progress = createProgress();
  try {
    return await reconcile(client, descriptor, options, progress);
  } catch (error) {
    logger.debug('Reconciliation failed', {
      kind: descriptor.kind,
      error: error instanceof Error ? error.message : String(error),
    });
    return reportFailure(error, describe(descriptor), {
      action: progress.action,
      dryRun: options.dryRun ?? false,
      writeIssued: progress.writeIssued,
    });
  } finally {
    await client.close();
  }
}
