/**
 * Outcome records and their messages
 *
 * Pure functions: nothing here talks to the API.
 */

import type { ApiEnvelope } from '../api/types.js';
import { isTechnitiumError, RemoteOperationError, TransportError } from '../api/errors.js';
import { stripStackTrace } from '../api/envelope.js';
import type {
  OutcomeAction,
  OutcomeRecord,
  OutcomeSubject,
  FieldChange,
} from './types.js';

const PAST_TENSE: Record<Exclude<OutcomeAction, 'noop'>, string> = {
  create: 'created',
  update: 'updated',
  delete: 'deleted',
  flush: 'flushed',
};

function label(subject: OutcomeSubject): string {
  return subject.kind === 'flush' ? subject.noun : `${subject.noun} '${subject.resource}'`;
}

/**
 * Build the human-readable message for an outcome
 *
 * @example
 * outcomeMessage('delete', true, { kind: 'zone', noun: 'Zone', resource: 'example.com' })
 * // "Zone 'example.com' would be deleted (dry run)."
 */
export function outcomeMessage(
  action: OutcomeAction,
  dryRun: boolean,
  subject: OutcomeSubject,
  current: 'present' | 'absent' = 'present'
): string {
  const who = label(subject);
  if (action === 'noop') {
    if (current === 'absent') return `${who} does not exist.`;
    return `${who} ${subject.presentPhrase ?? 'already exists'}.`;
  }
  if (dryRun) {
    return `${who} would be ${PAST_TENSE[action]} (dry run).`;
  }
  return `${who} ${PAST_TENSE[action]}.`;
}

/**
 * Build the record for a completed invocation
 *
 * @param current - Probed state, used for the noop message
 */
export function report(
  action: OutcomeAction,
  dryRun: boolean,
  envelope: ApiEnvelope | undefined,
  subject: OutcomeSubject,
  current: 'present' | 'absent' = 'present',
  changes?: FieldChange[]
): OutcomeRecord {
  const record: OutcomeRecord = {
    changed: action !== 'noop',
    failed: false,
    message: outcomeMessage(action, dryRun, subject, current),
    kind: subject.kind,
    resource: subject.resource,
    action,
    dryRun,
  };
  if (envelope) {
    record.rawResponse = stripStackTrace(envelope);
  }
  if (changes && changes.length > 0) {
    record.changes = changes;
  }
  return record;
}

export interface FailureContext {
  action: OutcomeAction;
  dryRun: boolean;
  /** The mutating call had been sent when the error happened */
  writeIssued: boolean;
}

/**
 * Build the record for a failed invocation
 */
export function reportFailure(
  error: unknown,
  subject: OutcomeSubject,
  context: FailureContext
): OutcomeRecord {
  const record: OutcomeRecord = {
    changed: false,
    failed: true,
    message: error instanceof Error ? error.message : String(error),
    kind: subject.kind,
    resource: subject.resource,
    action: context.action,
    dryRun: context.dryRun,
    writeIssued: context.writeIssued,
  };

  if (isTechnitiumError(error)) {
    record.error = { code: error.code, suggestion: error.suggestion };
    if (error instanceof RemoteOperationError) {
      record.rawResponse = error.envelope;
    }
  } else {
    record.error = { code: 'UNEXPECTED_ERROR' };
  }

  // A timed-out write may have landed; say so
  if (context.writeIssued && error instanceof TransportError && error.timedOut) {
    record.message += ' (the change may have been applied)';
  }

  return record;
}
