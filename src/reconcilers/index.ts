/**
 * Reconcilers module - desired state for Technitium DNS resources
 *
 * Each resource kind has a handler (probe, diff, write); the engine in
 * reconcile.ts drives them and the reporter turns results into records.
 *
 * @module reconcilers
 */

export {
  decideAction,
  reconcile,
  describe,
  runReconciliation,
  createProgress,
  type ReconcileProgress,
  type RunOptions,
} from './reconcile.js';

export { report, reportFailure, outcomeMessage, type FailureContext } from './report.js';

export {
  applyManifest,
  type ApplyManifestOptions,
  type ApplyManifestResult,
  type ApplyStats,
} from './batch.js';

export {
  zoneHandler,
  checkZoneOptions,
  isZoneType,
  isZoneOptionName,
  ZONE_TYPES,
  ZONE_OPTION_NAMES,
  ZONE_OPTION_RULES,
  ZONE_NOT_FOUND,
  DEFAULT_ZONE_TYPE,
  type ZoneAttributes,
  type ZoneOptionName,
} from './zone.js';

export {
  recordHandler,
  isRecordType,
  normalizeName,
  identifyingParams,
  formatRecordValue,
  rDataMatches,
  RECORD_TYPES,
  type RecordAttributes,
} from './record.js';

export { userHandler, type UserAttributes } from './user.js';
export { groupHandler, type GroupAttributes } from './group.js';
export { blockedDomainHandler, allowedDomainHandler, listContains } from './domain-list.js';
export {
  appConfigHandler,
  serializeAppConfig,
  canonicalJson,
  appConfigMatches,
  type AppConfigAttributes,
} from './app-config.js';

export type * from './types.js';
export { RESOURCE_KINDS } from './types.js';
