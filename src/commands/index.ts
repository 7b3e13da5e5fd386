/**
 * Command exports
 */

export { createContext } from './context.js';
export { reconcileCommand, runOptionsFor, type ReconcileCommandOptions } from './reconcile.js';
export { applyCommand, parseConcurrency, type ApplyOptions } from './apply.js';
export { flushCommand, type FlushOptions } from './flush.js';
export {
  zoneEntry,
  recordEntry,
  userEntry,
  groupEntry,
  domainEntry,
  appConfigEntry,
  recordValueField,
  type CliFlags,
} from './entries.js';
