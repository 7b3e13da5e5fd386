/**
 * technitium-reconcile library entrypoint
 *
 * The CLI lives in cli.ts; this module exposes the same operations for
 * programmatic use.
 */

export * from './api/index.js';
export * from './config/index.js';
export * from './reconcilers/index.js';
export * from './manifest/index.js';
export { flush, runFlush, isFlushTarget, FLUSH_TARGETS, type FlushTarget } from './actions/flush.js';
