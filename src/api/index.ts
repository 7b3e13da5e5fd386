/**
 * Technitium DNS API client module
 *
 * Provides:
 * - createClient, a transport bound to one connection profile
 * - Envelope helpers (success check, error message extraction)
 * - The error taxonomy
 * - JSON logging with secret redaction
 */

// Main client
export { createClient, buildBaseUrl, encodeParams, DEFAULT_TIMEOUT_MS } from './client.js';
export type { TechnitiumClient } from './client.js';

// Envelope helpers
export {
  isApiEnvelope,
  isOk,
  extractErrorMessage,
  stripStackTrace,
  assertOk,
  errorMessageIncludes,
  isRecord,
  payloadOf,
  readString,
  readNumber,
  readBoolean,
  readRecords,
  readStrings,
} from './envelope.js';

// Errors
export {
  TechnitiumError,
  TransportError,
  ProtocolError,
  RemoteOperationError,
  PolicyViolation,
  isTechnitiumError,
  formatError,
} from './errors.js';
export type { TechnitiumErrorCode } from './errors.js';

// Logger utilities
export { logger, createLogger, ApiLogger, redactParams, redactObject } from './logger.js';
export type { LogLevel, LogEntry, LoggerConfig } from './logger.js';

// Types
export type {
  ConnectionProfile,
  HttpMethod,
  QueryParams,
  ApiEnvelope,
  FetchFn,
  TechnitiumClientConfig,
} from './types.js';
