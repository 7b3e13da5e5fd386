/**
 * Envelope interpretation helpers
 *
 * The client returns envelopes untouched; everything that looks at
 * `status`, error messages or payload fields lives here.
 */

import type { ApiEnvelope } from './types.js';
import { RemoteOperationError } from './errors.js';

const UNKNOWN_ERROR = 'Unknown error';

/**
 * Check if a decoded JSON value can be treated as an envelope
 */
export function isApiEnvelope(value: unknown): value is ApiEnvelope {
  return isRecord(value);
}

/**
 * Whether the envelope reports success
 */
export function isOk(envelope: ApiEnvelope): boolean {
  return envelope.status === 'ok';
}

/**
 * Extract the error message of a failed envelope.
 *
 * Priority: `errorMessage`, `error`, `message`, then a fixed fallback.
 * Empty strings are skipped.
 */
export function extractErrorMessage(envelope: ApiEnvelope): string {
  for (const key of ['errorMessage', 'error', 'message']) {
    const value = envelope[key];
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
  }
  return UNKNOWN_ERROR;
}

/**
 * Copy of the envelope without `stackTrace`
 */
export function stripStackTrace(envelope: ApiEnvelope): ApiEnvelope {
  const { stackTrace: _stackTrace, ...rest } = envelope;
  return rest;
}

/**
 * Throw a RemoteOperationError unless the envelope reports success
 *
 * @param context - Prefix for the error message, e.g. "Failed to delete zone"
 */
export function assertOk(envelope: ApiEnvelope, context?: string): ApiEnvelope {
  if (isOk(envelope)) {
    return envelope;
  }
  const message = extractErrorMessage(envelope);
  throw new RemoteOperationError(
    context ? `${context}: ${message}` : message,
    stripStackTrace(envelope)
  );
}

/**
 * Whether a failed envelope's message contains the given marker.
 *
 * This is how "not found" is detected: the API has no structured error
 * codes, only message text.
 */
export function errorMessageIncludes(envelope: ApiEnvelope, marker: string): boolean {
  return !isOk(envelope) && extractErrorMessage(envelope).includes(marker);
}

// =============================================================================
// Payload readers
// =============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * The `response` payload, or an empty object
 */
export function payloadOf(envelope: ApiEnvelope): Record<string, unknown> {
  return isRecord(envelope.response) ? envelope.response : {};
}

export function readString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  return typeof value === 'string' ? value : undefined;
}

export function readNumber(source: Record<string, unknown>, key: string): number | undefined {
  const value = source[key];
  return typeof value === 'number' ? value : undefined;
}

export function readBoolean(source: Record<string, unknown>, key: string): boolean | undefined {
  const value = source[key];
  return typeof value === 'boolean' ? value : undefined;
}

/**
 * Read an array of objects, dropping non-object items
 */
export function readRecords(
  source: Record<string, unknown>,
  key: string
): Record<string, unknown>[] {
  const value = source[key];
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

/**
 * Read an array of strings, dropping non-string items
 */
export function readStrings(source: Record<string, unknown>, key: string): string[] {
  const value = source[key];
  return Array.isArray(value)
    ? value.filter((item): item is string => typeof item === 'string')
    : [];
}
