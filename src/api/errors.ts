/**
 * Error taxonomy for reconciliation runs
 *
 * Every fatal condition is a TechnitiumError subclass carrying a code, so
 * callers can branch on `code` and print `toUserMessage()`.
 */

import type { ApiEnvelope } from './types.js';

/**
 * Error codes for programmatic handling
 */
export type TechnitiumErrorCode =
  | 'TRANSPORT_ERROR'
  | 'PROTOCOL_ERROR'
  | 'REMOTE_OPERATION_ERROR'
  | 'POLICY_VIOLATION';

/**
 * Base class for all reconciliation errors
 */
export class TechnitiumError extends Error {
  constructor(
    message: string,
    public readonly code: TechnitiumErrorCode,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'TechnitiumError';
  }

  /**
   * Get a user-friendly formatted error message
   */
  toUserMessage(): string {
    let msg = `Error: ${this.message}`;
    if (this.suggestion) {
      msg += `\n\nSuggestion: ${this.suggestion}`;
    }
    return msg;
  }
}

/**
 * Network, timeout or HTTP-level failure.
 *
 * For writes this is at-most-once: the request may have reached the server
 * before the connection failed.
 */
export class TransportError extends TechnitiumError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
    public readonly timedOut = false
  ) {
    super(
      message,
      'TRANSPORT_ERROR',
      timedOut
        ? 'Check that the DNS server is reachable; a write may still have been applied'
        : 'Check the API URL and port, and that the DNS server web service is running'
    );
    this.name = 'TransportError';
  }
}

/**
 * The response body was not a JSON object
 */
export class ProtocolError extends TechnitiumError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly bodyPreview?: string
  ) {
    super(message, 'PROTOCOL_ERROR', 'Make sure the URL points at the Technitium web service');
    this.name = 'ProtocolError';
  }
}

/**
 * The API answered with `status !== "ok"`
 */
export class RemoteOperationError extends TechnitiumError {
  constructor(
    message: string,
    /** Envelope with `stackTrace` removed */
    public readonly envelope: ApiEnvelope
  ) {
    super(message, 'REMOTE_OPERATION_ERROR');
    this.name = 'RemoteOperationError';
  }
}

/**
 * A requested change is not allowed, detected before any write
 */
export class PolicyViolation extends TechnitiumError {
  constructor(message: string, suggestion?: string) {
    super(message, 'POLICY_VIOLATION', suggestion);
    this.name = 'PolicyViolation';
  }
}

/**
 * Type guard to check if an error belongs to the taxonomy
 */
export function isTechnitiumError(error: unknown): error is TechnitiumError {
  return error instanceof TechnitiumError;
}

/**
 * Format any error into a user-friendly message
 */
export function formatError(error: unknown): string {
  if (isTechnitiumError(error)) {
    return error.toUserMessage();
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }
  return `Error: ${String(error)}`;
}
