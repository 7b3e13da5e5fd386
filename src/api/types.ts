/**
 * Types for the Technitium DNS management API client
 */

import type { RequestInit, Response } from 'undici';

// =============================================================================
// Connection
// =============================================================================

/**
 * Connection profile for one invocation.
 *
 * Built once by the config layer and frozen; each client owns the profile
 * it was created from.
 */
export interface ConnectionProfile {
  /** Base URL without port, e.g. "https://dns.example.net" */
  readonly apiUrl: string;
  /** Management API port (default 5380) */
  readonly apiPort: number;
  /** API token sent as the `token` parameter */
  readonly apiToken: string;
  /** Verify TLS certificates on HTTPS connections */
  readonly validateCerts: boolean;
}

/**
 * HTTP methods used by the management API
 */
export type HttpMethod = 'GET' | 'POST';

/**
 * Request parameters before encoding.
 *
 * Booleans are sent as `true`/`false`, string arrays are comma-joined and
 * undefined values are dropped.
 */
export type QueryParams = Record<string, string | number | boolean | string[] | undefined>;

// =============================================================================
// Envelope
// =============================================================================

/**
 * Decoded JSON response wrapper returned by every API endpoint
 */
export interface ApiEnvelope {
  /** "ok" on success, "error" (or occasionally "invalid-token") otherwise */
  status?: string;
  /** Operation-specific payload */
  response?: Record<string, unknown>;
  /** Present on error */
  errorMessage?: string;
  /** Server-side stack trace, stripped before surfacing */
  stackTrace?: string;
  /** Older endpoints and proxies may use other keys */
  [key: string]: unknown;
}

// =============================================================================
// Client configuration
// =============================================================================

/**
 * Minimal fetch signature the client depends on
 */
export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

/**
 * Client configuration options
 */
export interface TechnitiumClientConfig {
  /** Request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
  /** Enable debug logging of requests and responses */
  debug?: boolean;
  /** Alternative fetch implementation */
  fetch?: FetchFn;
}
