/**
 * Technitium DNS management API client
 *
 * A thin transport: builds the URL, injects the token, sends the request and
 * hands back the decoded envelope. It never looks at `status`; that is the
 * reconcilers' job (see envelope.ts).
 *
 * No retries. A write that times out may or may not have been applied.
 */

import { Agent, fetch as undiciFetch } from 'undici';
import type { RequestInit } from 'undici';
import type {
  ApiEnvelope,
  ConnectionProfile,
  FetchFn,
  HttpMethod,
  QueryParams,
  TechnitiumClientConfig,
} from './types.js';
import { ProtocolError, TransportError } from './errors.js';
import { isApiEnvelope } from './envelope.js';
import { logger, ApiLogger } from './logger.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Client bound to one connection profile
 */
export interface TechnitiumClient {
  /**
   * Issue one API call.
   *
   * @param path - Endpoint path starting with `/api/`
   * @param params - Parameters; `token` is added automatically
   * @param method - GET sends a query string, POST a form body
   */
  request(path: string, params?: QueryParams, method?: HttpMethod): Promise<ApiEnvelope>;

  /** Get current configuration (with redacted secrets) */
  getConfig(): { baseUrl: string; validateCerts: boolean; hasToken: boolean };

  /** Release pooled connections */
  close(): Promise<void>;
}

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_TIMEOUT_MS = 10_000;

const BODY_PREVIEW_LENGTH = 200;

// =============================================================================
// Helpers
// =============================================================================

/**
 * Base URL for a profile, e.g. `https://dns.example.net:5380`
 */
export function buildBaseUrl(profile: ConnectionProfile): string {
  return `${profile.apiUrl.replace(/\/+$/, '')}:${profile.apiPort}`;
}

/**
 * Encode parameters for a query string or form body
 */
export function encodeParams(params: QueryParams): URLSearchParams {
  const encoded = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      encoded.set(key, value.join(','));
    } else {
      encoded.set(key, String(value));
    }
  }
  return encoded;
}

// =============================================================================
// Client Implementation
// =============================================================================

/**
 * Create an API client for one connection profile
 *
 * @example
 * const client = createClient(profile);
 * const envelope = await client.request('/api/zones/options/get', { zone: 'example.com' });
 */
export function createClient(
  profile: ConnectionProfile,
  config: TechnitiumClientConfig = {}
): TechnitiumClient {
  const baseUrl = buildBaseUrl(profile);
  const timeout = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const doFetch: FetchFn = config.fetch ?? undiciFetch;
  const log = config.debug
    ? new ApiLogger({ ...logger.getConfig(), level: 'debug' })
    : logger;

  const dispatcher = profile.validateCerts
    ? undefined
    : new Agent({ connect: { rejectUnauthorized: false } });

  async function request(
    path: string,
    params: QueryParams = {},
    method: HttpMethod = 'GET'
  ): Promise<ApiEnvelope> {
    const encoded = encodeParams({ ...params, token: profile.apiToken });
    const url = method === 'GET' ? `${baseUrl}${path}?${encoded.toString()}` : `${baseUrl}${path}`;

    const init: RequestInit = {
      method,
      headers: { Accept: 'application/json' },
      dispatcher,
    };
    if (method === 'POST') {
      init.headers = {
        Accept: 'application/json',
        'Content-Type': 'application/x-www-form-urlencoded',
      };
      init.body = encoded.toString();
    }

    log.request(method, url, typeof init.body === 'string' ? init.body : undefined);

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);
    init.signal = controller.signal;

    let status: number;
    let text: string;
    try {
      const startTime = Date.now();
      const response = await doFetch(url, init);
      log.response(response.status, url, Date.now() - startTime);

      status = response.status;
      text = await response.text();
    } catch (error) {
      if (controller.signal.aborted) {
        throw new TransportError(`Request to ${path} timed out after ${timeout}ms`, url, undefined, true);
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransportError(`Request to ${path} failed: ${reason}`, url);
    } finally {
      clearTimeout(timeoutId);
    }

    if (status >= 400) {
      throw new TransportError(`Request to ${path} failed with HTTP ${status}`, url, status);
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(text);
    } catch {
      throw new ProtocolError(
        `Response from ${path} is not valid JSON`,
        url,
        text.slice(0, BODY_PREVIEW_LENGTH)
      );
    }

    if (!isApiEnvelope(decoded)) {
      throw new ProtocolError(
        `Response from ${path} is not a JSON object`,
        url,
        text.slice(0, BODY_PREVIEW_LENGTH)
      );
    }

    return decoded;
  }

  return {
    request,

    getConfig() {
      return {
        baseUrl,
        validateCerts: profile.validateCerts,
        hasToken: profile.apiToken.length > 0,
      };
    },

    async close() {
      if (dispatcher) {
        await dispatcher.close();
      }
    },
  };
}
