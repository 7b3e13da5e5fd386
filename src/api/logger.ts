/**
 * Structured logging with secret redaction for the management API client
 *
 * The API takes its token (and user passwords) as request parameters, so
 * URLs and form bodies are scrubbed before anything is written out.
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Log levels in order of severity
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry
 */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Output as JSON (default: false for human-readable) */
  json?: boolean;
  /** Include timestamps (default: true) */
  timestamps?: boolean;
}

// =============================================================================
// Constants
// =============================================================================

/**
 * Request parameters that carry secrets
 */
const SENSITIVE_PARAMS = ['token', 'pass', 'newPass', 'proxyPassword'];

/**
 * `token=...` style pairs in URLs and form bodies
 */
const SENSITIVE_PARAM_PATTERN = new RegExp(
  `([?&]|^)(${SENSITIVE_PARAMS.join('|')})=([^&\\s]*)`,
  'g'
);

/**
 * Object keys whose values are always redacted (compared lowercase)
 */
const SENSITIVE_KEYS = new Set([
  'token',
  'apitoken',
  'api_token',
  'pass',
  'password',
  'newpass',
  'proxypassword',
  'authorization',
]);

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const REDACTED = '[REDACTED]';

// =============================================================================
// Redaction Functions
// =============================================================================

/**
 * Redact secret parameters inside a URL or form-encoded string
 *
 * @example
 * redactParams('http://dns:5380/api/zones/list?token=abc123')
 * // 'http://dns:5380/api/zones/list?token=[REDACTED]'
 */
export function redactParams(value: string): string {
  SENSITIVE_PARAM_PATTERN.lastIndex = 0;
  return value.replace(SENSITIVE_PARAM_PATTERN, (_match, sep: string, key: string) => {
    return `${sep}${key}=${REDACTED}`;
  });
}

/**
 * Redact sensitive values in an object (deep clone with redaction)
 */
export function redactObject(value: unknown, depth = 0): unknown {
  if (depth > 10) {
    return '[MAX_DEPTH]';
  }

  if (typeof value === 'string') {
    return redactParams(value);
  }

  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactObject(item, depth + 1));
  }

  const result: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(value)) {
    if (SENSITIVE_KEYS.has(key.toLowerCase())) {
      result[key] = item === undefined || item === null ? item : REDACTED;
    } else {
      result[key] = redactObject(item, depth + 1);
    }
  }
  return result;
}

function redactContext(context: Record<string, unknown>): Record<string, unknown> {
  const redacted = redactObject(context);
  return typeof redacted === 'object' && redacted !== null && !Array.isArray(redacted)
    ? { ...redacted }
    : {};
}

// =============================================================================
// Logger Class
// =============================================================================

/**
 * Logger with JSON output and automatic secret redaction
 */
export class ApiLogger {
  private config: Required<LoggerConfig>;
  private readonly baseContext: Record<string, unknown>;

  constructor(config: LoggerConfig = {}, baseContext: Record<string, unknown> = {}) {
    this.config = {
      level: config.level ?? 'info',
      json: config.json ?? false,
      timestamps: config.timestamps ?? true,
    };
    this.baseContext = baseContext;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private createEntry(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: redactParams(message),
    };

    const merged = { ...this.baseContext, ...context };
    if (Object.keys(merged).length > 0) {
      entry.context = redactContext(merged);
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: redactParams(error.message),
        stack: error.stack ? redactParams(error.stack) : undefined,
      };
    }

    return entry;
  }

  /**
   * Format entry for output
   */
  formatEntry(entry: LogEntry): string {
    if (this.config.json) {
      return JSON.stringify(entry);
    }

    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(`[${entry.timestamp}]`);
    }

    parts.push(`[${entry.level.toUpperCase()}]`);
    parts.push(entry.message);

    if (entry.context && Object.keys(entry.context).length > 0) {
      parts.push(JSON.stringify(entry.context));
    }

    if (entry.error) {
      parts.push(`\n  Error: ${entry.error.name}: ${entry.error.message}`);
    }

    return parts.join(' ');
  }

  // Log lines go to stderr so --json output on stdout stays parseable
  private output(entry: LogEntry): void {
    console.error(this.formatEntry(entry));
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.shouldLog(level)) return;
    this.output(this.createEntry(level, message, context, error));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  /**
   * Log an outgoing API request
   */
  request(method: string, url: string, body?: string): void {
    this.debug('HTTP Request', {
      method,
      url: redactParams(url),
      body: body ? redactParams(body) : undefined,
    });
  }

  /**
   * Log an API response; HTTP errors are logged at warn
   */
  response(status: number, url: string, durationMs?: number): void {
    const level: LogLevel = status >= 400 ? 'warn' : 'debug';
    this.log(level, `HTTP Response ${status}: ${redactParams(url)}`, { status, durationMs });
  }

  /**
   * Create a child logger with additional context
   */
  child(context: Record<string, unknown>): ApiLogger {
    return new ApiLogger(this.config, { ...this.baseContext, ...context });
  }

  setConfig(config: Partial<LoggerConfig>): void {
    Object.assign(this.config, config);
  }

  getConfig(): Required<LoggerConfig> {
    return { ...this.config };
  }
}

// =============================================================================
// Default Logger Instance
// =============================================================================

function parseLevel(value: string | undefined): LogLevel | undefined {
  switch (value) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return value;
    default:
      return undefined;
  }
}

/**
 * Default logger, configured from TECHNITIUM_LOG_LEVEL / TECHNITIUM_LOG_JSON
 */
export const logger = new ApiLogger({
  level: parseLevel(process.env.TECHNITIUM_LOG_LEVEL) ?? 'warn',
  json: process.env.TECHNITIUM_LOG_JSON === 'true',
});

/**
 * Create a new logger with custom configuration
 */
export function createLogger(config: LoggerConfig = {}): ApiLogger {
  return new ApiLogger(config);
}
