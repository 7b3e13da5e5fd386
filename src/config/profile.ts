/**
 * Connection profile resolution
 *
 * Sources, highest priority first:
 * 1. CLI flags (--api-url, --api-port, --api-token, --no-validate-certs)
 * 2. Environment (TECHNITIUM_API_URL, TECHNITIUM_API_PORT, TECHNITIUM_API_TOKEN,
 *    TECHNITIUM_VALIDATE_CERTS)
 * 3. YAML config file (--config, ./technitium.yaml,
 *    ~/.config/technitium-reconcile/config.yaml)
 * 4. Defaults (port 5380, certificate validation on)
 */

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { ConnectionProfile } from '../api/types.js';
import { isRecord } from '../api/envelope.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Where a profile field came from
 */
export type ProfileSource = 'cli' | 'env' | 'config' | 'default';

/**
 * Identifiers that must never be deleted, per kind
 */
export interface ProtectedResources {
  readonly user: readonly string[];
  readonly group: readonly string[];
}

/**
 * Values passed on the command line; undefined means "not given"
 */
export interface ProfileOverrides {
  apiUrl?: string;
  apiPort?: string | number;
  apiToken?: string;
  validateCerts?: boolean;
}

export interface ProfileResolveOptions {
  cli?: ProfileOverrides;
  /** Explicit config file; must exist when given */
  configPath?: string;
  /** Working directory for ./technitium.yaml lookup */
  cwd?: string;
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Home directory for the user config lookup */
  homeDir?: string;
}

export interface ResolvedSettings {
  profile: ConnectionProfile;
  protectedResources: ProtectedResources;
  sources: Record<keyof ConnectionProfile, ProfileSource>;
  /** Config file that was read, if any */
  configPath?: string;
}

/**
 * Shape of the YAML config file
 */
interface ConfigFile {
  apiUrl?: string;
  apiPort?: number;
  apiToken?: string;
  validateCerts?: boolean;
  protectedResources?: {
    user?: string[];
    group?: string[];
  };
}

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_API_PORT = 5380;

/** Groups the server ships with; deleting them is always refused */
export const BUILTIN_GROUPS: readonly string[] = Object.freeze([
  'Administrators',
  'DHCP Administrators',
  'DNS Administrators',
]);

const LOCAL_CONFIG_FILE = 'technitium.yaml';
const USER_CONFIG_FILE = join('.config', 'technitium-reconcile', 'config.yaml');

const ENV_API_URL = 'TECHNITIUM_API_URL';
const ENV_API_PORT = 'TECHNITIUM_API_PORT';
const ENV_API_TOKEN = 'TECHNITIUM_API_TOKEN';
const ENV_VALIDATE_CERTS = 'TECHNITIUM_VALIDATE_CERTS';

// =============================================================================
// Errors
// =============================================================================

/**
 * Custom error for profile resolution failures
 */
export class ProfileResolutionError extends Error {
  constructor(
    message: string,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'ProfileResolutionError';
  }

  toUserMessage(): string {
    let msg = `Error: ${this.message}`;
    if (this.suggestion) {
      msg += `\n\nSuggestion: ${this.suggestion}`;
    }
    return msg;
  }
}

// =============================================================================
// Parsing helpers
// =============================================================================

/**
 * Parse a TCP port from a flag, env var or config value
 */
export function parsePort(value: string | number, source: string): number {
  const port = typeof value === 'number' ? value : Number(value.trim());
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ProfileResolutionError(
      `Invalid API port from ${source}: ${String(value)}`,
      'Use a port number between 1 and 65535'
    );
  }
  return port;
}

/**
 * Parse a boolean environment value (true/false, 1/0, yes/no)
 */
export function parseBooleanEnv(value: string, name: string): boolean {
  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new ProfileResolutionError(
        `Invalid value for ${name}: ${value}`,
        'Use true or false'
      );
  }
}

function readStringList(value: unknown, path: string): string[] | undefined {
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ProfileResolutionError(`${path} must be a list of names`);
  }
  return value;
}

/**
 * Validate the parsed YAML document
 */
function toConfigFile(doc: unknown, filePath: string): ConfigFile {
  if (doc === null || doc === undefined) return {};
  if (!isRecord(doc)) {
    throw new ProfileResolutionError(`Config file ${filePath} must contain a mapping`);
  }

  const config: ConfigFile = {};

  const { apiUrl, apiPort, apiToken, validateCerts, protectedResources } = doc;
  if (apiUrl !== undefined) {
    if (typeof apiUrl !== 'string') throw new ProfileResolutionError(`apiUrl in ${filePath} must be a string`);
    config.apiUrl = apiUrl;
  }
  if (apiPort !== undefined) {
    if (typeof apiPort !== 'number' && typeof apiPort !== 'string') {
      throw new ProfileResolutionError(`apiPort in ${filePath} must be a number`);
    }
    config.apiPort = parsePort(apiPort, filePath);
  }
  if (apiToken !== undefined) {
    if (typeof apiToken !== 'string') throw new ProfileResolutionError(`apiToken in ${filePath} must be a string`);
    config.apiToken = apiToken;
  }
  if (validateCerts !== undefined) {
    if (typeof validateCerts !== 'boolean') {
      throw new ProfileResolutionError(`validateCerts in ${filePath} must be true or false`);
    }
    config.validateCerts = validateCerts;
  }
  if (protectedResources !== undefined) {
    if (!isRecord(protectedResources)) {
      throw new ProfileResolutionError(`protectedResources in ${filePath} must be a mapping`);
    }
    config.protectedResources = {
      user: readStringList(protectedResources.user, 'protectedResources.user'),
      group: readStringList(protectedResources.group, 'protectedResources.group'),
    };
  }

  return config;
}

// =============================================================================
// Config file discovery
// =============================================================================

/**
 * Find the config file to read, or null when none exists
 */
export function findConfigFile(options: ProfileResolveOptions = {}): string | null {
  if (options.configPath) {
    const explicit = resolve(options.cwd ?? process.cwd(), options.configPath);
    if (!existsSync(explicit)) {
      throw new ProfileResolutionError(
        `Config file not found: ${explicit}`,
        'Check the path passed to --config'
      );
    }
    return explicit;
  }

  const local = resolve(options.cwd ?? process.cwd(), LOCAL_CONFIG_FILE);
  if (existsSync(local)) return local;

  const user = join(options.homeDir ?? homedir(), USER_CONFIG_FILE);
  if (existsSync(user)) return user;

  return null;
}

/**
 * Read and validate a YAML config file
 */
export function loadConfigFile(filePath: string): ConfigFile {
  let doc: unknown;
  try {
    doc = parseYaml(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ProfileResolutionError(`Failed to read config file ${filePath}: ${reason}`);
  }
  return toConfigFile(doc, filePath);
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * Resolve the connection profile and protected lists for one run
 *
 * @throws ProfileResolutionError when URL or token is missing or a value is malformed
 */
export function resolveProfile(options: ProfileResolveOptions = {}): ResolvedSettings {
  const env = options.env ?? process.env;
  const cli = options.cli ?? {};
  const configPath = findConfigFile(options);
  const file = configPath ? loadConfigFile(configPath) : {};

  const sources: Record<keyof ConnectionProfile, ProfileSource> = {
    apiUrl: 'default',
    apiPort: 'default',
    apiToken: 'default',
    validateCerts: 'default',
  };

  // URL
  let apiUrl: string | undefined;
  if (cli.apiUrl) {
    apiUrl = cli.apiUrl;
    sources.apiUrl = 'cli';
  } else if (env[ENV_API_URL]) {
    apiUrl = env[ENV_API_URL];
    sources.apiUrl = 'env';
  } else if (file.apiUrl) {
    apiUrl = file.apiUrl;
    sources.apiUrl = 'config';
  }

  if (!apiUrl) {
    throw new ProfileResolutionError(
      'No API URL configured',
      `Use --api-url, set ${ENV_API_URL}, or add apiUrl to ${LOCAL_CONFIG_FILE}`
    );
  }

  // Port
  let apiPort = DEFAULT_API_PORT;
  const envPort = env[ENV_API_PORT];
  if (cli.apiPort !== undefined) {
    apiPort = parsePort(cli.apiPort, '--api-port');
    sources.apiPort = 'cli';
  } else if (envPort) {
    apiPort = parsePort(envPort, ENV_API_PORT);
    sources.apiPort = 'env';
  } else if (file.apiPort !== undefined) {
    apiPort = file.apiPort;
    sources.apiPort = 'config';
  }

  // Token
  let apiToken: string | undefined;
  if (cli.apiToken) {
    apiToken = cli.apiToken;
    sources.apiToken = 'cli';
  } else if (env[ENV_API_TOKEN]) {
    apiToken = env[ENV_API_TOKEN];
    sources.apiToken = 'env';
  } else if (file.apiToken) {
    apiToken = file.apiToken;
    sources.apiToken = 'config';
  }

  if (!apiToken) {
    throw new ProfileResolutionError(
      'No API token configured',
      `Use --api-token, set ${ENV_API_TOKEN}, or add apiToken to ${LOCAL_CONFIG_FILE}`
    );
  }

  // Certificate validation
  let validateCerts = true;
  const envValidate = env[ENV_VALIDATE_CERTS];
  if (cli.validateCerts !== undefined) {
    validateCerts = cli.validateCerts;
    sources.validateCerts = 'cli';
  } else if (envValidate) {
    validateCerts = parseBooleanEnv(envValidate, ENV_VALIDATE_CERTS);
    sources.validateCerts = 'env';
  } else if (file.validateCerts !== undefined) {
    validateCerts = file.validateCerts;
    sources.validateCerts = 'config';
  }

  const profile: ConnectionProfile = Object.freeze({
    apiUrl: apiUrl.replace(/\/+$/, ''),
    apiPort,
    apiToken,
    validateCerts,
  });

  const protectedResources: ProtectedResources = Object.freeze({
    user: Object.freeze([...(file.protectedResources?.user ?? [])]),
    group: Object.freeze([...BUILTIN_GROUPS, ...(file.protectedResources?.group ?? [])]),
  });

  return {
    profile,
    protectedResources,
    sources,
    configPath: configPath ?? undefined,
  };
}

/**
 * Protected lists when no config file is involved (library callers)
 */
export function defaultProtectedResources(): ProtectedResources {
  return Object.freeze({ user: Object.freeze([]), group: BUILTIN_GROUPS });
}

/**
 * Format a profile for display (token hidden)
 */
export function formatProfile(profile: ConnectionProfile): string {
  const tls = profile.validateCerts ? '' : ' (certificate validation off)';
  return `${profile.apiUrl}:${profile.apiPort}${tls}`;
}
