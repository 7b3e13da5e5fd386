/**
 * Shared types for the technitium-reconcile CLI
 */

import type { ConnectionProfile } from './api/types.js';
import type { ProfileSource, ProtectedResources } from './config/profile.js';

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Global options available to all commands
 */
export interface GlobalOptions {
  /** Server base URL, e.g. https://dns.example.com */
  apiUrl?: string;
  /** Server port (default 5380) */
  apiPort?: string;
  apiToken?: string;
  /** false when --no-validate-certs is passed */
  validateCerts?: boolean;
  /** Explicit config file path */
  config?: string;
  /** Report what would change without writing */
  dryRun: boolean;
  /** Alias for --dry-run */
  check?: boolean;
  /** Output JSON for CI/automation */
  json: boolean;
  verbose: boolean;
}

/**
 * Output format for command results
 */
export type OutputFormat = 'human' | 'json';

/**
 * Everything a command needs, resolved once per process
 */
export interface CommandContext {
  options: GlobalOptions;
  outputFormat: OutputFormat;
  profile: ConnectionProfile;
  protectedResources: ProtectedResources;
  /** Where each profile field came from */
  profileSources: Record<keyof ConnectionProfile, ProfileSource>;
  /** Config file that was read, if any */
  configPath?: string;
}

/**
 * Result of a command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
}
