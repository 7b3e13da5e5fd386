/**
 * Configuration module exports
 */

export {
  resolveProfile,
  findConfigFile,
  loadConfigFile,
  parsePort,
  parseBooleanEnv,
  defaultProtectedResources,
  formatProfile,
  ProfileResolutionError,
  BUILTIN_GROUPS,
  DEFAULT_API_PORT,
  type ProfileSource,
  type ProtectedResources,
  type ProfileOverrides,
  type ProfileResolveOptions,
  type ResolvedSettings,
} from './profile.js';
