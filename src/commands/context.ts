/**
 * Command context creation
 */

import { resolveProfile, formatProfile } from '../config/index.js';
import type { CommandContext, GlobalOptions } from '../types.js';
import { verbose } from '../utils/output.js';

/**
 * Resolve the connection profile for a CLI invocation
 *
 * @throws ProfileResolutionError when no URL or token can be found
 */
export function createContext(
  options: GlobalOptions,
  env: NodeJS.ProcessEnv = process.env
): CommandContext {
  const settings = resolveProfile({
    cli: {
      apiUrl: options.apiUrl,
      apiPort: options.apiPort,
      apiToken: options.apiToken,
      // commander defaults a --no- flag to true; only an explicit opt-out overrides
      validateCerts: options.validateCerts === false ? false : undefined,
    },
    configPath: options.config,
    env,
  });

  if (options.verbose) {
    verbose(`Config file: ${settings.configPath ?? '(none)'}`, true);
    verbose(`Profile: ${formatProfile(settings.profile)}`, true);
    const sources = Object.entries(settings.sources)
      .map(([field, source]) => `${field}=${source}`)
      .join(', ');
    verbose(`Sources: ${sources}`, true);
  }

  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
    profile: settings.profile,
    protectedResources: settings.protectedResources,
    profileSources: settings.sources,
    configPath: settings.configPath,
  };
}
