/**
 * Unit Tests: Connection profile resolution
 *
 * Tests the priority chain (CLI > env > config file > defaults), config file
 * discovery and the protected-resource lists.
 *
 * @see src/config/profile.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  BUILTIN_GROUPS,
  ProfileResolutionError,
  findConfigFile,
  parseBooleanEnv,
  parsePort,
  resolveProfile,
} from '../../src/config/profile.js';

// =============================================================================
// Fixtures
// =============================================================================

let cwd: string;
let homeDir: string;

beforeEach(() => {
  cwd = mkdtempSync(join(tmpdir(), 'technitium-cwd-'));
  homeDir = mkdtempSync(join(tmpdir(), 'technitium-home-'));
});

afterEach(() => {
  rmSync(cwd, { recursive: true, force: true });
  rmSync(homeDir, { recursive: true, force: true });
});

function writeLocalConfig(content: string): string {
  const path = join(cwd, 'technitium.yaml');
  writeFileSync(path, content);
  return path;
}

// =============================================================================
// Parsing helpers
// =============================================================================

describe('parsePort', () => {
  it('accepts numbers and numeric strings', () => {
    expect(parsePort(53443, 'config')).toBe(53443);
    expect(parsePort(' 8080 ', '--api-port')).toBe(8080);
  });

  it('rejects values outside the port range', () => {
    expect(() => parsePort('0', '--api-port')).toThrow('Invalid API port from --api-port: 0');
    expect(() => parsePort('http', 'TECHNITIUM_API_PORT')).toThrow(ProfileResolutionError);
  });
});

describe('parseBooleanEnv', () => {
  it('understands true/false, 1/0 and yes/no', () => {
    expect(parseBooleanEnv('TRUE', 'X')).toBe(true);
    expect(parseBooleanEnv('0', 'X')).toBe(false);
    expect(parseBooleanEnv('no', 'X')).toBe(false);
  });

  it('rejects anything else', () => {
    expect(() => parseBooleanEnv('maybe', 'TECHNITIUM_VALIDATE_CERTS')).toThrow(
      'Invalid value for TECHNITIUM_VALIDATE_CERTS: maybe'
    );
  });
});

// =============================================================================
// Resolution
// =============================================================================

describe('resolveProfile', () => {
  it('uses defaults for port and certificate validation', () => {
    const settings = resolveProfile({
      cwd,
      homeDir,
      env: {},
      cli: { apiUrl: 'https://dns.example.com/', apiToken: 'test-secret' },
    });

    expect(settings.profile).toEqual({
      apiUrl: 'https://dns.example.com',
      apiPort: 5380,
      apiToken: 'test-secret',
      validateCerts: true,
    });
    expect(settings.sources).toEqual({
      apiUrl: 'cli',
      apiPort: 'default',
      apiToken: 'cli',
      validateCerts: 'default',
    });
    expect(settings.configPath).toBeUndefined();
  });

  it('returns a frozen profile', () => {
    const { profile } = resolveProfile({
      cwd,
      homeDir,
      env: { TECHNITIUM_API_URL: 'http://dns.test', TECHNITIUM_API_TOKEN: 'test-secret' },
    });

    expect(Object.isFrozen(profile)).toBe(true);
  });

  it('prefers CLI over environment over config file', () => {
    writeLocalConfig(
      ['apiUrl: http://from-config', 'apiPort: 1111', 'apiToken: config-token', 'validateCerts: true'].join('\n')
    );

    const settings = resolveProfile({
      cwd,
      homeDir,
      env: {
        TECHNITIUM_API_URL: 'http://from-env',
        TECHNITIUM_API_PORT: '2222',
        TECHNITIUM_VALIDATE_CERTS: 'false',
      },
      cli: { apiUrl: 'http://from-cli' },
    });

    expect(settings.profile).toEqual({
      apiUrl: 'http://from-cli',
      apiPort: 2222,
      apiToken: 'config-token',
      validateCerts: false,
    });
    expect(settings.sources).toEqual({
      apiUrl: 'cli',
      apiPort: 'env',
      apiToken: 'config',
      validateCerts: 'env',
    });
  });

  it('lets --no-validate-certs override the environment', () => {
    const settings = resolveProfile({
      cwd,
      homeDir,
      env: {
        TECHNITIUM_API_URL: 'http://dns.test',
        TECHNITIUM_API_TOKEN: 'test-secret',
        TECHNITIUM_VALIDATE_CERTS: 'true',
      },
      cli: { validateCerts: false },
    });

    expect(settings.profile.validateCerts).toBe(false);
    expect(settings.sources.validateCerts).toBe('cli');
  });

  it('fails with a suggestion when no URL is configured', () => {
    let caught: unknown;
    try {
      resolveProfile({ cwd, homeDir, env: { TECHNITIUM_API_TOKEN: 'test-secret' } });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ProfileResolutionError);
    expect(caught).toMatchObject({ message: 'No API URL configured' });
    expect(caught instanceof ProfileResolutionError && caught.toUserMessage()).toBe(
      'Error: No API URL configured\n\nSuggestion: Use --api-url, set TECHNITIUM_API_URL, or add apiUrl to technitium.yaml'
    );
  });

  it('fails when no token is configured', () => {
    expect(() =>
      resolveProfile({ cwd, homeDir, env: { TECHNITIUM_API_URL: 'http://dns.test' } })
    ).toThrow('No API token configured');
  });

  describe('protected resources', () => {
    it('always protects the built-in groups', () => {
      const settings = resolveProfile({
        cwd,
        homeDir,
        env: { TECHNITIUM_API_URL: 'http://dns.test', TECHNITIUM_API_TOKEN: 'test-secret' },
      });

      expect(settings.protectedResources).toEqual({ user: [], group: [...BUILTIN_GROUPS] });
    });

    it('adds names from the config file', () => {
      writeLocalConfig(
        [
          'apiUrl: http://dns.test',
          'apiToken: test-secret',
          'protectedResources:',
          '  user: [admin]',
          '  group: [Operators]',
        ].join('\n')
      );

      const settings = resolveProfile({ cwd, homeDir, env: {} });

      expect(settings.protectedResources.user).toEqual(['admin']);
      expect(settings.protectedResources.group).toEqual([
        'Administrators',
        'DHCP Administrators',
        'DNS Administrators',
        'Operators',
      ]);
    });

    it('rejects a protected list that is not a list of names', () => {
      writeLocalConfig(['apiUrl: http://dns.test', 'protectedResources:', '  user: admin'].join('\n'));

      expect(() => resolveProfile({ cwd, homeDir, env: {} })).toThrow(
        'protectedResources.user must be a list of names'
      );
    });
  });
});

// =============================================================================
// Config file discovery
// =============================================================================

describe('findConfigFile', () => {
  it('returns null when no file exists', () => {
    expect(findConfigFile({ cwd, homeDir })).toBeNull();
  });

  it('prefers ./technitium.yaml over the user config', () => {
    const local = writeLocalConfig('apiUrl: http://dns.test\n');
    mkdirSync(join(homeDir, '.config', 'technitium-reconcile'), { recursive: true });
    writeFileSync(join(homeDir, '.config', 'technitium-reconcile', 'config.yaml'), 'apiUrl: http://home\n');

    expect(findConfigFile({ cwd, homeDir })).toBe(local);
  });

  it('falls back to the user config', () => {
    const dir = join(homeDir, '.config', 'technitium-reconcile');
    mkdirSync(dir, { recursive: true });
    writeFileSync(join(dir, 'config.yaml'), 'apiUrl: http://home\n');

    expect(findConfigFile({ cwd, homeDir })).toBe(join(dir, 'config.yaml'));
  });

  it('requires an explicit path to exist', () => {
    expect(() => findConfigFile({ cwd, homeDir, configPath: 'missing.yaml' })).toThrow(
      `Config file not found: ${join(cwd, 'missing.yaml')}`
    );
  });
});
