/**
 * Unit Tests: CLI commands
 *
 * Commands create their own clients, so the HTTP layer is swapped for the
 * in-process fake server here.
 *
 * @see src/commands/entries.ts
 * @see src/commands/reconcile.ts
 * @see src/commands/apply.ts
 * @see src/commands/flush.ts
 * @see src/commands/context.ts
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { InvalidArgumentError } from 'commander';
import type { RequestInit } from 'undici';
import type { FetchFn } from '../../src/api/types.js';
import {
  appConfigEntry,
  applyCommand,
  createContext,
  flushCommand,
  groupEntry,
  parseConcurrency,
  reconcileCommand,
  recordEntry,
  recordValueField,
  zoneEntry,
} from '../../src/commands/index.js';
import { defaultProtectedResources } from '../../src/config/profile.js';
import type { CommandContext, GlobalOptions } from '../../src/types.js';
import { FakeTechnitium, TEST_PROFILE, fetchFor } from './helpers.js';

const transport = vi.hoisted((): { fetch?: FetchFn } => ({}));

vi.mock('undici', async (importOriginal) => {
  const actual = await importOriginal<typeof import('undici')>();
  return {
    ...actual,
    fetch: (input: string, init: RequestInit) => {
      if (!transport.fetch) throw new Error('No fake server installed');
      return transport.fetch(input, init);
    },
  };
});

// =============================================================================
// Fixtures
// =============================================================================

let server: FakeTechnitium;
let dir: string;

beforeEach(() => {
  server = new FakeTechnitium();
  transport.fetch = fetchFor(server);
  dir = mkdtempSync(join(tmpdir(), 'technitium-cli-'));
});

afterEach(() => {
  transport.fetch = undefined;
  rmSync(dir, { recursive: true, force: true });
});

function contextFor(overrides: Partial<GlobalOptions> = {}, protectedGroups: string[] = []): CommandContext {
  const builtin = defaultProtectedResources();
  return {
    options: { dryRun: false, json: true, verbose: false, ...overrides },
    outputFormat: 'json',
    profile: TEST_PROFILE,
    protectedResources: { user: builtin.user, group: [...builtin.group, ...protectedGroups] },
    profileSources: { apiUrl: 'cli', apiPort: 'default', apiToken: 'env', validateCerts: 'default' },
  };
}

// =============================================================================
// Entries from flags
// =============================================================================

describe('entries', () => {
  it('maps --value to the field of the record type', () => {
    expect(recordValueField('mx')).toBe('exchange');
    expect(recordValueField('TXT')).toBe('text');
    expect(recordValueField('srv')).toBe('target');
    expect(recordValueField('CAA')).toBe('value');
    expect(recordValueField('HINFO')).toBeUndefined();
    expect(recordValueField(undefined)).toBeUndefined();
  });

  it('builds a record entry', () => {
    expect(recordEntry('www.example.com', { type: 'A', value: '192.0.2.10', ttl: '300' })).toEqual({
      type: 'A',
      ttl: '300',
      kind: 'record',
      name: 'www.example.com',
      ipAddress: '192.0.2.10',
    });
  });

  it('maps --value to the SRV target and keeps the other SRV flags', () => {
    expect(
      recordEntry('_sip._tcp.example.com', {
        type: 'SRV',
        value: 'sip.example.com',
        priority: '10',
        weight: '60',
        port: '5060',
      })
    ).toEqual({
      type: 'SRV',
      priority: '10',
      weight: '60',
      port: '5060',
      kind: 'record',
      name: '_sip._tcp.example.com',
      target: 'sip.example.com',
    });
  });

  it('passes --no-enabled through as enabled: false', () => {
    expect(zoneEntry('example.com', { enabled: false })).toEqual({
      enabled: false,
      kind: 'zone',
      zone: 'example.com',
    });
  });

  it('lets the argument win over flags of the same name', () => {
    expect(zoneEntry('example.com', { zone: 'other.example', kind: 'user' })).toEqual({
      zone: 'example.com',
      kind: 'zone',
    });
  });

  it('reads an app config from a file', () => {
    const path = join(dir, 'config.json');
    writeFileSync(path, '{"enabled":true}');

    expect(appConfigEntry('Split Horizon', { configFile: path, format: 'json' })).toEqual({
      format: 'json',
      kind: 'app-config',
      app: 'Split Horizon',
      config: '{"enabled":true}',
    });
  });

  it('takes inline app config text', () => {
    expect(appConfigEntry('Query Logs', { configText: 'a=1' })).toEqual({
      kind: 'app-config',
      app: 'Query Logs',
      config: 'a=1',
    });
  });
});

// =============================================================================
// parseConcurrency
// =============================================================================

describe('parseConcurrency', () => {
  it('accepts positive integers', () => {
    expect(parseConcurrency('4')).toBe(4);
    expect(parseConcurrency(' 2 ')).toBe(2);
  });

  it.each(['abc', '0', '-1', '1.5', '', '2x'])('rejects %j as a usage error', (value) => {
    expect(() => parseConcurrency(value)).toThrow(InvalidArgumentError);
  });
});

// =============================================================================
// reconcileCommand
// =============================================================================

describe('reconcileCommand', () => {
  it('reconciles a single entry', async () => {
    server.zones.set('example.com', { type: 'Primary', disabled: false });

    const result = await reconcileCommand(contextFor(), {
      entry: recordEntry('www.example.com', { type: 'A', value: '192.0.2.10', zone: 'example.com' }),
    });

    expect(result).toMatchObject({
      success: true,
      message: "Record 'www.example.com A 192.0.2.10' created.",
      data: { action: 'create', changed: true },
      errors: undefined,
    });
    expect(server.records).toHaveLength(1);
  });

  it('sends group members as one comma-separated field', async () => {
    server.groups.set('Operators', { description: '', members: ['alice'] });

    const result = await reconcileCommand(contextFor(), {
      entry: groupEntry('Operators', { members: 'alice, bob' }),
    });

    expect(result).toMatchObject({ success: true, message: "Group 'Operators' updated." });
    expect(server.writes()).toEqual([
      {
        path: '/api/admin/groups/set',
        params: { group: 'Operators', members: 'alice,bob' },
        method: 'POST',
      },
    ]);
    expect(server.groups.get('Operators')?.members).toEqual(['alice', 'bob']);
  });

  it('returns validation issues without calling the server', async () => {
    const result = await reconcileCommand(contextFor(), { entry: { kind: 'zone' } });

    expect(result).toEqual({
      success: false,
      message: 'Invalid resource',
      errors: ['zone.zone: Missing required field "zone"'],
    });
    expect(server.calls).toEqual([]);
  });

  it('honors --dry-run', async () => {
    const result = await reconcileCommand(contextFor({ dryRun: true }), { entry: zoneEntry('example.com', {}) });

    expect(result.message).toBe("Zone 'example.com' would be created (dry run).");
    expect(server.writes()).toEqual([]);
  });

  it('refuses groups protected by the config file', async () => {
    const result = await reconcileCommand(contextFor({}, ['Operators']), {
      entry: { kind: 'group', name: 'Operators', state: 'absent' },
    });

    expect(result.success).toBe(false);
    expect(result.errors).toEqual(["Cannot delete protected group 'Operators'"]);
  });
});

// =============================================================================
// flushCommand
// =============================================================================

describe('flushCommand', () => {
  it('flushes the named target', async () => {
    const result = await flushCommand(contextFor(), { target: 'cache' });

    expect(result).toMatchObject({ success: true, message: 'DNS cache flushed.' });
    expect(server.flushed).toEqual(['/api/cache/flush']);
  });

  it('rejects unknown targets', async () => {
    const result = await flushCommand(contextFor(), { target: 'zones' });

    expect(result).toEqual({
      success: false,
      message: 'Unknown flush target "zones". Use one of: cache, blocked, allowed',
      errors: ['Unknown flush target "zones". Use one of: cache, blocked, allowed'],
    });
  });
});

// =============================================================================
// applyCommand
// =============================================================================

describe('applyCommand', () => {
  it('applies a manifest file', async () => {
    const path = join(dir, 'dns.yaml');
    writeFileSync(
      path,
      [
        'apiVersion: technitium-reconcile/v1',
        'resources:',
        '  - kind: zone',
        '    zone: example.com',
        '  - kind: blocked-domain',
        '    domain: ads.example.net',
        '',
      ].join('\n')
    );

    const result = await applyCommand(contextFor(), { file: path });

    expect(result).toMatchObject({
      success: true,
      message: 'Applied 2 resource(s): 2 changed, 0 unchanged',
      errors: undefined,
    });
    expect(server.zones.has('example.com')).toBe(true);
    expect(server.blocked.has('ads.example.net')).toBe(true);
  });

  it('reports a missing manifest', async () => {
    const path = join(dir, 'missing.yaml');

    const result = await applyCommand(contextFor(), { file: path });

    expect(result).toEqual({
      success: false,
      message: `Manifest file not found: ${path}`,
      errors: [`Manifest file not found: ${path}`],
    });
  });
});

// =============================================================================
// createContext
// =============================================================================

describe('createContext', () => {
  function writeConfig(content: string): string {
    const path = join(dir, 'technitium.yaml');
    writeFileSync(path, content);
    return path;
  }

  it('resolves the profile from the given config file', () => {
    const config = writeConfig(
      ['apiUrl: https://dns.example.com/', 'apiToken: test-secret', 'validateCerts: false', ''].join('\n')
    );

    const ctx = createContext({ config, dryRun: false, json: true, verbose: false, validateCerts: true }, {});

    expect(ctx.outputFormat).toBe('json');
    expect(ctx.configPath).toBe(config);
    expect(ctx.profile).toEqual({
      apiUrl: 'https://dns.example.com',
      apiPort: 5380,
      apiToken: 'test-secret',
      validateCerts: false,
    });
    expect(ctx.profileSources).toEqual({
      apiUrl: 'config',
      apiPort: 'default',
      apiToken: 'config',
      validateCerts: 'config',
    });
  });

  it('lets --no-validate-certs override the environment', () => {
    const config = writeConfig('apiUrl: https://dns.example.com\n');

    const ctx = createContext(
      { config, dryRun: false, json: false, verbose: false, validateCerts: false, apiToken: 'test-secret' },
      { TECHNITIUM_VALIDATE_CERTS: 'true' }
    );

    expect(ctx.outputFormat).toBe('human');
    expect(ctx.profile.validateCerts).toBe(false);
    expect(ctx.profileSources.validateCerts).toBe('cli');
  });
});
