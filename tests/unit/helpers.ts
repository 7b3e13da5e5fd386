/**
 * Test helpers: an in-process stand-in for the Technitium management API
 *
 * FakeTechnitium implements TechnitiumClient over plain Maps, so reconcilers
 * can be driven end to end without a network. Every call is recorded.
 */

import { Response } from 'undici';
import type { TechnitiumClient } from '../../src/api/client.js';
import type {
  ApiEnvelope,
  ConnectionProfile,
  FetchFn,
  HttpMethod,
  QueryParams,
} from '../../src/api/types.js';

export const TEST_PROFILE: ConnectionProfile = Object.freeze({
  apiUrl: 'http://dns.test',
  apiPort: 5380,
  apiToken: 'test-secret',
  validateCerts: true,
});

export interface RecordedCall {
  path: string;
  params: QueryParams;
  method: HttpMethod;
}

export interface FakeRecord {
  name: string;
  type: string;
  ttl: number;
  rData: Record<string, unknown>;
  comments?: string;
}

const RDATA_FIELDS = [
  'ipAddress',
  'cname',
  'nameServer',
  'ptrName',
  'text',
  'exchange',
  'preference',
  'priority',
  'weight',
  'port',
  'target',
  'flags',
  'tag',
  'value',
  'dname',
  'aname',
];

const NUMERIC_RDATA_FIELDS = new Set(['preference', 'priority', 'weight', 'port', 'flags']);

function ok(response: Record<string, unknown> = {}): ApiEnvelope {
  return { status: 'ok', response };
}

function fail(errorMessage: string): ApiEnvelope {
  return {
    status: 'error',
    errorMessage,
    stackTrace: '   at DnsServerCore.WebService.Handle()',
  };
}

function str(params: QueryParams, key: string): string {
  const value = params[key];
  if (value === undefined) return '';
  return Array.isArray(value) ? value.join(',') : String(value);
}

function lower(name: string): string {
  return name.replace(/\.$/, '').toLowerCase();
}

export class FakeTechnitium implements TechnitiumClient {
  readonly calls: RecordedCall[] = [];
  readonly zones = new Map<string, { type: string; disabled: boolean }>();
  readonly records: FakeRecord[] = [];
  readonly users = new Map<string, { displayName: string; disabled?: boolean }>();
  readonly groups = new Map<string, { description: string; members?: string[] }>();
  readonly blocked = new Set<string>();
  readonly allowed = new Set<string>();
  readonly apps = new Map<string, string | null>();
  readonly flushed: string[] = [];

  /** Canned envelopes returned instead of the emulated behavior */
  readonly overrides = new Map<string, ApiEnvelope>();
  /** Errors thrown for a path, as a transport failure would be */
  readonly failures = new Map<string, Error>();

  closed = false;

  async request(path: string, params: QueryParams = {}, method: HttpMethod = 'GET'): Promise<ApiEnvelope> {
    this.calls.push({ path, params, method });
    const failure = this.failures.get(path);
    if (failure) throw failure;
    const override = this.overrides.get(path);
    if (override) return override;
    return this.handle(path, params);
  }

  getConfig() {
    return { baseUrl: 'http://dns.test:5380', validateCerts: true, hasToken: true };
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /** Calls that change server state */
  writes(): RecordedCall[] {
    return this.calls.filter((call) => call.method === 'POST');
  }

  paths(): string[] {
    return this.calls.map((call) => call.path);
  }

  private handle(path: string, params: QueryParams): ApiEnvelope {
    switch (path) {
      // Zones
      case '/api/zones/options/get': {
        const zone = this.zones.get(lower(str(params, 'zone')));
        if (!zone) return fail(`No such zone was found: ${str(params, 'zone')}`);
        return ok({ name: str(params, 'zone'), type: zone.type, disabled: zone.disabled });
      }
      case '/api/zones/create': {
        const name = lower(str(params, 'zone'));
        if (this.zones.has(name)) return fail(`Zone already exists: ${name}`);
        this.zones.set(name, { type: str(params, 'type'), disabled: false });
        return ok({ domain: name });
      }
      case '/api/zones/enable':
      case '/api/zones/disable': {
        const zone = this.zones.get(lower(str(params, 'zone')));
        if (!zone) return fail(`No such zone was found: ${str(params, 'zone')}`);
        zone.disabled = path === '/api/zones/disable';
        return ok();
      }
      case '/api/zones/delete': {
        const name = lower(str(params, 'zone'));
        if (!this.zones.delete(name)) return fail(`No such zone was found: ${name}`);
        return ok();
      }

      // Records
      case '/api/zones/records/get': {
        const domain = lower(str(params, 'domain'));
        if (!this.zoneFor(params)) return fail(`No such zone was found: ${str(params, 'domain')}`);
        return ok({
          zone: { name: str(params, 'zone') },
          records: this.records.filter((record) => lower(record.name) === domain),
        });
      }
      case '/api/zones/records/add': {
        if (!this.zoneFor(params)) return fail(`No such zone was found: ${str(params, 'domain')}`);
        this.records.push({
          name: str(params, 'domain'),
          type: str(params, 'type'),
          ttl: params.ttl === undefined ? 3600 : Number(params.ttl),
          rData: this.rDataFrom(params),
          comments: params.comments === undefined ? undefined : str(params, 'comments'),
        });
        return ok({ addedRecord: { name: str(params, 'domain') } });
      }
      case '/api/zones/records/update': {
        const record = this.findRecord(params);
        if (!record) return fail('Cannot update record: record does not exist.');
        if (params.ttl !== undefined) record.ttl = Number(params.ttl);
        return ok({ updatedRecord: { name: record.name } });
      }
      case '/api/zones/records/delete': {
        const record = this.findRecord(params);
        if (record) this.records.splice(this.records.indexOf(record), 1);
        return ok();
      }

      // Users
      case '/api/admin/users/list':
        return ok({
          users: [...this.users].map(([username, user]) => ({
            username,
            displayName: user.displayName,
            disabled: user.disabled ?? false,
          })),
        });
      case '/api/admin/users/create': {
        const user = str(params, 'user');
        if (this.users.has(user)) return fail(`User already exists: ${user}`);
        this.users.set(user, { displayName: str(params, 'displayName') || user });
        return ok({ username: user });
      }
      case '/api/admin/users/set': {
        const user = this.users.get(str(params, 'user'));
        if (!user) return fail('No such user exists.');
        if (params.displayName !== undefined) user.displayName = str(params, 'displayName');
        if (params.disabled !== undefined) user.disabled = str(params, 'disabled') === 'true';
        return ok();
      }
      case '/api/admin/users/delete':
        this.users.delete(str(params, 'user'));
        return ok();

      // Groups
      case '/api/admin/groups/list':
        return ok({
          groups: [...this.groups].map(([name, group]) => ({ name, description: group.description })),
        });
      case '/api/admin/groups/create': {
        const name = str(params, 'group');
        if (this.groups.has(name)) return fail(`Group already exists: ${name}`);
        this.groups.set(name, { description: str(params, 'description') });
        return ok({ name });
      }
      case '/api/admin/groups/get': {
        const name = str(params, 'group');
        const group = this.groups.get(name);
        if (!group) return fail('No such group exists.');
        return ok({ name, description: group.description, members: group.members ?? [] });
      }
      case '/api/admin/groups/set': {
        const group = this.groups.get(str(params, 'group'));
        if (!group) return fail('No such group exists.');
        if (params.description !== undefined) group.description = str(params, 'description');
        if (params.members !== undefined) {
          group.members = str(params, 'members').split(',').filter((member) => member !== '');
        }
        return ok();
      }
      case '/api/admin/groups/delete':
        this.groups.delete(str(params, 'group'));
        return ok();

      // Blocked / allowed
      case '/api/blocked/list':
        return this.listResponse(this.blocked, str(params, 'domain'));
      case '/api/blocked/add':
        this.blocked.add(lower(str(params, 'domain')));
        return ok();
      case '/api/blocked/delete':
        this.blocked.delete(lower(str(params, 'domain')));
        return ok();
      case '/api/allowed/list':
        return this.listResponse(this.allowed, str(params, 'domain'));
      case '/api/allowed/add':
        this.allowed.add(lower(str(params, 'domain')));
        return ok();
      case '/api/allowed/delete':
        this.allowed.delete(lower(str(params, 'domain')));
        return ok();

      // Apps
      case '/api/apps/config/get': {
        const name = str(params, 'name');
        if (!this.apps.has(name)) return fail(`DNS application was not found: ${name}`);
        return ok({ config: this.apps.get(name) ?? null });
      }
      case '/api/apps/config/set': {
        const name = str(params, 'name');
        if (!this.apps.has(name)) return fail(`DNS application was not found: ${name}`);
        this.apps.set(name, str(params, 'config'));
        return ok();
      }

      // Flush
      case '/api/cache/flush':
      case '/api/blocked/flush':
      case '/api/allowed/flush':
        this.flushed.push(path);
        return ok();

      default:
        return fail(`Invalid API call: ${path}`);
    }
  }

  private listResponse(list: Set<string>, domain: string): ApiEnvelope {
    const wanted = lower(domain);
    return ok({
      domain: wanted,
      zones: [...list].filter((entry) => entry.endsWith(`.${wanted}`)),
      records: list.has(wanted) ? [{ name: wanted, type: 'NS', ttl: 0, rData: {} }] : [],
    });
  }

  /** Zone named by the call, or the closest zone enclosing its domain */
  private zoneFor(params: QueryParams): string | undefined {
    const zone = lower(str(params, 'zone'));
    if (zone) return this.zones.has(zone) ? zone : undefined;
    const domain = lower(str(params, 'domain'));
    return [...this.zones.keys()]
      .filter((name) => domain === name || domain.endsWith(`.${name}`))
      .sort((a, b) => b.length - a.length)[0];
  }

  private rDataFrom(params: QueryParams): Record<string, unknown> {
    const rData: Record<string, unknown> = {};
    for (const field of RDATA_FIELDS) {
      if (params[field] !== undefined) {
        rData[field] = NUMERIC_RDATA_FIELDS.has(field) ? Number(params[field]) : str(params, field);
      }
    }
    return rData;
  }

  private findRecord(params: QueryParams): FakeRecord | undefined {
    const wanted = this.rDataFrom(params);
    return this.records.find(
      (record) =>
        lower(record.name) === lower(str(params, 'domain')) &&
        record.type === str(params, 'type') &&
        Object.entries(wanted).every(([key, value]) => record.rData[key] === value)
    );
  }
}

/**
 * A fetch implementation backed by a FakeTechnitium, for code that creates
 * its own client (runReconciliation, applyManifest, runFlush)
 */
export function fetchFor(fake: FakeTechnitium, tokens: string[] = []): FetchFn {
  return async (input, init) => {
    const url = new URL(input);
    const method: HttpMethod = init.method === 'POST' ? 'POST' : 'GET';
    const encoded = method === 'POST' && typeof init.body === 'string'
      ? new URLSearchParams(init.body)
      : url.searchParams;

    const params: QueryParams = {};
    for (const [key, value] of encoded) {
      if (key === 'token') {
        tokens.push(value);
      } else {
        params[key] = value;
      }
    }

    const envelope = await fake.request(url.pathname, params, method);
    return new Response(JSON.stringify(envelope), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    });
  };
}
