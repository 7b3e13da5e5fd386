/**
 * DNS app configuration
 *
 * An installed app always has a config (possibly empty), so the only actions
 * are noop and update. JSON configs are compared structurally, text configs
 * byte for byte.
 */

import { PolicyViolation } from '../api/errors.js';
import { assertOk, isRecord, payloadOf, readString } from '../api/envelope.js';
import type {
  AppConfig,
  AppConfigDescriptor,
  FieldChange,
  ResourceHandler,
  ResourceState,
} from './types.js';

export interface AppConfigAttributes {
  /** Stored config text; null when the app has none */
  config: string | null;
}

/**
 * Render a config to the text the API stores
 */
export function serializeAppConfig(config: AppConfig): string {
  switch (config.format) {
    case 'text':
      return config.text;
    case 'json':
      return JSON.stringify(config.document, null, 2);
  }
}

/**
 * JSON text with object keys sorted at every level
 */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (isRecord(value)) {
    const entries = Object.keys(value)
      .sort()
      .filter((key) => value[key] !== undefined)
      .map((key) => `${JSON.stringify(key)}:${canonicalJson(value[key])}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Whether the stored config already equals the desired one
 */
export function appConfigMatches(current: string | null, desired: AppConfig): boolean {
  if (desired.format === 'text') {
    return (current ?? '') === desired.text;
  }
  if (current === null) {
    return false;
  }
  const parsed = parseJson(current);
  return parsed.ok && canonicalJson(parsed.value) === canonicalJson(desired.document);
}

export const appConfigHandler: ResourceHandler<AppConfigDescriptor, AppConfigAttributes> = {
  noun: 'App config',
  presentPhrase: 'is already up to date',

  identify(descriptor) {
    return descriptor.app;
  },

  async probe(client, descriptor): Promise<ResourceState<AppConfigAttributes>> {
    const envelope = await client.request('/api/apps/config/get', { name: descriptor.app });
    assertOk(envelope);
    return {
      status: 'present',
      attributes: { config: readString(payloadOf(envelope), 'config') ?? null },
      envelope,
    };
  },

  diff(descriptor, current): FieldChange[] {
    if (appConfigMatches(current.config, descriptor.config)) {
      return [];
    }
    return [
      { field: 'config', current: current.config, desired: serializeAppConfig(descriptor.config) },
    ];
  },

  async write(client, descriptor, action) {
    if (action !== 'update') {
      throw new PolicyViolation(`App config '${descriptor.app}' can only be updated`);
    }
    return client.request(
      '/api/apps/config/set',
      { name: descriptor.app, config: serializeAppConfig(descriptor.config) },
      'POST'
    );
  },
};
