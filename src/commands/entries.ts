/**
 * Raw resource entries built from subcommand flags
 *
 * Flag names match manifest field names, so most flags pass straight
 * through; the validator does the type checking.
 */

import { readFileSync } from 'node:fs';
import { isRecordType } from '../reconcilers/record.js';
import type { RecordType } from '../reconcilers/types.js';

export type CliFlags = Record<string, unknown>;

const VALUE_FIELD: Record<RecordType, string> = {
  A: 'ipAddress',
  AAAA: 'ipAddress',
  CNAME: 'cname',
  NS: 'nameServer',
  PTR: 'ptrName',
  TXT: 'text',
  MX: 'exchange',
  SRV: 'target',
  CAA: 'value',
  DNAME: 'dname',
  ANAME: 'aname',
};

/**
 * Entry field that carries `--value` for a record type
 */
export function recordValueField(type: unknown): string | undefined {
  if (typeof type !== 'string') return undefined;
  const upper = type.toUpperCase();
  return isRecordType(upper) ? VALUE_FIELD[upper] : undefined;
}

export function zoneEntry(zone: string, flags: CliFlags): Record<string, unknown> {
  return { ...flags, kind: 'zone', zone };
}

export function recordEntry(name: string, flags: CliFlags): Record<string, unknown> {
  const { value, ...rest } = flags;
  const entry: Record<string, unknown> = { ...rest, kind: 'record', name };
  const field = recordValueField(flags.type);
  if (field !== undefined && value !== undefined) {
    entry[field] = value;
  }
  return entry;
}

export function userEntry(username: string, flags: CliFlags): Record<string, unknown> {
  return { ...flags, kind: 'user', username };
}

export function groupEntry(name: string, flags: CliFlags): Record<string, unknown> {
  return { ...flags, kind: 'group', name };
}

export function domainEntry(
  kind: 'blocked-domain' | 'allowed-domain',
  domain: string,
  flags: CliFlags
): Record<string, unknown> {
  return { ...flags, kind, domain };
}

/**
 * App config entry from `--config-text` or `--config-file`
 *
 * @throws Error if the config file cannot be read
 */
export function appConfigEntry(app: string, flags: CliFlags): Record<string, unknown> {
  const { configText, configFile, ...rest } = flags;
  let config: unknown = configText;
  if (typeof configFile === 'string') {
    config = readFileSync(configFile, 'utf-8');
  }
  return { ...rest, kind: 'app-config', app, config };
}
