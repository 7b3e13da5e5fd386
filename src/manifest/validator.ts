/**
 * Resource entry validation
 *
 * Turns loosely typed entries (from YAML manifests or CLI flags) into
 * ResourceDescriptors, collecting every issue instead of stopping at the
 * first.
 *
 * @example Valid entries
 * ```yaml
 * - kind: zone
 *   zone: example.com
 *   type: Forwarder
 *   forwarder: 192.0.2.53
 * - kind: record
 *   name: www.example.com
 *   type: A
 *   ipAddress: 192.0.2.10
 *   ttl: 300
 * - kind: group
 *   name: Old Admins
 *   state: absent
 * ```
 */

import { isRecord } from '../api/envelope.js';
import { describe } from '../reconcilers/reconcile.js';
import { isZoneType, checkZoneOptions, ZONE_OPTION_NAMES, ZONE_TYPES } from '../reconcilers/zone.js';
import { isRecordType, normalizeName, RECORD_TYPES } from '../reconcilers/record.js';
import { RESOURCE_KINDS } from '../reconcilers/types.js';
import type {
  AppConfig,
  DesiredState,
  ForwarderProtocol,
  ProxyType,
  RecordData,
  ResourceDescriptor,
  ResourceKind,
  ZoneOptions,
  ZoneTransferProtocol,
} from '../reconcilers/types.js';
import {
  type ValidationIssue,
  type ValidationResult,
  ManifestValidationError,
  buildResult,
  duplicateResource,
  invalidFieldType,
  invalidValue,
  missingRequiredField,
  unknownField,
  unknownKind,
  unsupportedOption,
} from './errors.js';

// =============================================================================
// Field reader
// =============================================================================

const DESIRED_STATES: readonly DesiredState[] = ['present', 'absent'];
const FORWARDER_PROTOCOLS: readonly ForwarderProtocol[] = ['Udp', 'Tcp', 'Tls', 'Https', 'Quic'];
const TRANSFER_PROTOCOLS: readonly ZoneTransferProtocol[] = ['Tcp', 'Tls', 'Quic'];
const PROXY_TYPES: readonly ProxyType[] = ['NoProxy', 'DefaultProxy', 'Http', 'Socks5'];

/**
 * Typed access to one raw entry, recording issues as it goes
 */
class EntryReader {
  readonly issues: ValidationIssue[] = [];

  constructor(
    private readonly entry: Record<string, unknown>,
    readonly path: string
  ) {}

  has(key: string): boolean {
    return this.entry[key] !== undefined && this.entry[key] !== null;
  }

  string(key: string, required = false): string | undefined {
    const value = this.entry[key];
    if (value === undefined || value === null) {
      if (required) this.issues.push(missingRequiredField(this.path, key));
      return undefined;
    }
    if (typeof value === 'number') return String(value);
    if (typeof value !== 'string') {
      this.issues.push(invalidFieldType(this.path, key, 'a string', value));
      return undefined;
    }
    if (required && value.trim() === '') {
      this.issues.push(invalidValue(this.path, key, `Field "${key}" must not be empty`));
      return undefined;
    }
    return value;
  }

  integer(key: string, min: number, max: number, required = false): number | undefined {
    const value = this.entry[key];
    if (value === undefined || value === null) {
      if (required) this.issues.push(missingRequiredField(this.path, key));
      return undefined;
    }
    const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
    if (typeof parsed !== 'number' || !Number.isInteger(parsed)) {
      this.issues.push(invalidFieldType(this.path, key, 'an integer', value));
      return undefined;
    }
    if (parsed < min || parsed > max) {
      this.issues.push(invalidValue(this.path, key, `Field "${key}" must be between ${min} and ${max}`));
      return undefined;
    }
    return parsed;
  }

  boolean(key: string): boolean | undefined {
    const value = this.entry[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value === 'boolean') return value;
    if (value === 'true') return true;
    if (value === 'false') return false;
    this.issues.push(invalidFieldType(this.path, key, 'true or false', value));
    return undefined;
  }

  /**
   * A list of strings, also accepted as one comma-separated string
   */
  stringList(key: string): string[] | undefined {
    const value = this.entry[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value === 'string') {
      return value.split(',').map((item) => item.trim()).filter((item) => item.length > 0);
    }
    if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
      return value;
    }
    this.issues.push(invalidFieldType(this.path, key, 'a list of strings', value));
    return undefined;
  }

  oneOf<T extends string>(key: string, allowed: readonly T[], required = false): T | undefined {
    const value = this.string(key, required);
    if (value === undefined) return undefined;
    const match = allowed.find((candidate) => candidate === value);
    if (!match) {
      this.issues.push(
        invalidValue(this.path, key, `Invalid value "${value}" for "${key}"`, allowed)
      );
    }
    return match;
  }

  rejectUnknown(allowed: readonly string[]): void {
    for (const key of Object.keys(this.entry)) {
      if (!allowed.includes(key)) {
        this.issues.push(unknownField(this.path, key, allowed));
      }
    }
  }

  raw(key: string): unknown {
    return this.entry[key];
  }
}

// =============================================================================
// Per-kind builders
// =============================================================================

const COMMON_FIELDS = ['kind', 'state'];

const RECORD_DATA_FIELDS: Record<RecordData['type'], readonly string[]> = {
  A: ['ipAddress'],
  AAAA: ['ipAddress'],
  CNAME: ['cname'],
  NS: ['nameServer'],
  PTR: ['ptrName'],
  TXT: ['text'],
  MX: ['exchange', 'preference'],
  SRV: ['priority', 'weight', 'port', 'target'],
  CAA: ['flags', 'tag', 'value'],
  DNAME: ['dname'],
  ANAME: ['aname'],
};

const ALL_RECORD_DATA_FIELDS: readonly string[] = [
  ...new Set(Object.values(RECORD_DATA_FIELDS).flat()),
];

function readZoneOptions(reader: EntryReader): ZoneOptions {
  return {
    catalog: reader.string('catalog'),
    useSoaSerialDateScheme: reader.boolean('useSoaSerialDateScheme'),
    primaryNameServerAddresses: reader.stringList('primaryNameServerAddresses'),
    zoneTransferProtocol: reader.oneOf('zoneTransferProtocol', TRANSFER_PROTOCOLS),
    tsigKeyName: reader.string('tsigKeyName'),
    validateZone: reader.boolean('validateZone'),
    initializeForwarder: reader.boolean('initializeForwarder'),
    protocol: reader.oneOf('protocol', FORWARDER_PROTOCOLS),
    forwarder: reader.string('forwarder'),
    dnssecValidation: reader.boolean('dnssecValidation'),
    proxyType: reader.oneOf('proxyType', PROXY_TYPES),
    proxyAddress: reader.string('proxyAddress'),
    proxyPort: reader.integer('proxyPort', 1, 65535),
    proxyUsername: reader.string('proxyUsername'),
    proxyPassword: reader.string('proxyPassword'),
  };
}

function buildZone(reader: EntryReader, state: DesiredState): ResourceDescriptor | undefined {
  reader.rejectUnknown([...COMMON_FIELDS, 'zone', 'type', 'enabled', ...ZONE_OPTION_NAMES]);
  const zone = reader.string('zone', true);
  const enabled = reader.boolean('enabled');
  const rawType = reader.string('type');
  if (rawType !== undefined && !isZoneType(rawType)) {
    reader.issues.push(invalidValue(reader.path, 'type', `Unknown zone type "${rawType}"`, ZONE_TYPES));
  }
  const type = rawType !== undefined && isZoneType(rawType) ? rawType : undefined;
  const options = readZoneOptions(reader);

  const effectiveType = type ?? 'Primary';
  const { unsupported, missing } = checkZoneOptions(effectiveType, options);
  for (const option of unsupported) {
    reader.issues.push(unsupportedOption(reader.path, option, `${effectiveType} zones`));
  }
  if (state === 'present') {
    for (const option of missing) {
      reader.issues.push(missingRequiredField(reader.path, option, `required for ${effectiveType} zones`));
    }
  }

  if (zone === undefined) return undefined;
  const given = Object.entries(options).some(([, value]) => value !== undefined);
  return {
    kind: 'zone',
    state,
    zone: zone.trim(),
    ...(type ? { type } : {}),
    ...(enabled !== undefined ? { enabled } : {}),
    ...(given ? { options } : {}),
  };
}

function readRecordData(reader: EntryReader): RecordData | undefined {
  const type = reader.string('type', true)?.toUpperCase();
  if (type === undefined) return undefined;
  if (!isRecordType(type)) {
    reader.issues.push(invalidValue(reader.path, 'type', `Unsupported record type "${type}"`, RECORD_TYPES));
    return undefined;
  }

  for (const field of ALL_RECORD_DATA_FIELDS) {
    if (reader.has(field) && !RECORD_DATA_FIELDS[type].includes(field)) {
      reader.issues.push(unsupportedOption(reader.path, field, `${type} records`));
    }
  }

  switch (type) {
    case 'A':
    case 'AAAA': {
      const ipAddress = reader.string('ipAddress', true);
      return ipAddress === undefined ? undefined : { type, ipAddress };
    }
    case 'CNAME': {
      const cname = reader.string('cname', true);
      return cname === undefined ? undefined : { type, cname };
    }
    case 'NS': {
      const nameServer = reader.string('nameServer', true);
      return nameServer === undefined ? undefined : { type, nameServer };
    }
    case 'PTR': {
      const ptrName = reader.string('ptrName', true);
      return ptrName === undefined ? undefined : { type, ptrName };
    }
    case 'TXT': {
      const text = reader.string('text', true);
      return text === undefined ? undefined : { type, text };
    }
    case 'MX': {
      const exchange = reader.string('exchange', true);
      const preference = reader.integer('preference', 0, 65535, true);
      return exchange === undefined || preference === undefined
        ? undefined
        : { type, exchange, preference };
    }
    case 'SRV': {
      const priority = reader.integer('priority', 0, 65535, true);
      const weight = reader.integer('weight', 0, 65535, true);
      const port = reader.integer('port', 0, 65535, true);
      const target = reader.string('target', true);
      return priority === undefined || weight === undefined || port === undefined || target === undefined
        ? undefined
        : { type, priority, weight, port, target };
    }
    case 'CAA': {
      const flags = reader.integer('flags', 0, 255, true);
      const tag = reader.string('tag', true);
      const value = reader.string('value', true);
      return flags === undefined || tag === undefined || value === undefined
        ? undefined
        : { type, flags, tag, value };
    }
    case 'DNAME': {
      const dname = reader.string('dname', true);
      return dname === undefined ? undefined : { type, dname };
    }
    case 'ANAME': {
      const aname = reader.string('aname', true);
      return aname === undefined ? undefined : { type, aname };
    }
  }
}

function buildRecord(reader: EntryReader, state: DesiredState): ResourceDescriptor | undefined {
  reader.rejectUnknown([
    ...COMMON_FIELDS,
    'name',
    'zone',
    'type',
    'ttl',
    'comments',
    ...ALL_RECORD_DATA_FIELDS,
  ]);
  const name = reader.string('name', true);
  const zone = reader.string('zone');
  const ttl = reader.integer('ttl', 0, 2147483647);
  const comments = reader.string('comments');
  const data = readRecordData(reader);

  if (name === undefined || data === undefined) return undefined;
  return { kind: 'record', state, name: name.trim(), zone, ttl, comments, data };
}

function buildUser(reader: EntryReader, state: DesiredState): ResourceDescriptor | undefined {
  reader.rejectUnknown([...COMMON_FIELDS, 'username', 'password', 'displayName', 'disabled']);
  const username = reader.string('username', true);
  const password = reader.string('password');
  const displayName = reader.string('displayName');
  const disabled = reader.boolean('disabled');
  if (username === undefined) return undefined;
  return {
    kind: 'user',
    state,
    username,
    password,
    displayName,
    ...(disabled !== undefined ? { disabled } : {}),
  };
}

function buildGroup(reader: EntryReader, state: DesiredState): ResourceDescriptor | undefined {
  reader.rejectUnknown([...COMMON_FIELDS, 'name', 'description', 'members']);
  const name = reader.string('name', true);
  const description = reader.string('description');
  const members = reader.stringList('members');
  if (name === undefined) return undefined;
  return { kind: 'group', state, name, description, ...(members !== undefined ? { members } : {}) };
}

function buildDomainList(
  reader: EntryReader,
  kind: 'blocked-domain' | 'allowed-domain',
  state: DesiredState
): ResourceDescriptor | undefined {
  reader.rejectUnknown([...COMMON_FIELDS, 'domain']);
  const domain = reader.string('domain', true);
  if (domain === undefined) return undefined;
  return { kind, state, domain: domain.trim() };
}

function readAppConfig(reader: EntryReader): AppConfig | undefined {
  const format = reader.oneOf('format', ['text', 'json'] as const);
  const raw = reader.raw('config');
  if (raw === undefined || raw === null) {
    reader.issues.push(missingRequiredField(reader.path, 'config'));
    return undefined;
  }

  if (typeof raw === 'string') {
    if (format !== 'json') return { format: 'text', text: raw };
    try {
      const document: unknown = JSON.parse(raw);
      return { format: 'json', document };
    } catch {
      reader.issues.push(invalidValue(reader.path, 'config', 'Field "config" is not valid JSON'));
      return undefined;
    }
  }

  if (format === 'text') {
    reader.issues.push(invalidFieldType(reader.path, 'config', 'a string when format is text', raw));
    return undefined;
  }
  return { format: 'json', document: raw };
}

function buildAppConfig(reader: EntryReader, state: DesiredState): ResourceDescriptor | undefined {
  reader.rejectUnknown([...COMMON_FIELDS, 'app', 'config', 'format']);
  if (state !== 'present') {
    reader.issues.push(
      invalidValue(reader.path, 'state', 'App configs can only be present', ['present'])
    );
  }
  const app = reader.string('app', true);
  const config = readAppConfig(reader);
  if (app === undefined || config === undefined) return undefined;
  return { kind: 'app-config', state: 'present', app, config };
}

// =============================================================================
// Entry points
// =============================================================================

export interface ResourceValidation {
  descriptor?: ResourceDescriptor;
  issues: ValidationIssue[];
}

function isResourceKind(value: unknown): value is ResourceKind {
  return RESOURCE_KINDS.some((kind) => kind === value);
}

/**
 * Validate one raw entry
 *
 * @param path - Location used in issue paths, e.g. "resources[0]"
 */
export function validateResource(entry: unknown, path = 'resource'): ResourceValidation {
  if (!isRecord(entry)) {
    return { issues: [invalidFieldType(path, 'entry', 'a mapping', entry)] };
  }

  const reader = new EntryReader(entry, path);
  const kind = entry.kind;
  if (kind === undefined || kind === null) {
    return { issues: [missingRequiredField(path, 'kind')] };
  }
  if (!isResourceKind(kind)) {
    return { issues: [unknownKind(path, kind, RESOURCE_KINDS)] };
  }

  const state = reader.oneOf('state', DESIRED_STATES) ?? 'present';

  let descriptor: ResourceDescriptor | undefined;
  switch (kind) {
    case 'zone':
      descriptor = buildZone(reader, state);
      break;
    case 'record':
      descriptor = buildRecord(reader, state);
      break;
    case 'user':
      descriptor = buildUser(reader, state);
      break;
    case 'group':
      descriptor = buildGroup(reader, state);
      break;
    case 'blocked-domain':
    case 'allowed-domain':
      descriptor = buildDomainList(reader, kind, state);
      break;
    case 'app-config':
      descriptor = buildAppConfig(reader, state);
      break;
  }

  const valid = !reader.issues.some((issue) => issue.severity === 'error');
  return { descriptor: valid ? descriptor : undefined, issues: reader.issues };
}

/**
 * Key that identifies the same remote object across entries
 */
function resourceKey(descriptor: ResourceDescriptor): string {
  const subject = describe(descriptor);
  const name = descriptor.kind === 'user' || descriptor.kind === 'group' || descriptor.kind === 'app-config'
    ? subject.resource
    : normalizeName(subject.resource);
  return `${descriptor.kind} '${name}'`;
}

/**
 * Validate a list of entries
 */
export function validateResources(
  entries: readonly unknown[],
  basePath = 'resources'
): ValidationResult & { descriptors: ResourceDescriptor[] } {
  const issues: ValidationIssue[] = [];
  const descriptors: ResourceDescriptor[] = [];
  const seen = new Map<string, string>();

  entries.forEach((entry, index) => {
    const path = `${basePath}[${index}]`;
    const result = validateResource(entry, path);
    issues.push(...result.issues);
    if (!result.descriptor) return;

    const key = resourceKey(result.descriptor);
    const firstPath = seen.get(key);
    if (firstPath !== undefined) {
      issues.push(duplicateResource(path, key, firstPath));
      return;
    }
    seen.set(key, path);
    descriptors.push(result.descriptor);
  });

  return { ...buildResult(issues), descriptors };
}

/**
 * Validate entries and return descriptors, or throw
 *
 * @throws ManifestValidationError when any entry is invalid
 */
export function parseResources(entries: readonly unknown[], basePath = 'resources'): ResourceDescriptor[] {
  const result = validateResources(entries, basePath);
  if (!result.valid) {
    throw new ManifestValidationError(
      `Found ${result.errors.length} invalid resource field(s)`,
      buildResult(result.issues)
    );
  }
  return result.descriptors;
}

/**
 * Validate a single entry and return its descriptor, or throw
 */
export function parseResource(entry: unknown, path = 'resource'): ResourceDescriptor {
  const result = validateResource(entry, path);
  if (!result.descriptor) {
    throw new ManifestValidationError('Invalid resource', buildResult(result.issues));
  }
  return result.descriptor;
}
