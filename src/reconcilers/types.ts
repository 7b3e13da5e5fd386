/**
 * Types for resource reconciliation
 *
 * A descriptor states the desired end state of one remote object. Handlers
 * probe the current state, diff it against the descriptor and issue at most
 * one write.
 */

import type { TechnitiumClient } from '../api/client.js';
import type { ApiEnvelope } from '../api/types.js';
import type { TechnitiumErrorCode } from '../api/errors.js';
import type { ProtectedResources } from '../config/profile.js';

// =============================================================================
// Intent and state
// =============================================================================

export type DesiredState = 'present' | 'absent';

/**
 * Result of a probe. Both variants keep the probe envelope for reporting.
 */
export type ResourceState<A> =
  | { status: 'absent'; envelope: ApiEnvelope }
  | { status: 'present'; attributes: A; envelope: ApiEnvelope };

/**
 * One differing attribute between current and desired state
 */
export interface FieldChange {
  field: string;
  current: unknown;
  desired: unknown;
  /** Cannot be changed in place; reconciling it is refused */
  immutable?: boolean;
}

/**
 * Minimal action needed to converge
 */
export type Action = 'noop' | 'create' | 'update' | 'delete';

/**
 * Actions that issue a mutating call
 */
export type WriteAction = Exclude<Action, 'noop'>;

// =============================================================================
// Descriptors
// =============================================================================

export type ZoneType =
  | 'Primary'
  | 'Secondary'
  | 'Stub'
  | 'Forwarder'
  | 'SecondaryForwarder'
  | 'Catalog'
  | 'SecondaryCatalog';

export type ForwarderProtocol = 'Udp' | 'Tcp' | 'Tls' | 'Https' | 'Quic';
export type ZoneTransferProtocol = 'Tcp' | 'Tls' | 'Quic';
export type ProxyType = 'NoProxy' | 'DefaultProxy' | 'Http' | 'Socks5';

/**
 * Options accepted by zone creation. Which ones apply depends on the zone type.
 */
export interface ZoneOptions {
  catalog?: string;
  useSoaSerialDateScheme?: boolean;
  primaryNameServerAddresses?: string[];
  zoneTransferProtocol?: ZoneTransferProtocol;
  tsigKeyName?: string;
  validateZone?: boolean;
  initializeForwarder?: boolean;
  protocol?: ForwarderProtocol;
  forwarder?: string;
  dnssecValidation?: boolean;
  proxyType?: ProxyType;
  proxyAddress?: string;
  proxyPort?: number;
  proxyUsername?: string;
  proxyPassword?: string;
}

export interface ZoneDescriptor {
  kind: 'zone';
  state: DesiredState;
  zone: string;
  /** Defaults to Primary on creation; compared when given */
  type?: ZoneType;
  /** Compared when given. New zones start enabled. */
  enabled?: boolean;
  /** Used on creation only */
  options?: ZoneOptions;
}

export type RecordType = RecordData['type'];

/**
 * Record data, keyed by record type. These fields identify the record.
 */
export type RecordData =
  | { type: 'A'; ipAddress: string }
  | { type: 'AAAA'; ipAddress: string }
  | { type: 'CNAME'; cname: string }
  | { type: 'NS'; nameServer: string }
  | { type: 'PTR'; ptrName: string }
  | { type: 'TXT'; text: string }
  | { type: 'MX'; exchange: string; preference: number }
  | { type: 'SRV'; priority: number; weight: number; port: number; target: string }
  | { type: 'CAA'; flags: number; tag: string; value: string }
  | { type: 'DNAME'; dname: string }
  | { type: 'ANAME'; aname: string };

export interface RecordDescriptor {
  kind: 'record';
  state: DesiredState;
  /** Owner name, e.g. "www.example.com" */
  name: string;
  /** Authoritative zone; the server infers it when omitted */
  zone?: string;
  ttl?: number;
  /** Sent with writes, never compared */
  comments?: string;
  data: RecordData;
}

export interface UserDescriptor {
  kind: 'user';
  state: DesiredState;
  username: string;
  /** Required to create; never compared */
  password?: string;
  displayName?: string;
  /** Compared when given. New accounts start enabled. */
  disabled?: boolean;
}

export interface GroupDescriptor {
  kind: 'group';
  state: DesiredState;
  name: string;
  description?: string;
  /** Exact member usernames, compared as a set when given */
  members?: string[];
}

export interface DomainListDescriptor {
  kind: 'blocked-domain' | 'allowed-domain';
  state: DesiredState;
  domain: string;
}

/**
 * App configuration: either opaque text or a JSON document
 */
export type AppConfig =
  | { format: 'text'; text: string }
  | { format: 'json'; document: unknown };

export interface AppConfigDescriptor {
  kind: 'app-config';
  /** App configs cannot be removed, only set */
  state: 'present';
  app: string;
  config: AppConfig;
}

/**
 * Closed union of everything that can be reconciled
 */
export type ResourceDescriptor =
  | ZoneDescriptor
  | RecordDescriptor
  | UserDescriptor
  | GroupDescriptor
  | DomainListDescriptor
  | AppConfigDescriptor;

export type ResourceKind = ResourceDescriptor['kind'];

export const RESOURCE_KINDS: readonly ResourceKind[] = [
  'zone',
  'record',
  'user',
  'group',
  'blocked-domain',
  'allowed-domain',
  'app-config',
];

// =============================================================================
// Handlers
// =============================================================================

/**
 * Per-kind probe, diff and write operations
 */
export interface ResourceHandler<D extends ResourceDescriptor, A> {
  /** Display noun, e.g. "Zone" */
  readonly noun: string;
  /** Phrase for an up-to-date present resource (default "already exists") */
  readonly presentPhrase?: string;
  /** Identifier shown in messages */
  identify(descriptor: D): string;
  /** Whether deleting this resource is refused */
  isProtected?(descriptor: D, protectedResources: ProtectedResources): boolean;
  probe(client: TechnitiumClient, descriptor: D): Promise<ResourceState<A>>;
  diff(descriptor: D, current: A): FieldChange[];
  /** Refuse a decided write before it is sent (also under dry run) */
  checkWrite?(descriptor: D, action: WriteAction): void;
  /** Issue exactly one mutating call and return its envelope unchecked */
  write(
    client: TechnitiumClient,
    descriptor: D,
    action: WriteAction,
    current: A | undefined
  ): Promise<ApiEnvelope>;
}

// =============================================================================
// Options and results
// =============================================================================

export interface ReconcileOptions {
  /** Report what would change without mutating */
  dryRun?: boolean;
  /** Identifiers that must not be deleted */
  protectedResources?: ProtectedResources;
}

/**
 * What a reconcile or action did
 */
export type OutcomeAction = Action | 'flush';

/**
 * Normalised result of one invocation
 */
export interface OutcomeRecord {
  /** A mutating call was issued (or would be, under dry run) */
  changed: boolean;
  failed: boolean;
  message: string;
  /** Envelope of the last call, `stackTrace` removed */
  rawResponse?: ApiEnvelope;
  kind: ResourceKind | 'flush';
  /** Identifier of the subject */
  resource: string;
  action: OutcomeAction;
  dryRun: boolean;
  /** Attribute differences that drove an update */
  changes?: FieldChange[];
  /** Set on failure */
  error?: {
    code: TechnitiumErrorCode | 'UNEXPECTED_ERROR';
    suggestion?: string;
  };
  /**
   * On failure: whether the mutating call had been sent. A write that timed
   * out may still have been applied.
   */
  writeIssued?: boolean;
}

/**
 * Subject of an outcome message
 */
export interface OutcomeSubject {
  kind: ResourceKind | 'flush';
  noun: string;
  resource: string;
  presentPhrase?: string;
}
