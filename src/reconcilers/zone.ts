/**
 * Zone reconciliation
 *
 * Zones are probed through their options endpoint. The zone type cannot be
 * changed in place; options only apply on creation. The enabled flag is the
 * one attribute updated in place, through the enable and disable endpoints.
 */

import type { QueryParams } from '../api/types.js';
import { PolicyViolation } from '../api/errors.js';
import { assertOk, errorMessageIncludes, payloadOf, readBoolean, readString } from '../api/envelope.js';
import type {
  FieldChange,
  ResourceHandler,
  ResourceState,
  ZoneDescriptor,
  ZoneOptions,
  ZoneType,
} from './types.js';

/**
 * Error text the server returns for an unknown zone
 */
export const ZONE_NOT_FOUND = 'No such zone was found';

export const DEFAULT_ZONE_TYPE: ZoneType = 'Primary';

export const ZONE_TYPES: readonly ZoneType[] = [
  'Primary',
  'Secondary',
  'Stub',
  'Forwarder',
  'SecondaryForwarder',
  'Catalog',
  'SecondaryCatalog',
];

export type ZoneOptionName = keyof ZoneOptions;

const PRIMARY_OPTIONS: readonly ZoneOptionName[] = ['catalog', 'useSoaSerialDateScheme'];
const SECONDARY_OPTIONS: readonly ZoneOptionName[] = [
  'primaryNameServerAddresses',
  'zoneTransferProtocol',
  'tsigKeyName',
];

/**
 * Options each zone type accepts, and the ones it requires
 */
export const ZONE_OPTION_RULES: Record<
  ZoneType,
  { allowed: readonly ZoneOptionName[]; required: readonly ZoneOptionName[] }
> = {
  Primary: { allowed: PRIMARY_OPTIONS, required: [] },
  Catalog: { allowed: PRIMARY_OPTIONS, required: [] },
  Forwarder: {
    allowed: [
      ...PRIMARY_OPTIONS,
      'initializeForwarder',
      'protocol',
      'forwarder',
      'dnssecValidation',
      'proxyType',
      'proxyAddress',
      'proxyPort',
      'proxyUsername',
      'proxyPassword',
    ],
    required: ['forwarder'],
  },
  Secondary: {
    allowed: [...SECONDARY_OPTIONS, 'validateZone'],
    required: ['primaryNameServerAddresses'],
  },
  SecondaryForwarder: { allowed: SECONDARY_OPTIONS, required: ['primaryNameServerAddresses'] },
  SecondaryCatalog: { allowed: SECONDARY_OPTIONS, required: ['primaryNameServerAddresses'] },
  Stub: { allowed: ['primaryNameServerAddresses'], required: ['primaryNameServerAddresses'] },
};

export function isZoneType(value: string): value is ZoneType {
  return ZONE_TYPES.some((type) => type === value);
}

/**
 * Every option zone creation accepts
 */
export const ZONE_OPTION_NAMES: readonly ZoneOptionName[] = [
  ...ZONE_OPTION_RULES.Forwarder.allowed,
  ...ZONE_OPTION_RULES.Secondary.allowed,
];

export function isZoneOptionName(value: string): value is ZoneOptionName {
  return ZONE_OPTION_NAMES.some((name) => name === value);
}

/**
 * Options given for a zone type that does not accept them, and required
 * options that are missing
 */
export function checkZoneOptions(
  type: ZoneType,
  options: ZoneOptions
): { unsupported: ZoneOptionName[]; missing: ZoneOptionName[] } {
  const rules = ZONE_OPTION_RULES[type];
  const given = ZONE_OPTION_NAMES.filter((name) => options[name] !== undefined);
  return {
    unsupported: given.filter((name) => !rules.allowed.includes(name)),
    missing: rules.required.filter((name) => options[name] === undefined),
  };
}

/**
 * Current zone attributes read from the options endpoint
 */
export interface ZoneAttributes {
  type?: string;
  disabled?: boolean;
}

export const zoneHandler: ResourceHandler<ZoneDescriptor, ZoneAttributes> = {
  noun: 'Zone',

  identify(descriptor) {
    return descriptor.zone;
  },

  checkWrite(descriptor, action) {
    if (action === 'create' && descriptor.enabled === false) {
      throw new PolicyViolation(
        `Zone '${descriptor.zone}' cannot be created disabled`,
        'Apply it once without enabled: false, then again to disable it'
      );
    }
  },

  async probe(client, descriptor): Promise<ResourceState<ZoneAttributes>> {
    const envelope = await client.request('/api/zones/options/get', { zone: descriptor.zone });
    if (errorMessageIncludes(envelope, ZONE_NOT_FOUND)) {
      return { status: 'absent', envelope };
    }
    assertOk(envelope);

    const payload = payloadOf(envelope);
    return {
      status: 'present',
      attributes: {
        type: readString(payload, 'type'),
        disabled: readBoolean(payload, 'disabled'),
      },
      envelope,
    };
  },

  diff(descriptor, current): FieldChange[] {
    const changes: FieldChange[] = [];
    if (descriptor.type && current.type && descriptor.type !== current.type) {
      changes.push({ field: 'type', current: current.type, desired: descriptor.type, immutable: true });
    }
    const enabled = !(current.disabled ?? false);
    if (descriptor.enabled !== undefined && descriptor.enabled !== enabled) {
      changes.push({ field: 'enabled', current: enabled, desired: descriptor.enabled });
    }
    return changes;
  },

  async write(client, descriptor, action) {
    switch (action) {
      case 'create': {
        const params: QueryParams = {
          zone: descriptor.zone,
          type: descriptor.type ?? DEFAULT_ZONE_TYPE,
          ...descriptor.options,
        };
        return client.request('/api/zones/create', params, 'POST');
      }
      case 'delete':
        return client.request('/api/zones/delete', { zone: descriptor.zone }, 'POST');
      case 'update': {
        const path = descriptor.enabled === false ? '/api/zones/disable' : '/api/zones/enable';
        return client.request(path, { zone: descriptor.zone }, 'POST');
      }
    }
  },
};
