/**
 * DNS record reconciliation
 *
 * A record is one entry of an RRset, matched on the owner name, the type
 * and the type's identifying fields (MX: exchange and preference; SRV: all
 * four fields; CAA: flags, tag and value). TTL is the
 * only attribute updated in place; comments ride along on writes.
 */

import type { QueryParams } from '../api/types.js';
import {
  assertOk,
  errorMessageIncludes,
  payloadOf,
  readNumber,
  readRecords,
  readString,
  isRecord,
} from '../api/envelope.js';
import { ZONE_NOT_FOUND } from './zone.js';
import type {
  FieldChange,
  RecordData,
  RecordDescriptor,
  RecordType,
  ResourceHandler,
  ResourceState,
} from './types.js';

export const RECORD_TYPES: readonly RecordType[] = [
  'A',
  'AAAA',
  'CNAME',
  'NS',
  'PTR',
  'TXT',
  'MX',
  'SRV',
  'CAA',
  'DNAME',
  'ANAME',
];

export function isRecordType(value: string): value is RecordType {
  return RECORD_TYPES.some((type) => type === value);
}

/**
 * Current record as returned by the records endpoint
 */
export interface RecordAttributes {
  ttl?: number;
  rData: Record<string, unknown>;
  comments?: string;
}

// =============================================================================
// Matching
// =============================================================================

/**
 * Lowercase a domain name and drop the trailing dot
 */
export function normalizeName(name: string): string {
  return name.trim().replace(/\.$/, '').toLowerCase();
}

/**
 * API parameters that identify the record within its RRset
 */
export function identifyingParams(data: RecordData): QueryParams {
  switch (data.type) {
    case 'A':
    case 'AAAA':
      return { ipAddress: data.ipAddress };
    case 'CNAME':
      return { cname: data.cname };
    case 'NS':
      return { nameServer: data.nameServer };
    case 'PTR':
      return { ptrName: data.ptrName };
    case 'TXT':
      return { text: data.text };
    case 'MX':
      return { exchange: data.exchange, preference: data.preference };
    case 'SRV':
      return { priority: data.priority, weight: data.weight, port: data.port, target: data.target };
    case 'CAA':
      return { flags: data.flags, tag: data.tag, value: data.value };
    case 'DNAME':
      return { dname: data.dname };
    case 'ANAME':
      return { aname: data.aname };
  }
}

/**
 * Record value as shown in messages
 */
export function formatRecordValue(data: RecordData): string {
  switch (data.type) {
    case 'A':
    case 'AAAA':
      return data.ipAddress;
    case 'CNAME':
      return data.cname;
    case 'NS':
      return data.nameServer;
    case 'PTR':
      return data.ptrName;
    case 'TXT':
      return data.text;
    case 'MX':
      return `${data.preference} ${data.exchange}`;
    case 'SRV':
      return `${data.priority} ${data.weight} ${data.port} ${data.target}`;
    case 'CAA':
      return `${data.flags} ${data.tag} "${data.value}"`;
    case 'DNAME':
      return data.dname;
    case 'ANAME':
      return data.aname;
  }
}

function sameName(current: unknown, desired: string): boolean {
  return typeof current === 'string' && normalizeName(current) === normalizeName(desired);
}

/**
 * Numbers may come back as strings from some server versions
 */
function sameNumber(current: unknown, desired: number): boolean {
  return current === desired || current === String(desired);
}

/**
 * Whether an rData object from the server holds the desired record
 */
export function rDataMatches(rData: Record<string, unknown>, data: RecordData): boolean {
  switch (data.type) {
    case 'A':
    case 'AAAA': {
      const current = readString(rData, 'ipAddress');
      return current !== undefined && current.toLowerCase() === data.ipAddress.toLowerCase();
    }
    case 'CNAME':
      return sameName(rData.cname, data.cname);
    case 'NS':
      return sameName(rData.nameServer, data.nameServer);
    case 'PTR':
      return sameName(rData.ptrName, data.ptrName);
    case 'TXT':
      return readString(rData, 'text') === data.text;
    case 'MX':
      return sameName(rData.exchange, data.exchange) && sameNumber(rData.preference, data.preference);
    case 'SRV':
      return (
        sameName(rData.target, data.target) &&
        sameNumber(rData.priority, data.priority) &&
        sameNumber(rData.weight, data.weight) &&
        sameNumber(rData.port, data.port)
      );
    case 'CAA':
      return (
        sameNumber(rData.flags, data.flags) &&
        readString(rData, 'tag')?.toLowerCase() === data.tag.toLowerCase() &&
        readString(rData, 'value') === data.value
      );
    case 'DNAME':
      return sameName(rData.dname, data.dname);
    case 'ANAME':
      return sameName(rData.aname, data.aname);
  }
}

function baseParams(descriptor: RecordDescriptor): QueryParams {
  return {
    domain: descriptor.name,
    zone: descriptor.zone,
    type: descriptor.data.type,
    ...identifyingParams(descriptor.data),
  };
}

// =============================================================================
// Handler
// =============================================================================

export const recordHandler: ResourceHandler<RecordDescriptor, RecordAttributes> = {
  noun: 'Record',

  identify(descriptor) {
    return `${descriptor.name} ${descriptor.data.type} ${formatRecordValue(descriptor.data)}`;
  },

  async probe(client, descriptor): Promise<ResourceState<RecordAttributes>> {
    const envelope = await client.request('/api/zones/records/get', {
      domain: descriptor.name,
      zone: descriptor.zone,
    });
    // No zone holds the name, so no record can exist
    if (errorMessageIncludes(envelope, ZONE_NOT_FOUND)) {
      return { status: 'absent', envelope };
    }
    assertOk(envelope);

    const match = readRecords(payloadOf(envelope), 'records').find((record) => {
      const rData = record.rData;
      return (
        sameName(record.name, descriptor.name) &&
        readString(record, 'type')?.toUpperCase() === descriptor.data.type &&
        isRecord(rData) &&
        rDataMatches(rData, descriptor.data)
      );
    });

    const rData = match?.rData;
    if (!match || !isRecord(rData)) {
      return { status: 'absent', envelope };
    }

    return {
      status: 'present',
      attributes: {
        ttl: readNumber(match, 'ttl'),
        rData,
        comments: readString(match, 'comments'),
      },
      envelope,
    };
  },

  diff(descriptor, current): FieldChange[] {
    if (descriptor.ttl !== undefined && descriptor.ttl !== current.ttl) {
      return [{ field: 'ttl', current: current.ttl, desired: descriptor.ttl }];
    }
    return [];
  },

  async write(client, descriptor, action) {
    switch (action) {
      case 'create':
        return client.request(
          '/api/zones/records/add',
          { ...baseParams(descriptor), ttl: descriptor.ttl, comments: descriptor.comments },
          'POST'
        );
      case 'update':
        return client.request(
          '/api/zones/records/update',
          { ...baseParams(descriptor), ttl: descriptor.ttl, comments: descriptor.comments },
          'POST'
        );
      case 'delete':
        return client.request('/api/zones/records/delete', baseParams(descriptor), 'POST');
    }
  },
};
