/**
 * Blocked and allowed domain lists
 *
 * Both lists share one endpoint shape, so a single factory builds both
 * handlers.
 */

import { assertOk, payloadOf, readRecords, readStrings } from '../api/envelope.js';
import type { DomainListDescriptor, ResourceHandler, ResourceState } from './types.js';
import { normalizeName } from './record.js';

type ListName = 'blocked' | 'allowed';

/**
 * Whether a list response contains the domain, either as a zone entry or as
 * a record owner name
 */
export function listContains(payload: Record<string, unknown>, domain: string): boolean {
  const wanted = normalizeName(domain);
  if (readStrings(payload, 'zones').some((zone) => normalizeName(zone) === wanted)) {
    return true;
  }
  return readRecords(payload, 'records').some(
    (record) => typeof record.name === 'string' && normalizeName(record.name) === wanted
  );
}

function createDomainListHandler(list: ListName): ResourceHandler<DomainListDescriptor, true> {
  return {
    noun: list === 'blocked' ? 'Blocked domain' : 'Allowed domain',

    identify(descriptor) {
      return descriptor.domain;
    },

    async probe(client, descriptor): Promise<ResourceState<true>> {
      const envelope = await client.request(`/api/${list}/list`, { domain: descriptor.domain });
      assertOk(envelope);
      return listContains(payloadOf(envelope), descriptor.domain)
        ? { status: 'present', attributes: true, envelope }
        : { status: 'absent', envelope };
    },

    // Membership is the only state
    diff() {
      return [];
    },

    async write(client, descriptor, action) {
      const endpoint = action === 'delete' ? 'delete' : 'add';
      return client.request(`/api/${list}/${endpoint}`, { domain: descriptor.domain }, 'POST');
    },
  };
}

export const blockedDomainHandler = createDomainListHandler('blocked');
export const allowedDomainHandler = createDomainListHandler('allowed');
