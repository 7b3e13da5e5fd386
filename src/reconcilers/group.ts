/**
 * Group reconciliation
 *
 * Built-in groups can never be deleted; the config file may add more names.
 * Membership is read from the group details only when members are declared,
 * and is replaced as a whole through groups/set.
 */

import { PolicyViolation } from '../api/errors.js';
import { assertOk, payloadOf, readRecords, readString, readStrings } from '../api/envelope.js';
import type { FieldChange, GroupDescriptor, ResourceHandler, ResourceState } from './types.js';

export interface GroupAttributes {
  description?: string;
  /** Read only when the descriptor declares members */
  members?: string[];
}

/**
 * Sorted, de-duplicated member list
 */
export function memberSet(members: readonly string[]): string[] {
  return [...new Set(members.map((member) => member.trim()).filter((member) => member !== ''))].sort();
}

function sameMembers(a: readonly string[], b: readonly string[]): boolean {
  const left = memberSet(a);
  const right = memberSet(b);
  return left.length === right.length && left.every((member, i) => member === right[i]);
}

export const groupHandler: ResourceHandler<GroupDescriptor, GroupAttributes> = {
  noun: 'Group',

  identify(descriptor) {
    return descriptor.name;
  },

  isProtected(descriptor, protectedResources) {
    return protectedResources.group.includes(descriptor.name);
  },

  checkWrite(descriptor, action) {
    if (action === 'create' && memberSet(descriptor.members ?? []).length > 0) {
      throw new PolicyViolation(
        `Group '${descriptor.name}' cannot be created with members`,
        'Apply it once without members, then again to set them'
      );
    }
  },

  async probe(client, descriptor): Promise<ResourceState<GroupAttributes>> {
    const envelope = await client.request('/api/admin/groups/list');
    assertOk(envelope);

    const group = readRecords(payloadOf(envelope), 'groups').find(
      (entry) => entry.name === descriptor.name
    );
    if (!group) {
      return { status: 'absent', envelope };
    }

    const attributes: GroupAttributes = { description: readString(group, 'description') };
    if (descriptor.members === undefined || descriptor.state === 'absent') {
      return { status: 'present', attributes, envelope };
    }

    const details = await client.request('/api/admin/groups/get', {
      group: descriptor.name,
      includeUsers: true,
    });
    assertOk(details);
    return {
      status: 'present',
      attributes: { ...attributes, members: readStrings(payloadOf(details), 'members') },
      envelope: details,
    };
  },

  diff(descriptor, current): FieldChange[] {
    const changes: FieldChange[] = [];
    if (descriptor.description !== undefined && descriptor.description !== (current.description ?? '')) {
      changes.push({ field: 'description', current: current.description, desired: descriptor.description });
    }
    if (descriptor.members !== undefined && !sameMembers(descriptor.members, current.members ?? [])) {
      changes.push({
        field: 'members',
        current: memberSet(current.members ?? []),
        desired: memberSet(descriptor.members),
      });
    }
    return changes;
  },

  async write(client, descriptor, action) {
    switch (action) {
      case 'create':
        return client.request(
          '/api/admin/groups/create',
          { group: descriptor.name, description: descriptor.description },
          'POST'
        );
      case 'update':
        return client.request(
          '/api/admin/groups/set',
          {
            group: descriptor.name,
            description: descriptor.description,
            members: descriptor.members === undefined ? undefined : memberSet(descriptor.members),
          },
          'POST'
        );
      case 'delete':
        return client.request('/api/admin/groups/delete', { group: descriptor.name }, 'POST');
    }
  },
};
