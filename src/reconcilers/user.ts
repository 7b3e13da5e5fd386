/**
 * User account reconciliation
 *
 * The display name and the disabled flag are compared. The password is sent
 * on creation and never read back, so it cannot be diffed.
 */

import { PolicyViolation } from '../api/errors.js';
import { assertOk, payloadOf, readBoolean, readRecords, readString } from '../api/envelope.js';
import type { FieldChange, ResourceHandler, ResourceState, UserDescriptor } from './types.js';

export interface UserAttributes {
  displayName?: string;
  disabled?: boolean;
}

export const userHandler: ResourceHandler<UserDescriptor, UserAttributes> = {
  noun: 'User',

  identify(descriptor) {
    return descriptor.username;
  },

  isProtected(descriptor, protectedResources) {
    return protectedResources.user.includes(descriptor.username);
  },

  checkWrite(descriptor, action) {
    if (action !== 'create') return;
    if (!descriptor.password) {
      throw new PolicyViolation(
        `A password is required to create user '${descriptor.username}'`,
        'Set password on the user resource'
      );
    }
    if (descriptor.disabled === true) {
      throw new PolicyViolation(
        `User '${descriptor.username}' cannot be created disabled`,
        'Apply it once without disabled: true, then again to disable it'
      );
    }
  },

  async probe(client, descriptor): Promise<ResourceState<UserAttributes>> {
    const envelope = await client.request('/api/admin/users/list');
    assertOk(envelope);

    const user = readRecords(payloadOf(envelope), 'users').find(
      (entry) => entry.username === descriptor.username
    );
    if (!user) {
      return { status: 'absent', envelope };
    }
    return {
      status: 'present',
      attributes: {
        displayName: readString(user, 'displayName'),
        disabled: readBoolean(user, 'disabled'),
      },
      envelope,
    };
  },

  diff(descriptor, current): FieldChange[] {
    const changes: FieldChange[] = [];
    if (descriptor.displayName !== undefined && descriptor.displayName !== current.displayName) {
      changes.push({ field: 'displayName', current: current.displayName, desired: descriptor.displayName });
    }
    const disabled = current.disabled ?? false;
    if (descriptor.disabled !== undefined && descriptor.disabled !== disabled) {
      changes.push({ field: 'disabled', current: disabled, desired: descriptor.disabled });
    }
    return changes;
  },

  async write(client, descriptor, action) {
    switch (action) {
      case 'create':
        return client.request(
          '/api/admin/users/create',
          { user: descriptor.username, pass: descriptor.password, displayName: descriptor.displayName },
          'POST'
        );
      case 'update':
        return client.request(
          '/api/admin/users/set',
          {
            user: descriptor.username,
            displayName: descriptor.displayName,
            disabled: descriptor.disabled,
          },
          'POST'
        );
      case 'delete':
        return client.request('/api/admin/users/delete', { user: descriptor.username }, 'POST');
    }
  },
};
