// ---------------------------------------------------------------------------
// Remote snapshot
//
// Reads the whole assigned population from the provider into memory. Users
// and groups are deduplicated by provider id across apps; memberships are
// kept only for ACTIVE members that are themselves assigned users.
// ---------------------------------------------------------------------------

import type { Logger } from '../logger';
import type { DirectoryProvider, RemoteUser } from '../providers';
import { SyncError, ValidationError, type SyncStep } from '../sync-errors';
import type { StreamResult } from './resource-stream';

export interface SnapshotUser {
  idpId: string;
  /** Lowercased and trimmed */
  email: string;
  name: string;
  givenName: string;
  familyName: string;
}

export interface SnapshotGroup {
  idpId: string;
  name: string;
}

export interface SnapshotMembership {
  userIdpId: string;
  groupIdpId: string;
}

export interface RemoteSnapshot {
  appCount: number;
  users: Map<string, SnapshotUser>;
  groups: Map<string, SnapshotGroup>;
  memberships: SnapshotMembership[];
}

export async function buildRemoteSnapshot(
  provider: DirectoryProvider,
  token: string,
  logger: Logger,
): Promise<RemoteSnapshot> {
  const apps = await attempt('list_apps', () => provider.listApplications(token));

  const users = new Map<string, SnapshotUser>();
  const groups = new Map<string, SnapshotGroup>();

  for (const app of apps) {
    for await (const result of provider.streamUsers(token, app.id)) {
      const user = unwrap(result, 'stream_app_users');
      users.set(user.idpId, normalizeUser(user));
    }
    for await (const result of provider.streamGroups(token, app.id)) {
      const group = unwrap(result, 'stream_app_groups');
      groups.set(group.idpId, group);
    }
  }

  const memberships = new Map<string, SnapshotMembership>();
  let skipped = 0;
  for (const group of groups.values()) {
    for await (const result of provider.streamGroupMembers(token, group.idpId)) {
      const member = unwrap(result, 'stream_group_members');
      if (member.status !== 'ACTIVE') continue;
      if (!users.has(member.idpId)) {
        skipped++;
        continue;
      }
      memberships.set(`${member.idpId}\u0000${group.idpId}`, {
        userIdpId: member.idpId,
        groupIdpId: group.idpId,
      });
    }
  }

  logger.info(
    {
      apps: apps.length,
      users: users.size,
      groups: groups.size,
      memberships: memberships.size,
      unassignedMembers: skipped,
    },
    'Remote snapshot complete',
  );

  return { appCount: apps.length, users, groups, memberships: [...memberships.values()] };
}

/** Validate a provider user and derive the stored identity fields. */
export function normalizeUser(user: RemoteUser): SnapshotUser {
  const email = user.email?.trim().toLowerCase() ?? '';
  if (email === '') {
    throw ValidationError.missingField('user', user.idpId, 'email', user.raw).at('process_user');
  }

  const fullName = [user.givenName, user.familyName].filter((part) => part !== '').join(' ');
  return {
    idpId: user.idpId,
    email,
    name: fullName || email,
    givenName: user.givenName,
    familyName: user.familyName,
  };
}

// ── Step attribution ────────────────────────────────────────────────────────

function blame(err: unknown, step: SyncStep): unknown {
  return err instanceof SyncError ? err.at(step) : err;
}

function unwrap<T>(result: StreamResult<T>, step: SyncStep): T {
  if (!result.ok) throw blame(result.error, step);
  return result.value;
}

async function attempt<T>(step: SyncStep, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw blame(err, step);
  }
}
