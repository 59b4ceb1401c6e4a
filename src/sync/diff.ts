// ---------------------------------------------------------------------------
// Sync planning
//
// Pure comparison of a remote snapshot against the directory's local rows.
// Every identifier the commit needs (new actor, identity, group and
// membership ids) is assigned here, so the circuit breaker sees exactly what
// the commit will do.
// ---------------------------------------------------------------------------

import { v4 as uuidv4 } from 'uuid';
import type { RemoteSnapshot, SnapshotGroup, SnapshotUser } from './snapshot';

export interface LocalIdentity {
  id: string;
  idpId: string;
  actorId: string;
  email: string;
  name: string;
  givenName: string;
  familyName: string;
  lastSyncedAt: string | null;
}

export interface LocalGroup {
  id: string;
  idpId: string;
  name: string;
  lastSyncedAt: string | null;
}

export interface LocalMembership {
  id: string;
  actorId: string;
  groupId: string;
  lastSyncedAt: string | null;
}

export interface LocalState {
  identities: LocalIdentity[];
  groups: LocalGroup[];
  memberships: LocalMembership[];
  /** Account actors by lowercased email, oldest first wins */
  actorIdsByEmail: Map<string, string>;
}

export interface EntityPlan<C, U, D> {
  create: C[];
  update: U[];
  delete: D[];
  /** Local rows before the pass */
  total: number;
}

export interface PlannedIdentity extends SnapshotUser {
  id: string;
  actorId: string;
}

export interface PlannedGroup extends SnapshotGroup {
  id: string;
}

export interface PlannedMembership {
  id: string;
  actorId: string;
  groupId: string;
}

export interface PlannedActor {
  id: string;
  name: string;
  email: string;
}

export type Updated<T> = T & { changed: boolean };

export interface SyncPlan {
  passStart: string;
  actors: PlannedActor[];
  identities: EntityPlan<PlannedIdentity, Updated<PlannedIdentity>, LocalIdentity>;
  groups: EntityPlan<PlannedGroup, Updated<PlannedGroup>, LocalGroup>;
  memberships: EntityPlan<PlannedMembership, PlannedMembership, LocalMembership>;
}

/**
 * A local row may be deleted only when the pass did not see it and nothing
 * newer than the pass has touched it.
 */
export function isStale(lastSyncedAt: string | null, passStart: string): boolean {
  return lastSyncedAt === null || lastSyncedAt < passStart;
}

export function planSync(
  snapshot: RemoteSnapshot,
  local: LocalState,
  passStart: string,
  newId: () => string = uuidv4,
): SyncPlan {
  // ── Identities and actors ──
  const identitiesByIdp = new Map(local.identities.map((row) => [row.idpId, row]));
  const actorIdsByEmail = new Map(local.actorIdsByEmail);
  const actors: PlannedActor[] = [];
  const identities: SyncPlan['identities'] = {
    create: [],
    update: [],
    delete: [],
    total: local.identities.length,
  };

  for (const user of snapshot.users.values()) {
    const existing = identitiesByIdp.get(user.idpId);
    if (existing) {
      identities.update.push({
        ...user,
        id: existing.id,
        actorId: existing.actorId,
        changed: identityChanged(existing, user),
      });
      continue;
    }

    let actorId = actorIdsByEmail.get(user.email);
    if (!actorId) {
      actorId = newId();
      actorIdsByEmail.set(user.email, actorId);
      actors.push({ id: actorId, name: user.name, email: user.email });
    }
    identities.create.push({ ...user, id: newId(), actorId });
  }

  identities.delete = local.identities.filter(
    (row) => !snapshot.users.has(row.idpId) && isStale(row.lastSyncedAt, passStart),
  );

  // ── Groups ──
  const groupsByIdp = new Map(local.groups.map((row) => [row.idpId, row]));
  const groups: SyncPlan['groups'] = { create: [], update: [], delete: [], total: local.groups.length };

  for (const group of snapshot.groups.values()) {
    const existing = groupsByIdp.get(group.idpId);
    if (existing) {
      groups.update.push({ ...group, id: existing.id, changed: existing.name !== group.name });
    } else {
      groups.create.push({ ...group, id: newId() });
    }
  }

  // ── Memberships, keyed by resolved (actor, group) ──
  const actorIdByUser = new Map<string, string>();
  for (const row of [...identities.create, ...identities.update]) actorIdByUser.set(row.idpId, row.actorId);
  const groupIdByIdp = new Map<string, string>();
  for (const row of [...groups.create, ...groups.update]) groupIdByIdp.set(row.idpId, row.id);

  const localMemberships = new Map(local.memberships.map((row) => [membershipKey(row), row]));
  const memberships: SyncPlan['memberships'] = {
    create: [],
    update: [],
    delete: [],
    total: local.memberships.length,
  };
  const seen = new Set<string>();

  for (const membership of snapshot.memberships) {
    const actorId = actorIdByUser.get(membership.userIdpId);
    const groupId = groupIdByIdp.get(membership.groupIdpId);
    if (!actorId || !groupId) continue;

    const key = membershipKey({ actorId, groupId });
    // Two provider users sharing an email resolve to one actor
    if (seen.has(key)) continue;
    seen.add(key);

    const existing = localMemberships.get(key);
    if (existing) {
      memberships.update.push({ id: existing.id, actorId, groupId });
    } else {
      memberships.create.push({ id: newId(), actorId, groupId });
    }
  }

  memberships.delete = local.memberships.filter(
    (row) => !seen.has(membershipKey(row)) && isStale(row.lastSyncedAt, passStart),
  );

  // A group stays while a membership that survives the pass still points at it
  const deletedMembershipIds = new Set(memberships.delete.map((row) => row.id));
  const referencedGroupIds = new Set(
    local.memberships.filter((row) => !deletedMembershipIds.has(row.id)).map((row) => row.groupId),
  );
  groups.delete = local.groups.filter(
    (row) =>
      !snapshot.groups.has(row.idpId) && isStale(row.lastSyncedAt, passStart) && !referencedGroupIds.has(row.id),
  );

  return { passStart, actors, identities, groups, memberships };
}

function identityChanged(local: LocalIdentity, remote: SnapshotUser): boolean {
  return (
    local.email !== remote.email ||
    local.name !== remote.name ||
    local.givenName !== remote.givenName ||
    local.familyName !== remote.familyName
  );
}

function membershipKey(row: { actorId: string; groupId: string }): string {
  return `${row.actorId}\u0000${row.groupId}`;
}
