// ---------------------------------------------------------------------------
// SyncStore: knex persistence for directories, synced entities and runs
//
// All reads are scoped to one directory (and its account for actors). A plan
// is applied inside a single transaction together with the local-state read
// it was computed from, so a failed pass leaves nothing behind.
// ---------------------------------------------------------------------------

import type { Knex } from 'knex';
import { v4 as uuidv4 } from 'uuid';
import { oktaBaseUrl } from '../okta/api-client';
import { CommitError, SyncError } from '../sync-errors';
import type {
  AccountRow,
  ActorRow,
  DirectoryRow,
  ExternalIdentityRow,
  GroupRow,
  MembershipRow,
  SyncRunRow,
  SyncRunStatus,
  SyncTrigger,
} from '../types';
import type { LocalState, SyncPlan } from './diff';

/** Rows per INSERT / IN (...) list; keeps well under SQLite's variable limit */
const CHUNK_SIZE = 50;

/** `disabled_reason` written by the error reporter */
export const SYNC_ERROR_DISABLED_REASON = 'Sync error';

export interface SyncCounts {
  identities: { created: number; updated: number; deleted: number };
  groups: { created: number; updated: number; deleted: number };
  memberships: { created: number; deleted: number };
  actors: { created: number; deleted: number };
}

export type SyncTarget =
  | { ok: true; directory: DirectoryRow }
  | { ok: false; reason: 'not_found' | 'account_disabled' | 'directory_disabled' };

export type DirectoryPatch = Partial<Omit<DirectoryRow, 'id' | 'account_id' | 'created_at'>>;

export class SyncStore {
  constructor(private readonly db: Knex) {}

  // ── Directories ──────────────────────────────────────────────────────────

  async getDirectory(id: string): Promise<DirectoryRow | undefined> {
    return this.db<DirectoryRow>('directories').where({ id }).first();
  }

  /**
   * Resolve a directory for a sync pass. Scheduled passes skip any disabled
   * directory; a manual pass may run one that sync itself disabled, which is
   * how an operator re-enables it after fixing the cause.
   */
  async loadSyncTarget(id: string, trigger: SyncTrigger): Promise<SyncTarget> {
    const directory = await this.getDirectory(id);
    if (!directory) return { ok: false, reason: 'not_found' };

    const account = await this.db<AccountRow>('accounts').where({ id: directory.account_id }).first();
    if (!account || account.disabled_at !== null) return { ok: false, reason: 'account_disabled' };

    if (Boolean(directory.is_disabled)) {
      const recoverable = trigger === 'manual' && directory.disabled_reason === SYNC_ERROR_DISABLED_REASON;
      if (!recoverable) return { ok: false, reason: 'directory_disabled' };
    }
    return { ok: true, directory };
  }

  /** Directories the scheduler should visit on each tick. */
  async listSchedulableDirectoryIds(): Promise<string[]> {
    const rows = await this.db('directories')
      .join('accounts', 'accounts.id', 'directories.account_id')
      .where('directories.is_disabled', false)
      .whereNull('accounts.disabled_at')
      .orderBy('directories.id')
      .select<{ id: string }[]>('directories.id as id');
    return rows.map((row) => row.id);
  }

  async updateDirectory(id: string, patch: DirectoryPatch): Promise<void> {
    await this.db('directories').where({ id }).update(patch);
  }

  // ── Sync runs ────────────────────────────────────────────────────────────

  async startRun(directoryId: string, trigger: SyncTrigger, startedAt: string): Promise<string> {
    const id = uuidv4();
    await this.db('sync_runs').insert({
      id,
      directory_id: directoryId,
      trigger,
      status: 'running' satisfies SyncRunStatus,
      started_at: startedAt,
    });
    return id;
  }

  async finishRun(
    id: string,
    status: Exclude<SyncRunStatus, 'running'>,
    finishedAt: string,
    result: { counts?: SyncCounts; errorMessage?: string | null },
  ): Promise<void> {
    const { counts } = result;
    await this.db('sync_runs')
      .where({ id })
      .update({
        status,
        finished_at: finishedAt,
        error_message: result.errorMessage ?? null,
        ...(counts && {
          identities_created: counts.identities.created,
          identities_updated: counts.identities.updated,
          identities_deleted: counts.identities.deleted,
          groups_created: counts.groups.created,
          groups_updated: counts.groups.updated,
          groups_deleted: counts.groups.deleted,
          memberships_created: counts.memberships.created,
          memberships_deleted: counts.memberships.deleted,
        }),
      });
  }

  async listRuns(directoryId: string, limit = 20): Promise<SyncRunRow[]> {
    return this.db<SyncRunRow>('sync_runs')
      .where({ directory_id: directoryId })
      .orderBy('started_at', 'desc')
      .limit(limit);
  }

  // ── Commit ───────────────────────────────────────────────────────────────

  /**
   * Read the directory's local state, let `plan` compare it with the remote
   * snapshot (and veto the pass by throwing), then write the plan. All three
   * happen in one transaction.
   */
  async commit(
    directory: DirectoryRow,
    plan: (local: LocalState) => SyncPlan,
  ): Promise<{ plan: SyncPlan; counts: SyncCounts }> {
    try {
      return await this.db.transaction(async (trx) => {
        const local = await this.loadLocalState(trx, directory);
        const computed = plan(local);
        const counts = await this.applyPlan(trx, directory, computed);
        return { plan: computed, counts };
      });
    } catch (err) {
      // Planning errors (circuit breaker) pass through untouched
      if (err instanceof SyncError) throw err;
      throw new CommitError(err).at('commit', directory.id);
    }
  }

  async loadLocalState(trx: Knex, directory: DirectoryRow): Promise<LocalState> {
    const identities = await trx<ExternalIdentityRow>('external_identities').where({ directory_id: directory.id });
    const groups = await trx<GroupRow>('groups').where({ directory_id: directory.id });
    const memberships = await trx<MembershipRow>('memberships').where({ directory_id: directory.id });
    const actors = await trx<ActorRow>('actors')
      .where({ account_id: directory.account_id })
      .orderBy([{ column: 'created_at' }, { column: 'id' }]);

    const actorIdsByEmail = new Map<string, string>();
    for (const actor of actors) {
      const email = actor.email.toLowerCase();
      if (!actorIdsByEmail.has(email)) actorIdsByEmail.set(email, actor.id);
    }

    return {
      identities: identities.map((row) => ({
        id: row.id,
        idpId: row.idp_id,
        actorId: row.actor_id,
        email: row.email,
        name: row.name,
        givenName: row.given_name,
        familyName: row.family_name,
        lastSyncedAt: row.last_synced_at,
      })),
      groups: groups.map((row) => ({
        id: row.id,
        idpId: row.idp_id,
        name: row.name,
        lastSyncedAt: row.last_synced_at,
      })),
      memberships: memberships.map((row) => ({
        id: row.id,
        actorId: row.actor_id,
        groupId: row.group_id,
        lastSyncedAt: row.last_synced_at,
      })),
      actorIdsByEmail,
    };
  }

  private async applyPlan(trx: Knex.Transaction, directory: DirectoryRow, plan: SyncPlan): Promise<SyncCounts> {
    const now = plan.passStart;
    const scope = { account_id: directory.account_id, directory_id: directory.id };
    const issuer = issuerFor(directory);

    // ── Inserts, parents first ──
    await insertChunked(
      trx,
      'actors',
      plan.actors.map((actor) => ({
        id: actor.id,
        account_id: directory.account_id,
        type: 'account_user',
        name: actor.name,
        email: actor.email,
        created_by_directory_id: directory.id,
        created_at: now,
        updated_at: now,
      })),
    );

    await insertChunked(
      trx,
      'external_identities',
      plan.identities.create.map((identity) => ({
        id: identity.id,
        ...scope,
        actor_id: identity.actorId,
        issuer,
        idp_id: identity.idpId,
        email: identity.email,
        name: identity.name,
        given_name: identity.givenName,
        family_name: identity.familyName,
        last_synced_at: now,
        created_at: now,
        updated_at: now,
      })),
    );

    await insertChunked(
      trx,
      'groups',
      plan.groups.create.map((group) => ({
        id: group.id,
        ...scope,
        idp_id: group.idpId,
        name: group.name,
        last_synced_at: now,
        created_at: now,
        updated_at: now,
      })),
    );

    await insertChunked(
      trx,
      'memberships',
      plan.memberships.create.map((membership) => ({
        id: membership.id,
        ...scope,
        actor_id: membership.actorId,
        group_id: membership.groupId,
        last_synced_at: now,
      })),
    );

    // ── Updates ──
    const changedIdentities = plan.identities.update.filter((identity) => identity.changed);
    for (const identity of changedIdentities) {
      await trx('external_identities').where({ id: identity.id }).update({
        email: identity.email,
        name: identity.name,
        given_name: identity.givenName,
        family_name: identity.familyName,
        last_synced_at: now,
        updated_at: now,
      });
    }
    await touchChunked(
      trx,
      'external_identities',
      plan.identities.update.filter((identity) => !identity.changed).map((identity) => identity.id),
      now,
    );

    const changedGroups = plan.groups.update.filter((group) => group.changed);
    for (const group of changedGroups) {
      await trx('groups').where({ id: group.id }).update({ name: group.name, last_synced_at: now, updated_at: now });
    }
    await touchChunked(
      trx,
      'groups',
      plan.groups.update.filter((group) => !group.changed).map((group) => group.id),
      now,
    );

    await touchChunked(
      trx,
      'memberships',
      plan.memberships.update.map((membership) => membership.id),
      now,
    );

    // ── Deletes, children first ──
    await deleteChunked(
      trx,
      'memberships',
      plan.memberships.delete.map((row) => row.id),
    );
    await deleteChunked(
      trx,
      'external_identities',
      plan.identities.delete.map((row) => row.id),
    );
    await deleteChunked(
      trx,
      'groups',
      plan.groups.delete.map((row) => row.id),
    );

    // Actors this directory created and nothing references any more
    const orphanedActorIds = await trx<ActorRow>('actors')
      .where({ created_by_directory_id: directory.id })
      .whereNotExists((qb) => {
        qb.select(trx.raw('1')).from('external_identities').whereRaw('external_identities.actor_id = actors.id');
      })
      .whereNotExists((qb) => {
        qb.select(trx.raw('1')).from('memberships').whereRaw('memberships.actor_id = actors.id');
      })
      .pluck('id');
    await deleteChunked(trx, 'actors', orphanedActorIds);

    return {
      identities: {
        created: plan.identities.create.length,
        updated: changedIdentities.length,
        deleted: plan.identities.delete.length,
      },
      groups: {
        created: plan.groups.create.length,
        updated: changedGroups.length,
        deleted: plan.groups.delete.length,
      },
      memberships: {
        created: plan.memberships.create.length,
        deleted: plan.memberships.delete.length,
      },
      actors: { created: plan.actors.length, deleted: orphanedActorIds.length },
    };
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function issuerFor(directory: DirectoryRow): string {
  switch (directory.provider) {
    case 'okta':
      return oktaBaseUrl(directory.okta_domain);
  }
}

function* chunked<T>(items: T[], size = CHUNK_SIZE): Generator<T[]> {
  for (let i = 0; i < items.length; i += size) yield items.slice(i, i + size);
}

async function insertChunked(trx: Knex.Transaction, table: string, rows: Record<string, unknown>[]): Promise<void> {
  for (const chunk of chunked(rows)) await trx(table).insert(chunk);
}

async function touchChunked(trx: Knex.Transaction, table: string, ids: string[], at: string): Promise<void> {
  for (const chunk of chunked(ids)) await trx(table).whereIn('id', chunk).update({ last_synced_at: at });
}

async function deleteChunked(trx: Knex.Transaction, table: string, ids: string[]): Promise<void> {
  for (const chunk of chunked(ids)) await trx(table).whereIn('id', chunk).delete();
}
