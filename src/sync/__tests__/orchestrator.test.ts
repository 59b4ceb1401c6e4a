import type { Knex } from 'knex';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FakeOkta, emptyState, oktaUser, type OktaUserRecord } from '../../__tests__/support/fake-okta';
import {
  ACCOUNT_ID,
  DIRECTORY_ID,
  SEED_TIME,
  TEST_HTTP,
  countRows,
  createTestDb,
  seedDirectory,
  seedIdentities,
  steppingClock,
} from '../../__tests__/support/fixtures';
import { silentLogger } from '../../logger';
import { createProvider } from '../../providers';
import type { DirectoryRow, ExternalIdentityRow, SyncRunRow } from '../../types';
import { SyncErrorReporter } from '../error-reporter';
import { SyncOrchestrator, type SyncOutcome } from '../orchestrator';
import { SyncStore } from '../store';

function users(count: number): OktaUserRecord[] {
  return Array.from({ length: count }, (_, i) => oktaUser(`u${i + 1}`, `user${i + 1}@example.com`));
}

describe('SyncOrchestrator', () => {
  let db: Knex;
  let fake: FakeOkta;
  let store: SyncStore;
  let orchestrator: SyncOrchestrator;

  beforeEach(async () => {
    db = await createTestDb();
    fake = new FakeOkta({
      ...emptyState(),
      apps: [{ id: 'app1', label: 'Portal' }],
      appUsers: { app1: [] },
      appGroups: { app1: [] },
    });
    store = new SyncStore(db);

    const clock = steppingClock();
    const logger = silentLogger();
    orchestrator = new SyncOrchestrator({
      store,
      reporter: new SyncErrorReporter(store, { autoDisable: true, logger }),
      createProvider,
      provider: { http: TEST_HTTP, dispatcher: fake.agent, sleep: async () => {}, now: clock.nowMs },
      logger,
      now: clock.now,
    });
  });

  afterEach(async () => {
    await fake.close();
    await db.destroy();
  });

  async function directoryRow(): Promise<DirectoryRow> {
    const row = await store.getDirectory(DIRECTORY_ID);
    if (!row) throw new Error('directory missing');
    return row;
  }

  async function identityIdpIds(): Promise<string[]> {
    const rows = await db<ExternalIdentityRow>('external_identities')
      .where({ directory_id: DIRECTORY_ID })
      .orderBy('idp_id');
    return rows.map((row) => row.idp_id);
  }

  function expectSucceeded(outcome: SyncOutcome): Extract<SyncOutcome, { status: 'succeeded' }> {
    if (outcome.status !== 'succeeded') {
      throw new Error(`expected success, got ${outcome.status}: ${JSON.stringify(outcome)}`);
    }
    return outcome;
  }

  function expectFailed(outcome: SyncOutcome): Extract<SyncOutcome, { status: 'failed' }> {
    if (outcome.status !== 'failed') throw new Error(`expected failure, got ${outcome.status}`);
    return outcome;
  }

  // ── Reconciliation ───────────────────────────────────────────────────────

  describe('reconciliation', () => {
    it('creates identities, groups and memberships, then leaves them alone on an unchanged pass', async () => {
      await seedDirectory(db);
      fake.state.appUsers.app1 = users(3);
      fake.state.appGroups.app1 = [{ id: 'g1', name: 'Engineering' }];
      fake.state.groupMembers.g1 = [fake.state.appUsers.app1[0], fake.state.appUsers.app1[1]];

      const first = expectSucceeded(await orchestrator.runSync(DIRECTORY_ID));
      expect(first.counts).toEqual({
        identities: { created: 3, updated: 0, deleted: 0 },
        groups: { created: 1, updated: 0, deleted: 0 },
        memberships: { created: 2, deleted: 0 },
        actors: { created: 3, deleted: 0 },
      });

      const second = expectSucceeded(await orchestrator.runSync(DIRECTORY_ID));
      expect(second.counts).toEqual({
        identities: { created: 0, updated: 0, deleted: 0 },
        groups: { created: 0, updated: 0, deleted: 0 },
        memberships: { created: 0, deleted: 0 },
        actors: { created: 0, deleted: 0 },
      });

      // Second pass: started at 00:00:03 on the stepping clock
      const identities = await db<ExternalIdentityRow>('external_identities').where({ directory_id: DIRECTORY_ID });
      expect(new Set(identities.map((row) => row.last_synced_at))).toEqual(new Set(['2026-01-01T00:00:03.000Z']));
      expect((await directoryRow()).synced_at).toBe('2026-01-01T00:00:03.000Z');
      expect(await countRows(db, 'memberships')).toBe(2);
    });

    it('stores one identity for a user assigned to two apps', async () => {
      await seedDirectory(db);
      const shared = oktaUser('u1', 'Shared.User@Example.com ', 'Shared', 'User');
      fake.state.apps.push({ id: 'app2', label: 'Wiki' });
      fake.state.appUsers = { app1: [shared], app2: [shared] };
      fake.state.appGroups = { app1: [], app2: [] };

      expectSucceeded(await orchestrator.runSync(DIRECTORY_ID));

      const rows = await db<ExternalIdentityRow>('external_identities').where({ directory_id: DIRECTORY_ID });
      expect(rows).toHaveLength(1);
      expect(rows[0]).toMatchObject({
        idp_id: 'u1',
        email: 'shared.user@example.com',
        name: 'Shared User',
        issuer: 'https://test.okta.com',
      });
    });

    it('updates changed profile fields in place', async () => {
      await seedDirectory(db);
      await seedIdentities(db, 2);
      fake.state.appUsers.app1 = [oktaUser('u1', 'user1@example.com', 'Jane'), oktaUser('u2', 'user2@example.com')];

      const outcome = expectSucceeded(await orchestrator.runSync(DIRECTORY_ID));

      expect(outcome.counts.identities).toEqual({ created: 0, updated: 1, deleted: 0 });
      const row = await db<ExternalIdentityRow>('external_identities').where({ id: 'identity-1' }).first();
      expect(row).toMatchObject({ name: 'Jane u1', given_name: 'Jane', actor_id: 'actor-1' });
    });

    it('keeps only memberships of active, assigned users', async () => {
      await seedDirectory(db);
      fake.state.appUsers.app1 = users(2);
      fake.state.appGroups.app1 = [{ id: 'g1', name: 'Engineering' }];
      fake.state.groupMembers.g1 = [
        oktaUser('u1', 'user1@example.com'),
        oktaUser('u2', 'user2@example.com', 'Test', 'u2', 'SUSPENDED'),
        oktaUser('u9', 'outsider@example.com'),
      ];

      const outcome = expectSucceeded(await orchestrator.runSync(DIRECTORY_ID));

      expect(outcome.counts.memberships.created).toBe(1);
    });

    it('does not delete rows synced after the pass began', async () => {
      await seedDirectory(db);
      await seedIdentities(db, 2);
      await db('external_identities').where({ id: 'identity-2' }).update({ last_synced_at: '2026-06-01T00:00:00.000Z' });
      fake.state.appUsers.app1 = users(1);

      expectSucceeded(await orchestrator.runSync(DIRECTORY_ID));

      expect(await identityIdpIds()).toEqual(['u1', 'u2']);
    });

    it('keeps a stale group while a membership written during the pass points at it', async () => {
      await seedDirectory(db);
      await seedIdentities(db, 1);
      await db('groups').insert({
        id: 'grp-1',
        account_id: ACCOUNT_ID,
        directory_id: DIRECTORY_ID,
        idp_id: 'g-gone',
        name: 'Former',
        last_synced_at: SEED_TIME,
        created_at: SEED_TIME,
        updated_at: SEED_TIME,
      });
      await db('memberships').insert({
        id: 'm-1',
        account_id: ACCOUNT_ID,
        directory_id: DIRECTORY_ID,
        actor_id: 'actor-1',
        group_id: 'grp-1',
        last_synced_at: '2026-06-01T00:00:00.000Z',
      });
      fake.state.appUsers.app1 = users(1);

      const outcome = expectSucceeded(await orchestrator.runSync(DIRECTORY_ID));

      expect(outcome.counts.groups.deleted).toBe(0);
      expect(outcome.counts.memberships.deleted).toBe(0);
      expect(await countRows(db, 'groups')).toBe(1);
      expect(await countRows(db, 'memberships')).toBe(1);
    });
  });

  // ── Fatal validation ─────────────────────────────────────────────────────

  describe('missing email', () => {
    it('aborts the pass and names the user', async () => {
      await seedDirectory(db);
      await seedIdentities(db, 2);
      fake.state.appUsers.app1 = [oktaUser('u1', 'user1@example.com'), oktaUser('u3', null)];

      const outcome = expectFailed(await orchestrator.runSync(DIRECTORY_ID));

      expect(outcome.message).toBe("User 'u3' missing required 'email' field.");
      expect(outcome.error).toMatchObject({ step: 'process_user', directoryId: DIRECTORY_ID });
      expect(await identityIdpIds()).toEqual(['u1', 'u2']);

      const directory = await directoryRow();
      expect(directory.error_message).toBe("User 'u3' missing required 'email' field.");
      expect(directory.synced_at).toBe(SEED_TIME);
      expect(Boolean(directory.is_disabled)).toBe(true);
      expect(directory.disabled_reason).toBe('Sync error');
    });

    it('treats a profile without an email key the same way', async () => {
      await seedDirectory(db);
      await seedIdentities(db, 2);
      fake.state.appUsers.app1 = [
        oktaUser('u1', 'user1@example.com'),
        { id: 'u7', status: 'ACTIVE', profile: { firstName: 'Test', lastName: 'u7' } },
      ];

      const outcome = expectFailed(await orchestrator.runSync(DIRECTORY_ID));

      expect(outcome.message).toBe("User 'u7' missing required 'email' field.");
      expect(await identityIdpIds()).toEqual(['u1', 'u2']);
      expect(await countRows(db, 'memberships')).toBe(0);
      expect((await directoryRow()).synced_at).toBe(SEED_TIME);
    });
  });

  // ── Deletion circuit breaker ─────────────────────────────────────────────

  describe('deletion guard', () => {
    it('blocks wiping out 15 of 15 identities', async () => {
      await seedDirectory(db);
      await seedIdentities(db, 15);

      const outcome = expectFailed(await orchestrator.runSync(DIRECTORY_ID));

      expect(outcome.message).toContain('Sync would delete 15 of 15 identities (100%).');
      expect(await countRows(db, 'external_identities')).toBe(15);
      expect(await db('actors').count<{ count: number }[]>('* as count')).toEqual([{ count: 15 }]);
    });

    it('allows removing 2 of 10 identities', async () => {
      await seedDirectory(db);
      await seedIdentities(db, 10);
      fake.state.appUsers.app1 = users(8);

      const outcome = expectSucceeded(await orchestrator.runSync(DIRECTORY_ID));

      expect(outcome.counts.identities.deleted).toBe(2);
      expect(outcome.counts.actors.deleted).toBe(2);
      expect(await countRows(db, 'external_identities')).toBe(8);
    });

    it('exempts the first sync of a directory', async () => {
      await seedDirectory(db, { synced_at: null });
      await seedIdentities(db, 15);

      expectSucceeded(await orchestrator.runSync(DIRECTORY_ID));

      expect(await countRows(db, 'external_identities')).toBe(0);
      expect((await directoryRow()).synced_at).toBe('2026-01-01T00:00:01.000Z');
    });

    it('exempts directories below the record floor', async () => {
      await seedDirectory(db);
      await seedIdentities(db, 5);

      expectSucceeded(await orchestrator.runSync(DIRECTORY_ID));

      expect(await countRows(db, 'external_identities')).toBe(0);
    });
  });

  // ── Outcome bookkeeping ──────────────────────────────────────────────────

  describe('error reporting', () => {
    it('records a token failure on the directory and the run', async () => {
      await seedDirectory(db);
      fake.failNext('/oauth2/v1/token', { status: 401, body: { error: 'invalid_client' } });

      const outcome = expectFailed(await orchestrator.runSync(DIRECTORY_ID));

      expect(outcome.error).toMatchObject({ step: 'get_access_token', status: 401 });
      const directory = await directoryRow();
      expect(directory.errored_at).toBe('2026-01-01T00:00:02.000Z');
      expect(Boolean(directory.is_verified)).toBe(false);

      const [run] = await store.listRuns(DIRECTORY_ID);
      expect(run).toMatchObject({
        status: 'failed',
        trigger: 'schedule',
        started_at: '2026-01-01T00:00:01.000Z',
        finished_at: '2026-01-01T00:00:02.000Z',
        error_message: outcome.message,
      } satisfies Partial<SyncRunRow>);
    });

    it('clears the error fields after a successful pass', async () => {
      await seedDirectory(db, { errored_at: '2025-12-31T00:00:00.000Z', error_message: 'Network error: UNKNOWN.' });
      fake.state.appUsers.app1 = users(1);

      expectSucceeded(await orchestrator.runSync(DIRECTORY_ID));

      const directory = await directoryRow();
      expect(directory.errored_at).toBeNull();
      expect(directory.error_message).toBeNull();
    });

    it('reports a cancelled pass as aborted', async () => {
      await seedDirectory(db);
      const controller = new AbortController();
      controller.abort();

      const outcome = expectFailed(await orchestrator.runSync(DIRECTORY_ID, { signal: controller.signal }));

      expect(outcome.message).toBe('Request was cancelled before it completed.');
    });
  });

  // ── Eligibility ──────────────────────────────────────────────────────────

  describe('eligibility', () => {
    it('skips unknown directories', async () => {
      await expect(orchestrator.runSync('missing')).resolves.toEqual({
        status: 'skipped',
        directoryId: 'missing',
        reason: 'not_found',
      });
    });

    it('skips directories of a disabled account', async () => {
      await seedDirectory(db);
      await db('accounts').update({ disabled_at: SEED_TIME });

      const outcome = await orchestrator.runSync(DIRECTORY_ID);

      expect(outcome).toMatchObject({ status: 'skipped', reason: 'account_disabled' });
      expect(fake.requests).toEqual([]);
    });

    it('lets a manual pass recover a directory that sync disabled', async () => {
      await seedDirectory(db, { is_disabled: true, disabled_reason: 'Sync error' });
      fake.state.appUsers.app1 = users(1);

      expect(await orchestrator.runSync(DIRECTORY_ID)).toMatchObject({ status: 'skipped', reason: 'directory_disabled' });
      expectSucceeded(await orchestrator.runSync(DIRECTORY_ID, { trigger: 'manual' }));

      const directory = await directoryRow();
      expect(Boolean(directory.is_disabled)).toBe(false);
      expect(directory.disabled_reason).toBeNull();
    });

    it('never runs an operator-disabled directory', async () => {
      await seedDirectory(db, { is_disabled: true, disabled_reason: 'Disabled by admin' });

      const outcome = await orchestrator.runSync(DIRECTORY_ID, { trigger: 'manual' });

      expect(outcome).toMatchObject({ status: 'skipped', reason: 'directory_disabled' });
    });
  });

  // ── Verification ─────────────────────────────────────────────────────────

  describe('verifyDirectory', () => {
    it('marks a working connection verified', async () => {
      await seedDirectory(db, { is_verified: false });
      fake.state.appUsers.app1 = users(1);
      fake.state.appGroups.app1 = [{ id: 'g1', name: 'Engineering' }];

      await expect(orchestrator.verifyDirectory(DIRECTORY_ID)).resolves.toEqual({ verified: true });
      expect(Boolean((await directoryRow()).is_verified)).toBe(true);
    });

    it('explains what the API service app cannot see', async () => {
      await seedDirectory(db, { is_verified: false });
      fake.state.appUsers.app1 = users(1);

      await expect(orchestrator.verifyDirectory(DIRECTORY_ID)).resolves.toEqual({
        verified: false,
        message: 'No groups were returned. Assign at least one group to the API service app and check its granted scopes.',
      });
      expect(Boolean((await directoryRow()).is_verified)).toBe(false);
    });
  });
});
