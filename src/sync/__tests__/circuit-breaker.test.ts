import { describe, expect, it } from 'vitest';
import { silentLogger } from '../../logger';
import { CircuitBreakerError } from '../../sync-errors';
import { checkDeletionThreshold, evaluateDeletion } from '../circuit-breaker';
import type { LocalIdentity, SyncPlan } from '../diff';

function identity(i: number): LocalIdentity {
  return {
    id: `identity-${i}`,
    idpId: `u${i}`,
    actorId: `actor-${i}`,
    email: `user${i}@example.com`,
    name: `Test u${i}`,
    givenName: 'Test',
    familyName: `u${i}`,
    lastSyncedAt: null,
  };
}

function planDeleting(total: number, toDelete: number): SyncPlan {
  const local = Array.from({ length: total }, (_, i) => identity(i + 1));
  return {
    passStart: '2026-01-01T00:00:01.000Z',
    actors: [],
    identities: { create: [], update: [], delete: local.slice(0, toDelete), total },
    groups: { create: [], update: [], delete: [], total: 0 },
    memberships: { create: [], update: [], delete: [], total: 0 },
  };
}

describe('evaluateDeletion', () => {
  it('skips the first sync of a directory', () => {
    expect(evaluateDeletion(100, 100, { firstSync: true })).toEqual({ action: 'skip', reason: 'first_sync' });
  });

  it('skips small directories', () => {
    expect(evaluateDeletion(9, 9, { firstSync: false })).toEqual({ action: 'skip', reason: 'too_few_records' });
  });

  it('skips when nothing would be deleted', () => {
    expect(evaluateDeletion(50, 0, { firstSync: false })).toEqual({ action: 'skip', reason: 'nothing_to_delete' });
  });

  it('allows exactly ninety percent', () => {
    expect(evaluateDeletion(10, 9, { firstSync: false })).toEqual({ action: 'allow', ratio: 0.9 });
  });

  it('blocks anything above ninety percent', () => {
    expect(evaluateDeletion(10, 10, { firstSync: false })).toEqual({ action: 'block', ratio: 1 });
    expect(evaluateDeletion(1000, 901, { firstSync: false })).toEqual({ action: 'block', ratio: 0.901 });
  });

  it('honours overridden limits', () => {
    expect(evaluateDeletion(4, 3, { firstSync: false, threshold: 0.5, minRecords: 2 })).toEqual({
      action: 'block',
      ratio: 0.75,
    });
  });
});

describe('checkDeletionThreshold', () => {
  it('throws a CircuitBreakerError naming the entity', () => {
    let thrown: unknown;
    try {
      checkDeletionThreshold(planDeleting(10, 10), { firstSync: false }, silentLogger());
    } catch (err) {
      thrown = err;
    }

    expect(thrown).toBeInstanceOf(CircuitBreakerError);
    expect(thrown).toMatchObject({ entity: 'identities', total: 10, toDelete: 10, step: 'check_deletion_threshold' });
    expect(thrown).toHaveProperty(
      'message',
      'Sync would delete 10 of 10 identities (100%). This may indicate the Okta application was misconfigured or removed. ' +
        'Please verify your Okta configuration and re-verify the directory connection.',
    );
  });

  it('lets a partial cleanup through', () => {
    expect(() => checkDeletionThreshold(planDeleting(20, 5), { firstSync: false }, silentLogger())).not.toThrow();
  });

  it('checks memberships too', () => {
    const plan = planDeleting(0, 0);
    plan.memberships = {
      create: [],
      update: [],
      delete: Array.from({ length: 12 }, (_, i) => ({
        id: `m${i}`,
        actorId: `actor-${i}`,
        groupId: 'group-1',
        lastSyncedAt: null,
      })),
      total: 12,
    };

    expect(() => checkDeletionThreshold(plan, { firstSync: false }, silentLogger())).toThrow(
      'Sync would delete 12 of 12 memberships (100%).',
    );
  });
});
