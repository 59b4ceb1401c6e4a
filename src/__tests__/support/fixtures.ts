import { exportJWK, generateKeyPair, type JWK } from 'jose';
import type { Knex } from 'knex';
import { createDb, initDb } from '../../db';
import type { DirectoryRow } from '../../types';
import { OKTA_DOMAIN, OKTA_ORIGIN } from './fake-okta';

export const ACCOUNT_ID = 'acct-1';
export const DIRECTORY_ID = 'dir-1';
export const KID = 'test-kid';
export const SEED_TIME = '2025-12-01T00:00:00.000Z';

export const TEST_HTTP = {
  connectTimeoutMs: 1000,
  requestTimeoutMs: 1000,
  maxRetries: 1,
  maxRateLimitRetries: 3,
  backoffMs: 1000,
};

let keyPromise: Promise<JWK> | null = null;

/** One RSA key per test file; generating them is slow. */
export function testPrivateKey(): Promise<JWK> {
  if (!keyPromise) {
    keyPromise = generateKeyPair('RS256', { extractable: true }).then(({ privateKey }) => exportJWK(privateKey));
  }
  return keyPromise;
}

export async function createTestDb(): Promise<Knex> {
  const db = createDb(':memory:');
  await initDb(db);
  return db;
}

export async function seedDirectory(db: Knex, overrides: Partial<DirectoryRow> = {}): Promise<DirectoryRow> {
  const key = await testPrivateKey();
  await db('accounts').insert({ id: ACCOUNT_ID, name: 'Test Account', disabled_at: null, created_at: SEED_TIME });

  const row: DirectoryRow = {
    id: DIRECTORY_ID,
    account_id: ACCOUNT_ID,
    provider: 'okta',
    name: 'Test Okta',
    okta_domain: OKTA_DOMAIN,
    client_id: 'test-client-id',
    private_key_jwk: JSON.stringify(key),
    kid: KID,
    synced_at: SEED_TIME,
    errored_at: null,
    error_message: null,
    error_email_count: 0,
    is_disabled: false,
    disabled_reason: null,
    is_verified: true,
    created_at: SEED_TIME,
    updated_at: SEED_TIME,
    ...overrides,
  };
  await db('directories').insert(row);
  return row;
}

/**
 * Persist `count` identities `u1`..`uN` (with their actors) as if an earlier
 * pass had synced them.
 */
export async function seedIdentities(db: Knex, count: number, directoryId = DIRECTORY_ID): Promise<void> {
  for (let i = 1; i <= count; i++) {
    const email = `user${i}@example.com`;
    await db('actors').insert({
      id: `actor-${i}`,
      account_id: ACCOUNT_ID,
      type: 'account_user',
      name: `Test u${i}`,
      email,
      created_by_directory_id: directoryId,
      created_at: SEED_TIME,
      updated_at: SEED_TIME,
    });
    await db('external_identities').insert({
      id: `identity-${i}`,
      account_id: ACCOUNT_ID,
      directory_id: directoryId,
      actor_id: `actor-${i}`,
      issuer: OKTA_ORIGIN,
      idp_id: `u${i}`,
      email,
      name: `Test u${i}`,
      given_name: 'Test',
      family_name: `u${i}`,
      last_synced_at: SEED_TIME,
      created_at: SEED_TIME,
      updated_at: SEED_TIME,
    });
  }
}

export async function countRows(db: Knex, table: string, directoryId = DIRECTORY_ID): Promise<number> {
  const [{ count }] = await db(table).where({ directory_id: directoryId }).count<{ count: number }[]>('* as count');
  return Number(count);
}

/** Clock that advances one second per reading, starting at `start`. */
export function steppingClock(start = '2026-01-01T00:00:00.000Z'): { now: () => Date; nowMs: () => number } {
  let ms = Date.parse(start);
  return {
    now: () => {
      ms += 1000;
      return new Date(ms);
    },
    nowMs: () => ms,
  };
}
