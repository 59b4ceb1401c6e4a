import Knex from 'knex';
import type { Knex as KnexType } from 'knex';

// ---------------------------------------------------------------------------
// Database client
// ---------------------------------------------------------------------------

/**
 * Open the local authorization store. Pass ':memory:' for a throwaway
 * database; the pool is pinned to one connection so every query sees the
 * same in-memory file.
 */
export function createDb(filename: string): KnexType {
  return Knex({
    client: 'better-sqlite3',
    connection: { filename },
    useNullAsDefault: true,
    pool: { min: 1, max: 1 },
  });
}

// ---------------------------------------------------------------------------
// Schema bootstrap: idempotent, safe to call on every startup
// ---------------------------------------------------------------------------

export async function initDb(db: KnexType): Promise<void> {
  // --- accounts ------------------------------------------------------------
  // Provisioned elsewhere; only the disabled flag matters to sync.
  if (!(await db.schema.hasTable('accounts'))) {
    await db.schema.createTable('accounts', (t) => {
      t.string('id').primary();
      t.string('name').notNullable();
      t.string('disabled_at').nullable();
      t.string('created_at').notNullable();
    });
  }

  // --- directories ---------------------------------------------------------
  // One row per IdP connection, plus the operator-visible sync health fields.
  if (!(await db.schema.hasTable('directories'))) {
    await db.schema.createTable('directories', (t) => {
      t.string('id').primary();
      t.string('account_id').notNullable().references('id').inTable('accounts');
      t.string('provider').notNullable();
      t.string('name').notNullable();
      t.string('okta_domain').notNullable();
      t.string('client_id').notNullable();
      t.text('private_key_jwk').notNullable();
      t.string('kid').notNullable();
      t.string('synced_at').nullable();
      t.string('errored_at').nullable();
      t.text('error_message').nullable();
      t.integer('error_email_count').notNullable().defaultTo(0);
      t.boolean('is_disabled').notNullable().defaultTo(false);
      t.string('disabled_reason').nullable();
      t.boolean('is_verified').notNullable().defaultTo(false);
      t.string('created_at').notNullable();
      t.string('updated_at').notNullable();
    });
  }

  // --- actors --------------------------------------------------------------
  if (!(await db.schema.hasTable('actors'))) {
    await db.schema.createTable('actors', (t) => {
      t.string('id').primary();
      t.string('account_id').notNullable().references('id').inTable('accounts');
      t.string('type').notNullable();
      t.string('name').notNullable();
      t.string('email').notNullable();
      t.string('created_by_directory_id').nullable();
      t.string('created_at').notNullable();
      t.string('updated_at').notNullable();
      t.index(['account_id', 'email']);
    });
  }

  // --- external_identities -------------------------------------------------
  if (!(await db.schema.hasTable('external_identities'))) {
    await db.schema.createTable('external_identities', (t) => {
      t.string('id').primary();
      t.string('account_id').notNullable();
      t.string('directory_id').notNullable().references('id').inTable('directories');
      t.string('actor_id').notNullable().references('id').inTable('actors');
      t.string('issuer').notNullable();
      t.string('idp_id').notNullable();
      t.string('email').notNullable();
      t.string('name').notNullable();
      t.string('given_name').notNullable().defaultTo('');
      t.string('family_name').notNullable().defaultTo('');
      t.string('last_synced_at').nullable();
      t.string('created_at').notNullable();
      t.string('updated_at').notNullable();
      t.unique(['directory_id', 'idp_id']);
    });
  }

  // --- groups --------------------------------------------------------------
  if (!(await db.schema.hasTable('groups'))) {
    await db.schema.createTable('groups', (t) => {
      t.string('id').primary();
      t.string('account_id').notNullable();
      t.string('directory_id').notNullable().references('id').inTable('directories');
      t.string('idp_id').notNullable();
      t.string('name').notNullable();
      t.string('last_synced_at').nullable();
      t.string('created_at').notNullable();
      t.string('updated_at').notNullable();
      t.unique(['directory_id', 'idp_id']);
    });
  }

  // --- memberships ---------------------------------------------------------
  if (!(await db.schema.hasTable('memberships'))) {
    await db.schema.createTable('memberships', (t) => {
      t.string('id').primary();
      t.string('account_id').notNullable();
      t.string('directory_id').notNullable().references('id').inTable('directories');
      t.string('actor_id').notNullable().references('id').inTable('actors');
      t.string('group_id').notNullable().references('id').inTable('groups');
      t.string('last_synced_at').nullable();
      t.unique(['directory_id', 'actor_id', 'group_id']);
    });
  }

  // --- sync_runs -----------------------------------------------------------
  // One row per pass, written at start and finalised at the end.
  if (!(await db.schema.hasTable('sync_runs'))) {
    await db.schema.createTable('sync_runs', (t) => {
      t.string('id').primary();
      t.string('directory_id').notNullable();
      t.string('trigger').notNullable();
      t.string('status').notNullable();
      t.string('started_at').notNullable();
      t.string('finished_at').nullable();
      t.integer('identities_created').notNullable().defaultTo(0);
      t.integer('identities_updated').notNullable().defaultTo(0);
      t.integer('identities_deleted').notNullable().defaultTo(0);
      t.integer('groups_created').notNullable().defaultTo(0);
      t.integer('groups_updated').notNullable().defaultTo(0);
      t.integer('groups_deleted').notNullable().defaultTo(0);
      t.integer('memberships_created').notNullable().defaultTo(0);
      t.integer('memberships_deleted').notNullable().defaultTo(0);
      t.text('error_message').nullable();
      t.index(['directory_id', 'started_at']);
    });
  }
}
