// ---------------------------------------------------------------------------
// Database row types for directory-sync
//
// Timestamps are ISO-8601 UTC strings so that string comparison in SQL
// matches chronological order.
// ---------------------------------------------------------------------------

export type ProviderType = 'okta';

export type SyncTrigger = 'schedule' | 'manual';

export type SyncRunStatus = 'running' | 'succeeded' | 'failed' | 'skipped';

export interface AccountRow {
  id: string;
  name: string;
  disabled_at: string | null;
  created_at: string;
}

export interface DirectoryRow {
  id: string;
  account_id: string;
  provider: ProviderType;
  name: string;
  okta_domain: string;
  client_id: string;
  /** Private signing key as JWK JSON text. Never logged. */
  private_key_jwk: string;
  kid: string;
  synced_at: string | null;
  errored_at: string | null;
  error_message: string | null;
  error_email_count: number;
  /** SQLite stores booleans as 0/1 */
  is_disabled: number | boolean;
  disabled_reason: string | null;
  is_verified: number | boolean;
  created_at: string;
  updated_at: string;
}

export interface ActorRow {
  id: string;
  account_id: string;
  type: 'account_user';
  name: string;
  email: string;
  created_by_directory_id: string | null;
  created_at: string;
  updated_at: string;
}

export interface ExternalIdentityRow {
  id: string;
  account_id: string;
  directory_id: string;
  actor_id: string;
  issuer: string;
  idp_id: string;
  email: string;
  name: string;
  given_name: string;
  family_name: string;
  last_synced_at: string | null;
  created_at: string;
  updated_at: string;
}

export interface GroupRow {
  id: string;
  account_id: string;
  directory_id: string;
  idp_id: string;
  name: string;
  last_synced_at: string | null;
  created_at: string;
  updated_at: string;
}

export interface MembershipRow {
  id: string;
  account_id: string;
  directory_id: string;
  actor_id: string;
  group_id: string;
  last_synced_at: string | null;
}

export interface SyncRunRow {
  id: string;
  directory_id: string;
  trigger: SyncTrigger;
  status: SyncRunStatus;
  started_at: string;
  finished_at: string | null;
  identities_created: number;
  identities_updated: number;
  identities_deleted: number;
  groups_created: number;
  groups_updated: number;
  groups_deleted: number;
  memberships_created: number;
  memberships_deleted: number;
  error_message: string | null;
}
