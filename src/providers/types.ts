import type { ProviderType } from '../types';
import type { ResourceStream } from '../sync/resource-stream';

// ---------------------------------------------------------------------------
// Provider-neutral directory records
// ---------------------------------------------------------------------------

export interface RemoteApp {
  id: string;
  label: string;
}

export interface RemoteUser {
  idpId: string;
  /** As sent by the provider; null when the attribute is unset */
  email: string | null;
  givenName: string;
  familyName: string;
  /** The raw record, kept for validation errors */
  raw: unknown;
}

export interface RemoteGroup {
  idpId: string;
  name: string;
}

export interface RemoteMember {
  idpId: string;
  status: string | null;
}

/**
 * Everything the reconciler needs from an identity provider. One instance
 * serves a single pass; the access token is passed explicitly so a pass never
 * outlives its token unnoticed.
 */
export interface DirectoryProvider {
  readonly type: ProviderType;
  fetchToken(): Promise<string>;
  listApplications(token: string): Promise<RemoteApp[]>;
  streamUsers(token: string, appId: string): ResourceStream<RemoteUser>;
  streamGroups(token: string, appId: string): ResourceStream<RemoteGroup>;
  streamGroupMembers(token: string, groupId: string): ResourceStream<RemoteMember>;
  verifyConnection(token: string): Promise<void>;
}
