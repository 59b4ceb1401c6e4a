import type { Dispatcher } from 'undici';
import type { Logger } from '../logger';
import { ValidationError } from '../sync-errors';
import type { DirectoryRow } from '../types';
import { ResourceStream, collect } from '../sync/resource-stream';
import type {
  DirectoryProvider,
  RemoteApp,
  RemoteGroup,
  RemoteMember,
  RemoteUser,
} from '../providers/types';
import { OktaApiClient, type HttpSettings } from './api-client';
import {
  appGroupSchema,
  appSchema,
  appUserSchema,
  decodeWith,
  privateKeyJwkSchema,
  userSchema,
  type PrivateKeyJwk,
} from './schemas';

// ── Page sizes ──────────────────────────────────────────────────────────────
// App user listings with expand=user allow up to 500; everything else 200.

const APP_USERS_PAGE_SIZE = '500';
const PAGE_SIZE = '200';

export interface OktaProviderOptions {
  http: HttpSettings;
  dispatcher: Dispatcher;
  logger: Logger;
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => number;
}

export class OktaProvider implements DirectoryProvider {
  readonly type = 'okta';

  constructor(private readonly client: OktaApiClient) {}

  static fromDirectory(directory: DirectoryRow, options: OktaProviderOptions): OktaProvider {
    return new OktaProvider(
      new OktaApiClient({
        oktaDomain: directory.okta_domain,
        clientId: directory.client_id,
        privateKey: parsePrivateKey(directory),
        kid: directory.kid,
        ...options,
      }),
    );
  }

  fetchToken(): Promise<string> {
    return this.client.fetchAccessToken();
  }

  listApplications(token: string): Promise<RemoteApp[]> {
    return collect(
      new ResourceStream(
        (cursor) => this.client.getPage('/api/v1/apps', { limit: PAGE_SIZE }, token, cursor),
        decodeApp,
      ),
    );
  }

  streamUsers(token: string, appId: string): ResourceStream<RemoteUser> {
    return new ResourceStream(
      (cursor) =>
        this.client.getPage(
          `/api/v1/apps/${encodeURIComponent(appId)}/users`,
          { expand: 'user', limit: APP_USERS_PAGE_SIZE },
          token,
          cursor,
        ),
      decodeAppUser,
    );
  }

  streamGroups(token: string, appId: string): ResourceStream<RemoteGroup> {
    return new ResourceStream(
      (cursor) =>
        this.client.getPage(
          `/api/v1/apps/${encodeURIComponent(appId)}/groups`,
          { expand: 'group', limit: PAGE_SIZE },
          token,
          cursor,
        ),
      decodeAppGroup,
    );
  }

  streamGroupMembers(token: string, groupId: string): ResourceStream<RemoteMember> {
    return new ResourceStream(
      (cursor) =>
        this.client.getPage(
          `/api/v1/groups/${encodeURIComponent(groupId)}/users`,
          { limit: PAGE_SIZE },
          token,
          cursor,
        ),
      decodeMember,
    );
  }

  verifyConnection(token: string): Promise<void> {
    return this.client.verifyConnection(token);
  }
}

// ---------------------------------------------------------------------------
// Decoders
// ---------------------------------------------------------------------------

function parsePrivateKey(directory: DirectoryRow): PrivateKeyJwk {
  // The key never goes into the error record
  const invalid = () =>
    ValidationError.invalidRecord('directory', directory.id, 'private_key_jwk is not a valid RSA private JWK', null);

  let json: unknown;
  try {
    json = JSON.parse(directory.private_key_jwk);
  } catch {
    throw invalid();
  }
  const parsed = privateKeyJwkSchema.safeParse(json);
  if (!parsed.success) throw invalid();
  return parsed.data;
}

function decodeApp(raw: unknown): RemoteApp {
  const app = decodeWith(appSchema, 'app', raw);
  return { id: app.id, label: app.label ?? app.id };
}

function decodeAppUser(raw: unknown): RemoteUser {
  const appUser = decodeWith(appUserSchema, 'app user', raw);
  const user = appUser._embedded?.user;
  if (!user) throw ValidationError.missingField('app user', appUser.id, '_embedded.user', raw);

  return {
    idpId: user.id,
    email: user.profile?.email ?? null,
    givenName: user.profile?.firstName?.trim() ?? '',
    familyName: user.profile?.lastName?.trim() ?? '',
    raw: user,
  };
}

function decodeAppGroup(raw: unknown): RemoteGroup {
  const appGroup = decodeWith(appGroupSchema, 'app group', raw);
  const group = appGroup._embedded?.group;
  // An app group assignment's id is the group id
  if (!group) return { idpId: appGroup.id, name: appGroup.id };

  const name = group.profile?.name?.trim();
  return { idpId: group.id, name: name ? name : group.id };
}

function decodeMember(raw: unknown): RemoteMember {
  const user = decodeWith(userSchema, 'group member', raw);
  return { idpId: user.id, status: user.status ?? null };
}
