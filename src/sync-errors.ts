// ---------------------------------------------------------------------------
// Sync error taxonomy
//
// Every failure that can end a sync pass is one of these classes. The raw
// `message` is for logs; `formatSyncError` produces the text stored on the
// directory for operators.
// ---------------------------------------------------------------------------

import { formatOktaApiError } from './okta/error-codes';
import type { ProviderType } from './types';

export type SyncStep =
  | 'load_directory'
  | 'get_access_token'
  | 'list_apps'
  | 'stream_app_users'
  | 'stream_app_groups'
  | 'stream_group_members'
  | 'process_user'
  | 'check_deletion_threshold'
  | 'commit'
  | 'verify';

export type SyncErrorKind = 'transport' | 'provider_api' | 'validation' | 'circuit_breaker' | 'commit';

/** How the error reporter treats a failure when deciding to disable a directory. */
export type FailureClass = 'client_error' | 'transient';

export abstract class SyncError extends Error {
  abstract readonly kind: SyncErrorKind;
  step: SyncStep | null = null;
  directoryId: string | null = null;

  /** Attach pass context without overwriting what a deeper layer already set. */
  at(step: SyncStep, directoryId?: string): this {
    if (this.step === null) this.step = step;
    if (this.directoryId === null && directoryId) this.directoryId = directoryId;
    return this;
  }
}

// ---------------------------------------------------------------------------
// Transport
// ---------------------------------------------------------------------------

const TLS_CODES = new Set([
  'CERT_HAS_EXPIRED',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'ERR_TLS_CERT_ALTNAME_INVALID',
  'ERR_SSL_WRONG_VERSION_NUMBER',
]);

export class TransportError extends SyncError {
  readonly kind = 'transport';

  constructor(
    /** Underlying error code, e.g. ENOTFOUND or UND_ERR_CONNECT_TIMEOUT */
    readonly reason: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'TransportError';
  }

  static from(err: unknown): TransportError {
    if (err instanceof TransportError) return err;
    const reason = codeOf(err) ?? 'UNKNOWN';
    const message = err instanceof Error ? err.message : String(err);
    return new TransportError(reason, message, { cause: err });
  }
}

function codeOf(err: unknown): string | null {
  if (!(err instanceof Error)) return null;
  if (err.name === 'AbortError') return 'ABORTED';
  const code = 'code' in err ? err.code : undefined;
  if (typeof code === 'string' && code.length > 0) return code;
  // Node's net errors are often wrapped one level down by undici
  return err.cause === undefined ? null : codeOf(err.cause);
}

export function formatTransportReason(reason: string): string {
  switch (reason) {
    case 'ENOTFOUND':
    case 'EAI_AGAIN':
      return 'DNS lookup failed. Check that the Okta domain is spelled correctly and resolvable from this host.';
    case 'ETIMEDOUT':
    case 'UND_ERR_CONNECT_TIMEOUT':
    case 'UND_ERR_HEADERS_TIMEOUT':
    case 'UND_ERR_BODY_TIMEOUT':
      return 'Connection timed out. The provider did not answer in time; the next sync will retry.';
    case 'ECONNREFUSED':
      return 'Connection refused. Check outbound firewall rules for the provider domain.';
    case 'ECONNRESET':
    case 'EPIPE':
    case 'UND_ERR_SOCKET':
    case 'UND_ERR_CLOSED':
      return 'Connection closed unexpectedly. The next sync will retry.';
    case 'EHOSTUNREACH':
      return 'Host is unreachable. Check network routing to the provider.';
    case 'ENETUNREACH':
      return 'Network is unreachable. Check network connectivity from this host.';
    case 'ABORTED':
      return 'Request was cancelled before it completed.';
    default:
      if (TLS_CODES.has(reason)) {
        return `TLS error (${reason}). Check for a proxy intercepting TLS traffic to the provider.`;
      }
      return `Network error: ${reason}.`;
  }
}

// ---------------------------------------------------------------------------
// Provider API
// ---------------------------------------------------------------------------

export class ProviderApiError extends SyncError {
  readonly kind = 'provider_api';
  /** Vendor error code (Okta `errorCode`) or OAuth `error` */
  readonly errorCode: string | null;
  /** Vendor `errorSummary` or OAuth `error_description` */
  readonly errorSummary: string | null;

  constructor(
    readonly provider: ProviderType,
    readonly status: number,
    readonly body: unknown,
  ) {
    const { code, summary } = parseErrorBody(body);
    super(
      `${provider} API responded with HTTP ${status}` +
        (code ? ` (${code})` : '') +
        (summary ? `: ${summary}` : ''),
    );
    this.name = 'ProviderApiError';
    this.errorCode = code;
    this.errorSummary = summary;
  }
}

function parseErrorBody(body: unknown): { code: string | null; summary: string | null } {
  if (typeof body === 'string') {
    const trimmed = body.trim();
    return { code: null, summary: trimmed ? trimmed.substring(0, 500) : null };
  }
  if (!isRecord(body)) return { code: null, summary: null };

  const code = stringField(body, 'errorCode') ?? stringField(body, 'error');
  const summary = stringField(body, 'errorSummary') ?? stringField(body, 'error_description');
  return { code, summary };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(obj: Record<string, unknown>, key: string): string | null {
  const value = obj[key];
  return typeof value === 'string' && value.length > 0 ? value : null;
}

// ---------------------------------------------------------------------------
// Domain validation
// ---------------------------------------------------------------------------

export class ValidationError extends SyncError {
  readonly kind = 'validation';

  private constructor(
    message: string,
    readonly entity: string,
    readonly idpId: string | null,
    readonly field: string | null,
    /** The offending record, kept for diagnosis */
    readonly record: unknown,
  ) {
    super(message);
    this.name = 'ValidationError';
  }

  static missingField(entity: string, idpId: string | null, field: string, record: unknown): ValidationError {
    const subject = idpId ? `${capitalize(entity)} '${idpId}'` : capitalize(entity);
    return new ValidationError(
      `${subject} missing required '${field}' field.`,
      entity,
      idpId,
      field,
      record,
    );
  }

  static invalidRecord(entity: string, idpId: string | null, detail: string, record: unknown): ValidationError {
    const subject = idpId ? `${capitalize(entity)} '${idpId}'` : capitalize(entity);
    return new ValidationError(`${subject} is invalid: ${detail}`, entity, idpId, null, record);
  }

  static missingScopes(missing: string[]): ValidationError {
    return new ValidationError(
      `Access token is missing required scopes: ${missing.join(', ')}. Grant them to the API service app.`,
      'access token',
      null,
      'scope',
      null,
    );
  }

  static emptyCollection(collection: string): ValidationError {
    return new ValidationError(
      `No ${collection} were returned. Assign at least one ${collection.replace(/s$/, '')} ` +
        'to the API service app and check its granted scopes.',
      collection,
      null,
      null,
      null,
    );
  }
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

// ---------------------------------------------------------------------------
// Circuit breaker
// ---------------------------------------------------------------------------

export class CircuitBreakerError extends SyncError {
  readonly kind = 'circuit_breaker';

  constructor(
    readonly entity: string,
    readonly total: number,
    readonly toDelete: number,
    readonly ratio: number,
  ) {
    super(
      `Sync would delete ${toDelete} of ${total} ${entity} (${Math.round(ratio * 100)}%). ` +
        'This may indicate the Okta application was misconfigured or removed. ' +
        'Please verify your Okta configuration and re-verify the directory connection.',
    );
    this.name = 'CircuitBreakerError';
  }
}

// ---------------------------------------------------------------------------
// Commit
// ---------------------------------------------------------------------------

export class CommitError extends SyncError {
  readonly kind = 'commit';

  constructor(cause: unknown) {
    super(`Failed to write sync results: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
    this.name = 'CommitError';
  }
}

// ---------------------------------------------------------------------------
// Classification and formatting
// ---------------------------------------------------------------------------

export function classifyFailure(err: unknown): FailureClass {
  if (err instanceof ProviderApiError) {
    // 408 and 429 only mean "not now"
    const retryable = err.status === 408 || err.status === 429;
    return err.status >= 400 && err.status < 500 && !retryable ? 'client_error' : 'transient';
  }
  if (err instanceof ValidationError || err instanceof CircuitBreakerError) return 'client_error';
  return 'transient';
}

/** Operator-facing message for any error that ended a pass. */
export function formatSyncError(err: unknown): string {
  if (err instanceof ProviderApiError) {
    switch (err.provider) {
      case 'okta':
        return formatOktaApiError(err.status, err.errorCode, err.errorSummary);
    }
  }
  if (err instanceof TransportError) return formatTransportReason(err.reason);
  if (err instanceof Error) return err.message;
  return 'Unknown error occurred';
}
