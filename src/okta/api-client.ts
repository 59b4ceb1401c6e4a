// ---------------------------------------------------------------------------
// Okta management API client
//
// OAuth 2.0 client credentials with a private_key_jwt assertion, DPoP-bound
// access tokens, and a bounded retry policy for reads.
// ---------------------------------------------------------------------------

import { setTimeout as delay } from 'timers/promises';
import { Agent, request } from 'undici';
import type { Dispatcher } from 'undici';
import type { JWK } from 'jose';
import type { Logger } from '../logger';
import { ProviderApiError, TransportError, ValidationError, isRecord } from '../sync-errors';
import { nextCursorFromLink, type Page } from '../sync/resource-stream';
import { buildProofClaims, createClientAssertion, dpopSign } from './dpop';
import { decodeWith, tokenResponseSchema } from './schemas';

export const REQUIRED_SCOPES = ['okta.users.read', 'okta.groups.read', 'okta.apps.read'];

const CLIENT_ASSERTION_TYPE = 'urn:ietf:params:oauth:client-assertion-type:jwt-bearer';

/** Statuses worth a second attempt on an idempotent read */
const RETRYABLE_STATUSES = new Set([408, 500, 502, 503, 504]);

export interface HttpSettings {
  connectTimeoutMs: number;
  /** Applied separately to response headers and response body */
  requestTimeoutMs: number;
  /** Retries for 408/5xx on GET */
  maxRetries: number;
  /** Waits honoured for 429 on GET */
  maxRateLimitRetries: number;
  /** Base for exponential backoff, and the 429 wait when Okta gives no hint */
  backoffMs: number;
}

export interface OktaApiClientOptions {
  /** Bare domain (`acme.okta.com`) or full origin */
  oktaDomain: string;
  clientId: string;
  privateKey: JWK;
  kid: string;
  http: HttpSettings;
  dispatcher: Dispatcher;
  logger: Logger;
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Epoch milliseconds */
  now?: () => number;
}

export interface HttpResponse {
  status: number;
  headers: Record<string, string | string[] | undefined>;
  /** Parsed JSON when the body is JSON, raw text otherwise */
  body: unknown;
}

/** Shared connection pool for every directory's client. */
export function createHttpAgent(http: Pick<HttpSettings, 'connectTimeoutMs' | 'requestTimeoutMs'>): Agent {
  return new Agent({
    connect: { timeout: http.connectTimeoutMs },
    headersTimeout: http.requestTimeoutMs,
    bodyTimeout: http.requestTimeoutMs,
  });
}

export function oktaBaseUrl(domain: string): string {
  const trimmed = domain.trim().replace(/\/+$/, '');
  return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}

export class OktaApiClient {
  readonly baseUrl: string;
  private readonly logger: Logger;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly now: () => number;

  constructor(private readonly options: OktaApiClientOptions) {
    this.baseUrl = oktaBaseUrl(options.oktaDomain);
    this.logger = options.logger.child({ component: 'OktaApiClient', oktaDomain: options.oktaDomain });
    this.sleep = options.sleep ?? ((ms, signal) => delay(ms, undefined, { signal }));
    this.now = options.now ?? Date.now;
  }

  // ── Token ────────────────────────────────────────────────────────────────

  /**
   * Exchange a signed client assertion for a DPoP-bound access token. One
   * nonce challenge is answered; a second one fails the call.
   */
  async fetchAccessToken(): Promise<string> {
    const tokenUrl = new URL('/oauth2/v1/token', this.baseUrl);
    let nonce: string | null = null;

    for (let challenges = 0; ; challenges++) {
      const assertion = await createClientAssertion(
        this.options.clientId,
        tokenUrl.toString(),
        this.options.privateKey,
        this.options.kid,
        this.nowSeconds(),
      );
      const form = new URLSearchParams({
        grant_type: 'client_credentials',
        scope: REQUIRED_SCOPES.join(' '),
        client_assertion_type: CLIENT_ASSERTION_TYPE,
        client_assertion: assertion,
      });

      const res = await this.send('POST', tokenUrl, {
        nonce,
        body: form.toString(),
        headers: { 'content-type': 'application/x-www-form-urlencoded' },
      });

      if (res.status >= 200 && res.status < 300) {
        const token = decodeWith(tokenResponseSchema, 'token response', res.body);
        if (token.scope !== undefined) {
          const granted = new Set(token.scope.split(/\s+/));
          const missing = REQUIRED_SCOPES.filter((scope) => !granted.has(scope));
          if (missing.length > 0) throw ValidationError.missingScopes(missing);
        }
        return token.access_token;
      }

      const challenge = nonceChallenge(res);
      if (challenge !== null && challenges === 0) {
        this.logger.debug('Token endpoint requested a DPoP nonce');
        nonce = challenge;
        continue;
      }

      throw new ProviderApiError('okta', res.status, res.body);
    }
  }

  // ── Reads ────────────────────────────────────────────────────────────────

  /** GET one page of a collection endpoint. */
  async getPage(
    path: string,
    params: Record<string, string>,
    accessToken: string,
    cursor: string | null,
  ): Promise<Page> {
    const query = cursor === null ? params : { ...params, after: cursor };
    const res = await this.get(path, query, accessToken);
    if (!Array.isArray(res.body)) {
      throw ValidationError.invalidRecord('response', null, `expected a JSON array from ${path}`, res.body);
    }
    return { items: res.body, next: nextCursorFromLink(res.headers.link) };
  }

  /**
   * Probe each collection the sync reads. An empty collection means the API
   * service app is missing assignments or scopes.
   */
  async verifyConnection(accessToken: string): Promise<void> {
    for (const collection of ['apps', 'users', 'groups']) {
      const page = await this.getPage(`/api/v1/${collection}`, { limit: '1' }, accessToken, null);
      if (page.items.length === 0) throw ValidationError.emptyCollection(collection);
    }
  }

  async get(path: string, params: Record<string, string>, accessToken: string): Promise<HttpResponse> {
    const url = new URL(path, this.baseUrl);
    for (const [key, value] of Object.entries(params)) url.searchParams.set(key, value);

    let retries = 0;
    let rateLimitWaits = 0;
    for (;;) {
      const res = await this.send('GET', url, { accessToken });
      if (res.status >= 200 && res.status < 300) return res;

      if (res.status === 429 && rateLimitWaits < this.options.http.maxRateLimitRetries) {
        rateLimitWaits++;
        const waitMs = this.rateLimitDelay(res.headers);
        this.logger.warn({ path, waitMs, attempt: rateLimitWaits }, 'Okta rate limit hit, waiting');
        await this.wait(waitMs);
        continue;
      }

      if (RETRYABLE_STATUSES.has(res.status) && retries < this.options.http.maxRetries) {
        const waitMs = this.options.http.backoffMs * Math.pow(2, retries);
        retries++;
        this.logger.warn({ path, status: res.status, waitMs, attempt: retries }, 'Retrying Okta request');
        await this.wait(waitMs);
        continue;
      }

      throw new ProviderApiError('okta', res.status, res.body);
    }
  }

  /**
   * 429 wait: until `x-rate-limit-reset`, else `Retry-After` seconds (at
   * least one), else the configured backoff.
   */
  rateLimitDelay(headers: HttpResponse['headers']): number {
    const reset = Number(firstHeader(headers, 'x-rate-limit-reset'));
    if (Number.isFinite(reset) && reset > 0) {
      return Math.max(reset * 1000 - this.now(), 0);
    }
    const retryAfter = Number(firstHeader(headers, 'retry-after'));
    if (Number.isFinite(retryAfter) && retryAfter >= 0) {
      return Math.max(retryAfter, 1) * 1000;
    }
    return this.options.http.backoffMs;
  }

  // ── Wire ─────────────────────────────────────────────────────────────────

  private async send(
    method: 'GET' | 'POST',
    url: URL,
    opts: {
      accessToken?: string;
      nonce?: string | null;
      body?: string;
      headers?: Record<string, string>;
    },
  ): Promise<HttpResponse> {
    const claims = buildProofClaims(method, url, this.nowSeconds(), {
      nonce: opts.nonce,
      accessToken: opts.accessToken,
    });
    const proof = await dpopSign(claims, this.options.privateKey, this.options.kid);

    const headers: Record<string, string> = {
      accept: 'application/json',
      dpop: proof,
      ...opts.headers,
    };
    if (opts.accessToken) headers.authorization = `DPoP ${opts.accessToken}`;

    const started = this.now();
    try {
      const res = await request(url, {
        method,
        headers,
        body: opts.body,
        dispatcher: this.options.dispatcher,
        signal: this.options.signal,
        headersTimeout: this.options.http.requestTimeoutMs,
        bodyTimeout: this.options.http.requestTimeoutMs,
      });
      const text = await res.body.text();
      this.logger.debug(
        { method, path: url.pathname, status: res.statusCode, durationMs: this.now() - started },
        'Okta request completed',
      );
      return { status: res.statusCode, headers: res.headers, body: parseBody(text) };
    } catch (err) {
      throw TransportError.from(err);
    }
  }

  private async wait(ms: number): Promise<void> {
    try {
      await this.sleep(ms, this.options.signal);
    } catch (err) {
      throw TransportError.from(err);
    }
  }

  private nowSeconds(): number {
    return Math.floor(this.now() / 1000);
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function firstHeader(headers: HttpResponse['headers'], name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
}

function parseBody(text: string): unknown {
  if (text === '') return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/** The nonce to retry with, when the response is a DPoP nonce challenge. */
function nonceChallenge(res: HttpResponse): string | null {
  if (res.status !== 400) return null;
  const nonce = firstHeader(res.headers, 'dpop-nonce');
  if (!nonce) return null;
  return isRecord(res.body) && res.body.error === 'use_dpop_nonce' ? nonce : null;
}
