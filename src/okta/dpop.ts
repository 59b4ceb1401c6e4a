// ---------------------------------------------------------------------------
// DPoP proofs and client assertions (RFC 9449, RFC 7523)
//
// Both are RS256 JWTs signed with the directory's private key. The proof also
// carries the public half in its header so Okta can bind the access token to
// the key.
// ---------------------------------------------------------------------------

import { createHash, randomBytes } from 'crypto';
import { CompactSign, SignJWT, importJWK, type JWK } from 'jose';

export const DPOP_ALG = 'RS256';

/** Proof lifetime and client assertion lifetime, in seconds */
const TOKEN_LIFETIME_S = 300;

export interface DpopClaims {
  htm: string;
  htu: string;
  iat: number;
  exp: number;
  jti: string;
  nonce?: string;
  ath?: string;
}

/** Public components of an RSA or EC JWK; everything else is dropped. */
export function publicJwk(key: JWK): Pick<JWK, 'kty' | 'crv' | 'x' | 'y' | 'e' | 'n'> {
  if (key.kty === 'RSA') return { kty: key.kty, n: key.n, e: key.e };
  return { kty: key.kty, crv: key.crv, x: key.x, y: key.y };
}

/**
 * Sign DPoP proof claims. RS256 signatures are deterministic, so identical
 * claims and key give an identical token.
 */
export async function dpopSign(
  claims: DpopClaims | Record<string, unknown>,
  privateKey: JWK,
  kid: string,
): Promise<string> {
  const key = await importJWK(privateKey, DPOP_ALG);
  return new CompactSign(new TextEncoder().encode(JSON.stringify(claims)))
    .setProtectedHeader({
      alg: DPOP_ALG,
      typ: 'dpop+jwt',
      kid,
      jwk: publicJwk(privateKey),
    })
    .sign(key);
}

/** `jti` values are `<unix seconds>_<random>` so they stay unique across retries. */
export function newJti(nowS: number): string {
  return `${nowS}_${randomBytes(8).toString('base64url')}`;
}

/** `htu` is the target URI without query or fragment. */
export function htu(url: URL): string {
  return `${url.protocol}//${url.host}${url.pathname || '/'}`;
}

/** `ath` binds a proof to the access token it accompanies. */
export function accessTokenHash(accessToken: string): string {
  return createHash('sha256').update(accessToken).digest('base64url');
}

export function buildProofClaims(
  method: string,
  url: URL,
  nowS: number,
  options: { nonce?: string | null; accessToken?: string | null } = {},
): DpopClaims {
  const claims: DpopClaims = {
    htm: method.toUpperCase(),
    htu: htu(url),
    iat: nowS,
    exp: nowS + TOKEN_LIFETIME_S,
    jti: newJti(nowS),
  };
  if (options.accessToken) claims.ath = accessTokenHash(options.accessToken);
  if (options.nonce) claims.nonce = options.nonce;
  return claims;
}

/**
 * Private-key JWT used to authenticate the client at the token endpoint.
 */
export async function createClientAssertion(
  clientId: string,
  tokenEndpoint: string,
  privateKey: JWK,
  kid: string,
  nowS: number,
): Promise<string> {
  const key = await importJWK(privateKey, DPOP_ALG);
  return new SignJWT({})
    .setProtectedHeader({ alg: DPOP_ALG, kid })
    .setIssuer(clientId)
    .setSubject(clientId)
    .setAudience(tokenEndpoint)
    .setIssuedAt(nowS)
    .setExpirationTime(nowS + TOKEN_LIFETIME_S)
    .setJti(newJti(nowS))
    .sign(key);
}
