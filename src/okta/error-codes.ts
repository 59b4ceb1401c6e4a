// ---------------------------------------------------------------------------
// Okta error codes → operator-facing remediation text
//
// Okta management API errors carry `errorCode` / `errorSummary`; the OAuth
// endpoints use `error` / `error_description`. Both land in the same lookup.
// ---------------------------------------------------------------------------

const REQUIRED_SCOPES = 'okta.users.read, okta.groups.read and okta.apps.read';

const OKTA_ERROR_MESSAGES: Record<string, string> = {
  E0000001: 'API validation failed. Okta rejected the request parameters.',
  E0000003: 'The request body was invalid.',
  E0000006: `Access denied. You do not have permission to perform this action. Grant the ${REQUIRED_SCOPES} scopes to the API service app.`,
  E0000007: 'Resource not found. The application or group may have been deleted in Okta.',
  E0000011: 'Invalid token provided. Re-verify the directory connection.',
  E0000021: 'Bad request to Okta.',
  E0000022: 'API access denied. The feature may not be available for this Okta organization.',
  E0000047: 'API call exceeded rate limit due to too many requests. The next sync will retry.',
  E0000061: 'Access denied. An Okta policy does not allow this application to access the API.',
  invalid_client:
    "Invalid client application. Check the client ID and that the public key registered in Okta matches this directory's key.",
  invalid_scope: `The requested scopes are not granted. Grant the ${REQUIRED_SCOPES} scopes to the API service app.`,
  invalid_dpop_proof: 'Okta rejected the DPoP proof. Check that the key ID matches the key registered in Okta.',
  use_dpop_nonce: 'Okta repeatedly demanded a new DPoP nonce. Retry the sync; contact Okta support if this persists.',
  unauthorized_client:
    'The client is not allowed to use the client credentials grant. Enable it on the API service app in Okta.',
};

function genericMessage(status: number): string {
  if (status === 400) return 'Bad request to Okta.';
  if (status === 401) return 'Okta rejected the credentials. Re-verify the directory connection.';
  if (status === 403) return 'Okta denied access to the requested resource.';
  if (status === 404) return 'Resource not found in Okta.';
  if (status === 429) return 'Okta rate limit exceeded. The next sync will retry.';
  if (status >= 500) return 'Okta service is unavailable. This is usually temporary; the next sync will retry.';
  if (status >= 400) return 'Okta rejected the request.';
  return 'Unexpected response from Okta.';
}

/**
 * Build the message stored on the directory for an Okta HTTP failure.
 * Unknown codes fall back to a per-status text and keep the raw code and
 * summary so support can look them up.
 */
export function formatOktaApiError(
  status: number,
  code: string | null,
  summary: string | null,
): string {
  const known = code ? OKTA_ERROR_MESSAGES[code] : undefined;
  if (known) return `HTTP ${status} - ${known}`;

  const raw = [code, summary].filter((part): part is string => Boolean(part)).join(': ');
  return raw
    ? `HTTP ${status} - ${genericMessage(status)} Okta said: ${raw}`
    : `HTTP ${status} - ${genericMessage(status)}`;
}
