import { z } from 'zod';
import { ValidationError, isRecord } from '../sync-errors';

// ---------------------------------------------------------------------------
// Okta wire records
//
// Only the fields the sync reads are declared; everything else passes through
// untouched. Profile fields are optional because Okta omits unset attributes.
// ---------------------------------------------------------------------------

const nullableString = z.string().nullish();

export const appSchema = z
  .object({
    id: z.string().min(1),
    label: nullableString,
    status: nullableString,
  })
  .passthrough();

export const userSchema = z
  .object({
    id: z.string().min(1),
    status: nullableString,
    profile: z
      .object({
        email: nullableString,
        firstName: nullableString,
        lastName: nullableString,
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

/** `GET /api/v1/apps/{id}/users?expand=user` element */
export const appUserSchema = z
  .object({
    id: z.string().min(1),
    _embedded: z.object({ user: userSchema.nullish() }).passthrough().nullish(),
  })
  .passthrough();

export const groupSchema = z
  .object({
    id: z.string().min(1),
    profile: z.object({ name: nullableString }).passthrough().nullish(),
  })
  .passthrough();

/** `GET /api/v1/apps/{id}/groups?expand=group` element */
export const appGroupSchema = z
  .object({
    id: z.string().min(1),
    _embedded: z.object({ group: groupSchema.nullish() }).passthrough().nullish(),
  })
  .passthrough();

export const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string(),
  expires_in: z.number().optional(),
  scope: z.string().optional(),
});

/** RSA private key as stored on the directory row; unknown members are dropped */
export const privateKeyJwkSchema = z.object({
  kty: z.literal('RSA'),
  n: z.string().min(1),
  e: z.string().min(1),
  d: z.string().min(1),
  p: z.string().min(1),
  q: z.string().min(1),
  dp: z.string().min(1),
  dq: z.string().min(1),
  qi: z.string().min(1),
});

export type PrivateKeyJwk = z.infer<typeof privateKeyJwkSchema>;

/**
 * Parse one record, turning a schema mismatch into a ValidationError that
 * names the record and the first failing path.
 */
export function decodeWith<S extends z.ZodTypeAny>(schema: S, entity: string, raw: unknown): z.output<S> {
  const result = schema.safeParse(raw);
  if (result.success) return result.data;

  const issue = result.error.issues[0];
  const detail = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'unexpected shape';
  const id = isRecord(raw) && typeof raw.id === 'string' ? raw.id : null;
  throw ValidationError.invalidRecord(entity, id, detail, raw);
}
