import { z } from 'zod';

export const DRIVE_SCOPES = ['https://www.googleapis.com/auth/drive.file'];

/**
 * Persisted OAuth credential. Field names follow the token JSON written by
 * Google's client libraries so the file stays interchangeable with them.
 */
export const storedCredentialSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).optional(),
  expiry_date: z.number(),
  token_type: z.string().default('Bearer'),
  scope: z.string().default(DRIVE_SCOPES.join(' ')),
});

export type StoredCredential = z.infer<typeof storedCredentialSchema>;

/**
 * OAuth client descriptor downloaded from the Google Cloud Console.
 * Desktop clients nest it under `installed`, web clients under `web`.
 */
const clientEntrySchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
});

export const clientSecretsFileSchema = z.union([
  z.object({ installed: clientEntrySchema }),
  z.object({ web: clientEntrySchema }),
]);

export interface OAuthClientSecrets {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
}

export const serviceAccountKeySchema = z.object({
  client_email: z.string().min(1),
  private_key: z.string().min(1),
});

export type ServiceAccountKey = z.infer<typeof serviceAccountKeySchema>;

export type CredentialProviderKind =
  | 'interactive'
  | 'pre-provisioned'
  | 'service-account';

/**
 * Where a credential comes from when nothing is stored, and how it is renewed.
 */
// Epoch milliseconds; expiry dates are computed against it
export type Clock = () => number;

export interface CredentialProvider {
  readonly kind: CredentialProviderKind;
  provision(now: Clock): Promise<StoredCredential>;
  refresh(credential: StoredCredential, now: Clock): Promise<StoredCredential>;
}

export interface GoogleAuthContext {
  readonly accessToken: string;
  // epoch milliseconds
  readonly expiresAt: number;
  readonly source: CredentialProviderKind;
}
