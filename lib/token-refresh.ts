import { google } from 'googleapis';
import { z } from 'zod';
import { createLogger } from './logger';
import { ExtendedError } from './errors';
import {
  DRIVE_SCOPES,
  type Clock,
  type OAuthClientSecrets,
  type StoredCredential,
} from '@/types/auth';

const logger = createLogger('token-refresh');

export const GOOGLE_TOKEN_ENDPOINT = 'https://oauth2.googleapis.com/token';

// Refresh 5 minutes before expiry
export const TOKEN_REFRESH_BUFFER_MS = 5 * 60 * 1000;

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number(),
  refresh_token: z.string().min(1).optional(),
  scope: z.string().optional(),
  token_type: z.string().default('Bearer'),
});

const tokenErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

export function isCredentialExpired(
  credential: StoredCredential,
  now: number = Date.now()
): boolean {
  return now >= credential.expiry_date - TOKEN_REFRESH_BUFFER_MS;
}

/**
 * Consent URL for the installed-app flow. Offline access plus a forced
 * consent prompt makes Google issue a refresh token every time.
 */
export function buildAuthorizationUrl(secrets: OAuthClientSecrets): string {
  const client = new google.auth.OAuth2(
    secrets.clientId,
    secrets.clientSecret,
    secrets.redirectUri
  );

  return client.generateAuthUrl({
    access_type: 'offline',
    prompt: 'consent',
    scope: DRIVE_SCOPES,
  });
}

async function postTokenRequest(
  params: Record<string, string>,
  operation: string
): Promise<z.infer<typeof tokenResponseSchema>> {
  const response = await fetch(GOOGLE_TOKEN_ENDPOINT, {
    method: 'POST',
    headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    body: new URLSearchParams(params),
  });

  const payload: unknown = await response.json();

  if (!response.ok) {
    const parsedError = tokenErrorSchema.safeParse(payload);
    throw new ExtendedError({
      message: parsedError.success
        ? parsedError.data.error
        : `Token endpoint returned ${response.status}`,
      details: {
        operation,
        statusCode: response.status,
        description: parsedError.success
          ? parsedError.data.error_description
          : undefined,
      },
    });
  }

  const parsed = tokenResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new ExtendedError({
      message: 'Token endpoint returned an unexpected payload',
      details: { operation, issues: parsed.error.issues.map(i => i.message) },
    });
  }

  return parsed.data;
}

/**
 * Refresh an OAuth access token using the credential's refresh token.
 * Google usually omits the refresh token on refresh, so the existing one is kept.
 */
export async function refreshAccessToken(
  secrets: OAuthClientSecrets,
  credential: StoredCredential,
  now: Clock = Date.now
): Promise<StoredCredential> {
  if (!credential.refresh_token) {
    throw new ExtendedError({
      message: 'Stored credential has no refresh token',
    });
  }

  logger.info('Refreshing Google access token');

  try {
    const tokens = await postTokenRequest(
      {
        client_id: secrets.clientId,
        client_secret: secrets.clientSecret,
        grant_type: 'refresh_token',
        refresh_token: credential.refresh_token,
      },
      'refresh'
    );

    logger.info('Access token refreshed', { expiresIn: tokens.expires_in });

    return {
      access_token: tokens.access_token,
      refresh_token: tokens.refresh_token ?? credential.refresh_token,
      expiry_date: now() + tokens.expires_in * 1000,
      token_type: tokens.token_type,
      scope: tokens.scope ?? credential.scope,
    };
  } catch (error) {
    logger.error('Error refreshing access token', error);
    throw error;
  }
}

/**
 * Exchange the code returned to the consent callback for a credential.
 */
export async function exchangeAuthorizationCode(
  secrets: OAuthClientSecrets,
  code: string,
  now: Clock = Date.now
): Promise<StoredCredential> {
  const tokens = await postTokenRequest(
    {
      client_id: secrets.clientId,
      client_secret: secrets.clientSecret,
      code,
      grant_type: 'authorization_code',
      redirect_uri: secrets.redirectUri,
    },
    'exchange'
  );

  if (!tokens.refresh_token) {
    throw new ExtendedError({
      message:
        'No refresh token received. Revoke the app at https://myaccount.google.com/permissions and authorize again.',
    });
  }

  logger.info('Authorization code exchanged', { scope: tokens.scope });

  return {
    access_token: tokens.access_token,
    refresh_token: tokens.refresh_token,
    expiry_date: now() + tokens.expires_in * 1000,
    token_type: tokens.token_type,
    scope: tokens.scope ?? DRIVE_SCOPES.join(' '),
  };
}
