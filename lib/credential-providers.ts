import { readFile } from 'fs/promises';
import { google } from 'googleapis';
import { createLogger } from './logger';
import { AuthenticationRequiredError, ExtendedError } from './errors';
import {
  buildAuthorizationUrl,
  exchangeAuthorizationCode,
  refreshAccessToken,
} from './token-refresh';
import type { AuthConfig } from './config';
import {
  DRIVE_SCOPES,
  clientSecretsFileSchema,
  serviceAccountKeySchema,
  type Clock,
  type CredentialProvider,
  type OAuthClientSecrets,
  type ServiceAccountKey,
  type StoredCredential,
} from '@/types/auth';

const logger = createLogger('credential-providers');
const operatorLogger = createLogger('operator');

export const OAUTH_CALLBACK_PATH = '/oauth2callback';

export type AuthorizationUrlSink = (url: string) => void;

/**
 * Operator-facing channel: the process log and stderr, never the chat.
 */
export const emitToOperator: AuthorizationUrlSink = url => {
  operatorLogger.warn('Google Drive authorization required', {
    authorizationUrl: url,
  });
  process.stderr.write(
    `\nOpen this URL while "npm run authorize" is running to connect Google Drive:\n${url}\n\n`
  );
};

async function readJsonFile(filePath: string): Promise<unknown> {
  const content = await readFile(filePath, 'utf-8');
  return JSON.parse(content);
}

export function redirectUriFor(port: number): string {
  return `http://localhost:${port}${OAUTH_CALLBACK_PATH}`;
}

/**
 * Load the OAuth client descriptor supplied by the operator.
 */
export async function loadClientSecrets(
  credentialsFile: string,
  redirectPort: number
): Promise<OAuthClientSecrets> {
  let raw: unknown;
  try {
    raw = await readJsonFile(credentialsFile);
  } catch (error) {
    throw new AuthenticationRequiredError({
      reason: `'${credentialsFile}' is missing or unreadable; download the OAuth client file from Google Cloud Console`,
      cause: error,
    });
  }

  const parsed = clientSecretsFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new AuthenticationRequiredError({
      reason: `'${credentialsFile}' is not an OAuth client file for a desktop or web app`,
      cause: parsed.error,
    });
  }

  const entry = 'installed' in parsed.data ? parsed.data.installed : parsed.data.web;

  return {
    clientId: entry.client_id,
    clientSecret: entry.client_secret,
    redirectUri: redirectUriFor(redirectPort),
  };
}

interface OAuthProviderOptions {
  credentialsFile: string;
  redirectPort: number;
}

/**
 * First-time authorization needs a browser: the consent URL goes to the
 * operator and acquisition fails until the consent CLI stores a credential.
 */
export class InteractiveCredentialProvider implements CredentialProvider {
  readonly kind = 'interactive' as const;
  private readonly options: OAuthProviderOptions;
  private readonly onAuthorizationUrl: AuthorizationUrlSink;

  constructor(
    options: OAuthProviderOptions,
    onAuthorizationUrl: AuthorizationUrlSink = emitToOperator
  ) {
    this.options = options;
    this.onAuthorizationUrl = onAuthorizationUrl;
  }

  private secrets(): Promise<OAuthClientSecrets> {
    return loadClientSecrets(
      this.options.credentialsFile,
      this.options.redirectPort
    );
  }

  async authorizationUrl(): Promise<string> {
    return buildAuthorizationUrl(await this.secrets());
  }

  async provision(): Promise<StoredCredential> {
    const authorizationUrl = await this.authorizationUrl();
    this.onAuthorizationUrl(authorizationUrl);
    throw new AuthenticationRequiredError({
      reason: 'no stored credential',
      authorizationUrl,
    });
  }

  async refresh(credential: StoredCredential, now: Clock = Date.now): Promise<StoredCredential> {
    return refreshAccessToken(await this.secrets(), credential, now);
  }

  async completeConsent(code: string, now: Clock = Date.now): Promise<StoredCredential> {
    return exchangeAuthorizationCode(await this.secrets(), code, now);
  }
}

/**
 * Refresh token handed over in configuration; the first access token is
 * obtained by refreshing it.
 */
export class PreProvisionedCredentialProvider implements CredentialProvider {
  readonly kind = 'pre-provisioned' as const;
  private readonly options: OAuthProviderOptions;
  private readonly refreshToken: string;

  constructor(options: OAuthProviderOptions, refreshToken: string) {
    this.options = options;
    this.refreshToken = refreshToken;
  }

  async provision(now: Clock = Date.now): Promise<StoredCredential> {
    const secrets = await loadClientSecrets(
      this.options.credentialsFile,
      this.options.redirectPort
    );
    const seed: StoredCredential = {
      access_token: 'unissued',
      refresh_token: this.refreshToken,
      expiry_date: 0,
      token_type: 'Bearer',
      scope: DRIVE_SCOPES.join(' '),
    };

    try {
      return await refreshAccessToken(secrets, seed, now);
    } catch (error) {
      throw new AuthenticationRequiredError({
        reason: 'the configured GOOGLE_REFRESH_TOKEN was rejected',
        cause: error,
      });
    }
  }

  async refresh(credential: StoredCredential, now: Clock = Date.now): Promise<StoredCredential> {
    const secrets = await loadClientSecrets(
      this.options.credentialsFile,
      this.options.redirectPort
    );
    return refreshAccessToken(secrets, credential, now);
  }
}

/**
 * Service accounts have no refresh token; every renewal mints a new token
 * from the key.
 */
export class ServiceAccountCredentialProvider implements CredentialProvider {
  readonly kind = 'service-account' as const;
  private readonly keyFile: string;

  constructor(keyFile: string) {
    this.keyFile = keyFile;
  }

  private async loadKey(): Promise<ServiceAccountKey> {
    let raw: unknown;
    try {
      raw = await readJsonFile(this.keyFile);
    } catch (error) {
      throw new AuthenticationRequiredError({
        reason: `service account key '${this.keyFile}' is missing or unreadable`,
        cause: error,
      });
    }

    const parsed = serviceAccountKeySchema.safeParse(raw);
    if (!parsed.success) {
      throw new AuthenticationRequiredError({
        reason: `'${this.keyFile}' is not a service account key`,
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  private async mint(now: Clock): Promise<StoredCredential> {
    const key = await this.loadKey();
    const client = new google.auth.JWT({
      email: key.client_email,
      key: key.private_key,
      scopes: DRIVE_SCOPES,
    });

    const tokens = await client.authorize();
    if (!tokens.access_token) {
      throw new ExtendedError({
        message: 'Service account authorization returned no access token',
        details: { clientEmail: key.client_email },
      });
    }

    logger.info('Minted service account access token', {
      clientEmail: key.client_email,
    });

    return {
      access_token: tokens.access_token,
      expiry_date: tokens.expiry_date ?? now() + 60 * 60 * 1000,
      token_type: tokens.token_type ?? 'Bearer',
      scope: DRIVE_SCOPES.join(' '),
    };
  }

  provision(now: Clock = Date.now): Promise<StoredCredential> {
    return this.mint(now);
  }

  refresh(_credential: StoredCredential, now: Clock = Date.now): Promise<StoredCredential> {
    return this.mint(now);
  }
}

export function createCredentialProvider(
  config: AuthConfig,
  onAuthorizationUrl: AuthorizationUrlSink = emitToOperator
): CredentialProvider {
  const oauthOptions: OAuthProviderOptions = {
    credentialsFile: config.credentialsFile,
    redirectPort: config.oauthRedirectPort,
  };

  switch (config.authMode) {
    case 'interactive':
      return new InteractiveCredentialProvider(oauthOptions, onAuthorizationUrl);
    case 'pre-provisioned':
      if (!config.refreshToken) {
        throw new AuthenticationRequiredError({
          reason: 'GOOGLE_REFRESH_TOKEN is not set',
        });
      }
      return new PreProvisionedCredentialProvider(oauthOptions, config.refreshToken);
    case 'service-account':
      if (!config.serviceAccountFile) {
        throw new AuthenticationRequiredError({
          reason: 'GOOGLE_SERVICE_ACCOUNT_FILE is not set',
        });
      }
      return new ServiceAccountCredentialProvider(config.serviceAccountFile);
  }
}
