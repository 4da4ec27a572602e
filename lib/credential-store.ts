import { chmod, mkdir, rm } from 'fs/promises';
import path from 'path';
import { JSONFile } from 'lowdb/node';
import { createLogger } from './logger';
import {
  AuthenticationExpiredError,
  AuthenticationRequiredError,
} from './errors';
import { isCredentialExpired } from './token-refresh';
import {
  storedCredentialSchema,
  type CredentialProvider,
  type GoogleAuthContext,
  type StoredCredential,
} from '@/types/auth';

const logger = createLogger('credential-store');

export interface CredentialStoreOptions {
  tokenFile: string;
  provider: CredentialProvider;
  now?: () => number;
}

/**
 * Holds the single Google credential of this process. The token file is
 * re-read on every acquisition so a credential written by the consent CLI
 * is picked up without a restart.
 */
export class CredentialStore {
  private readonly tokenFile: string;
  private readonly adapter: JSONFile<StoredCredential>;
  private readonly provider: CredentialProvider;
  private readonly now: () => number;

  constructor(options: CredentialStoreOptions) {
    this.tokenFile = options.tokenFile;
    this.adapter = new JSONFile<StoredCredential>(options.tokenFile);
    this.provider = options.provider;
    this.now = options.now ?? Date.now;
  }

  /**
   * Read the stored credential. Unreadable or malformed files count as absent.
   */
  async load(): Promise<StoredCredential | null> {
    let raw: unknown;
    try {
      raw = await this.adapter.read();
    } catch (error) {
      logger.error('Error loading credential file, re-authorization needed', error, {
        tokenFile: this.tokenFile,
      });
      return null;
    }

    if (raw === null) {
      return null;
    }

    const parsed = storedCredentialSchema.safeParse(raw);
    if (!parsed.success) {
      logger.error('Credential file has an unexpected shape, re-authorization needed', parsed.error, {
        tokenFile: this.tokenFile,
      });
      return null;
    }

    return parsed.data;
  }

  /**
   * Replace the stored credential. The write goes to a temporary file that is
   * renamed over the old one.
   */
  async save(credential: StoredCredential): Promise<void> {
    await mkdir(path.dirname(this.tokenFile), { recursive: true, mode: 0o700 });

    // Files created by the write, the temporary one included, are owner-only
    const previousMask = process.umask(0o077);
    try {
      await this.adapter.write(credential);
    } finally {
      process.umask(previousMask);
    }
    // A stale temporary file keeps its earlier mode
    await chmod(this.tokenFile, 0o600);
    logger.info('Credential saved', {
      tokenFile: this.tokenFile,
      expiresAt: new Date(credential.expiry_date).toISOString(),
    });
  }

  async clear(): Promise<void> {
    await rm(this.tokenFile, { force: true });
    logger.info('Credential removed', { tokenFile: this.tokenFile });
  }

  async acquire(): Promise<GoogleAuthContext> {
    let credential = await this.load();

    if (!credential) {
      logger.info('No stored credential, provisioning', {
        provider: this.provider.kind,
      });
      credential = await this.provider.provision(this.now);
      await this.save(credential);
    } else if (isCredentialExpired(credential, this.now())) {
      credential = await this.refresh(credential);
    }

    return {
      accessToken: credential.access_token,
      expiresAt: credential.expiry_date,
      source: this.provider.kind,
    };
  }

  private async refresh(credential: StoredCredential): Promise<StoredCredential> {
    let refreshed: StoredCredential;
    try {
      refreshed = await this.provider.refresh(credential, this.now);
    } catch (error) {
      if (error instanceof AuthenticationRequiredError) {
        throw error;
      }

      logger.error('Error refreshing credential, discarding it', error, {
        provider: this.provider.kind,
      });
      await this.clear();
      throw new AuthenticationExpiredError(error);
    }

    await this.save(refreshed);
    return refreshed;
  }
}
