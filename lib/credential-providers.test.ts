import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  InteractiveCredentialProvider,
  PreProvisionedCredentialProvider,
  ServiceAccountCredentialProvider,
  createCredentialProvider,
  loadClientSecrets,
} from './credential-providers';
import { AuthenticationRequiredError } from './errors';
import type { AuthConfig } from './config';

vi.mock('@/lib/logger', () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

const NOW = 1_700_000_000_000;

describe('credential providers', () => {
  let dir: string;
  let credentialsFile: string;
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'providers-test-'));
    credentialsFile = path.join(dir, 'credentials.json');
    await writeFile(
      credentialsFile,
      JSON.stringify({
        web: { client_id: 'test-client-id', client_secret: 'test-secret' },
      })
    );
    vi.stubGlobal('fetch', fetchMock);
    vi.spyOn(Date, 'now').mockReturnValue(NOW);
  });

  afterEach(async () => {
    fetchMock.mockReset();
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  describe('loadClientSecrets', () => {
    it('reads web client files and derives the loopback redirect URI', async () => {
      await expect(loadClientSecrets(credentialsFile, 9000)).resolves.toEqual({
        clientId: 'test-client-id',
        clientSecret: 'test-secret',
        redirectUri: 'http://localhost:9000/oauth2callback',
      });
    });

    it('requires authorization when the file is missing', async () => {
      await expect(
        loadClientSecrets(path.join(dir, 'absent.json'), 8085)
      ).rejects.toBeInstanceOf(AuthenticationRequiredError);
    });

    it('requires authorization when the file is not an OAuth client', async () => {
      await writeFile(credentialsFile, JSON.stringify({ type: 'service_account' }));

      await expect(loadClientSecrets(credentialsFile, 8085)).rejects.toThrow(
        /is not an OAuth client file/
      );
    });
  });

  describe('InteractiveCredentialProvider', () => {
    it('never provisions on its own', async () => {
      const onAuthorizationUrl = vi.fn<(url: string) => void>();
      const provider = new InteractiveCredentialProvider(
        { credentialsFile, redirectPort: 8085 },
        onAuthorizationUrl
      );

      await expect(provider.provision()).rejects.toMatchObject({
        message: 'Google Drive authorization required: no stored credential',
      });
      expect(onAuthorizationUrl).toHaveBeenCalledTimes(1);
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe('PreProvisionedCredentialProvider', () => {
    it('obtains the first access token from the configured refresh token', async () => {
      fetchMock.mockResolvedValue(
        new Response(JSON.stringify({ access_token: 'test-access-token', expires_in: 3600 }), {
          status: 200,
        })
      );
      const provider = new PreProvisionedCredentialProvider(
        { credentialsFile, redirectPort: 8085 },
        'test-refresh-token'
      );

      await expect(provider.provision()).resolves.toEqual({
        access_token: 'test-access-token',
        refresh_token: 'test-refresh-token',
        expiry_date: NOW + 3600 * 1000,
        token_type: 'Bearer',
        scope: 'https://www.googleapis.com/auth/drive.file',
      });
    });

    it('requires authorization when the refresh token is rejected', async () => {
      fetchMock.mockResolvedValue(
        new Response(JSON.stringify({ error: 'invalid_grant' }), { status: 400 })
      );
      const provider = new PreProvisionedCredentialProvider(
        { credentialsFile, redirectPort: 8085 },
        'test-refresh-token'
      );

      await expect(provider.provision()).rejects.toMatchObject({
        message:
          'Google Drive authorization required: the configured GOOGLE_REFRESH_TOKEN was rejected',
      });
    });
  });

  describe('ServiceAccountCredentialProvider', () => {
    it('requires authorization when the key file is missing', async () => {
      const provider = new ServiceAccountCredentialProvider(path.join(dir, 'key.json'));

      await expect(provider.provision()).rejects.toBeInstanceOf(AuthenticationRequiredError);
    });
  });

  describe('createCredentialProvider', () => {
    const base: AuthConfig = {
      authMode: 'interactive',
      credentialsFile: 'credentials.json',
      tokenFile: 'token.json',
      oauthRedirectPort: 8085,
      logLevel: 'info',
    };

    it('builds the provider named by the auth mode', () => {
      expect(createCredentialProvider(base).kind).toBe('interactive');
      expect(
        createCredentialProvider({
          ...base,
          authMode: 'pre-provisioned',
          refreshToken: 'test-refresh-token',
        }).kind
      ).toBe('pre-provisioned');
      expect(
        createCredentialProvider({
          ...base,
          authMode: 'service-account',
          serviceAccountFile: 'key.json',
        }).kind
      ).toBe('service-account');
    });

    it('rejects a pre-provisioned mode without a refresh token', () => {
      expect(() =>
        createCredentialProvider({ ...base, authMode: 'pre-provisioned' })
      ).toThrow(AuthenticationRequiredError);
    });
  });
});
