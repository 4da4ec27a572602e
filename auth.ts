import 'dotenv/config';
import { loadAuthConfig } from '@/lib/config';
import {
  InteractiveCredentialProvider,
  redirectUriFor,
} from '@/lib/credential-providers';
import { CredentialStore } from '@/lib/credential-store';
import { waitForAuthorizationCode } from '@/lib/oauth-callback-server';
import { createLogger, setLogLevel } from '@/lib/logger';

const logger = createLogger('authorize');

/**
 * One-time consent flow: prints the Google consent URL, waits for the
 * redirect on localhost and stores the resulting credential where the bot
 * reads it.
 */
async function authorize(): Promise<void> {
  const config = loadAuthConfig();
  setLogLevel(config.logLevel);

  if (config.authMode !== 'interactive') {
    logger.warn('GOOGLE_AUTH_MODE does not use browser consent, nothing to do', {
      authMode: config.authMode,
    });
    return;
  }

  const provider = new InteractiveCredentialProvider({
    credentialsFile: config.credentialsFile,
    redirectPort: config.oauthRedirectPort,
  });
  const store = new CredentialStore({ tokenFile: config.tokenFile, provider });

  const url = await provider.authorizationUrl();
  process.stdout.write(
    `\nOpen this URL in a browser and grant access to Google Drive:\n\n${url}\n\n` +
      `The redirect URI ${redirectUriFor(config.oauthRedirectPort)} must be allowed for this OAuth client.\n\n`
  );

  const code = await waitForAuthorizationCode({ port: config.oauthRedirectPort });
  const credential = await provider.completeConsent(code);
  await store.save(credential);

  logger.info('Google Drive authorized', { tokenFile: config.tokenFile });
}

authorize().catch(error => {
  logger.error('Authorization failed', error);
  process.exitCode = 1;
});
