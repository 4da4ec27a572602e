import 'dotenv/config';
import { loadConfig, type AppConfig } from '@/lib/config';
import { createAppContext } from '@/lib/app-context';
import { ConfigError, isAuthenticationError } from '@/lib/errors';
import { createLogger, setLogLevel } from '@/lib/logger';
import { createBot } from '@/bot/telegram';

const logger = createLogger('main');

async function main(): Promise<void> {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error('Cannot start: configuration is invalid', error);
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  setLogLevel(config.logLevel);
  const app = await createAppContext(config);

  // The bot still starts without Drive access; uploads report the problem
  try {
    const auth = await app.credentials.acquire();
    logger.info('Google Drive credential ready', {
      source: auth.source,
      expiresAt: new Date(auth.expiresAt).toISOString(),
    });
  } catch (error) {
    if (!isAuthenticationError(error)) throw error;
    logger.warn('Google Drive is not authorized yet; run "npm run authorize"', {
      reason: error.message,
    });
  }

  const bot = createBot(config.botToken, app);

  process.once('SIGINT', () => bot.stop('SIGINT'));
  process.once('SIGTERM', () => bot.stop('SIGTERM'));

  logger.info('Starting bot', {
    maxFileSizeMb: config.maxFileSizeMb,
    folderId: config.destinationFolderId ?? 'root',
    authMode: config.authMode,
  });

  await bot.launch(() => {
    logger.info('Bot is polling for updates');
  });

  logger.info('Bot stopped');
}

main().catch(error => {
  logger.error('Bot terminated with an error', error);
  process.exitCode = 1;
});
