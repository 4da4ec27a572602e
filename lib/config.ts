import path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors';
import { LOG_LEVELS, type LogLevel } from './logger';
import type { CredentialProviderKind } from '@/types/auth';

export const DEFAULT_MAX_FILE_SIZE_MB = 100;
export const DEFAULT_UPLOAD_TIMEOUT_SECONDS = 600;
export const DEFAULT_OAUTH_REDIRECT_PORT = 8085;

export interface AppConfig {
  botToken: string;
  destinationFolderId?: string;
  maxFileSizeMb: number;
  maxFileSizeBytes: number;
  authMode: CredentialProviderKind;
  credentialsFile: string;
  tokenFile: string;
  refreshToken?: string;
  serviceAccountFile?: string;
  oauthRedirectPort: number;
  ledgerFile: string;
  uploadTimeoutMs: number;
  logLevel: LogLevel;
}

// Empty strings in .env files mean "unset"
const optionalString = z
  .string()
  .trim()
  .transform(value => (value === '' ? undefined : value))
  .optional();

const envSchema = z
  .object({
    BOT_TOKEN: optionalString,
    DESTINATION_FOLDER_ID: optionalString,
    MAX_FILE_SIZE_MB: z.coerce
      .number()
      .int()
      .positive()
      .catch(DEFAULT_MAX_FILE_SIZE_MB),
    GOOGLE_AUTH_MODE: z
      .enum(['interactive', 'pre-provisioned', 'service-account'])
      .default('interactive'),
    GOOGLE_CREDENTIALS_FILE: z.string().min(1).default('credentials.json'),
    GOOGLE_TOKEN_FILE: z.string().min(1).default(path.join('data', 'token.json')),
    GOOGLE_REFRESH_TOKEN: optionalString,
    GOOGLE_SERVICE_ACCOUNT_FILE: optionalString,
    OAUTH_REDIRECT_PORT: z.coerce
      .number()
      .int()
      .min(1)
      .max(65535)
      .default(DEFAULT_OAUTH_REDIRECT_PORT),
    LEDGER_FILE: z
      .string()
      .min(1)
      .default(path.join('data', 'uploaded_files.json')),
    UPLOAD_TIMEOUT_SECONDS: z.coerce
      .number()
      .positive()
      .default(DEFAULT_UPLOAD_TIMEOUT_SECONDS),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  })
  .superRefine((env, ctx) => {
    if (env.GOOGLE_AUTH_MODE === 'pre-provisioned' && !env.GOOGLE_REFRESH_TOKEN) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['GOOGLE_REFRESH_TOKEN'],
        message: 'required when GOOGLE_AUTH_MODE is pre-provisioned',
      });
    }
    if (
      env.GOOGLE_AUTH_MODE === 'service-account' &&
      !env.GOOGLE_SERVICE_ACCOUNT_FILE
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['GOOGLE_SERVICE_ACCOUNT_FILE'],
        message: 'required when GOOGLE_AUTH_MODE is service-account',
      });
    }
  });

type EnvSource = Record<string, string | undefined>;

function withAliases(env: EnvSource): EnvSource {
  return {
    ...env,
    BOT_TOKEN: env.BOT_TOKEN || env.TELEGRAM_BOT_TOKEN,
    DESTINATION_FOLDER_ID: env.DESTINATION_FOLDER_ID || env.GOOGLE_DRIVE_FOLDER_ID,
  };
}

/**
 * Settings shared by the bot and the consent CLI. The bot token is not needed
 * to authorize Drive, so it is only enforced by `loadConfig`.
 */
function parseEnv(env: EnvSource) {
  const result = envSchema.safeParse(withAliases(env));
  if (!result.success) {
    const issues = result.error.issues.map(
      issue => `${issue.path.join('.') || 'env'}: ${issue.message}`
    );
    throw new ConfigError('Invalid configuration', issues);
  }
  return result.data;
}

export function loadConfig(env: EnvSource = process.env): AppConfig {
  const parsed = parseEnv(env);

  if (!parsed.BOT_TOKEN) {
    throw new ConfigError('Missing bot token', [
      'BOT_TOKEN: required (TELEGRAM_BOT_TOKEN is also accepted)',
    ]);
  }

  return {
    botToken: parsed.BOT_TOKEN,
    destinationFolderId: parsed.DESTINATION_FOLDER_ID,
    maxFileSizeMb: parsed.MAX_FILE_SIZE_MB,
    maxFileSizeBytes: parsed.MAX_FILE_SIZE_MB * 1024 * 1024,
    authMode: parsed.GOOGLE_AUTH_MODE,
    credentialsFile: parsed.GOOGLE_CREDENTIALS_FILE,
    tokenFile: parsed.GOOGLE_TOKEN_FILE,
    refreshToken: parsed.GOOGLE_REFRESH_TOKEN,
    serviceAccountFile: parsed.GOOGLE_SERVICE_ACCOUNT_FILE,
    oauthRedirectPort: parsed.OAUTH_REDIRECT_PORT,
    ledgerFile: parsed.LEDGER_FILE,
    uploadTimeoutMs: parsed.UPLOAD_TIMEOUT_SECONDS * 1000,
    logLevel: parsed.LOG_LEVEL,
  };
}

export type AuthConfig = Pick<
  AppConfig,
  | 'authMode'
  | 'credentialsFile'
  | 'tokenFile'
  | 'refreshToken'
  | 'serviceAccountFile'
  | 'oauthRedirectPort'
  | 'logLevel'
>;

export function loadAuthConfig(env: EnvSource = process.env): AuthConfig {
  const parsed = parseEnv(env);
  return {
    authMode: parsed.GOOGLE_AUTH_MODE,
    credentialsFile: parsed.GOOGLE_CREDENTIALS_FILE,
    tokenFile: parsed.GOOGLE_TOKEN_FILE,
    refreshToken: parsed.GOOGLE_REFRESH_TOKEN,
    serviceAccountFile: parsed.GOOGLE_SERVICE_ACCOUNT_FILE,
    oauthRedirectPort: parsed.OAUTH_REDIRECT_PORT,
    logLevel: parsed.LOG_LEVEL,
  };
}
