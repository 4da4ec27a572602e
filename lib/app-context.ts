import type { AppConfig } from './config';
import { createCredentialProvider } from './credential-providers';
import { CredentialStore } from './credential-store';
import { UploadPipeline } from './upload-pipeline';
import { UploadLedger, openFileRecordStore } from './uploads-db';

/**
 * Everything a chat handler needs, built once at startup and passed down
 * explicitly.
 */
export interface AppContext {
  maxFileSizeMb: number;
  credentials: CredentialStore;
  pipeline: UploadPipeline;
  ledger: UploadLedger;
}

export async function createAppContext(config: AppConfig): Promise<AppContext> {
  const credentials = new CredentialStore({
    tokenFile: config.tokenFile,
    provider: createCredentialProvider(config),
  });

  const ledger = new UploadLedger(await openFileRecordStore(config.ledgerFile));

  const pipeline = new UploadPipeline({
    credentials,
    maxBytes: config.maxFileSizeBytes,
    timeoutMs: config.uploadTimeoutMs,
    defaultFolderId: config.destinationFolderId,
  });

  return {
    maxFileSizeMb: config.maxFileSizeMb,
    credentials,
    pipeline,
    ledger,
  };
}
