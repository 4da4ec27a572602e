import { mkdir } from 'fs/promises';
import path from 'path';
import { Low, Memory, type Adapter } from 'lowdb';
import { JSONFile } from 'lowdb/node';
import { createLogger } from '@/lib/logger';
import { LedgerWriteFailedError } from '@/lib/errors';
import { uploadsDataSchema, type UploadRecord, type UploadsData } from '@/types/uploads';

const logger = createLogger('uploads-db');

/**
 * Capability the ledger writes through: append one entry, read them all
 */
export interface RecordStore {
  append(record: UploadRecord): Promise<void>;
  listAll(): Promise<UploadRecord[]>;
}

/**
 * RecordStore over a lowdb adapter. The whole array is rewritten on every
 * append; JSONFile writes go through a temporary file and a rename.
 */
export class LowRecordStore implements RecordStore {
  private readonly db: Low<UploadsData>;
  private readonly label: string;
  private loaded = false;

  constructor(adapter: Adapter<UploadsData>, label: string) {
    this.db = new Low<UploadsData>(adapter, []);
    this.label = label;
  }

  private async ensureLoaded(): Promise<void> {
    if (this.loaded) return;

    const startTime = Date.now();
    try {
      await this.db.read();
    } catch (error) {
      logger.error('Error decoding ledger, starting from an empty list', error, {
        ledger: this.label,
      });
      this.db.data = [];
    }

    const parsed = uploadsDataSchema.safeParse(this.db.data);
    if (parsed.success) {
      this.db.data = parsed.data;
    } else {
      logger.error('Ledger has an unexpected shape, starting from an empty list', parsed.error, {
        ledger: this.label,
      });
      this.db.data = [];
    }

    this.loaded = true;
    logger.info('Ledger loaded', {
      ledger: this.label,
      recordCount: this.db.data.length,
      readDurationMs: Date.now() - startTime,
    });
  }

  async append(record: UploadRecord): Promise<void> {
    await this.ensureLoaded();
    this.db.data.push(record);
    try {
      await this.db.write();
    } catch (error) {
      // Keep memory in step with what is on disk
      this.db.data.pop();
      throw error;
    }
  }

  async listAll(): Promise<UploadRecord[]> {
    await this.ensureLoaded();
    return this.db.data.map(record => ({ ...record }));
  }
}

export async function openFileRecordStore(ledgerFile: string): Promise<RecordStore> {
  await mkdir(path.dirname(ledgerFile), { recursive: true });
  return new LowRecordStore(new JSONFile<UploadsData>(ledgerFile), ledgerFile);
}

export function createMemoryRecordStore(): RecordStore {
  return new LowRecordStore(new Memory<UploadsData>(), 'memory');
}

/**
 * Append-only history of completed uploads, shared by every chat user.
 * Single writer: callers must not record concurrently.
 */
export class UploadLedger {
  private readonly store: RecordStore;

  constructor(store: RecordStore) {
    this.store = store;
  }

  /**
   * Record a successful upload; a persistence failure surfaces as
   * LedgerWriteFailedError so the caller can still report the link.
   */
  async record(entry: UploadRecord): Promise<void> {
    logger.info('Recording upload', {
      fileId: entry.id,
      name: entry.name,
      size: entry.size,
    });

    try {
      await this.store.append(entry);
    } catch (error) {
      throw new LedgerWriteFailedError({ fileId: entry.id, cause: error });
    }

    logger.debug('Upload recorded', { fileId: entry.id });
  }

  /**
   * Full history in insertion order
   */
  listAll(): Promise<UploadRecord[]> {
    return this.store.listAll();
  }
}
