import type { Readable } from 'stream';
import { z } from 'zod';

/**
 * Upload ledger schema
 */

/**
 * Record of a file that reached Drive and received a shareable link
 */
export const uploadRecordSchema = z.object({
  name: z.string(),
  id: z.string(),
  link: z.string(),
  uploadedAt: z.string(),
  size: z.number(),
  mimeType: z.string().optional(),
  uploaderId: z.number().optional(),
});

export type UploadRecord = z.infer<typeof uploadRecordSchema>;

/**
 * Root structure of the ledger file: entries in upload completion order
 */
export const uploadsDataSchema = z.array(uploadRecordSchema);

export type UploadsData = UploadRecord[];

export type UploadStage = 'downloading' | 'uploading';

export interface UploadRequest {
  /**
   * Opens the byte source; not called when the size check fails. The signal
   * fires when the transfer times out.
   */
  openStream: (signal: AbortSignal) => Promise<Readable>;
  /** Size reported by the sender before any bytes move, when known */
  declaredSize?: number;
  fileName: string;
  mimeType?: string;
  destinationFolderId?: string;
  uploaderId?: number;
  onStage?: (stage: UploadStage) => Promise<void> | void;
}

export interface UploadResult {
  fileName: string;
  fileId: string;
  shareableLink: string;
  size: number;
  mimeType?: string;
}
