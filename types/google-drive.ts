import type { Readable } from 'stream';
import type { GoogleAuthContext } from './auth';

/**
 * Drive root alias used when no destination folder is configured
 */
export const DRIVE_ROOT_FOLDER = 'root';

export interface DriveUploadedFile {
  id: string;
  name: string;
  mimeType?: string;
  size?: number;
  webViewLink?: string;
}

export interface CreateDriveFileParams {
  auth: GoogleAuthContext;
  body: Readable;
  fileName: string;
  mimeType?: string;
  folderId?: string;
  signal?: AbortSignal;
}

export interface ShareDriveFileParams {
  auth: GoogleAuthContext;
  fileId: string;
  signal?: AbortSignal;
}

/**
 * The two Drive calls the upload pipeline needs
 */
export interface DriveGateway {
  createFile(params: CreateDriveFileParams): Promise<DriveUploadedFile>;
  /** Grants anyone-with-link read access and returns the canonical link */
  shareWithLink(params: ShareDriveFileParams): Promise<string>;
}
