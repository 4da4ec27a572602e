import { google } from 'googleapis';
import { createLogger } from '@/lib/logger';
import { ExtendedError } from '@/lib/errors';
import type { GoogleAuthContext } from '@/types/auth';
import {
  DRIVE_ROOT_FOLDER,
  type CreateDriveFileParams,
  type DriveGateway,
  type DriveUploadedFile,
  type ShareDriveFileParams,
} from '@/types/google-drive';

const logger = createLogger('google-drive');

const UPLOAD_FIELDS = 'id, name, mimeType, size, webViewLink';

/**
 * Initialize Google Drive API client with OAuth2 credentials
 */
function getDriveClient(auth: GoogleAuthContext) {
  const oauth2Client = new google.auth.OAuth2();
  oauth2Client.setCredentials({ access_token: auth.accessToken });

  return google.drive({ version: 'v3', auth: oauth2Client });
}

/**
 * Pull the HTTP status out of a googleapis (gaxios) error when there is one
 */
export function statusCodeOf(error: unknown): number | undefined {
  if (!error || typeof error !== 'object') return undefined;
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  if ('code' in error && typeof error.code === 'number') {
    return error.code;
  }
  if (
    'response' in error &&
    error.response &&
    typeof error.response === 'object' &&
    'status' in error.response &&
    typeof error.response.status === 'number'
  ) {
    return error.response.status;
  }
  return undefined;
}

/**
 * Stream a file into Drive as a multipart media upload
 */
export async function createDriveFile({
  auth,
  body,
  fileName,
  mimeType,
  folderId,
  signal,
}: CreateDriveFileParams): Promise<DriveUploadedFile> {
  const parent = folderId ?? DRIVE_ROOT_FOLDER;
  logger.debug('Creating Drive file', { fileName, mimeType, parent });

  try {
    const drive = getDriveClient(auth);
    const response = await drive.files.create(
      {
        requestBody: {
          name: fileName,
          parents: [parent],
          ...(mimeType ? { mimeType } : {}),
        },
        media: {
          mimeType,
          body,
        },
        fields: UPLOAD_FIELDS,
      },
      { signal }
    );

    const { id, name } = response.data;
    if (!id) {
      throw new ExtendedError({
        message: 'Drive did not return an id for the uploaded file',
        details: { response: response.data },
      });
    }

    logger.info('Drive file created', { fileId: id, name });

    return {
      id,
      name: name ?? fileName,
      mimeType: response.data.mimeType ?? mimeType,
      size: response.data.size ? Number(response.data.size) : undefined,
      webViewLink: response.data.webViewLink ?? undefined,
    };
  } catch (error) {
    throw new ExtendedError({
      message: 'Failed to create Drive file',
      cause: error,
      details: { fileName, parent, statusCode: statusCodeOf(error) },
    });
  }
}

/**
 * Grant anyone-with-link read access and return the file's canonical link
 */
export async function shareDriveFile({
  auth,
  fileId,
  signal,
}: ShareDriveFileParams): Promise<string> {
  logger.debug('Sharing Drive file with link', { fileId });

  try {
    const drive = getDriveClient(auth);

    await drive.permissions.create(
      {
        fileId,
        requestBody: { role: 'reader', type: 'anyone' },
        fields: 'id',
      },
      { signal }
    );

    const response = await drive.files.get(
      { fileId, fields: 'id, webViewLink' },
      { signal }
    );

    const link = response.data.webViewLink;
    if (!link) {
      throw new ExtendedError({
        message: 'Drive did not return a link for the shared file',
        details: { fileId },
      });
    }

    logger.debug('Drive file shared', { fileId, link });
    return link;
  } catch (error) {
    throw new ExtendedError({
      message: 'Failed to share Drive file',
      cause: error,
      details: { fileId, statusCode: statusCodeOf(error) },
    });
  }
}

export const googleDriveGateway: DriveGateway = {
  createFile: createDriveFile,
  shareWithLink: shareDriveFile,
};
