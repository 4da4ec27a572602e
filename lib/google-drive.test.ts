import { Readable } from 'stream';
import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createDriveFile, shareDriveFile, statusCodeOf } from './google-drive';
import type { GoogleAuthContext } from '@/types/auth';

const drive = vi.hoisted(() => ({
  files: { create: vi.fn(), get: vi.fn() },
  permissions: { create: vi.fn() },
  setCredentials: vi.fn(),
}));

vi.mock('googleapis', () => ({
  google: {
    auth: {
      OAuth2: class {
        setCredentials = drive.setCredentials;
      },
    },
    drive: vi.fn(() => ({ files: drive.files, permissions: drive.permissions })),
  },
}));

vi.mock('@/lib/logger', () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

const auth: GoogleAuthContext = {
  accessToken: 'test-access-token',
  expiresAt: 0,
  source: 'interactive',
};

describe('google-drive', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('createDriveFile', () => {
    it('uploads into the given folder and returns the created file', async () => {
      const body = Readable.from([Buffer.from('hello')]);
      drive.files.create.mockResolvedValue({
        data: {
          id: 'file-1',
          name: 'hello.txt',
          mimeType: 'text/plain',
          size: '5',
          webViewLink: 'https://drive.google.com/file/d/file-1/view',
        },
      });

      const created = await createDriveFile({
        auth,
        body,
        fileName: 'hello.txt',
        mimeType: 'text/plain',
        folderId: 'folder-123',
      });

      expect(drive.setCredentials).toHaveBeenCalledWith({ access_token: 'test-access-token' });
      expect(drive.files.create).toHaveBeenCalledWith(
        {
          requestBody: { name: 'hello.txt', parents: ['folder-123'], mimeType: 'text/plain' },
          media: { mimeType: 'text/plain', body },
          fields: 'id, name, mimeType, size, webViewLink',
        },
        { signal: undefined }
      );
      expect(created).toEqual({
        id: 'file-1',
        name: 'hello.txt',
        mimeType: 'text/plain',
        size: 5,
        webViewLink: 'https://drive.google.com/file/d/file-1/view',
      });
    });

    it('uses the root folder when none is configured', async () => {
      drive.files.create.mockResolvedValue({ data: { id: 'file-1', name: 'a.bin' } });

      await createDriveFile({ auth, body: Readable.from([]), fileName: 'a.bin' });

      expect(drive.files.create.mock.calls[0][0].requestBody).toEqual({
        name: 'a.bin',
        parents: ['root'],
      });
    });

    it('wraps API failures with the HTTP status', async () => {
      const apiError = Object.assign(new Error('Insufficient permissions'), { status: 403 });
      drive.files.create.mockRejectedValue(apiError);

      await expect(
        createDriveFile({ auth, body: Readable.from([]), fileName: 'a.bin' })
      ).rejects.toMatchObject({
        message: 'Failed to create Drive file',
        cause: apiError,
        details: { fileName: 'a.bin', parent: 'root', statusCode: 403 },
      });
    });
  });

  describe('shareDriveFile', () => {
    it('grants anyone-with-link read access and returns the view link', async () => {
      drive.permissions.create.mockResolvedValue({ data: { id: 'anyoneWithLink' } });
      drive.files.get.mockResolvedValue({
        data: { id: 'file-1', webViewLink: 'https://drive.google.com/file/d/file-1/view' },
      });

      const link = await shareDriveFile({ auth, fileId: 'file-1' });

      expect(link).toBe('https://drive.google.com/file/d/file-1/view');
      expect(drive.permissions.create).toHaveBeenCalledWith(
        { fileId: 'file-1', requestBody: { role: 'reader', type: 'anyone' }, fields: 'id' },
        { signal: undefined }
      );
    });

    it('fails when Drive returns no link', async () => {
      drive.permissions.create.mockResolvedValue({ data: {} });
      drive.files.get.mockResolvedValue({ data: { id: 'file-1' } });

      await expect(shareDriveFile({ auth, fileId: 'file-1' })).rejects.toMatchObject({
        message: 'Failed to share Drive file',
        details: { fileId: 'file-1' },
      });
    });
  });

  describe('statusCodeOf', () => {
    it('reads the status from the places gaxios puts it', () => {
      expect(statusCodeOf({ status: 404 })).toBe(404);
      expect(statusCodeOf({ code: 429 })).toBe(429);
      expect(statusCodeOf({ response: { status: 500 } })).toBe(500);
      expect(statusCodeOf(new Error('plain'))).toBeUndefined();
    });
  });
});
