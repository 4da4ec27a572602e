import { pipeline, type Readable } from 'stream';
import { createLogger } from '@/lib/logger';
import {
  ExtendedError,
  FileTooLargeError,
  UploadFailedError,
} from '@/lib/errors';
import { googleDriveGateway } from '@/lib/google-drive';
import { SizeLimitStream } from '@/lib/size-limit';
import type { GoogleAuthContext } from '@/types/auth';
import type { DriveGateway } from '@/types/google-drive';
import type { UploadRequest, UploadResult } from '@/types/uploads';

const logger = createLogger('upload-pipeline');

export interface CredentialSource {
  acquire(): Promise<GoogleAuthContext>;
}

export interface UploadPipelineOptions {
  credentials: CredentialSource;
  maxBytes: number;
  timeoutMs: number;
  defaultFolderId?: string;
  drive?: DriveGateway;
}

function formatMb(bytes: number): string {
  return (bytes / 1024 / 1024).toFixed(2);
}

/**
 * Walk an error and its causes looking for a size violation, which keeps its
 * own type instead of becoming a generic upload failure.
 */
function findTooLarge(...errors: unknown[]): FileTooLargeError | undefined {
  for (let current of errors) {
    while (current) {
      if (current instanceof FileTooLargeError) return current;
      current = current instanceof Error ? current.cause : undefined;
    }
  }
  return undefined;
}

/**
 * Moves one incoming file into Drive and returns its shareable link.
 * Transfers are never retried; a failure is reported once to the caller.
 */
export class UploadPipeline {
  private readonly credentials: CredentialSource;
  private readonly drive: DriveGateway;
  private readonly maxBytes: number;
  private readonly timeoutMs: number;
  private readonly defaultFolderId?: string;

  constructor(options: UploadPipelineOptions) {
    this.credentials = options.credentials;
    this.drive = options.drive ?? googleDriveGateway;
    this.maxBytes = options.maxBytes;
    this.timeoutMs = options.timeoutMs;
    this.defaultFolderId = options.defaultFolderId;
  }

  /**
   * Open the source, giving up when the signal fires even if the opener
   * ignores it. A stream that arrives after that is destroyed.
   */
  private async openSource(request: UploadRequest, signal: AbortSignal): Promise<Readable> {
    try {
      return await new Promise<Readable>((resolve, reject) => {
        if (signal.aborted) {
          reject(signal.reason);
          return;
        }

        const onAbort = () => reject(signal.reason);
        signal.addEventListener('abort', onAbort, { once: true });

        void request.openStream(signal).then(
          source => {
            signal.removeEventListener('abort', onAbort);
            if (signal.aborted) {
              source.destroy();
              return;
            }
            resolve(source);
          },
          (error: unknown) => {
            signal.removeEventListener('abort', onAbort);
            reject(error);
          }
        );
      });
    } catch (error) {
      throw new UploadFailedError({
        stage: 'download',
        fileName: request.fileName,
        cause: error,
      });
    }
  }

  async upload(request: UploadRequest): Promise<UploadResult> {
    const { fileName, mimeType } = request;
    const declaredSize = request.declaredSize ?? 0;

    // Checked before credentials or bytes are touched
    if (declaredSize > this.maxBytes) {
      logger.info('Rejected file above size limit', {
        fileName,
        sizeMb: formatMb(declaredSize),
        maxMb: formatMb(this.maxBytes),
        uploaderId: request.uploaderId,
      });
      throw new FileTooLargeError({
        fileName,
        size: declaredSize,
        maxBytes: this.maxBytes,
      });
    }

    const auth = await this.credentials.acquire();
    const folderId = request.destinationFolderId ?? this.defaultFolderId;

    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(
        new ExtendedError({
          message: `Transfer timed out after ${this.timeoutMs} ms`,
          details: { fileName },
        })
      );
    }, this.timeoutMs);

    const limiter = new SizeLimitStream(fileName, this.maxBytes);
    let streamError: unknown;

    try {
      await request.onStage?.('downloading');
      const source = await this.openSource(request, controller.signal);

      // Stream failures abort the Drive request, which does not always
      // notice an errored body on its own
      pipeline(source, limiter, error => {
        if (error && !controller.signal.aborted) {
          streamError = error;
          controller.abort(error);
        }
      });

      await request.onStage?.('uploading');
      logger.info('Uploading file to Drive', {
        fileName,
        declaredSize,
        folderId: folderId ?? 'root',
      });

      const created = await this.drive
        .createFile({
          auth,
          body: limiter,
          fileName,
          mimeType,
          folderId,
          signal: controller.signal,
        })
        .catch((error: unknown) => {
          const tooLarge = findTooLarge(streamError, error);
          if (tooLarge) throw tooLarge;
          throw new UploadFailedError({
            stage: 'upload',
            fileName,
            cause: streamError ?? error,
          });
        });

      const shareableLink = await this.drive
        .shareWithLink({ auth, fileId: created.id, signal: controller.signal })
        .catch((error: unknown) => {
          logger.warn('File uploaded but could not be shared', {
            fileId: created.id,
            fileName: created.name,
          });
          throw new UploadFailedError({
            stage: 'share',
            fileName,
            fileId: created.id,
            cause: error,
          });
        });

      const result: UploadResult = {
        fileName: created.name,
        fileId: created.id,
        shareableLink,
        size: created.size ?? limiter.bytesSeen,
        mimeType: created.mimeType ?? mimeType,
      };

      logger.info('File uploaded and shared', {
        fileId: result.fileId,
        fileName: result.fileName,
        size: result.size,
      });

      return result;
    } finally {
      clearTimeout(timer);
      if (!limiter.destroyed) {
        limiter.destroy();
      }
    }
  }
}
