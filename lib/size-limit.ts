import { Transform, type TransformCallback } from 'stream';
import { FileTooLargeError } from './errors';

/**
 * Pass-through stream that counts bytes and fails once more than `maxBytes`
 * have gone through. Catches senders whose declared size was wrong.
 */
export class SizeLimitStream extends Transform {
  private readonly fileName: string;
  private readonly maxBytes: number;
  private seen = 0;

  constructor(fileName: string, maxBytes: number) {
    super();
    this.fileName = fileName;
    this.maxBytes = maxBytes;
  }

  get bytesSeen(): number {
    return this.seen;
  }

  override _transform(
    chunk: Buffer | string,
    encoding: BufferEncoding,
    callback: TransformCallback
  ): void {
    const size =
      typeof chunk === 'string' ? Buffer.byteLength(chunk, encoding) : chunk.length;
    this.seen += size;

    if (this.seen > this.maxBytes) {
      callback(
        new FileTooLargeError({
          fileName: this.fileName,
          size: this.seen,
          maxBytes: this.maxBytes,
        })
      );
      return;
    }

    callback(null, chunk);
  }
}
