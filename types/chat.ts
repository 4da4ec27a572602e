import type { Readable } from 'stream';

export interface ReplyOptions {
  format?: 'markdown' | 'html';
  disableLinkPreview?: boolean;
}

/**
 * A message the bot already sent and may rewrite in place
 */
export interface StatusMessage {
  edit(text: string, options?: ReplyOptions): Promise<void>;
}

/**
 * The part of an incoming chat update the handlers work with
 */
export interface ChatSession {
  readonly userId?: number;
  readonly firstName?: string;
  reply(text: string, options?: ReplyOptions): Promise<StatusMessage>;
}

export type AttachmentKind = 'document' | 'photo' | 'video' | 'audio' | 'voice';

export interface IncomingAttachment {
  kind: AttachmentKind;
  fileId: string;
  fileName: string;
  mimeType?: string;
  declaredSize?: number;
  download: (signal: AbortSignal) => Promise<Readable>;
}
