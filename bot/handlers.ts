import { createLogger } from '@/lib/logger';
import { LedgerWriteFailedError } from '@/lib/errors';
import type { AppContext } from '@/lib/app-context';
import type {
  ChatSession,
  IncomingAttachment,
  ReplyOptions,
  StatusMessage,
} from '@/types/chat';
import {
  EMPTY_LEDGER_TEXT,
  fileListMarkdown,
  fileListPlain,
  greetingText,
  helpText,
  stageText,
  uploadSuccessText,
} from './messages';

const logger = createLogger('bot');

export interface CommandInput {
  chat: ChatSession;
  app: AppContext;
}

export interface FileInput extends CommandInput {
  attachment: IncomingAttachment;
}

/**
 * Session whose first reply is sent and every later reply rewrites that same
 * message, so a transfer shows up as one status line. If an edit is refused
 * a fresh message is sent instead.
 */
export function singleMessageSession(chat: ChatSession): ChatSession {
  let status: StatusMessage | undefined;

  return {
    userId: chat.userId,
    firstName: chat.firstName,
    async reply(text: string, options?: ReplyOptions): Promise<StatusMessage> {
      if (status) {
        try {
          await status.edit(text, options);
          return status;
        } catch (error) {
          logger.warn('Could not edit status message, sending a new one', {
            userId: chat.userId,
            error: error instanceof Error ? error.message : String(error),
          });
        }
      }
      status = await chat.reply(text, options);
      return status;
    },
  };
}

export async function handleStart({ chat, app }: CommandInput): Promise<void> {
  logger.info('Start command', { userId: chat.userId });
  await chat.reply(greetingText(chat.firstName, chat.userId), { format: 'html' });
  await chat.reply(helpText(app.maxFileSizeMb), { format: 'markdown' });
}

export async function handleHelp({ chat, app }: CommandInput): Promise<void> {
  await chat.reply(helpText(app.maxFileSizeMb), { format: 'markdown' });
}

/**
 * List the most recent uploads. Falls back to plain text when Telegram
 * rejects the Markdown rendering.
 */
export async function handleMyFiles({ chat, app }: CommandInput): Promise<void> {
  const records = await app.ledger.listAll();
  logger.info('Listing uploaded files', {
    userId: chat.userId,
    recordCount: records.length,
  });

  if (records.length === 0) {
    await chat.reply(EMPTY_LEDGER_TEXT);
    return;
  }

  try {
    await chat.reply(fileListMarkdown(records), {
      format: 'markdown',
      disableLinkPreview: true,
    });
  } catch (error) {
    logger.warn('Markdown file list rejected, sending plain text', {
      userId: chat.userId,
      error: error instanceof Error ? error.message : String(error),
    });
    await chat.reply(fileListPlain(records), { disableLinkPreview: true });
  }
}

export async function handleFile({ chat, app, attachment }: FileInput): Promise<void> {
  logger.info('Received file', {
    userId: chat.userId,
    kind: attachment.kind,
    fileName: attachment.fileName,
    declaredSize: attachment.declaredSize,
  });

  const result = await app.pipeline.upload({
    openStream: attachment.download,
    declaredSize: attachment.declaredSize,
    fileName: attachment.fileName,
    mimeType: attachment.mimeType,
    uploaderId: chat.userId,
    onStage: async stage => {
      await chat.reply(stageText(stage, attachment.fileName));
    },
  });

  try {
    await app.ledger.record({
      name: result.fileName,
      id: result.fileId,
      link: result.shareableLink,
      uploadedAt: new Date().toISOString(),
      size: result.size,
      mimeType: result.mimeType,
      uploaderId: chat.userId,
    });
  } catch (error) {
    if (!(error instanceof LedgerWriteFailedError)) throw error;
    // The file is in Drive and shared; only /myfiles misses it
    logger.warn('Upload not recorded in ledger', {
      fileId: result.fileId,
      cause: error.cause instanceof Error ? error.cause.message : String(error.cause),
    });
  }

  await chat.reply(uploadSuccessText(result), { format: 'markdown' });
}
