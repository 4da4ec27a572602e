import { Readable } from 'stream';
import { Telegraf, type Context, type Telegram } from 'telegraf';
import { message } from 'telegraf/filters';
import type { Message } from 'telegraf/types';
import { createLogger } from '@/lib/logger';
import { ExtendedError } from '@/lib/errors';
import { withErrorHandler } from '@/lib/error-handler';
import { createSerialQueue } from '@/lib/serial-queue';
import type { AppContext } from '@/lib/app-context';
import type { ChatSession, ReplyOptions } from '@/types/chat';
import { extractAttachment } from './attachments';
import {
  handleFile,
  handleHelp,
  handleMyFiles,
  handleStart,
  singleMessageSession,
} from './handlers';
import { describeError } from './messages';

const logger = createLogger('telegram');

interface MessageExtra {
  parse_mode?: 'Markdown' | 'HTML';
  link_preview_options?: { is_disabled: boolean };
}

export function toMessageExtra(options?: ReplyOptions): MessageExtra {
  const extra: MessageExtra = {};
  if (options?.format === 'markdown') extra.parse_mode = 'Markdown';
  if (options?.format === 'html') extra.parse_mode = 'HTML';
  if (options?.disableLinkPreview) extra.link_preview_options = { is_disabled: true };
  return extra;
}

function toChatSession(ctx: Context): ChatSession {
  return {
    userId: ctx.from?.id,
    firstName: ctx.from?.first_name,
    async reply(text, options) {
      const sent = await ctx.reply(text, toMessageExtra(options));
      return {
        async edit(newText, editOptions) {
          await ctx.telegram.editMessageText(
            sent.chat.id,
            sent.message_id,
            undefined,
            newText,
            toMessageExtra(editOptions)
          );
        },
      };
    },
  };
}

/**
 * Stream a file from Telegram's file endpoint
 */
async function downloadTelegramFile(
  telegram: Telegram,
  fileId: string,
  signal: AbortSignal
): Promise<Readable> {
  const link = await telegram.getFileLink(fileId);
  const response = await fetch(link, { signal });

  if (!response.ok || !response.body) {
    throw new ExtendedError({
      message: 'Telegram file download failed',
      details: { fileId, statusCode: response.status },
    });
  }

  return Readable.fromWeb(response.body);
}

export function createBot(token: string, app: AppContext): Telegraf {
  const bot = new Telegraf(token, {
    // Updates wait in the queue behind running uploads, which have their own timeout
    handlerTimeout: Infinity,
  });

  // One update at a time: the credential file and the ledger have a single writer
  const enqueue = createSerialQueue();
  bot.use((ctx, next) => enqueue(() => next()));

  const start = withErrorHandler('start', handleStart, describeError);
  const help = withErrorHandler('help', handleHelp, describeError);
  const myFiles = withErrorHandler('myfiles', handleMyFiles, describeError);
  const file = withErrorHandler('file', handleFile, describeError);

  bot.start(ctx => start({ chat: toChatSession(ctx), app }));
  bot.help(ctx => help({ chat: toChatSession(ctx), app }));
  bot.command('myfiles', ctx => myFiles({ chat: toChatSession(ctx), app }));

  const onFileMessage = async (ctx: Context, incoming: Message): Promise<void> => {
    const attachment = extractAttachment(incoming, (fileId, signal) =>
      downloadTelegramFile(ctx.telegram, fileId, signal)
    );
    if (!attachment) return;

    await file({
      chat: singleMessageSession(toChatSession(ctx)),
      app,
      attachment,
    });
  };

  bot.on(message('document'), ctx => onFileMessage(ctx, ctx.message));
  bot.on(message('photo'), ctx => onFileMessage(ctx, ctx.message));
  bot.on(message('video'), ctx => onFileMessage(ctx, ctx.message));
  bot.on(message('audio'), ctx => onFileMessage(ctx, ctx.message));
  bot.on(message('voice'), ctx => onFileMessage(ctx, ctx.message));

  bot.catch((error, ctx) => {
    logger.error('Unhandled error while processing update', error, {
      updateId: ctx.update.update_id,
    });
  });

  return bot;
}
