import { isAuthenticationError } from './errors';
import { createLogger } from './logger';
import type { ChatSession, ReplyOptions } from '@/types/chat';

const logger = createLogger('error-handler');

export interface ChatReply {
  text: string;
  options?: ReplyOptions;
}

export type ChatHandler<TInput> = (input: TInput) => Promise<void>;

/**
 * Error boundary for chat handlers
 *
 * Catches anything the handler throws, logs it with full context and answers
 * the user with the text `describe` picks. Nothing escapes to the polling loop.
 *
 * Usage:
 * ```ts
 * bot.command('myfiles', adapt(withErrorHandler('myfiles', handleMyFiles, describeError)));
 * ```
 */
export function withErrorHandler<TInput extends { chat: ChatSession }>(
  name: string,
  handler: ChatHandler<TInput>,
  describe: (error: unknown) => ChatReply
): ChatHandler<TInput> {
  return async (input: TInput): Promise<void> => {
    try {
      await handler(input);
    } catch (error) {
      const context = { handler: name, userId: input.chat.userId };

      if (isAuthenticationError(error)) {
        // Operator problem, the chat user only gets a generic notice
        logger.warn(error.message, { ...context, ...error.details });
      } else if (error instanceof Error) {
        logger.error(error.message, error, context);
      } else {
        logger.error('Unknown error occurred', error, context);
      }

      const reply = describe(error);
      try {
        await input.chat.reply(reply.text, reply.options);
      } catch (replyError) {
        logger.error('Failed to deliver error message to chat', replyError, context);
      }
    }
  };
}
