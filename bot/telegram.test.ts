import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Message, Update } from 'telegraf/types';
import { createBot, toMessageExtra } from './telegram';
import type { CommandInput, FileInput } from './handlers';
import { CredentialStore } from '@/lib/credential-store';
import { UploadPipeline } from '@/lib/upload-pipeline';
import { UploadLedger, createMemoryRecordStore } from '@/lib/uploads-db';
import type { AppContext } from '@/lib/app-context';

const handlers = vi.hoisted(() => ({
  handleStart: vi.fn<(input: CommandInput) => Promise<void>>(),
  handleHelp: vi.fn<(input: CommandInput) => Promise<void>>(),
  handleMyFiles: vi.fn<(input: CommandInput) => Promise<void>>(),
  handleFile: vi.fn<(input: FileInput) => Promise<void>>(),
}));

vi.mock('./handlers', async importOriginal => ({
  ...(await importOriginal<typeof import('./handlers')>()),
  ...handlers,
}));

vi.mock('@/lib/logger', () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

const chat = { id: 42, type: 'private' as const, first_name: 'Ada' };
const from = { id: 42, is_bot: false, first_name: 'Ada' };

const documentMessage: Update.MessageUpdate<Message.DocumentMessage>['message'] = {
  message_id: 10,
  date: 1_700_000_000,
  chat,
  from,
  document: {
    file_id: 'doc-file-id',
    file_unique_id: 'doc-unique',
    file_name: 'report.pdf',
    mime_type: 'application/pdf',
    file_size: 2048,
  },
};

function textMessage(text: string, isCommand: boolean): Update.MessageUpdate<Message.TextMessage>['message'] {
  return {
    message_id: 11,
    date: 1_700_000_001,
    chat,
    from,
    text,
    entities: isCommand ? [{ type: 'bot_command', offset: 0, length: text.length }] : [],
  };
}

function update(updateId: number, message: Update.MessageUpdate['message']): Update.MessageUpdate {
  return { update_id: updateId, message };
}

function buildApp(): AppContext {
  return {
    maxFileSizeMb: 100,
    credentials: new CredentialStore({
      tokenFile: path.join(os.tmpdir(), 'telegram-test-unused-token.json'),
      provider: { kind: 'pre-provisioned', provision: vi.fn(), refresh: vi.fn() },
    }),
    pipeline: new UploadPipeline({
      credentials: { acquire: vi.fn() },
      maxBytes: 100 * 1024 * 1024,
      timeoutMs: 60_000,
      drive: { createFile: vi.fn(), shareWithLink: vi.fn() },
    }),
    ledger: new UploadLedger(createMemoryRecordStore()),
  };
}

// Known up front so handling an update never calls getMe
const botInfo = {
  id: 1,
  is_bot: true as const,
  first_name: 'Drop',
  username: 'drop_test_bot',
  can_join_groups: false,
  can_read_all_group_messages: false,
  supports_inline_queries: false,
  can_connect_to_business: false,
  has_main_web_app: false,
};

function startBot(app: AppContext) {
  const bot = createBot('test-token', app);
  bot.botInfo = botInfo;
  return bot;
}

describe('toMessageExtra', () => {
  it('maps reply options onto Bot API parameters', () => {
    expect(toMessageExtra()).toEqual({});
    expect(toMessageExtra({ format: 'markdown' })).toEqual({ parse_mode: 'Markdown' });
    expect(toMessageExtra({ format: 'html', disableLinkPreview: true })).toEqual({
      parse_mode: 'HTML',
      link_preview_options: { is_disabled: true },
    });
  });
});

describe('createBot', () => {
  beforeEach(() => {
    for (const handler of Object.values(handlers)) {
      handler.mockReset();
      handler.mockResolvedValue(undefined);
    }
  });

  it('routes a document message to the file handler', async () => {
    const app = buildApp();
    const bot = startBot(app);

    await bot.handleUpdate(update(1, documentMessage));

    expect(handlers.handleFile).toHaveBeenCalledTimes(1);
    expect(handlers.handleFile).toHaveBeenCalledWith(
      expect.objectContaining({
        app,
        attachment: expect.objectContaining({
          kind: 'document',
          fileId: 'doc-file-id',
          fileName: 'report.pdf',
          declaredSize: 2048,
        }),
      })
    );
    expect(handlers.handleHelp).not.toHaveBeenCalled();
  });

  it('routes commands to their handlers and ignores plain text', async () => {
    const bot = startBot(buildApp());

    await bot.handleUpdate(update(1, textMessage('/help', true)));
    await bot.handleUpdate(update(2, textMessage('/myfiles', true)));
    await bot.handleUpdate(update(3, textMessage('hello', false)));

    expect(handlers.handleHelp).toHaveBeenCalledTimes(1);
    expect(handlers.handleMyFiles).toHaveBeenCalledTimes(1);
    expect(handlers.handleFile).not.toHaveBeenCalled();
    expect(handlers.handleStart).not.toHaveBeenCalled();
  });

  it('holds later updates until the running one finishes', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>(resolve => {
      release = resolve;
    });
    handlers.handleFile.mockImplementationOnce(() => gate);
    const bot = startBot(buildApp());

    const fileUpdate = bot.handleUpdate(update(1, documentMessage));
    const helpUpdate = bot.handleUpdate(update(2, textMessage('/help', true)));

    await vi.waitFor(() => expect(handlers.handleFile).toHaveBeenCalledTimes(1));
    await new Promise(resolve => setTimeout(resolve, 10));
    expect(handlers.handleHelp).not.toHaveBeenCalled();

    release();
    await Promise.all([fileUpdate, helpUpdate]);

    expect(handlers.handleHelp).toHaveBeenCalledTimes(1);
  });
});
