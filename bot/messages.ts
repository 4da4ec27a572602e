import {
  FileTooLargeError,
  UploadFailedError,
  isAuthenticationError,
} from '@/lib/errors';
import type { ChatReply } from '@/lib/error-handler';
import type { UploadRecord, UploadResult, UploadStage } from '@/types/uploads';

// Longer lists run into Telegram's message size limit
export const MAX_FILES_TO_SHOW = 25;

const BYTES_PER_MB = 1024 * 1024;

/**
 * Escape the characters legacy Telegram Markdown treats as entity markers
 */
export function escapeMarkdown(text: string): string {
  return text.replace(/([_*[`])/g, '\\$1');
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export function formatMegabytes(bytes: number): string {
  return (bytes / BYTES_PER_MB).toFixed(2);
}

export function greetingText(firstName: string | undefined, userId: number | undefined): string {
  const name = escapeHtml(firstName || 'there');
  const mention = userId ? `<a href="tg://user?id=${userId}">${name}</a>` : name;
  return `Hi ${mention}! 👋`;
}

export function helpText(maxFileSizeMb: number): string {
  return [
    '🤖 *Welcome to the File to Cloud Bot!*',
    '',
    'I can upload files you send me directly to Google Drive.',
    '',
    '*How to use:*',
    '1. Just send me any file (document, photo, video, audio or voice note).',
    '2. I will upload it to the configured Google Drive folder.',
    "3. I'll send you back a shareable Google Drive link.",
    '',
    '*Commands:*',
    '/start - Start the bot',
    '/help - Show this help message',
    "/myfiles - List files you've uploaded via this bot",
    '',
    `*File Size Limit:* ${maxFileSizeMb} MB per file.`,
  ].join('\n');
}

export const EMPTY_LEDGER_TEXT =
  "You haven't uploaded any files yet using this bot.";

function visibleSlice(records: UploadRecord[]) {
  const startIndex = Math.max(0, records.length - MAX_FILES_TO_SHOW);
  return {
    startIndex,
    shown: records.slice(startIndex),
    truncated: records.length > MAX_FILES_TO_SHOW,
  };
}

/**
 * Newest entries of the ledger as a Markdown list, numbered by their
 * position in the whole history
 */
export function fileListMarkdown(records: UploadRecord[]): string {
  const { startIndex, shown, truncated } = visibleSlice(records);

  let text = '📂 *Your Uploaded Files:*\n\n';
  shown.forEach((record, offset) => {
    const position = startIndex + offset + 1;
    const name = escapeMarkdown(record.name || 'Unknown File');
    text += record.link
      ? `${position}. [${name}](${record.link})\n`
      : `${position}. ${name} (Link unavailable)\n`;
  });

  if (truncated) {
    text += `\n_Showing the latest ${MAX_FILES_TO_SHOW} files._`;
  }
  return text;
}

export function fileListPlain(records: UploadRecord[]): string {
  const { startIndex, shown, truncated } = visibleSlice(records);

  let text = 'Your Uploaded Files:\n\n';
  shown.forEach((record, offset) => {
    const position = startIndex + offset + 1;
    text += `${position}. ${record.name || 'Unknown File'} - Link: ${record.link || 'N/A'}\n`;
  });

  if (truncated) {
    text += `\nShowing the latest ${MAX_FILES_TO_SHOW} files.`;
  }
  return text;
}

export function stageText(stage: UploadStage, fileName: string): string {
  switch (stage) {
    case 'downloading':
      return `📥 Downloading '${fileName}' from Telegram...`;
    case 'uploading':
      return `⏳ Uploading '${fileName}' to Google Drive...`;
  }
}

export function uploadSuccessText(result: UploadResult): string {
  return [
    '✅ *Upload Successful!*',
    '',
    `📄 File: ${escapeMarkdown(result.fileName)}`,
    `🔗 [Open in Google Drive](${result.shareableLink})`,
  ].join('\n');
}

export function fileTooLargeText(error: FileTooLargeError, fileName: string): string {
  return [
    '❌ *File Too Large!*',
    '',
    `The file '${escapeMarkdown(fileName)}' is ${formatMegabytes(error.size)} MB. ` +
      `The maximum allowed size is ${Math.floor(error.maxBytes / BYTES_PER_MB)} MB.`,
  ].join('\n');
}

export const DRIVE_UNAVAILABLE_TEXT =
  '⚠️ Could not connect to Google Drive. Authentication might be needed or configuration is wrong. Please check the bot logs or contact the administrator.';

export const UNEXPECTED_ERROR_TEXT =
  '❌ An unexpected error occurred. Please try again later.';

/**
 * Chat-facing wording for a failure; details stay in the log
 */
export function describeError(error: unknown): ChatReply {
  if (error instanceof FileTooLargeError) {
    const fileName =
      typeof error.details?.fileName === 'string' ? error.details.fileName : 'file';
    return { text: fileTooLargeText(error, fileName), options: { format: 'markdown' } };
  }

  if (isAuthenticationError(error)) {
    return { text: DRIVE_UNAVAILABLE_TEXT };
  }

  if (error instanceof UploadFailedError) {
    switch (error.stage) {
      case 'download':
        return { text: '❌ Error downloading the file from Telegram. Please try again.' };
      case 'upload':
        return { text: '❌ Upload to Google Drive failed. Please try again later.' };
      case 'share':
        return {
          text: '❌ The file reached Google Drive but a shareable link could not be created.',
        };
    }
  }

  return { text: UNEXPECTED_ERROR_TEXT };
}
