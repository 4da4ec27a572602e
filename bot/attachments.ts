import type { Readable } from 'stream';
import type { Message } from 'telegraf/types';
import type { IncomingAttachment } from '@/types/chat';

export type FileDownloader = (fileId: string, signal: AbortSignal) => Promise<Readable>;

/**
 * Pull the uploadable file out of a chat message. Telegram strips names from
 * photos, voice notes and most videos, so those get a name built from the
 * file's unique id. Returns null for messages that carry no file.
 */
export function extractAttachment(
  message: Message,
  download: FileDownloader
): IncomingAttachment | null {
  if ('document' in message) {
    const { document } = message;
    return {
      kind: 'document',
      fileId: document.file_id,
      fileName: document.file_name || `telegram_doc_${document.file_unique_id}`,
      mimeType: document.mime_type,
      declaredSize: document.file_size,
      download: signal => download(document.file_id, signal),
    };
  }

  if ('photo' in message) {
    // Sizes come smallest first
    const photo = message.photo.at(-1);
    if (!photo) return null;
    return {
      kind: 'photo',
      fileId: photo.file_id,
      fileName: `telegram_photo_${photo.file_unique_id}.jpg`,
      mimeType: 'image/jpeg',
      declaredSize: photo.file_size,
      download: signal => download(photo.file_id, signal),
    };
  }

  if ('video' in message) {
    const { video } = message;
    return {
      kind: 'video',
      fileId: video.file_id,
      fileName: video.file_name || `telegram_video_${video.file_unique_id}.mp4`,
      mimeType: video.mime_type,
      declaredSize: video.file_size,
      download: signal => download(video.file_id, signal),
    };
  }

  if ('audio' in message) {
    const { audio } = message;
    return {
      kind: 'audio',
      fileId: audio.file_id,
      fileName: audio.file_name || `telegram_audio_${audio.file_unique_id}.mp3`,
      mimeType: audio.mime_type,
      declaredSize: audio.file_size,
      download: signal => download(audio.file_id, signal),
    };
  }

  if ('voice' in message) {
    const { voice } = message;
    return {
      kind: 'voice',
      fileId: voice.file_id,
      fileName: `telegram_voice_${voice.file_unique_id}.ogg`,
      mimeType: voice.mime_type ?? 'audio/ogg',
      declaredSize: voice.file_size,
      download: signal => download(voice.file_id, signal),
    };
  }

  return null;
}
