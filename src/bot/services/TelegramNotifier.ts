import path from 'path';
import { Telegram } from 'telegraf';
import { NotifyClassification } from '../../download/core/types';
import { DeliveryNotifier, ProgressUpdate } from '../../queue/types';
import { describeError, logger } from '../../utils/logger';
import { ChatTarget } from '../types';

const VIDEO_EXTENSIONS = new Set(['.mp4', '.mov', '.m4v', '.webm', '.mkv']);
const PHOTO_EXTENSIONS = new Set(['.jpg', '.jpeg', '.png', '.webp']);
const ANIMATION_EXTENSIONS = new Set(['.gif']);

// Telegram rejects captions longer than this
const MAX_CAPTION_LENGTH = 1024;

export const ERROR_MESSAGES: Record<NotifyClassification, string> = {
  private_or_login_required: '🔒 This content is private or needs a login.',
  unsupported_format: '⚠️ No downloadable media was found at this link.',
  rate_limited: '⏳ The site is rate limiting downloads. Try again in a few minutes.',
  content_unavailable: '❌ This content is unavailable or was removed.',
  file_too_large: '📦 The file is larger than the upload limit.',
  generic_extraction_error: '❌ Download failed. Please try again later.',
  policy_violation: '🚫 This content is not allowed by the content policy.',
  delivery_failed: '❌ The file was downloaded but could not be sent.',
};

export function formatProgress(update: ProgressUpdate): string {
  switch (update.stage) {
    case 'queued':
      return `📋 Added to the queue at position ${update.position ?? 1}.`;
    case 'analyzing':
      return '🔍 Analyzing link...';
    case 'downloading':
      return `⬇️ Downloading ${update.contentType ?? 'media'}...`;
    case 'fallback':
      return `🔁 Retrying as ${update.strategy ?? 'another'} download...`;
    case 'uploading':
      return '📤 Uploading...';
  }
}

/**
 * DeliveryNotifier over the Telegram Bot API.
 * Progress edits the request's status message; the result or error replaces it.
 */
export class TelegramNotifier implements DeliveryNotifier<ChatTarget> {
  private telegram: Telegram;

  constructor(telegram: Telegram) {
    this.telegram = telegram;
  }

  async sendProgress(target: ChatTarget, update: ProgressUpdate): Promise<void> {
    if (target.statusMessageId === undefined) return;
    try {
      await this.telegram.editMessageText(
        target.chatId,
        target.statusMessageId,
        undefined,
        formatProgress(update),
      );
    } catch (error: unknown) {
      // "message is not modified" and friends
      logger.debug('Progress edit skipped', { chatId: target.chatId, error: describeError(error) });
    }
  }

  async sendResult(
    target: ChatTarget,
    filePath: string,
    title: string,
    platformLabel: string,
  ): Promise<void> {
    const caption = buildCaption(title, platformLabel);
    const ext = path.extname(filePath).toLowerCase();
    const file = { source: filePath };

    if (VIDEO_EXTENSIONS.has(ext)) {
      await this.telegram.sendVideo(target.chatId, file, { caption, supports_streaming: true });
    } else if (PHOTO_EXTENSIONS.has(ext)) {
      await this.telegram.sendPhoto(target.chatId, file, { caption });
    } else if (ANIMATION_EXTENSIONS.has(ext)) {
      await this.telegram.sendAnimation(target.chatId, file, { caption });
    } else {
      await this.telegram.sendDocument(target.chatId, file, { caption });
    }

    logger.info('📤 File delivered', { chatId: target.chatId, ext });
    await this.removeStatusMessage(target);
  }

  async sendError(
    target: ChatTarget,
    classification: NotifyClassification,
    message: string,
  ): Promise<void> {
    logger.debug('Reporting failure', { chatId: target.chatId, classification, message });
    const text = ERROR_MESSAGES[classification];

    if (target.statusMessageId !== undefined) {
      try {
        await this.telegram.editMessageText(target.chatId, target.statusMessageId, undefined, text);
        return;
      } catch (error: unknown) {
        logger.debug('Status edit failed, sending a new message', { error: describeError(error) });
      }
    }
    await this.telegram.sendMessage(target.chatId, text);
  }

  private async removeStatusMessage(target: ChatTarget): Promise<void> {
    if (target.statusMessageId === undefined) return;
    try {
      await this.telegram.deleteMessage(target.chatId, target.statusMessageId);
    } catch (error: unknown) {
      logger.debug('Status message already gone', { error: describeError(error) });
    }
  }
}

export function buildCaption(title: string, platformLabel: string): string {
  const suffix = `\n📎 ${platformLabel}`;
  const room = MAX_CAPTION_LENGTH - suffix.length;
  if (title.length <= room) return `${title}${suffix}`;

  // Lengths are UTF-16 units; cut on whole code points so no surrogate pair is split
  let trimmed = '';
  for (const char of title) {
    if (trimmed.length + char.length > room - 1) break;
    trimmed += char;
  }
  return `${trimmed}…${suffix}`;
}
