import { Context, Telegraf } from 'telegraf';
import { message } from 'telegraf/filters';
import { logError, logger } from '../utils/logger';
import { DownloadService } from './services/DownloadService';
import { IncomingMessage } from './types';

type TextHandler = (msg: IncomingMessage, args: string) => Promise<void>;

/**
 * Wire bot commands and plain text messages to the DownloadService
 */
export function registerHandlers(bot: Telegraf, downloadService: DownloadService): void {
  const commands: Record<string, TextHandler> = {
    download: (msg, args) => downloadService.handleDownloadCommand(msg, args),
    dl: (msg, args) => downloadService.handleDownloadCommand(msg, args),
    get: (msg, args) => downloadService.handleDownloadCommand(msg, args),
    status: (msg) => downloadService.handleStatus(msg),
    position: (msg) => downloadService.handlePosition(msg),
    cancel: (msg) => downloadService.handleCancel(msg),
    quality: (msg, args) => downloadService.handleQuality(msg, args),
    qualities: (msg) => downloadService.handleQuality(msg, ''),
    info: (msg, args) => downloadService.handleInfo(msg, args),
    formats: (msg, args) => downloadService.handleFormats(msg, args),
    history: (msg) => downloadService.handleHistory(msg),
    stats: (msg) => downloadService.handleStats(msg),
    platforms: (msg) => downloadService.handlePlatforms(msg),
    help: (msg) => downloadService.handleHelp(msg),
    start: (msg) => downloadService.handleHelp(msg),
  };

  for (const [name, handler] of Object.entries(commands)) {
    bot.command(name, async (ctx) => {
      const msg = toIncomingMessage(ctx.chat.id, ctx.from, ctx.message.text);
      await handler(msg, ctx.payload);
    });
  }

  bot.on(message('text'), async (ctx) => {
    if (ctx.message.text.startsWith('/')) return; // Unknown commands
    const msg = toIncomingMessage(ctx.chat.id, ctx.from, ctx.message.text);
    await downloadService.handleMessage(msg);
  });

  bot.catch((error: unknown, ctx: Context) => {
    logError(error, { updateId: ctx.update.update_id });
  });

  logger.info('✅ Bot handlers registered', { commands: Object.keys(commands).length });
}

export function toIncomingMessage(
  chatId: number,
  from: { id: number; first_name: string; username?: string },
  text: string,
): IncomingMessage {
  return {
    chatId,
    userId: from.id,
    displayName: from.username ?? from.first_name,
    text,
  };
}
