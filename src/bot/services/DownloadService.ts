import { Telegram } from 'telegraf';
import { ContentAnalyzer } from '../../download/core/ContentAnalyzer';
import { classifyExtractionError } from '../../download/core/ErrorClassifier';
import { PlatformClassifier } from '../../download/core/PlatformClassifier';
import { ExtractionEngine, ExtractionMetadata, MediaFormat, PlatformMatch } from '../../download/core/types';
import { QualityManager } from '../../download/quality/QualityManager';
import { PolicyGate, RateLimiter } from '../../download/security';
import { HistoryStore } from '../../database/HistoryStore';
import { DownloadQueue } from '../../queue/DownloadQueue';
import { AdmissionRejection, PolicyRejection } from '../../queue/types';
import { describeError, logError, logger } from '../../utils/logger';
import { ChatTarget, IncomingMessage } from '../types';
import { ERROR_MESSAGES } from './TelegramNotifier';

export interface DownloadServiceOptions {
  defaultQuality: string;
  rateLimitWindowSeconds: number;
}

/**
 * What /info and /formats need to look at a link without downloading it.
 * The rate limiter and policy gate are the queue's own instances.
 */
export interface MediaInspection {
  engine: ExtractionEngine;
  analyzer: ContentAnalyzer;
  policyGate: PolicyGate;
  rateLimiter: RateLimiter;
}

const HISTORY_PAGE_SIZE = 10;
const MAX_FORMATS_LISTED = 10;

/**
 * DownloadService - Telegram command surface over the download queue
 */
export class DownloadService {
  private telegram: Telegram;
  private queue: DownloadQueue<ChatTarget>;
  private history: HistoryStore;
  private classifier: PlatformClassifier;
  private quality: QualityManager;
  private inspection: MediaInspection;
  private options: DownloadServiceOptions;

  constructor(
    telegram: Telegram,
    queue: DownloadQueue<ChatTarget>,
    history: HistoryStore,
    classifier: PlatformClassifier,
    quality: QualityManager,
    inspection: MediaInspection,
    options: DownloadServiceOptions,
  ) {
    this.telegram = telegram;
    this.queue = queue;
    this.history = history;
    this.classifier = classifier;
    this.quality = quality;
    this.inspection = inspection;
    this.options = options;
  }

  /**
   * /download <url> [quality]
   */
  public async handleDownloadCommand(msg: IncomingMessage, args: string): Promise<void> {
    const parts = args.trim().split(/\s+/).filter(Boolean);
    const url: string | undefined = parts[0];
    const quality: string | undefined = parts[1];
    if (!url) {
      await this.reply(msg.chatId, 'Usage: /download <url> [quality]');
      return;
    }
    await this.submit(msg, url, quality);
  }

  /**
   * Plain messages: the first link in the text is downloaded with the user's preference
   */
  public async handleMessage(msg: IncomingMessage): Promise<void> {
    const url = this.classifier.extractUrl(msg.text);
    if (!url) return;
    await this.submit(msg, url);
  }

  public async handleStatus(msg: IncomingMessage): Promise<void> {
    const { pendingCount, activeCount } = await this.queue.status();
    await this.reply(
      msg.chatId,
      `📊 Queue status\nWaiting: ${pendingCount}\nDownloading: ${activeCount}`,
    );
  }

  public async handlePosition(msg: IncomingMessage): Promise<void> {
    const position = await this.queue.positionOf(msg.userId);
    await this.reply(
      msg.chatId,
      position === null
        ? 'You have no downloads waiting in the queue.'
        : `📋 Your next download is at position ${position}.`,
    );
  }

  public async handleCancel(msg: IncomingMessage): Promise<void> {
    const count = await this.queue.cancelAllForUser(msg.userId);
    await this.reply(
      msg.chatId,
      count === 0
        ? 'You have no downloads waiting in the queue.'
        : `🗑️ Cancelled ${count} queued download(s).`,
    );
  }

  /**
   * /quality shows the current preference, /quality <value> changes it
   */
  public async handleQuality(msg: IncomingMessage, args: string): Promise<void> {
    const value = args.trim();
    if (!value) {
      const current = (await this.history.getPreferredQuality(msg.userId)) ?? this.options.defaultQuality;
      await this.reply(
        msg.chatId,
        `🎚️ Current quality: ${current}\nAvailable: ${this.quality.list().join(', ')}`,
      );
      return;
    }

    if (!this.quality.isValid(value)) {
      await this.reply(msg.chatId, `❓ Unknown quality "${value}". Available: ${this.quality.list().join(', ')}`);
      return;
    }

    try {
      await this.history.setPreferredQuality(msg.userId, msg.displayName, value);
      await this.reply(msg.chatId, `✅ Quality set to ${value}.`);
    } catch (error: unknown) {
      logError(error, { userId: msg.userId, command: 'quality' });
      await this.reply(msg.chatId, '❌ Could not save your preference. Please try again later.');
    }
  }

  public async handleHistory(msg: IncomingMessage): Promise<void> {
    const entries = await this.history.getUserDownloads(msg.userId, HISTORY_PAGE_SIZE);
    if (entries.length === 0) {
      await this.reply(msg.chatId, 'You have no downloads yet.');
      return;
    }

    const lines = entries.map(
      (e) => `${e.success ? '✅' : '❌'} ${e.title || e.url} (${e.platform})`,
    );
    await this.reply(msg.chatId, `🕘 Recent downloads\n${lines.join('\n')}`);
  }

  public async handleStats(msg: IncomingMessage): Promise<void> {
    const stats = await this.history.getDownloadStats();
    const top = stats.topPlatforms.map((p) => `• ${p.platform}: ${p.count}`).join('\n');
    await this.reply(
      msg.chatId,
      [
        '📈 Download statistics',
        `Total: ${stats.totalDownloads}`,
        `Successful: ${stats.successfulDownloads}`,
        `Failed: ${stats.failedDownloads}`,
        `Success rate: ${stats.successRate}%`,
        ...(top ? ['Top platforms:', top] : []),
      ].join('\n'),
    );
  }

  public async handlePlatforms(msg: IncomingMessage): Promise<void> {
    const platforms = this.classifier.list();
    const video = platforms.filter((p) => p.hint !== 'image').map((p) => p.label);
    const image = platforms.filter((p) => p.hint !== 'video').map((p) => p.label);
    await this.reply(
      msg.chatId,
      `🎬 Video: ${video.join(', ')}\n🖼️ Images: ${image.join(', ')}`,
    );
  }

  /**
   * /info <url>: title, uploader, duration and detected type, without downloading
   */
  public async handleInfo(msg: IncomingMessage, args: string): Promise<void> {
    const probed = await this.probe(msg, args, 'info');
    if (!probed) return;

    const { match, metadata } = probed;
    const analysis = this.inspection.analyzer.analyze(metadata, match.platform);
    const lines = [
      'ℹ️ Media information',
      `Platform: ${match.label}`,
      `Title: ${metadata.title ?? 'Unknown'}`,
      `Type: ${analysis.contentType}`,
    ];
    if (metadata.duration) lines.push(`Duration: ${formatDuration(metadata.duration)}`);
    if (metadata.uploader) lines.push(`Uploader: ${metadata.uploader}`);
    await this.reply(msg.chatId, lines.join('\n'));
  }

  /**
   * /formats <url>: the first formats the site offers
   */
  public async handleFormats(msg: IncomingMessage, args: string): Promise<void> {
    const probed = await this.probe(msg, args, 'formats');
    if (!probed) return;

    const formats = (probed.metadata.formats ?? []).filter((f) => f.ext);
    if (formats.length === 0) {
      await this.reply(msg.chatId, '❌ No format information is available for this link.');
      return;
    }

    const lines = formats
      .slice(0, MAX_FORMATS_LISTED)
      .map((f) => `• ${f.formatId} - ${f.ext} ${describeResolution(f)}`);
    if (formats.length > MAX_FORMATS_LISTED) {
      lines.push(`…and ${formats.length - MAX_FORMATS_LISTED} more`);
    }
    await this.reply(msg.chatId, `🎞️ Available formats (${probed.match.label})\n${lines.join('\n')}`);
  }

  public async handleHelp(msg: IncomingMessage): Promise<void> {
    await this.reply(
      msg.chatId,
      [
        'Send me a link and I will send the media back.',
        '',
        '/download <url> [quality] - download a link',
        '/status - queue status',
        '/position - your place in the queue',
        '/cancel - cancel your queued downloads',
        '/quality [value] - show or set your preferred quality',
        '/qualities - list quality options',
        '/info <url> - media details without downloading',
        '/formats <url> - formats a link offers',
        '/history - your recent downloads',
        '/stats - download statistics',
        '/platforms - supported sites',
      ].join('\n'),
    );
  }

  private async submit(msg: IncomingMessage, url: string, quality?: string): Promise<void> {
    const status = await this.telegram.sendMessage(msg.chatId, '⏳ Checking link...');
    const result = await this.queue.enqueue({
      requesterId: msg.userId,
      requesterDisplayName: msg.displayName,
      url,
      qualityOverride: quality,
      notifyTarget: { chatId: msg.chatId, statusMessageId: status.message_id },
    });

    if (result.status === 'rejected') {
      await this.telegram.editMessageText(
        msg.chatId,
        status.message_id,
        undefined,
        this.rejectionText(result.error),
      );
      return;
    }

    // The queue reports the position on the status message itself
    logger.info('Download accepted', {
      userId: msg.userId,
      platform: result.platform,
      position: result.position,
    });
  }

  /**
   * Rate limit, URL policy and content policy, then a metadata-only engine call.
   * Replies itself and returns null when the lookup cannot go ahead.
   */
  private async probe(
    msg: IncomingMessage,
    args: string,
    command: 'info' | 'formats',
  ): Promise<{ match: PlatformMatch; metadata: ExtractionMetadata } | null> {
    const url = args.trim().split(/\s+/)[0];
    if (!url) {
      await this.reply(msg.chatId, `Usage: /${command} <url>`);
      return null;
    }

    const { rateLimiter, policyGate, engine } = this.inspection;
    if (!rateLimiter.check(msg.userId)) {
      await this.reply(msg.chatId, this.rejectionText({ kind: 'admission_rejected', reason: 'rate_limited' }));
      return null;
    }
    const verdict = policyGate.validate(url);
    if (!verdict.allowed) {
      await this.reply(msg.chatId, this.rejectionText({ kind: 'policy_rejected', reason: verdict.reason }));
      return null;
    }
    rateLimiter.record(msg.userId);

    let metadata: ExtractionMetadata;
    try {
      metadata = await engine.extract(url);
    } catch (error: unknown) {
      const message = describeError(error);
      logger.warn('Metadata lookup failed', { userId: msg.userId, command, error: message });
      await this.reply(msg.chatId, ERROR_MESSAGES[classifyExtractionError(message)]);
      return null;
    }

    const content = policyGate.checkContent(metadata);
    if (!content.allowed) {
      await this.reply(msg.chatId, this.rejectionText({ kind: 'policy_rejected', reason: 'policy_violation' }));
      return null;
    }
    return { match: verdict.platform, metadata };
  }

  private rejectionText(error: AdmissionRejection | PolicyRejection): string {
    switch (error.reason) {
      case 'rate_limited':
        return `⏳ Too many requests. Try again in ${this.options.rateLimitWindowSeconds} seconds or less.`;
      case 'queue_full':
        return '🚦 The download queue is full. Please try again later.';
      case 'invalid_quality':
        return `❓ Unknown quality. Available: ${this.quality.list().join(', ')}`;
      case 'unsupported_platform':
        return '🌐 This site is not supported. Send /platforms for the list.';
      case 'blocked_domain':
        return '🚫 Links from this site are not allowed.';
      case 'private_content':
        return '🔒 This looks like private content, which cannot be downloaded.';
      case 'policy_violation':
        return '🚫 This content is not allowed by the content policy.';
    }
  }

  private async reply(chatId: number, text: string): Promise<void> {
    await this.telegram.sendMessage(chatId, text);
  }
}

export function formatDuration(seconds: number): string {
  const total = Math.round(seconds);
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = String(total % 60).padStart(2, '0');
  return hours > 0 ? `${hours}:${String(minutes).padStart(2, '0')}:${secs}` : `${minutes}:${secs}`;
}

function describeResolution(format: MediaFormat): string {
  if (format.width && format.height) return `${format.width}x${format.height}`;
  if (format.height) return `${format.height}p`;
  if (format.vcodec === 'none') return 'audio only';
  return 'N/A';
}
