import 'dotenv/config';
import { Telegraf } from 'telegraf';
import * as Sentry from '@sentry/node';
import { loadConfig } from './utils/config';
import { describeError, logError, logger } from './utils/logger';
import { FileManager } from './utils/FileManager';
import { HistoryStore } from './database/HistoryStore';
import { MemoryHistoryStore } from './database/MemoryHistoryStore';
import { SupabaseHistoryStore } from './database/SupabaseHistoryStore';
import { PlatformClassifier } from './download/core/PlatformClassifier';
import { ContentAnalyzer } from './download/core/ContentAnalyzer';
import { YtDlpEngine } from './download/engine/YtDlpEngine';
import { QualityManager } from './download/quality/QualityManager';
import { PolicyGate, RateLimiter } from './download/security';
import { ImageStrategy, VideoStrategy } from './download/strategies';
import { DownloadQueue } from './queue/DownloadQueue';
import { TelegramNotifier } from './bot/services/TelegramNotifier';
import { DownloadService } from './bot/services/DownloadService';
import { registerHandlers } from './bot/botHandler';
import { ChatTarget } from './bot/types';
import { Server } from './server';
import { AppConfig, AppContext } from './types';

const ORPHAN_SWEEP_INTERVAL_MS = 30 * 60 * 1000;
const ORPHAN_MAX_AGE_MINUTES = 60;
const HISTORY_SWEEP_INTERVAL_MS = 24 * 60 * 60 * 1000;

function initializeSentry(dsn: string | undefined): void {
  Sentry.init({
    dsn: dsn ?? '',
    tracesSampleRate: 1.0,
  });
}

function createHistoryStore(config: AppConfig): HistoryStore {
  if (config.supabase) {
    return new SupabaseHistoryStore(config.supabase);
  }
  logger.warn('⚠️ Supabase is not configured, history will not survive a restart');
  return new MemoryHistoryStore();
}

async function initializeComponents(config: AppConfig): Promise<AppContext> {
  const bot = new Telegraf(config.telegramToken);
  const fileManager = new FileManager(config.downloadPath);
  await fileManager.initialize();

  const history = createHistoryStore(config);
  const engine = new YtDlpEngine({ timeoutMs: config.extractionTimeoutMs });
  const classifier = new PlatformClassifier();
  const quality = new QualityManager(config.queue.validQualityValues);
  const rateLimiter = new RateLimiter({
    maxRequests: config.queue.rateLimitRequests,
    windowMs: config.queue.rateLimitWindowSeconds * 1000,
  });
  const policyGate = new PolicyGate(classifier);
  const analyzer = new ContentAnalyzer();
  const strategyDeps = {
    engine,
    fileManager,
    maxFileSizeBytes: config.queue.maxFileSizeBytes,
  };

  const queue = new DownloadQueue<ChatTarget>(
    {
      maxConcurrent: config.queue.maxConcurrent,
      maxQueueSize: config.queue.maxQueueSize,
      defaultQuality: config.queue.defaultQuality,
      validQualityValues: config.queue.validQualityValues,
    },
    {
      rateLimiter,
      policyGate,
      analyzer,
      engine,
      strategies: {
        video: new VideoStrategy(strategyDeps, quality),
        image: new ImageStrategy(strategyDeps, classifier),
      },
      notifier: new TelegramNotifier(bot.telegram),
      history,
    },
  );

  const downloadService = new DownloadService(
    bot.telegram,
    queue,
    history,
    classifier,
    quality,
    { engine, analyzer, policyGate, rateLimiter },
    {
      defaultQuality: config.queue.defaultQuality,
      rateLimitWindowSeconds: config.queue.rateLimitWindowSeconds,
    },
  );

  return { config, bot, queue, history, engine, fileManager, downloadService };
}

function scheduleMaintenance(app: AppContext): NodeJS.Timeout[] {
  const { fileManager, history } = app;

  const sweepFiles = setInterval(() => {
    fileManager
      .cleanupOldFiles(ORPHAN_MAX_AGE_MINUTES)
      .then((removed) => {
        if (removed > 0) logger.info(`🧹 Removed ${removed} orphaned download(s)`);
      })
      .catch((error: unknown) => logError(error, { task: 'orphan_sweep' }));
  }, ORPHAN_SWEEP_INTERVAL_MS);

  const sweepHistory = setInterval(() => {
    history
      .cleanupOldDownloads()
      .then((removed) => {
        if (removed > 0) logger.info(`🧹 Removed ${removed} old history record(s)`);
      })
      .catch((error: unknown) => logError(error, { task: 'history_sweep' }));
  }, HISTORY_SWEEP_INTERVAL_MS);

  return [sweepFiles, sweepHistory];
}

async function startBot(app: AppContext, server: Server): Promise<void> {
  const { config, bot } = app;
  await server.start();

  if (config.useWebhook) {
    logger.info('✅ Bot started in WEBHOOK mode');
  } else {
    // launch() resolves only when polling stops
    bot.launch().catch((error: unknown) => {
      logError(error, { stage: 'polling' });
      process.exit(1);
    });
    logger.info('✅ Bot started in POLLING mode');
  }
}

function setupShutdownHandlers(app: AppContext, server: Server, timers: NodeJS.Timeout[]): void {
  const { bot, queue, config } = app;
  let shuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received, shutting down gracefully...`);
    try {
      timers.forEach((timer) => clearInterval(timer));
      if (!config.useWebhook) bot.stop(signal);
      await queue.stop();
      await server.stop();
      await Sentry.close(2000);
      logger.info('✅ Bot stopped safely');
      process.exit(0);
    } catch (error: unknown) {
      logger.error('Error during shutdown', { error: describeError(error) });
      Sentry.captureException(error);
      process.exit(1);
    }
  };

  process.once('SIGTERM', () => void shutdown('SIGTERM'));
  process.once('SIGINT', () => void shutdown('SIGINT'));

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught Exception - shutting down', {
      error: error.message,
      stack: error.stack,
    });
    Sentry.captureException(error);
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled Rejection', { reason: describeError(reason) });
    Sentry.captureException(reason);
  });
}

async function main(): Promise<void> {
  try {
    const config = loadConfig();
    initializeSentry(config.sentryDsn);
    logger.level = config.logLevel;
    logger.info('🚀 Starting media relay bot...');
    logger.info('✅ Configuration loaded', {
      maxFileSize: `${(config.queue.maxFileSizeBytes / 1024 / 1024).toFixed(0)}MB`,
      maxConcurrent: config.queue.maxConcurrent,
      maxQueueSize: config.queue.maxQueueSize,
    });

    const app = await initializeComponents(config);
    logger.info('✅ All components initialized');

    registerHandlers(app.bot, app.downloadService);
    app.queue.start();

    const server = new Server(app.bot, () => app.queue.status(), {
      port: config.port,
      webhookUrl: config.useWebhook ? config.webhookUrl : undefined,
    });
    await startBot(app, server);
    const timers = scheduleMaintenance(app);
    setupShutdownHandlers(app, server, timers);

    logger.info('🎉 Bot is fully operational!');
  } catch (error: unknown) {
    logError(error, { stage: 'startup' });
    await Sentry.close(2000);
    process.exit(1);
  }
}

void main();
