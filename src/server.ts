import http from 'http';
import express, { Request, Response } from 'express';
import { Telegraf } from 'telegraf';
import { QueueStatus } from './queue/types';
import { describeError, logger } from './utils/logger';

export interface ServerOptions {
  port: number;
  /** Public webhook URL; when absent only the health endpoints are served */
  webhookUrl?: string;
}

/**
 * Express server: health check with queue status, and the Telegram webhook
 */
export class Server {
  private app: express.Application;
  private bot: Telegraf;
  private options: ServerOptions;
  private queueStatus: () => Promise<QueueStatus>;
  private httpServer: http.Server | null = null;

  constructor(bot: Telegraf, queueStatus: () => Promise<QueueStatus>, options: ServerOptions) {
    this.app = express();
    this.bot = bot;
    this.queueStatus = queueStatus;
    this.options = options;

    this.setupMiddleware();
    this.setupRoutes();
  }

  /**
   * Bound port once listening; differs from the configured one when that was 0
   */
  get port(): number | null {
    const address = this.httpServer?.address();
    return address && typeof address === 'object' ? address.port : null;
  }

  /**
   * Setup Express middleware
   */
  private setupMiddleware(): void {
    this.app.use(express.json());
  }

  /**
   * Setup Express routes
   */
  private setupRoutes(): void {
    this.app.get('/health', async (_req: Request, res: Response) => {
      const memoryUsage = process.memoryUsage();
      try {
        const queue = await this.queueStatus();
        res.status(200).json({
          status: 'ok',
          uptime: Math.floor(process.uptime()),
          queue,
          memory: {
            heapUsed: `${(memoryUsage.heapUsed / 1024 / 1024).toFixed(2)}MB`,
            heapTotal: `${(memoryUsage.heapTotal / 1024 / 1024).toFixed(2)}MB`,
          },
          timestamp: new Date().toISOString(),
        });
      } catch (error: unknown) {
        logger.error('Health check failed', { error: describeError(error) });
        res.status(503).json({ status: 'error' });
      }
    });

    if (this.options.webhookUrl) {
      this.app.post('/webhook', async (req: Request, res: Response) => {
        try {
          await this.bot.handleUpdate(req.body, res);
        } catch (error: unknown) {
          logger.error('Webhook update failed', { error: describeError(error) });
          if (!res.headersSent) res.sendStatus(500);
        }
      });
    }

    this.app.get('/', (_req: Request, res: Response) => {
      res.send('🤖 Media relay bot is running!');
    });
  }

  /**
   * Start listening; registers the webhook with Telegram when configured
   */
  async start(): Promise<void> {
    await new Promise<void>((resolve) => {
      this.httpServer = this.app.listen(this.options.port, () => resolve());
    });
    logger.info(`🚀 Server running on port ${this.port}`);

    if (this.options.webhookUrl) {
      // Ensure we don't add /webhook twice if URL already ends with it
      const webhookPath = this.options.webhookUrl.endsWith('/webhook')
        ? this.options.webhookUrl
        : `${this.options.webhookUrl}/webhook`;
      await this.bot.telegram.setWebhook(webhookPath);
      logger.info(`✅ Webhook set to: ${webhookPath}`);
    }
  }

  /**
   * Stop the server
   */
  async stop(): Promise<void> {
    const server = this.httpServer;
    if (!server) return;
    logger.info('🛑 Server shutting down...');
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    this.httpServer = null;
  }
}
