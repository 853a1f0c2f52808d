import { z } from 'zod';
import { AppConfig } from '../types';
import { DEFAULT_QUALITY, VALID_QUALITY_VALUES } from '../download/quality/QualityManager';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  BOT_TOKEN: z.string({ required_error: 'BOT_TOKEN is required' }).min(1),
  DOWNLOAD_PATH: z.string().default('./downloads'),
  MAX_CONCURRENT: positiveInt(3),
  MAX_QUEUE_SIZE: positiveInt(50),
  RATE_LIMIT_REQUESTS: positiveInt(3),
  RATE_LIMIT_WINDOW: positiveInt(60),
  MAX_FILE_SIZE: positiveInt(8 * 1024 * 1024),
  DEFAULT_QUALITY: z.enum(VALID_QUALITY_VALUES).default(DEFAULT_QUALITY),
  EXTRACTION_TIMEOUT: positiveInt(10 * 60 * 1000),
  PORT: positiveInt(3000),
  USE_WEBHOOK: z
    .enum(['true', 'false'])
    .default('false')
    .transform((v) => v === 'true'),
  WEBHOOK_URL: z.string().url().optional(),
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_KEY: z.string().optional(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().optional(),
  SENTRY_DSN: z.string().optional(),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
});

/**
 * Load configuration from environment variables.
 * Empty values count as unset, so a copied .env.example works as-is.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const provided = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );

  const parsed = EnvSchema.safeParse(provided);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const e = parsed.data;
  if (e.USE_WEBHOOK && !e.WEBHOOK_URL) {
    throw new ConfigError('Invalid configuration: WEBHOOK_URL is required when USE_WEBHOOK=true');
  }

  const supabaseKey = e.SUPABASE_SERVICE_ROLE_KEY ?? e.SUPABASE_KEY;

  return {
    telegramToken: e.BOT_TOKEN,
    downloadPath: e.DOWNLOAD_PATH,
    extractionTimeoutMs: e.EXTRACTION_TIMEOUT,
    port: e.PORT,
    useWebhook: e.USE_WEBHOOK,
    webhookUrl: e.WEBHOOK_URL,
    supabase: e.SUPABASE_URL && supabaseKey ? { url: e.SUPABASE_URL, key: supabaseKey } : undefined,
    sentryDsn: e.SENTRY_DSN,
    logLevel: e.LOG_LEVEL,
    queue: {
      maxConcurrent: e.MAX_CONCURRENT,
      maxQueueSize: e.MAX_QUEUE_SIZE,
      rateLimitRequests: e.RATE_LIMIT_REQUESTS,
      rateLimitWindowSeconds: e.RATE_LIMIT_WINDOW,
      maxFileSizeBytes: e.MAX_FILE_SIZE,
      defaultQuality: e.DEFAULT_QUALITY,
      validQualityValues: VALID_QUALITY_VALUES,
    },
  };
}
