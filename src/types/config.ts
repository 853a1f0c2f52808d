export interface QueueConfig {
  maxConcurrent: number;
  maxQueueSize: number;
  rateLimitRequests: number;
  rateLimitWindowSeconds: number;
  maxFileSizeBytes: number;
  defaultQuality: string;
  validQualityValues: readonly string[];
}

export interface SupabaseConfig {
  url: string;
  key: string;
}

export interface AppConfig {
  telegramToken: string;
  downloadPath: string;
  extractionTimeoutMs: number;
  port: number;
  useWebhook: boolean;
  webhookUrl?: string;
  supabase?: SupabaseConfig;
  sentryDsn?: string;
  logLevel: string;
  queue: QueueConfig;
}
