import { ConfigError, loadConfig } from '../src/utils/config';

describe('loadConfig', () => {
  const base = { BOT_TOKEN: 'test-token' };

  it('applies defaults', () => {
    const config = loadConfig(base);
    expect(config).toEqual({
      telegramToken: 'test-token',
      downloadPath: './downloads',
      extractionTimeoutMs: 600_000,
      port: 3000,
      useWebhook: false,
      webhookUrl: undefined,
      supabase: undefined,
      sentryDsn: undefined,
      logLevel: 'info',
      queue: expect.objectContaining({
        maxConcurrent: 3,
        maxQueueSize: 50,
        rateLimitRequests: 3,
        rateLimitWindowSeconds: 60,
        maxFileSizeBytes: 8 * 1024 * 1024,
        defaultQuality: 'best[height<=720]',
      }),
    });
  });

  it('parses numeric and boolean values', () => {
    const config = loadConfig({
      ...base,
      MAX_CONCURRENT: '5',
      RATE_LIMIT_WINDOW: '30',
      USE_WEBHOOK: 'true',
      WEBHOOK_URL: 'https://bot.example.com',
      DEFAULT_QUALITY: '480p',
    });
    expect(config.queue.maxConcurrent).toBe(5);
    expect(config.queue.rateLimitWindowSeconds).toBe(30);
    expect(config.queue.defaultQuality).toBe('480p');
    expect(config.useWebhook).toBe(true);
    expect(config.webhookUrl).toBe('https://bot.example.com');
  });

  it('treats empty values as unset', () => {
    expect(loadConfig({ ...base, MAX_QUEUE_SIZE: '', SUPABASE_URL: '' }).queue.maxQueueSize).toBe(50);
  });

  it('requires the bot token', () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({})).toThrow('Invalid configuration: BOT_TOKEN: BOT_TOKEN is required');
  });

  it('rejects invalid numbers and qualities', () => {
    expect(() => loadConfig({ ...base, MAX_CONCURRENT: '0' })).toThrow(/MAX_CONCURRENT/);
    expect(() => loadConfig({ ...base, DEFAULT_QUALITY: '8k' })).toThrow(/DEFAULT_QUALITY/);
  });

  it('requires a webhook URL in webhook mode', () => {
    expect(() => loadConfig({ ...base, USE_WEBHOOK: 'true' })).toThrow(
      'Invalid configuration: WEBHOOK_URL is required when USE_WEBHOOK=true',
    );
  });

  it('enables Supabase only with both URL and key, preferring the service role key', () => {
    expect(loadConfig({ ...base, SUPABASE_URL: 'https://test.supabase.co' }).supabase).toBeUndefined();
    expect(
      loadConfig({
        ...base,
        SUPABASE_URL: 'https://test.supabase.co',
        SUPABASE_KEY: 'test-key',
        SUPABASE_SERVICE_ROLE_KEY: 'test-service-key',
      }).supabase,
    ).toEqual({ url: 'https://test.supabase.co', key: 'test-service-key' });
  });
});
