import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import {
  clampHistoryLimit,
  DownloadHistoryEntry,
  DownloadOutcome,
  DownloadStats,
  HistoryStore,
  PlatformStat,
  summarizePlatformStats,
} from './HistoryStore';
import { logger } from '../utils/logger';

const DownloadRowSchema = z.object({
  user_id: z.number(),
  username: z.string().nullish(),
  url: z.string(),
  platform: z.string(),
  title: z.string().nullish(),
  success: z.boolean(),
  file_size: z.number().nullish(),
  error_message: z.string().nullish(),
  created_at: z.string(),
});

const PlatformStatRowSchema = z.object({
  platform: z.string(),
  total_downloads: z.number(),
  successful_downloads: z.number(),
  failed_downloads: z.number(),
  last_updated: z.string(),
});

const PreferenceRowSchema = z.object({
  preferred_quality: z.string().nullable(),
});

export interface SupabaseCredentials {
  url: string;
  key: string;
}

/**
 * HistoryStore backed by the `downloads`, `user_preferences` and
 * `platform_stats` tables (see supabase/schema.sql)
 */
export class SupabaseHistoryStore implements HistoryStore {
  private supabase: SupabaseClient;

  constructor(credentials: SupabaseCredentials) {
    this.supabase = createClient(credentials.url, credentials.key, {
      auth: { persistSession: false },
    });
    logger.info('🔌 Connected to Supabase');
  }

  async record(outcome: DownloadOutcome): Promise<void> {
    const { error } = await this.supabase.from('downloads').insert({
      user_id: outcome.userId,
      username: outcome.username,
      url: outcome.url,
      platform: outcome.platform,
      title: outcome.title,
      success: outcome.success,
      file_size: outcome.sizeBytes ?? null,
      error_message: outcome.errorMessage ?? null,
    });

    if (error) {
      logger.error('Supabase: Failed to record download', {
        userId: outcome.userId,
        error: error.message,
      });
      return;
    }

    await this.bumpPlatformStat(outcome.platform, outcome.success);
  }

  async getPreferredQuality(userId: number): Promise<string | null> {
    const { data, error } = await this.supabase
      .from('user_preferences')
      .select('preferred_quality')
      .eq('user_id', userId)
      .maybeSingle();

    if (error) {
      logger.error('Supabase: Failed to read preference', { userId, error: error.message });
      return null;
    }

    const row = PreferenceRowSchema.safeParse(data);
    return row.success ? row.data.preferred_quality : null;
  }

  async setPreferredQuality(userId: number, username: string, quality: string): Promise<void> {
    const { error } = await this.supabase.from('user_preferences').upsert(
      {
        user_id: userId,
        username,
        preferred_quality: quality,
        updated_at: new Date().toISOString(),
      },
      { onConflict: 'user_id' },
    );

    if (error) {
      logger.error('Supabase: Failed to save preference', { userId, error: error.message });
      throw new Error('Failed to save quality preference');
    }
  }

  async getUserDownloads(userId: number, limit: number = 10): Promise<DownloadHistoryEntry[]> {
    const { data, error } = await this.supabase
      .from('downloads')
      .select('*')
      .eq('user_id', userId)
      .order('created_at', { ascending: false })
      .limit(clampHistoryLimit(limit));

    if (error) {
      logger.error('Supabase: Failed to read history', { userId, error: error.message });
      return [];
    }

    const rows = z.array(DownloadRowSchema).safeParse(data ?? []);
    if (!rows.success) {
      logger.warn('Supabase: Unexpected download rows', { issue: rows.error.issues[0]?.message });
      return [];
    }

    return rows.data.map((row) => ({
      userId: row.user_id,
      username: row.username ?? '',
      url: row.url,
      platform: row.platform,
      title: row.title ?? '',
      success: row.success,
      sizeBytes: row.file_size ?? undefined,
      errorMessage: row.error_message ?? undefined,
      createdAt: row.created_at,
    }));
  }

  async getPlatformStats(): Promise<PlatformStat[]> {
    const { data, error } = await this.supabase
      .from('platform_stats')
      .select('*')
      .order('total_downloads', { ascending: false });

    if (error) {
      logger.error('Supabase: Failed to read platform stats', { error: error.message });
      return [];
    }

    const rows = z.array(PlatformStatRowSchema).safeParse(data ?? []);
    return rows.success ? rows.data.map(toPlatformStat) : [];
  }

  async getDownloadStats(): Promise<DownloadStats> {
    return summarizePlatformStats(await this.getPlatformStats());
  }

  async cleanupOldDownloads(days: number = 30): Promise<number> {
    const cutoff = new Date(Date.now() - days * 24 * 60 * 60 * 1000).toISOString();
    const { data, error } = await this.supabase
      .from('downloads')
      .delete()
      .lt('created_at', cutoff)
      .select('id');

    if (error) {
      logger.error('Supabase: Failed to clean old downloads', { error: error.message });
      return 0;
    }

    const removed = data?.length ?? 0;
    logger.info('🧹 Old download history removed', { removed, days });
    return removed;
  }

  private async bumpPlatformStat(platform: string, success: boolean): Promise<void> {
    const { data, error } = await this.supabase
      .from('platform_stats')
      .select('*')
      .eq('platform', platform)
      .maybeSingle();

    if (error) {
      logger.error('Supabase: Failed to read platform stat', { platform, error: error.message });
      return;
    }

    const existing = PlatformStatRowSchema.safeParse(data);
    const current = existing.success
      ? existing.data
      : { total_downloads: 0, successful_downloads: 0, failed_downloads: 0 };

    const { error: upsertError } = await this.supabase.from('platform_stats').upsert(
      {
        platform,
        total_downloads: current.total_downloads + 1,
        successful_downloads: current.successful_downloads + (success ? 1 : 0),
        failed_downloads: current.failed_downloads + (success ? 0 : 1),
        last_updated: new Date().toISOString(),
      },
      { onConflict: 'platform' },
    );

    if (upsertError) {
      logger.error('Supabase: Failed to update platform stat', {
        platform,
        error: upsertError.message,
      });
    }
  }
}

function toPlatformStat(row: z.infer<typeof PlatformStatRowSchema>): PlatformStat {
  return {
    platform: row.platform,
    totalDownloads: row.total_downloads,
    successfulDownloads: row.successful_downloads,
    failedDownloads: row.failed_downloads,
    lastUpdated: row.last_updated,
  };
}
