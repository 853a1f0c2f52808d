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

/**
 * In-process HistoryStore used when Supabase is not configured.
 * Everything is lost on restart.
 */
export class MemoryHistoryStore implements HistoryStore {
  private downloads: DownloadHistoryEntry[] = [];
  private readonly preferences = new Map<number, string>();
  private readonly platformStats = new Map<string, PlatformStat>();
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
    logger.info('💾 Using in-memory history store');
  }

  async record(outcome: DownloadOutcome): Promise<void> {
    const timestamp = new Date(this.now()).toISOString();
    this.downloads.push({ ...outcome, createdAt: timestamp });

    const stat = this.platformStats.get(outcome.platform) ?? {
      platform: outcome.platform,
      totalDownloads: 0,
      successfulDownloads: 0,
      failedDownloads: 0,
      lastUpdated: timestamp,
    };
    stat.totalDownloads += 1;
    if (outcome.success) {
      stat.successfulDownloads += 1;
    } else {
      stat.failedDownloads += 1;
    }
    stat.lastUpdated = timestamp;
    this.platformStats.set(outcome.platform, stat);
  }

  async getPreferredQuality(userId: number): Promise<string | null> {
    return this.preferences.get(userId) ?? null;
  }

  async setPreferredQuality(userId: number, _username: string, quality: string): Promise<void> {
    this.preferences.set(userId, quality);
  }

  async getUserDownloads(userId: number, limit: number = 10): Promise<DownloadHistoryEntry[]> {
    return this.downloads
      .filter((d) => d.userId === userId)
      .reverse()
      .slice(0, clampHistoryLimit(limit));
  }

  async getPlatformStats(): Promise<PlatformStat[]> {
    return [...this.platformStats.values()]
      .map((s) => ({ ...s }))
      .sort((a, b) => b.totalDownloads - a.totalDownloads);
  }

  async getDownloadStats(): Promise<DownloadStats> {
    return summarizePlatformStats([...this.platformStats.values()]);
  }

  async cleanupOldDownloads(days: number = 30): Promise<number> {
    const cutoff = this.now() - days * 24 * 60 * 60 * 1000;
    const before = this.downloads.length;
    this.downloads = this.downloads.filter((d) => Date.parse(d.createdAt) >= cutoff);
    return before - this.downloads.length;
  }
}
