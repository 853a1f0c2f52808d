/**
 * HistoryStore - Persisted outcomes, per-user quality preference and platform counters
 */

export interface DownloadOutcome {
  userId: number;
  username: string;
  url: string;
  platform: string;
  title: string;
  success: boolean;
  sizeBytes?: number;
  errorMessage?: string;
}

export interface DownloadHistoryEntry extends DownloadOutcome {
  createdAt: string;
}

export interface PlatformStat {
  platform: string;
  totalDownloads: number;
  successfulDownloads: number;
  failedDownloads: number;
  lastUpdated: string;
}

export interface DownloadStats {
  totalDownloads: number;
  successfulDownloads: number;
  failedDownloads: number;
  /** 0..100, one decimal */
  successRate: number;
  topPlatforms: Array<{ platform: string; count: number }>;
}

export const MAX_HISTORY_LIMIT = 20;

export interface HistoryStore {
  record(outcome: DownloadOutcome): Promise<void>;
  getPreferredQuality(userId: number): Promise<string | null>;
  setPreferredQuality(userId: number, username: string, quality: string): Promise<void>;
  /** Newest first, at most MAX_HISTORY_LIMIT entries */
  getUserDownloads(userId: number, limit?: number): Promise<DownloadHistoryEntry[]>;
  getPlatformStats(): Promise<PlatformStat[]>;
  getDownloadStats(): Promise<DownloadStats>;
  /** Deletes history older than `days`, returns the number of rows removed */
  cleanupOldDownloads(days?: number): Promise<number>;
}

export function clampHistoryLimit(limit: number): number {
  return Math.max(1, Math.min(Math.floor(limit), MAX_HISTORY_LIMIT));
}

/**
 * Aggregate platform counters into overall stats
 */
export function summarizePlatformStats(stats: PlatformStat[], top: number = 5): DownloadStats {
  const totalDownloads = stats.reduce((sum, s) => sum + s.totalDownloads, 0);
  const successfulDownloads = stats.reduce((sum, s) => sum + s.successfulDownloads, 0);
  const failedDownloads = stats.reduce((sum, s) => sum + s.failedDownloads, 0);
  const successRate =
    totalDownloads === 0 ? 0 : Math.round((successfulDownloads / totalDownloads) * 1000) / 10;

  const topPlatforms = [...stats]
    .sort((a, b) => b.totalDownloads - a.totalDownloads)
    .slice(0, top)
    .map((s) => ({ platform: s.platform, count: s.totalDownloads }));

  return { totalDownloads, successfulDownloads, failedDownloads, successRate, topPlatforms };
}
