import { MemoryHistoryStore } from '../src/database/MemoryHistoryStore';
import { DownloadOutcome, summarizePlatformStats } from '../src/database/HistoryStore';

const DAY_MS = 24 * 60 * 60 * 1000;

function outcome(overrides: Partial<DownloadOutcome> = {}): DownloadOutcome {
  return {
    userId: 1,
    username: 'tester',
    url: 'https://youtu.be/a',
    platform: 'youtube',
    title: 'Clip',
    success: true,
    ...overrides,
  };
}

describe('MemoryHistoryStore', () => {
  let now: number;
  let store: MemoryHistoryStore;

  beforeEach(() => {
    now = Date.UTC(2024, 0, 31);
    store = new MemoryHistoryStore(() => now);
  });

  it('returns a user history newest first', async () => {
    await store.record(outcome({ title: 'first' }));
    now += 1000;
    await store.record(outcome({ title: 'other user', userId: 2 }));
    now += 1000;
    await store.record(outcome({ title: 'second' }));

    const entries = await store.getUserDownloads(1);
    expect(entries.map((e) => e.title)).toEqual(['second', 'first']);
    expect(entries[0].createdAt).toBe(new Date(Date.UTC(2024, 0, 31) + 2000).toISOString());
  });

  it('clamps the history limit to 20', async () => {
    for (let i = 0; i < 25; i++) {
      await store.record(outcome({ title: `#${i}` }));
    }
    const entries = await store.getUserDownloads(1, 100);
    expect(entries).toHaveLength(20);
    expect(entries[0].title).toBe('#24');
  });

  it('stores quality preferences', async () => {
    expect(await store.getPreferredQuality(1)).toBeNull();
    await store.setPreferredQuality(1, 'tester', '480p');
    expect(await store.getPreferredQuality(1)).toBe('480p');
  });

  it('keeps per-platform counters', async () => {
    await store.record(outcome());
    await store.record(outcome({ success: false, errorMessage: 'nope' }));
    await store.record(outcome({ platform: 'tiktok' }));

    const stats = await store.getPlatformStats();
    expect(stats.map((s) => [s.platform, s.totalDownloads, s.successfulDownloads, s.failedDownloads])).toEqual([
      ['youtube', 2, 1, 1],
      ['tiktok', 1, 1, 0],
    ]);

    expect(await store.getDownloadStats()).toEqual({
      totalDownloads: 3,
      successfulDownloads: 2,
      failedDownloads: 1,
      successRate: 66.7,
      topPlatforms: [
        { platform: 'youtube', count: 2 },
        { platform: 'tiktok', count: 1 },
      ],
    });
  });

  it('removes history older than the retention period', async () => {
    await store.record(outcome({ title: 'old' }));
    now += 31 * DAY_MS;
    await store.record(outcome({ title: 'new' }));

    expect(await store.cleanupOldDownloads(30)).toBe(1);
    expect((await store.getUserDownloads(1)).map((e) => e.title)).toEqual(['new']);
  });
});

describe('summarizePlatformStats', () => {
  it('reports zero rate without downloads', () => {
    expect(summarizePlatformStats([])).toEqual({
      totalDownloads: 0,
      successfulDownloads: 0,
      failedDownloads: 0,
      successRate: 0,
      topPlatforms: [],
    });
  });

  it('keeps only the top entries', () => {
    const stats = ['a', 'b', 'c'].map((platform, i) => ({
      platform,
      totalDownloads: i + 1,
      successfulDownloads: i + 1,
      failedDownloads: 0,
      lastUpdated: '2024-01-01T00:00:00.000Z',
    }));
    expect(summarizePlatformStats(stats, 2).topPlatforms).toEqual([
      { platform: 'c', count: 3 },
      { platform: 'b', count: 2 },
    ]);
  });
});
