import { SupabaseHistoryStore } from '../src/database/SupabaseHistoryStore';

interface MockResponse {
  data: unknown;
  error: { message: string } | null;
}

interface MockCall {
  table: string;
  method: string;
  args: unknown[];
}

const mockResponses: MockResponse[] = [];
const mockCalls: MockCall[] = [];

// Chainable query builder; awaiting it (or maybeSingle) yields the next queued response
function mockQuery(table: string): Record<string, unknown> {
  const next = (): Promise<MockResponse> =>
    Promise.resolve(mockResponses.shift() ?? { data: null, error: null });
  const query: Record<string, unknown> = {};
  for (const method of ['select', 'insert', 'upsert', 'delete', 'eq', 'lt', 'order', 'limit']) {
    query[method] = (...args: unknown[]) => {
      mockCalls.push({ table, method, args });
      return query;
    };
  }
  query.maybeSingle = () => {
    mockCalls.push({ table, method: 'maybeSingle', args: [] });
    return next();
  };
  query.then = (resolve: (value: MockResponse) => unknown, reject: (reason: unknown) => unknown) =>
    next().then(resolve, reject);
  return query;
}

jest.mock('@supabase/supabase-js', () => ({
  createClient: jest.fn(() => ({ from: (table: string) => mockQuery(table) })),
}));

function callsTo(table: string, method: string): MockCall[] {
  return mockCalls.filter((c) => c.table === table && c.method === method);
}

describe('SupabaseHistoryStore', () => {
  let store: SupabaseHistoryStore;

  beforeEach(() => {
    mockResponses.length = 0;
    mockCalls.length = 0;
    store = new SupabaseHistoryStore({ url: 'https://test.supabase.co', key: 'test-key' });
  });

  describe('record', () => {
    it('inserts the outcome and bumps the platform counter', async () => {
      mockResponses.push(
        { data: null, error: null },
        {
          data: {
            platform: 'youtube',
            total_downloads: 2,
            successful_downloads: 1,
            failed_downloads: 1,
            last_updated: '2024-01-01T00:00:00.000Z',
          },
          error: null,
        },
        { data: null, error: null },
      );

      await store.record({
        userId: 1,
        username: 'tester',
        url: 'https://youtu.be/a',
        platform: 'youtube',
        title: 'Clip',
        success: true,
        sizeBytes: 100,
      });

      expect(callsTo('downloads', 'insert')[0].args[0]).toEqual({
        user_id: 1,
        username: 'tester',
        url: 'https://youtu.be/a',
        platform: 'youtube',
        title: 'Clip',
        success: true,
        file_size: 100,
        error_message: null,
      });
      const [upsert] = callsTo('platform_stats', 'upsert');
      expect(upsert.args[0]).toEqual(
        expect.objectContaining({
          platform: 'youtube',
          total_downloads: 3,
          successful_downloads: 2,
          failed_downloads: 1,
        }),
      );
      expect(upsert.args[1]).toEqual({ onConflict: 'platform' });
    });

    it('starts a new counter for an unseen platform', async () => {
      mockResponses.push({ data: null, error: null }, { data: null, error: null }, { data: null, error: null });

      await store.record({
        userId: 1,
        username: 'tester',
        url: 'https://vimeo.com/1',
        platform: 'vimeo',
        title: '',
        success: false,
        errorMessage: 'Video unavailable',
      });

      expect(callsTo('platform_stats', 'upsert')[0].args[0]).toEqual(
        expect.objectContaining({ total_downloads: 1, successful_downloads: 0, failed_downloads: 1 }),
      );
    });

    it('skips the counter when the insert fails', async () => {
      mockResponses.push({ data: null, error: { message: 'insert failed' } });

      await store.record({
        userId: 1,
        username: 'tester',
        url: 'https://youtu.be/a',
        platform: 'youtube',
        title: 'Clip',
        success: true,
      });

      expect(mockCalls.filter((c) => c.table === 'platform_stats')).toHaveLength(0);
    });
  });

  describe('preferences', () => {
    it('reads the stored quality', async () => {
      mockResponses.push({ data: { preferred_quality: '720p' }, error: null });
      await expect(store.getPreferredQuality(1)).resolves.toBe('720p');
      expect(callsTo('user_preferences', 'eq')[0].args).toEqual(['user_id', 1]);
    });

    it('returns null without a row or on error', async () => {
      mockResponses.push({ data: null, error: null }, { data: null, error: { message: 'down' } });
      await expect(store.getPreferredQuality(1)).resolves.toBeNull();
      await expect(store.getPreferredQuality(1)).resolves.toBeNull();
    });

    it('upserts by user and throws when saving fails', async () => {
      mockResponses.push({ data: null, error: null }, { data: null, error: { message: 'down' } });

      await store.setPreferredQuality(1, 'tester', '480p');
      const [upsert] = callsTo('user_preferences', 'upsert');
      expect(upsert.args[0]).toEqual(
        expect.objectContaining({ user_id: 1, username: 'tester', preferred_quality: '480p' }),
      );
      expect(upsert.args[1]).toEqual({ onConflict: 'user_id' });

      await expect(store.setPreferredQuality(1, 'tester', '480p')).rejects.toThrow(
        'Failed to save quality preference',
      );
    });
  });

  describe('getUserDownloads', () => {
    it('maps rows and clamps the limit', async () => {
      mockResponses.push({
        data: [
          {
            user_id: 1,
            username: null,
            url: 'https://youtu.be/a',
            platform: 'youtube',
            title: 'Clip',
            success: true,
            file_size: 100,
            error_message: null,
            created_at: '2024-01-02T00:00:00.000Z',
          },
        ],
        error: null,
      });

      const entries = await store.getUserDownloads(1, 50);

      expect(entries).toEqual([
        {
          userId: 1,
          username: '',
          url: 'https://youtu.be/a',
          platform: 'youtube',
          title: 'Clip',
          success: true,
          sizeBytes: 100,
          errorMessage: undefined,
          createdAt: '2024-01-02T00:00:00.000Z',
        },
      ]);
      expect(callsTo('downloads', 'order')[0].args).toEqual(['created_at', { ascending: false }]);
      expect(callsTo('downloads', 'limit')[0].args).toEqual([20]);
    });

    it('returns an empty list on error', async () => {
      mockResponses.push({ data: null, error: { message: 'down' } });
      await expect(store.getUserDownloads(1)).resolves.toEqual([]);
    });
  });

  it('derives overall stats from the platform table', async () => {
    mockResponses.push({
      data: [
        {
          platform: 'youtube',
          total_downloads: 3,
          successful_downloads: 3,
          failed_downloads: 0,
          last_updated: '2024-01-01T00:00:00.000Z',
        },
        {
          platform: 'tiktok',
          total_downloads: 1,
          successful_downloads: 0,
          failed_downloads: 1,
          last_updated: '2024-01-01T00:00:00.000Z',
        },
      ],
      error: null,
    });

    await expect(store.getDownloadStats()).resolves.toEqual({
      totalDownloads: 4,
      successfulDownloads: 3,
      failedDownloads: 1,
      successRate: 75,
      topPlatforms: [
        { platform: 'youtube', count: 3 },
        { platform: 'tiktok', count: 1 },
      ],
    });
  });

  describe('cleanupOldDownloads', () => {
    it('returns the number of deleted rows', async () => {
      mockResponses.push({ data: [{ id: 1 }, { id: 2 }], error: null });
      await expect(store.cleanupOldDownloads(30)).resolves.toBe(2);
      expect(callsTo('downloads', 'lt')[0].args[0]).toBe('created_at');
    });

    it('returns 0 on error', async () => {
      mockResponses.push({ data: null, error: { message: 'down' } });
      await expect(store.cleanupOldDownloads()).resolves.toBe(0);
    });
  });
});
