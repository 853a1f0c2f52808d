import { ContentAnalyzer } from '../src/download/core/ContentAnalyzer';
import { ExtractionMetadata, Platform } from '../src/download/core/types';

describe('ContentAnalyzer', () => {
  const analyzer = new ContentAnalyzer();

  describe('content type', () => {
    it('lets title keywords win over duration', () => {
      const metadata: ExtractionMetadata = { title: 'My Reel from the beach', duration: 15 };
      expect(analyzer.analyze(metadata, Platform.INSTAGRAM).contentType).toBe('reel');
    });

    it('detects Instagram stories before reels', () => {
      expect(
        analyzer.analyze({ title: 'story and reel' }, Platform.INSTAGRAM).contentType,
      ).toBe('story');
    });

    it('treats a positive duration as video', () => {
      expect(analyzer.analyze({ title: 'Clip', duration: 30 }, Platform.FACEBOOK).contentType).toBe(
        'video',
      );
    });

    it('falls back to image without a duration', () => {
      expect(analyzer.analyze({ title: 'Sunset' }, Platform.INSTAGRAM).contentType).toBe('image');
      expect(analyzer.analyze({ title: 'Sunset', duration: 0 }, Platform.TWITTER).contentType).toBe(
        'image',
      );
    });

    it('detects Twitter threads from the title', () => {
      expect(analyzer.analyze({ title: 'A 🧵 about cats' }, Platform.TWITTER).contentType).toBe(
        'thread',
      );
    });

    it('always reports video for TikTok', () => {
      expect(analyzer.analyze({}, Platform.TIKTOK).contentType).toBe('video');
    });

    it('reports unknown for YouTube items without a duration', () => {
      expect(analyzer.analyze({ title: 'Live soon' }, Platform.YOUTUBE).contentType).toBe('unknown');
    });

    it('checks Reddit gallery keywords only after the duration rule', () => {
      expect(analyzer.analyze({ title: 'gallery tour', duration: 40 }, Platform.REDDIT).contentType).toBe(
        'video',
      );
      expect(analyzer.analyze({ title: 'My Album' }, Platform.REDDIT).contentType).toBe('gallery');
    });

    it('uses the default rules for other platforms', () => {
      expect(analyzer.analyze({ duration: 5 }, Platform.VIMEO).contentType).toBe('video');
      expect(analyzer.analyze({}, Platform.FLICKR).contentType).toBe('image');
    });
  });

  describe('confidence', () => {
    it('starts at 0.5 for an empty record on an unrecognized platform', () => {
      expect(analyzer.analyze({}, Platform.VIMEO).confidence).toBe(0.5);
    });

    it('adds up the signals', () => {
      const metadata: ExtractionMetadata = {
        title: 'Clip',
        formats: [{ formatId: '18' }],
      };
      // 0.5 + formats 0.2 + title 0.1 + recognized 0.1
      expect(analyzer.analyze(metadata, Platform.YOUTUBE).confidence).toBe(0.9);
    });

    it('does not count the placeholder title', () => {
      expect(analyzer.analyze({ title: 'Unknown' }, Platform.VIMEO).confidence).toBe(0.5);
    });

    it('is capped at 1.0', () => {
      const metadata: ExtractionMetadata = {
        title: 'Clip',
        description: 'desc',
        formats: [{ formatId: '18' }],
      };
      expect(analyzer.analyze(metadata, Platform.YOUTUBE).confidence).toBe(1);
    });
  });

  it('summarizes the metadata', () => {
    const result = analyzer.analyze(
      {
        width: 1280,
        height: 720,
        duration: 12,
        uploader: 'someone',
        formats: [
          { formatId: 'v', vcodec: 'avc1', acodec: 'none' },
          { formatId: 'a', vcodec: 'none', acodec: 'mp4a' },
        ],
      },
      Platform.VIMEO,
    );
    expect(result.fallbackDetection).toBe(false);
    expect(result.metadata).toEqual({
      resolution: '1280x720',
      duration: 12,
      uploader: 'someone',
      tags: [],
      formatCount: 2,
      hasVideo: true,
      hasAudio: true,
    });
  });

  describe('analyzeUrl', () => {
    it.each([
      ['https://www.facebook.com/user/photos/a.1/2', 'gallery', 0.7],
      ['https://www.facebook.com/user/videos/123', 'video', 0.7],
      ['https://www.facebook.com/reel/123', 'reel', 0.8],
      ['https://www.facebook.com/stories/123', 'story', 0.8],
      ['https://www.facebook.com/permalink.php?id=1', 'image', 0.5],
    ])('guesses %s from the Facebook URL', (url, contentType, confidence) => {
      const result = analyzer.analyzeUrl(url, Platform.FACEBOOK);
      expect(result.contentType).toBe(contentType);
      expect(result.confidence).toBe(confidence);
      expect(result.fallbackDetection).toBe(true);
    });

    it('reports unknown with zero confidence for other platforms', () => {
      const result = analyzer.analyzeUrl('https://www.instagram.com/reel/abc/', Platform.INSTAGRAM);
      expect(result.contentType).toBe('unknown');
      expect(result.confidence).toBe(0);
      expect(result.fallbackDetection).toBe(true);
    });
  });
});
