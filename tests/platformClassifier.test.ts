import { PlatformClassifier } from '../src/download/core/PlatformClassifier';
import { Platform } from '../src/download/core/types';

describe('PlatformClassifier', () => {
  const classifier = new PlatformClassifier();

  it.each([
    ['https://www.youtube.com/watch?v=abc', Platform.YOUTUBE, 'video'],
    ['https://youtu.be/abc', Platform.YOUTUBE, 'video'],
    ['https://vm.tiktok.com/ZMabc/', Platform.TIKTOK, 'video'],
    ['https://www.instagram.com/p/abc/', Platform.INSTAGRAM, 'mixed'],
    ['https://fb.watch/abc/', Platform.FACEBOOK, 'mixed'],
    ['https://x.com/someone/status/1', Platform.TWITTER, 'mixed'],
    ['https://old.reddit.com/r/pics/comments/1/', Platform.REDDIT, 'mixed'],
    ['https://imgur.com/gallery/abc', Platform.IMGUR, 'image'],
    ['https://500px.com/photo/1', Platform.FIVE_HUNDRED_PX, 'image'],
  ])('classifies %s', (url, platform, hint) => {
    expect(classifier.classify(url)).toEqual(
      expect.objectContaining({ platform, hint }),
    );
  });

  it('returns the display label', () => {
    expect(classifier.classify('https://twitter.com/a/status/1')?.label).toBe('Twitter/X');
  });

  it('does not match look-alike hosts', () => {
    expect(classifier.classify('https://notyoutube.com/watch?v=abc')).toBeNull();
    expect(classifier.classify('https://youtube.com.evil.example/watch')).toBeNull();
  });

  it('returns null for unknown hosts and malformed URLs', () => {
    expect(classifier.classify('https://example.com/video.mp4')).toBeNull();
    expect(classifier.classify('not a url')).toBeNull();
  });

  it('is case-insensitive on the host', () => {
    expect(classifier.classify('https://WWW.YOUTUBE.COM/watch?v=abc')?.platform).toBe(
      Platform.YOUTUBE,
    );
  });

  it('reports image support per platform', () => {
    expect(classifier.supportsImages(Platform.INSTAGRAM)).toBe(true);
    expect(classifier.supportsImages(Platform.YOUTUBE)).toBe(false);
    expect(classifier.supportsImages(Platform.PINTEREST)).toBe(true);
  });

  it('accepts a replacement rule table', () => {
    const custom = new PlatformClassifier([
      {
        platform: Platform.VIMEO,
        label: 'Vimeo Mirror',
        hostPatterns: [/(^|\.)vimeo\.test$/],
        video: true,
        image: false,
      },
    ]);
    expect(custom.classify('https://player.vimeo.test/1')).toEqual({
      platform: Platform.VIMEO,
      label: 'Vimeo Mirror',
      hint: 'video',
    });
    expect(custom.classify('https://vimeo.com/1')).toBeNull();
    expect(custom.list()).toEqual([{ platform: Platform.VIMEO, label: 'Vimeo Mirror', hint: 'video' }]);
    expect(custom.labelFor(Platform.YOUTUBE)).toBe('youtube');
  });

  describe('extractUrl', () => {
    it('returns the first link in the text', () => {
      expect(
        classifier.extractUrl('look at https://youtu.be/a and https://youtu.be/b'),
      ).toBe('https://youtu.be/a');
    });

    it('returns null when there is no link', () => {
      expect(classifier.extractUrl('hello there')).toBeNull();
    });
  });
});
