import { PlatformClassifier } from '../src/download/core/PlatformClassifier';
import { Platform } from '../src/download/core/types';
import { PolicyGate } from '../src/download/security/PolicyGate';

describe('PolicyGate', () => {
  const gate = new PolicyGate(new PlatformClassifier());

  describe('validate', () => {
    it('allows a public link and returns its platform', () => {
      const verdict = gate.validate('https://www.youtube.com/watch?v=abc');
      expect(verdict).toEqual({
        allowed: true,
        platform: { platform: Platform.YOUTUBE, label: 'YouTube', hint: 'video' },
      });
    });

    it('trims surrounding whitespace', () => {
      expect(gate.validate('  https://vimeo.com/1  ').allowed).toBe(true);
    });

    it.each(['https://example.com/clip.mp4', 'not a url', 'ftp://youtube.com/x'])(
      'rejects %s as unsupported_platform',
      (url) => {
        expect(gate.validate(url)).toEqual({ allowed: false, reason: 'unsupported_platform' });
      },
    );

    it('rejects a supported link carrying a denylisted domain', () => {
      const verdict = gate.validate('https://www.youtube.com/redirect?q=https://onlyfans.com/x');
      expect(verdict.allowed).toBe(false);
      expect(verdict).toEqual(expect.objectContaining({ reason: 'blocked_domain' }));
    });

    it.each([
      'https://www.instagram.com/stories/someone/123/',
      'https://www.facebook.com/permalink.php?story_fbid=1',
      'https://www.tiktok.com/@user/private/1',
    ])('rejects %s as private_content', (url) => {
      expect(gate.validate(url)).toEqual(expect.objectContaining({ allowed: false, reason: 'private_content' }));
    });

    it('treats ordinary tweets as public', () => {
      expect(gate.validate('https://twitter.com/someone/status/123').allowed).toBe(true);
    });

    it('checks the platform before the denylist', () => {
      expect(gate.validate('https://onlyfans.com/someone')).toEqual({
        allowed: false,
        reason: 'unsupported_platform',
      });
    });
  });

  describe('checkContent', () => {
    it('allows ordinary metadata', () => {
      expect(gate.checkContent({ title: 'Cat video', duration: 30 })).toEqual({ allowed: true });
    });

    it('rejects blocked keywords in the title', () => {
      expect(gate.checkContent({ title: 'Totally NSFW clip' })).toEqual({
        allowed: false,
        reason: 'policy_violation',
        detail: 'blocked keyword: nsfw',
      });
    });

    it('checks description and tags as well', () => {
      expect(gate.checkContent({ title: 'ok', description: 'some illegal stuff' })).toEqual(
        expect.objectContaining({ detail: 'blocked keyword: illegal' }),
      );
      expect(gate.checkContent({ title: 'ok', tags: ['violence'] })).toEqual(
        expect.objectContaining({ detail: 'blocked keyword: violence' }),
      );
    });

    it('matches whole words only', () => {
      expect(gate.checkContent({ title: 'whatever happened to the chateau' })).toEqual({ allowed: true });
    });

    it('rejects items over the duration ceiling', () => {
      expect(gate.checkContent({ title: 'Lecture', duration: 601 })).toEqual({
        allowed: false,
        reason: 'policy_violation',
        detail: 'duration 601s exceeds 600s',
      });
      expect(gate.checkContent({ title: 'Lecture', duration: 600 })).toEqual({ allowed: true });
    });

    it('honours custom options', () => {
      const strict = new PolicyGate(new PlatformClassifier(), {
        blockedKeywords: ['spoiler'],
        maxDurationSeconds: 60,
      });
      expect(strict.checkContent({ title: 'nsfw' })).toEqual({ allowed: true });
      expect(strict.checkContent({ title: 'Spoiler alert' })).toEqual(
        expect.objectContaining({ detail: 'blocked keyword: spoiler' }),
      );
      expect(strict.checkContent({ duration: 61 })).toEqual(
        expect.objectContaining({ detail: 'duration 61s exceeds 60s' }),
      );
    });
  });
});
