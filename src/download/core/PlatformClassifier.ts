/**
 * PlatformClassifier - Maps a URL to the platform that serves it
 * Matching is done on the hostname against a replaceable rule table
 */

import { ContentHint, Platform, PlatformMatch } from './types';

export interface PlatformRule {
    platform: Platform;
    label: string;
    hostPatterns: RegExp[];
    video: boolean;
    image: boolean;
}

export const DEFAULT_PLATFORM_RULES: PlatformRule[] = [
    {
        platform: Platform.YOUTUBE,
        label: 'YouTube',
        hostPatterns: [/(^|\.)youtube\.com$/, /(^|\.)youtu\.be$/, /(^|\.)youtube-nocookie\.com$/],
        video: true,
        image: false,
    },
    {
        platform: Platform.TIKTOK,
        label: 'TikTok',
        hostPatterns: [/(^|\.)tiktok\.com$/],
        video: true,
        image: false,
    },
    {
        platform: Platform.INSTAGRAM,
        label: 'Instagram',
        hostPatterns: [/(^|\.)instagram\.com$/, /(^|\.)instagr\.am$/],
        video: true,
        image: true,
    },
    {
        platform: Platform.FACEBOOK,
        label: 'Facebook',
        hostPatterns: [/(^|\.)facebook\.com$/, /(^|\.)fb\.com$/, /(^|\.)fb\.watch$/],
        video: true,
        image: true,
    },
    {
        platform: Platform.TWITTER,
        label: 'Twitter/X',
        hostPatterns: [/(^|\.)twitter\.com$/, /(^|\.)x\.com$/],
        video: true,
        image: true,
    },
    {
        platform: Platform.REDDIT,
        label: 'Reddit',
        hostPatterns: [/(^|\.)reddit\.com$/, /(^|\.)redd\.it$/],
        video: true,
        image: true,
    },
    {
        platform: Platform.TWITCH,
        label: 'Twitch',
        hostPatterns: [/(^|\.)twitch\.tv$/],
        video: true,
        image: false,
    },
    {
        platform: Platform.VIMEO,
        label: 'Vimeo',
        hostPatterns: [/(^|\.)vimeo\.com$/],
        video: true,
        image: false,
    },
    {
        platform: Platform.DAILYMOTION,
        label: 'Dailymotion',
        hostPatterns: [/(^|\.)dailymotion\.com$/, /(^|\.)dai\.ly$/],
        video: true,
        image: false,
    },
    {
        platform: Platform.IMGUR,
        label: 'Imgur',
        hostPatterns: [/(^|\.)imgur\.com$/],
        video: false,
        image: true,
    },
    {
        platform: Platform.DEVIANTART,
        label: 'DeviantArt',
        hostPatterns: [/(^|\.)deviantart\.com$/],
        video: false,
        image: true,
    },
    {
        platform: Platform.PINTEREST,
        label: 'Pinterest',
        hostPatterns: [/(^|\.)pinterest\.com$/, /(^|\.)pin\.it$/],
        video: false,
        image: true,
    },
    {
        platform: Platform.FLICKR,
        label: 'Flickr',
        hostPatterns: [/(^|\.)flickr\.com$/],
        video: false,
        image: true,
    },
    {
        platform: Platform.FIVE_HUNDRED_PX,
        label: '500px',
        hostPatterns: [/(^|\.)500px\.com$/],
        video: false,
        image: true,
    },
    {
        platform: Platform.UNSPLASH,
        label: 'Unsplash',
        hostPatterns: [/(^|\.)unsplash\.com$/],
        video: false,
        image: true,
    },
    {
        platform: Platform.PEXELS,
        label: 'Pexels',
        hostPatterns: [/(^|\.)pexels\.com$/],
        video: false,
        image: true,
    },
];

export class PlatformClassifier {
    private readonly rules: PlatformRule[];

    constructor(rules: PlatformRule[] = DEFAULT_PLATFORM_RULES) {
        this.rules = rules;
    }

    /**
     * Resolve the platform of a URL, or null when no rule matches
     */
    classify(url: string): PlatformMatch | null {
        let hostname: string;
        try {
            hostname = new URL(url).hostname.toLowerCase();
        } catch {
            return null;
        }

        const rule = this.rules.find((r) => r.hostPatterns.some((p) => p.test(hostname)));
        if (!rule) return null;

        return this.toMatch(rule);
    }

    supportsImages(platform: Platform): boolean {
        return this.findRule(platform)?.image ?? false;
    }

    labelFor(platform: Platform): string {
        return this.findRule(platform)?.label ?? platform;
    }

    list(): PlatformMatch[] {
        return this.rules.map((rule) => this.toMatch(rule));
    }

    /**
     * Pull the first http(s) URL out of free text
     */
    extractUrl(text: string): string | null {
        const matches = text.match(/(https?:\/\/[^\s]+)/gi);
        return matches && matches.length > 0 ? matches[0] : null;
    }

    private findRule(platform: Platform): PlatformRule | undefined {
        return this.rules.find((r) => r.platform === platform);
    }

    private toMatch(rule: PlatformRule): PlatformMatch {
        return { platform: rule.platform, label: rule.label, hint: this.hintFor(rule) };
    }

    private hintFor(rule: PlatformRule): ContentHint {
        if (rule.video && rule.image) return 'mixed';
        return rule.video ? 'video' : 'image';
    }
}
