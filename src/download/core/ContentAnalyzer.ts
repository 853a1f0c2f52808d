/**
 * ContentAnalyzer - Infers what kind of media a link points at
 *
 * Rules are keyed by platform. Keyword overrides on the lower-cased title win
 * over the duration rule; anything without a duration and without a keyword
 * hit is treated as an image. The confidence score is telemetry only.
 */

import {
    AnalysisDetails,
    ContentAnalysis,
    ContentType,
    ExtractionMetadata,
    Platform,
} from './types';

interface KeywordRule {
    keywords: string[];
    type: ContentType;
}

interface PlatformContentRules {
    keywords: KeywordRule[];
    /** Type when the item has a positive duration and no keyword matched */
    withDuration: ContentType;
    /** Type when nothing else matched */
    otherwise: ContentType;
    /** Keyword rules evaluated only after the duration rule */
    afterDuration?: KeywordRule[];
}

const DEFAULT_RULES: PlatformContentRules = {
    keywords: [],
    withDuration: 'video',
    otherwise: 'image',
};

const CONTENT_RULES: Partial<Record<Platform, PlatformContentRules>> = {
    [Platform.INSTAGRAM]: {
        keywords: [
            { keywords: ['story', 'stories'], type: 'story' },
            { keywords: ['reel', 'reels'], type: 'reel' },
            { keywords: ['carousel', 'gallery', 'multiple'], type: 'gallery' },
        ],
        withDuration: 'video',
        otherwise: 'image',
    },
    [Platform.FACEBOOK]: {
        keywords: [
            { keywords: ['album', 'gallery', 'photos'], type: 'gallery' },
            { keywords: ['reel', 'reels'], type: 'reel' },
        ],
        withDuration: 'video',
        otherwise: 'image',
    },
    [Platform.TWITTER]: {
        keywords: [{ keywords: ['thread', '🧵'], type: 'thread' }],
        withDuration: 'video',
        otherwise: 'image',
    },
    [Platform.TIKTOK]: {
        keywords: [],
        withDuration: 'video',
        otherwise: 'video',
    },
    [Platform.YOUTUBE]: {
        keywords: [],
        withDuration: 'video',
        otherwise: 'unknown',
    },
    [Platform.REDDIT]: {
        keywords: [],
        withDuration: 'video',
        afterDuration: [{ keywords: ['gallery', 'album'], type: 'gallery' }],
        otherwise: 'image',
    },
};

// Platforms whose metadata is rich enough to trust a little more
const RECOGNIZED_PLATFORMS = new Set<Platform>([
    Platform.FACEBOOK,
    Platform.INSTAGRAM,
    Platform.TWITTER,
    Platform.TIKTOK,
    Platform.YOUTUBE,
    Platform.REDDIT,
]);

export class ContentAnalyzer {
    analyze(metadata: ExtractionMetadata, platform: Platform): ContentAnalysis {
        return {
            contentType: this.detectType(metadata, platform),
            confidence: this.confidence(metadata, platform),
            metadata: this.details(metadata),
            fallbackDetection: false,
        };
    }

    /**
     * Best guess from the URL shape, used when metadata extraction failed
     */
    analyzeUrl(url: string, platform: Platform): ContentAnalysis {
        const empty: AnalysisDetails = {
            tags: [],
            formatCount: 0,
            hasVideo: false,
            hasAudio: false,
        };

        if (platform !== Platform.FACEBOOK) {
            return { contentType: 'unknown', confidence: 0, metadata: empty, fallbackDetection: true };
        }

        const lower = url.toLowerCase();
        let contentType: ContentType = 'image';
        let confidence = 0.5;

        if (lower.includes('/photos/') || lower.includes('/photo/')) {
            contentType = 'gallery';
            confidence = 0.7;
        } else if (lower.includes('/videos/') || lower.includes('/video/')) {
            contentType = 'video';
            confidence = 0.7;
        } else if (lower.includes('/reels/') || lower.includes('/reel/')) {
            contentType = 'reel';
            confidence = 0.8;
        } else if (lower.includes('/stories/') || lower.includes('/story/')) {
            contentType = 'story';
            confidence = 0.8;
        }

        return { contentType, confidence, metadata: empty, fallbackDetection: true };
    }

    private detectType(metadata: ExtractionMetadata, platform: Platform): ContentType {
        const rules = CONTENT_RULES[platform] ?? DEFAULT_RULES;
        const title = (metadata.title ?? '').toLowerCase();

        const keywordHit = this.matchKeywords(title, rules.keywords);
        if (keywordHit) return keywordHit;

        if ((metadata.duration ?? 0) > 0) return rules.withDuration;

        const lateHit = this.matchKeywords(title, rules.afterDuration ?? []);
        if (lateHit) return lateHit;

        return rules.otherwise;
    }

    private matchKeywords(text: string, rules: KeywordRule[]): ContentType | null {
        const rule = rules.find((r) => r.keywords.some((k) => text.includes(k)));
        return rule ? rule.type : null;
    }

    // Counted in tenths so 0.5 + 0.2 + 0.1 lands exactly on 0.8
    private confidence(metadata: ExtractionMetadata, platform: Platform): number {
        let tenths = 5;
        if (metadata.formats && metadata.formats.length > 0) tenths += 2;
        if (metadata.title && metadata.title !== 'Unknown') tenths += 1;
        if (metadata.description) tenths += 1;
        if (RECOGNIZED_PLATFORMS.has(platform)) tenths += 1;
        return Math.min(tenths, 10) / 10;
    }

    private details(metadata: ExtractionMetadata): AnalysisDetails {
        const formats = metadata.formats ?? [];
        return {
            resolution:
                metadata.width && metadata.height ? `${metadata.width}x${metadata.height}` : undefined,
            duration: metadata.duration,
            uploader: metadata.uploader,
            tags: metadata.tags ?? [],
            formatCount: formats.length,
            hasVideo: formats.some((f) => !!f.vcodec && f.vcodec !== 'none'),
            hasAudio: formats.some((f) => !!f.acodec && f.acodec !== 'none'),
        };
    }
}
