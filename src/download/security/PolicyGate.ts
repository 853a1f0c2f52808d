/**
 * PolicyGate - Allow/deny rules applied before and after metadata extraction
 *
 * URL checks are heuristic: private content that slips through is caught by
 * the extraction step failing on its own.
 */

import { z } from 'zod';
import { PlatformClassifier } from '../core/PlatformClassifier';
import { ExtractionMetadata, Platform, PlatformMatch, PolicyReason } from '../core/types';
import { logger } from '../../utils/logger';

const UrlSchema = z
    .string()
    .trim()
    .url()
    .refine((url) => /^https?:\/\//i.test(url), { message: 'Only http(s) links are accepted' });

export const DEFAULT_BLOCKED_DOMAINS = ['onlyfans.com', 'pornhub.com', 'xvideos.com'];

export const DEFAULT_BLOCKED_KEYWORDS = [
    'nsfw',
    'adult',
    'explicit',
    'violence',
    'harassment',
    'hate',
    'discrimination',
    'illegal',
];

export const DEFAULT_PRIVATE_PATTERNS: Partial<Record<Platform, string[]>> = {
    [Platform.FACEBOOK]: ['/friends/', '/family/', '/private/', 'story_fbid', 'permalink', 'photo.php'],
    [Platform.INSTAGRAM]: ['/stories/', '/story/', '/highlights/', 'private', 'close_friends'],
    // '/status/' is every public tweet, so it is not treated as private
    [Platform.TWITTER]: ['protected', 'private'],
    [Platform.TIKTOK]: ['/private/', 'private_video'],
};

export const DEFAULT_MAX_DURATION_SECONDS = 600;

export type UrlVerdict =
    | { allowed: true; platform: PlatformMatch }
    | { allowed: false; reason: Exclude<PolicyReason, 'policy_violation'>; platform?: PlatformMatch };

export type ContentVerdict =
    | { allowed: true }
    | { allowed: false; reason: 'policy_violation'; detail: string };

export interface PolicyGateOptions {
    blockedDomains?: string[];
    blockedKeywords?: string[];
    privatePatterns?: Partial<Record<Platform, string[]>>;
    maxDurationSeconds?: number;
}

export class PolicyGate {
    private readonly classifier: PlatformClassifier;
    private readonly blockedDomains: string[];
    private readonly keywordPatterns: Array<{ keyword: string; pattern: RegExp }>;
    private readonly privatePatterns: Partial<Record<Platform, string[]>>;
    private readonly maxDurationSeconds: number;

    constructor(classifier: PlatformClassifier, options: PolicyGateOptions = {}) {
        this.classifier = classifier;
        this.blockedDomains = (options.blockedDomains ?? DEFAULT_BLOCKED_DOMAINS).map((d) => d.toLowerCase());
        this.keywordPatterns = (options.blockedKeywords ?? DEFAULT_BLOCKED_KEYWORDS).map((keyword) => ({
            keyword,
            pattern: new RegExp(`\\b${escapeRegExp(keyword)}\\b`, 'i'),
        }));
        this.privatePatterns = options.privatePatterns ?? DEFAULT_PRIVATE_PATTERNS;
        this.maxDurationSeconds = options.maxDurationSeconds ?? DEFAULT_MAX_DURATION_SECONDS;
    }

    /**
     * URL-level checks, in order: platform, denylisted domain, private-content path
     */
    validate(url: string): UrlVerdict {
        const parsed = UrlSchema.safeParse(url);
        const match = parsed.success ? this.classifier.classify(parsed.data) : null;
        if (!parsed.success || !match) {
            return { allowed: false, reason: 'unsupported_platform' };
        }

        const lower = parsed.data.toLowerCase();

        if (this.blockedDomains.some((domain) => lower.includes(domain))) {
            logger.info('🚫 Blocked domain rejected', { platform: match.platform });
            return { allowed: false, reason: 'blocked_domain', platform: match };
        }

        const patterns = this.privatePatterns[match.platform] ?? [];
        if (patterns.some((p) => lower.includes(p.toLowerCase()))) {
            return { allowed: false, reason: 'private_content', platform: match };
        }

        return { allowed: true, platform: match };
    }

    /**
     * Content-level checks run once metadata is known
     */
    checkContent(metadata: ExtractionMetadata): ContentVerdict {
        const haystack = [metadata.title ?? '', metadata.description ?? '', ...(metadata.tags ?? [])];

        for (const { keyword, pattern } of this.keywordPatterns) {
            if (haystack.some((text) => pattern.test(text))) {
                return { allowed: false, reason: 'policy_violation', detail: `blocked keyword: ${keyword}` };
            }
        }

        if ((metadata.duration ?? 0) > this.maxDurationSeconds) {
            return {
                allowed: false,
                reason: 'policy_violation',
                detail: `duration ${metadata.duration}s exceeds ${this.maxDurationSeconds}s`,
            };
        }

        return { allowed: true };
    }
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
