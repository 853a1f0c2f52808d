/**
 * Core Types for the download pipeline
 * Shared by the classifier, analyzer, policy gate, strategies and the queue
 */

// ============================================================================
// Enums
// ============================================================================

export enum Platform {
    YOUTUBE = 'youtube',
    TIKTOK = 'tiktok',
    INSTAGRAM = 'instagram',
    FACEBOOK = 'facebook',
    TWITTER = 'twitter',
    REDDIT = 'reddit',
    TWITCH = 'twitch',
    VIMEO = 'vimeo',
    DAILYMOTION = 'dailymotion',
    IMGUR = 'imgur',
    DEVIANTART = 'deviantart',
    PINTEREST = 'pinterest',
    FLICKR = 'flickr',
    FIVE_HUNDRED_PX = '500px',
    UNSPLASH = 'unsplash',
    PEXELS = 'pexels',
}

// ============================================================================
// Classification
// ============================================================================

/** Coarse hint from the URL alone: what the platform usually serves */
export type ContentHint = 'video' | 'image' | 'mixed';

export interface PlatformMatch {
    platform: Platform;
    label: string;
    hint: ContentHint;
}

export type ContentType =
    | 'video'
    | 'image'
    | 'gallery'
    | 'story'
    | 'reel'
    | 'thread'
    | 'unknown';

// ============================================================================
// Extraction metadata
// ============================================================================

export interface MediaFormat {
    formatId: string;
    ext?: string;
    width?: number;
    height?: number;
    vcodec?: string;
    acodec?: string;
}

/** Normalized engine output, every field optional because sites omit most of them */
export interface ExtractionMetadata {
    title?: string;
    description?: string;
    duration?: number;
    uploader?: string;
    tags?: string[];
    width?: number;
    height?: number;
    ext?: string;
    webpageUrl?: string;
    formats?: MediaFormat[];
}

export interface AnalysisDetails {
    resolution?: string;
    duration?: number;
    uploader?: string;
    tags: string[];
    formatCount: number;
    hasVideo: boolean;
    hasAudio: boolean;
}

export interface ContentAnalysis {
    contentType: ContentType;
    confidence: number;
    metadata: AnalysisDetails;
    /** true when the type was guessed from the URL because metadata extraction failed */
    fallbackDetection: boolean;
}

// ============================================================================
// Engine
// ============================================================================

export interface ExtractOptions {
    format?: string;
    userAgent?: string;
    headers?: Record<string, string>;
    extractorArgs?: string;
    /** When set the engine downloads to this template, otherwise it only probes */
    outputTemplate?: string;
    timeoutMs?: number;
}

export interface ExtractionEngine {
    extract(url: string, options?: ExtractOptions): Promise<ExtractionMetadata>;
}

// ============================================================================
// Errors & policy
// ============================================================================

export type ErrorClassification =
    | 'private_or_login_required'
    | 'unsupported_format'
    | 'rate_limited'
    | 'content_unavailable'
    | 'file_too_large'
    | 'generic_extraction_error';

/** Everything the notifier can be asked to report as a terminal failure */
export type NotifyClassification =
    | ErrorClassification
    | 'policy_violation'
    | 'delivery_failed';

export type PolicyReason =
    | 'unsupported_platform'
    | 'blocked_domain'
    | 'private_content'
    | 'policy_violation';

export type AdmissionReason = 'rate_limited' | 'queue_full' | 'invalid_quality';

// ============================================================================
// Strategies
// ============================================================================

export type StrategyKind = 'video' | 'image';

export interface StrategySuccess {
    ok: true;
    filePath: string;
    title: string;
    sizeBytes: number;
    sessionId: string;
    /** Deletes the downloaded file and its session directory */
    release(): Promise<void>;
}

export interface StrategyFailure {
    ok: false;
    classification: ErrorClassification;
    message: string;
    /** Set when the strategy declined the platform without calling the engine */
    skipped?: boolean;
}

export type StrategyResult = StrategySuccess | StrategyFailure;

export interface ExtractionStrategy {
    readonly kind: StrategyKind;
    fetch(url: string, platform: Platform, qualityHint?: string): Promise<StrategyResult>;
}

export type StrategySet = Record<StrategyKind, ExtractionStrategy>;
