/**
 * QualityManager - Quality values users may pick and the yt-dlp format
 * expressions they translate to
 */

import { Platform } from '../core/types';

export const VALID_QUALITY_VALUES = [
    'best',
    'worst',
    'small',
    'best[height<=720]',
    'best[height<=480]',
    'best[height<=360]',
    '720p',
    '480p',
    '360p',
] as const;

export type QualityValue = (typeof VALID_QUALITY_VALUES)[number];

export const DEFAULT_QUALITY: QualityValue = 'best[height<=720]';

const HEIGHT_SHORTHANDS: Record<string, number> = {
    '720p': 720,
    '480p': 480,
    '360p': 360,
};

export class QualityManager {
    private readonly validValues: ReadonlySet<string>;

    constructor(validValues: readonly string[] = VALID_QUALITY_VALUES) {
        this.validValues = new Set(validValues);
    }

    isValid(quality: string): boolean {
        return this.validValues.has(quality);
    }

    list(): string[] {
        return [...this.validValues];
    }

    /**
     * yt-dlp `-f` expression for a video download
     */
    videoFormat(platform: Platform, quality: string): string {
        if (quality === 'small') {
            return 'best[height<=480]/best[height<=720]/best';
        }

        const height = HEIGHT_SHORTHANDS[quality];
        if (height !== undefined) {
            return `best[height<=${height}]/best`;
        }

        // Per-platform caps replace every other quality value
        if (platform === Platform.TIKTOK || platform === Platform.INSTAGRAM) {
            return 'best[height<=720]/best';
        }
        if (platform === Platform.FACEBOOK) {
            return 'best[height<=720]/best[ext=mp4]/best';
        }

        return quality;
    }
}
