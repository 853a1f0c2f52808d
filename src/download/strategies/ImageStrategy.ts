/**
 * ImageStrategy - Downloads a still image (or the first item of a gallery)
 * Quality hints do not apply; yt-dlp picks the default rendition
 */

import { PlatformClassifier } from '../core/PlatformClassifier';
import { ExtractionStrategy, ExtractOptions, Platform, StrategyResult } from '../core/types';
import { browserOptions } from './browserProfile';
import { runExtraction, StrategyDependencies } from './runExtraction';

const BROWSER_PLATFORMS = new Set<Platform>([
    Platform.FACEBOOK,
    Platform.INSTAGRAM,
    Platform.TWITTER,
    Platform.REDDIT,
]);

export class ImageStrategy implements ExtractionStrategy {
    readonly kind = 'image' as const;
    private readonly deps: StrategyDependencies;
    private readonly classifier: PlatformClassifier;

    constructor(deps: StrategyDependencies, classifier: PlatformClassifier) {
        this.deps = deps;
        this.classifier = classifier;
    }

    async fetch(url: string, platform: Platform): Promise<StrategyResult> {
        if (!this.classifier.supportsImages(platform)) {
            return {
                ok: false,
                classification: 'unsupported_format',
                message: `Image extraction is not supported for ${this.classifier.labelFor(platform)}`,
                skipped: true,
            };
        }
        return runExtraction(this.deps, this.kind, url, platform, this.buildOptions(platform));
    }

    buildOptions(platform: Platform): ExtractOptions {
        return BROWSER_PLATFORMS.has(platform) ? browserOptions(platform) : {};
    }
}
