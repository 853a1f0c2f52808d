/**
 * VideoStrategy - Downloads a single video with a quality-derived format expression
 */

import { QualityManager, DEFAULT_QUALITY } from '../quality/QualityManager';
import { ExtractionStrategy, ExtractOptions, Platform, StrategyResult } from '../core/types';
import { browserOptions } from './browserProfile';
import { runExtraction, StrategyDependencies } from './runExtraction';

export class VideoStrategy implements ExtractionStrategy {
    readonly kind = 'video' as const;
    private readonly deps: StrategyDependencies;
    private readonly quality: QualityManager;

    constructor(deps: StrategyDependencies, quality: QualityManager = new QualityManager()) {
        this.deps = deps;
        this.quality = quality;
    }

    fetch(url: string, platform: Platform, qualityHint: string = DEFAULT_QUALITY): Promise<StrategyResult> {
        return runExtraction(this.deps, this.kind, url, platform, this.buildOptions(platform, qualityHint));
    }

    buildOptions(platform: Platform, qualityHint: string): ExtractOptions {
        const options: ExtractOptions = { format: this.quality.videoFormat(platform, qualityHint) };
        if (platform === Platform.FACEBOOK) {
            Object.assign(options, browserOptions(platform));
        }
        return options;
    }
}
