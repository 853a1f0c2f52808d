import { ContentType, StrategyKind } from '../core/types';

/**
 * Primary and fallback strategy for a content type.
 * thread/unknown go image-first as a fixed policy; whichever attempt succeeds is kept.
 */
export function selectStrategyOrder(contentType: ContentType): [StrategyKind, StrategyKind] {
    switch (contentType) {
        case 'video':
        case 'reel':
        case 'story':
            return ['video', 'image'];
        case 'image':
        case 'gallery':
        case 'thread':
        case 'unknown':
            return ['image', 'video'];
    }
}
