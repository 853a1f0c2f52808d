/**
 * Browser identity sent to sites that serve bare clients a login wall
 */

import { ExtractOptions, Platform } from '../core/types';

export const BROWSER_USER_AGENT =
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export const BROWSER_HEADERS: Record<string, string> = {
    Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.5',
    'Sec-Fetch-Mode': 'navigate',
};

export const FACEBOOK_EXTRACTOR_ARGS = 'facebook:skip=dash,hls';

export function browserOptions(platform: Platform): Pick<ExtractOptions, 'userAgent' | 'headers' | 'extractorArgs'> {
    return {
        userAgent: BROWSER_USER_AGENT,
        headers: BROWSER_HEADERS,
        extractorArgs: platform === Platform.FACEBOOK ? FACEBOOK_EXTRACTOR_ARGS : undefined,
    };
}
