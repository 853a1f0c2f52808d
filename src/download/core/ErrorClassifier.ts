/**
 * ErrorClassifier - Buckets extraction engine error text into a classification
 *
 * Rules are checked in order and the first match wins, so the more specific
 * buckets sit above the broad "unavailable" one. Extend by passing a custom table.
 */

import { ErrorClassification } from './types';

export interface ClassificationRule {
    classification: ErrorClassification;
    patterns: RegExp[];
}

export const DEFAULT_CLASSIFICATION_RULES: ClassificationRule[] = [
    {
        classification: 'rate_limited',
        patterns: [/\b429\b/, /too many requests/i, /rate.?limit/i],
    },
    {
        classification: 'private_or_login_required',
        patterns: [
            /login required/i,
            /sign in/i,
            /\bprivate\b/i,
            /\bprotected\b/i,
            /authentication/i,
            /members[- ]only/i,
            /confirm your age/i,
        ],
    },
    {
        classification: 'unsupported_format',
        patterns: [
            /unsupported url/i,
            /no video formats/i,
            /requested format is not available/i,
            /pfbid/i,
            /no media found/i,
        ],
    },
    {
        classification: 'content_unavailable',
        patterns: [
            /unavailable/i,
            /not available/i,
            /removed/i,
            /deleted/i,
            /does not exist/i,
            /\b404\b/,
            /\b403\b/,
            /forbidden/i,
            /geo.?restrict/i,
        ],
    },
];

export function classifyExtractionError(
    message: string,
    rules: ClassificationRule[] = DEFAULT_CLASSIFICATION_RULES,
): ErrorClassification {
    const rule = rules.find((r) => r.patterns.some((p) => p.test(message)));
    return rule ? rule.classification : 'generic_extraction_error';
}
