export { RateLimiter } from './RateLimiter';
export type { RateLimiterOptions } from './RateLimiter';
export { PolicyGate } from './PolicyGate';
export type { UrlVerdict, ContentVerdict, PolicyGateOptions } from './PolicyGate';
