/**
 * Gatehouse - Rate Limiter Algorithms
 */

export { FixedWindowLimiter, createFixedWindowLimiter, parseFixedWindowReply } from './fixed-window.js';

export type { RateLimitRequest, RateLimitResult, RateLimiterInterface } from '../types.js';
