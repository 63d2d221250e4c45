import type { NextFunction, Request, Response } from 'express';
import { logger } from '../logging/logger.js';

interface Bucket {
    tokens: number;
    lastRefill: number;
}

/**
 * Token bucket limiter keyed by caller (client address for the HTTP surface).
 */
export class RateLimiter {
    private buckets: Map<string, Bucket> = new Map();

    private readonly capacity: number;
    private readonly refillRate: number; // tokens per second

    constructor(capacity: number = 5, refillRate: number = 0.1, private readonly now: () => number = Date.now) {
        this.capacity = capacity;
        this.refillRate = refillRate;
    }

    /**
     * Consume a token for the given key.
     * @returns true if allowed, false if limit exceeded
     */
    checkLimit(key: string): boolean {
        const now = this.now();
        let bucket = this.buckets.get(key);

        if (!bucket) {
            bucket = { tokens: this.capacity, lastRefill: now };
            this.buckets.set(key, bucket);
        }

        const elapsedSeconds = (now - bucket.lastRefill) / 1000;
        if (elapsedSeconds > 0) {
            const newTokens = Math.floor(elapsedSeconds * this.refillRate);
            if (newTokens > 0) {
                bucket.tokens = Math.min(this.capacity, bucket.tokens + newTokens);
                bucket.lastRefill = now;
            }
        }

        if (bucket.tokens >= 1) {
            bucket.tokens -= 1;
            return true;
        }

        logger.warn({ key }, "Rate limit exceeded");
        return false;
    }

    /**
     * Seconds until the next token for `key` becomes available.
     */
    retryAfterSeconds(key: string): number {
        const bucket = this.buckets.get(key);
        if (!bucket || bucket.tokens >= 1) return 0;
        const elapsedSeconds = (this.now() - bucket.lastRefill) / 1000;
        return Math.max(1, Math.ceil(1 / this.refillRate - elapsedSeconds));
    }
}

/**
 * Express guard answering 429 once the caller's bucket is empty.
 */
export function rateLimit(limiter: RateLimiter) {
    return (req: Request, res: Response, next: NextFunction): void => {
        const key = req.ip ?? req.socket.remoteAddress ?? 'unknown';
        if (limiter.checkLimit(key)) {
            next();
            return;
        }
        res.setHeader('Retry-After', String(limiter.retryAfterSeconds(key)));
        res.status(429).json({ error: 'RATE_LIMITED', message: 'Too many reconnect requests' });
    };
}
