import { Redis } from 'ioredis';
import { logger, ILogger } from '../config/logger';
import { getSettings } from '../config/settings';
import { errorMessage } from '../errors';
import { cacheEntrySchema } from '../schemas/evaluation.schema';
import { CacheEntry, EvaluationResult } from '../types/evaluation';
import { buildCacheKey } from '../utils/fingerprint.util';

/**
 * Cache Store contract. Best-effort on both sides: implementations must
 * resolve (never reject) when the backing store is unavailable.
 */
export interface ICacheStore {
    get(fingerprint: string): Promise<EvaluationResult | null>;
    set(fingerprint: string, value: EvaluationResult, ttlSeconds: number): Promise<void>;
}

export type IRedisClient = Pick<Redis, 'get' | 'set' | 'ping' | 'quit'>;

/**
 * Redis Cache Store
 *
 * Stores one JSON-encoded CacheEntry per fingerprint (under a key prefix)
 * with `SET ... EX`.
 * Expiry is left entirely to Redis; nothing here deletes keys.
 */
export class RedisCacheStore implements ICacheStore {
    constructor(
        private redis: IRedisClient,
        private logger: ILogger,
        private keyPrefix: string = 'eval:'
    ) { }

    /**
     * Factory method for production use
     */
    static create(): RedisCacheStore {
        const settings = getSettings();

        const redis = new Redis(settings.cache.redisUrl, {
            lazyConnect: true,
            enableOfflineQueue: false,
            maxRetriesPerRequest: 1,
            commandTimeout: settings.cache.commandTimeoutMs,
            retryStrategy: (times: number) => Math.min(times * 500, 10000)
        });

        redis.on('error', (error: Error) => {
            logger.warn({ error: error.message }, 'Redis connection error');
        });

        redis.connect().catch((error: unknown) => {
            logger.warn({ error: errorMessage(error) }, 'Redis unavailable, evaluations will not be cached');
        });

        return new RedisCacheStore(redis, logger, settings.cache.keyPrefix);
    }

    async get(fingerprint: string): Promise<EvaluationResult | null> {
        const key = buildCacheKey(this.keyPrefix, fingerprint);
        let raw: string | null;

        try {
            raw = await this.redis.get(key);
        } catch (error: unknown) {
            this.logger.warn({ key, error: errorMessage(error) }, 'Cache read failed');
            return null;
        }

        if (raw === null) {
            return null;
        }

        try {
            const entry = cacheEntrySchema.parse(JSON.parse(raw));
            return Object.freeze({ ...entry.result });
        } catch (error: unknown) {
            this.logger.warn({ key, error: errorMessage(error) }, 'Ignoring malformed cache entry');
            return null;
        }
    }

    async set(fingerprint: string, value: EvaluationResult, ttlSeconds: number): Promise<void> {
        const key = buildCacheKey(this.keyPrefix, fingerprint);
        const entry: CacheEntry = {
            fingerprint,
            result: value,
            created_at: new Date().toISOString(),
            ttl_seconds: ttlSeconds
        };

        try {
            await this.redis.set(key, JSON.stringify(entry), 'EX', ttlSeconds);
            this.logger.debug({ key, ttlSeconds }, 'Evaluation cached');
        } catch (error: unknown) {
            this.logger.warn({ key, error: errorMessage(error) }, 'Cache write failed');
        }
    }

    async ping(): Promise<boolean> {
        try {
            return (await this.redis.ping()) === 'PONG';
        } catch {
            return false;
        }
    }

    async close(): Promise<void> {
        try {
            await this.redis.quit();
        } catch (error: unknown) {
            this.logger.warn({ error: errorMessage(error) }, 'Redis quit failed');
        }
    }
}

// Singleton instance
let cacheStore: RedisCacheStore | null = null;

export function getCacheStore(): RedisCacheStore {
    if (!cacheStore) {
        cacheStore = RedisCacheStore.create();
    }
    return cacheStore;
}
