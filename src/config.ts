/**
 * Configuration for the shared cache.
 *
 * Loads overrides from `.env` via dotenv, then parses them with zod so a bad
 * value fails at startup rather than on the first cache call.
 *
 * - CACHE_MAX_KEY_LENGTH: longest key `add` accepts
 * - VERBOSE_CACHE_LOGGING: also print get hits/misses
 * - CACHE_REQUEST_TIMEOUT_MS: how long a worker waits for the host to answer
 * - CACHE_DEMO_WORKERS: worker threads started by `npm start`
 */
import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const booleanFlag = z
    .enum(['true', 'false', '1', '0'])
    .transform((value) => value === 'true' || value === '1');

export const cacheEnvSchema = z.object({
    CACHE_MAX_KEY_LENGTH: z.coerce.number().int().min(1).max(65536).default(256),
    VERBOSE_CACHE_LOGGING: booleanFlag.default('false'),
    CACHE_REQUEST_TIMEOUT_MS: z.coerce.number().int().min(1).default(5000),
    CACHE_DEMO_WORKERS: z.coerce.number().int().min(1).max(64).default(4),
});

export interface CacheConfig {
    maxKeyLength: number;
    verboseLogging: boolean;
    requestTimeoutMs: number;
    demoWorkers: number;
}

export function loadCacheConfig(env: NodeJS.ProcessEnv = process.env): CacheConfig {
    const parsed = cacheEnvSchema.parse({
        CACHE_MAX_KEY_LENGTH: env.CACHE_MAX_KEY_LENGTH,
        VERBOSE_CACHE_LOGGING: env.VERBOSE_CACHE_LOGGING,
        CACHE_REQUEST_TIMEOUT_MS: env.CACHE_REQUEST_TIMEOUT_MS,
        CACHE_DEMO_WORKERS: env.CACHE_DEMO_WORKERS,
    });

    return {
        maxKeyLength: parsed.CACHE_MAX_KEY_LENGTH,
        verboseLogging: parsed.VERBOSE_CACHE_LOGGING,
        requestTimeoutMs: parsed.CACHE_REQUEST_TIMEOUT_MS,
        demoWorkers: parsed.CACHE_DEMO_WORKERS,
    };
}
