/**
 * Database connection management for Postgres and Redis.
 * Both are optional: without DATABASE_URL tasks live only in memory, without
 * REDIS_URL the queue and result channel are in-process.
 */
import Redis from 'ioredis';
import { Pool } from 'pg';

/**
 * Postgres connection pool:
 * - max: 20 connections
 * - idleTimeoutMillis: 30s (release idle connections)
 * - connectionTimeoutMillis: 2s (fail fast on connection issues)
 */
export function createPool(connectionString: string): Pool {
    const pool = new Pool({
        connectionString,
        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
    });

    // Fatal: crash so the supervisor restarts the process
    pool.on('error', (err) => {
        console.error('[db] unexpected error on idle client', err);
        process.exit(-1);
    });
    return pool;
}

export function createRedis(url: string): Redis {
    // BRPOP blocks; no per-request retry limit on blocking connections
    return new Redis(url, { maxRetriesPerRequest: null });
}
