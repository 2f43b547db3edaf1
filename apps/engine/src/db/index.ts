/**
 * Database connection management for Postgres and Redis.
 */
import fs from 'fs/promises';
import path from 'path';
import Redis from 'ioredis';
import { Pool } from 'pg';

/**
 * Postgres connection pool:
 * - max: 20 connections, one of them held by the change-feed LISTEN session
 * - idleTimeoutMillis: 30s (release idle connections)
 * - connectionTimeoutMillis: 2s (fail fast on connection issues)
 */
export function createPool(connectionString: string): Pool {
    return new Pool({
        connectionString,
        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
    });
}

/** Redis client for leadership and the change-feed resume token */
export function createRedis(url: string): Redis {
    return new Redis(url, { maxRetriesPerRequest: 3 });
}

export const SCHEMA_PATH = path.join(__dirname, 'schema.sql');

/** Creates tables, indexes and the change-feed trigger if they are missing. */
export async function applySchema(pool: Pool): Promise<void> {
    const sql = await fs.readFile(SCHEMA_PATH, 'utf-8');
    await pool.query(sql);
}
