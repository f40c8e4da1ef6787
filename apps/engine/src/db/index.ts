/**
 * Postgres connection pool for the postgres job store.
 */
import { Pool } from 'pg';

/**
 * Pool settings:
 * - max: 10 connections (one engine process, writes are per record)
 * - idleTimeoutMillis: 30s (release idle connections)
 * - connectionTimeoutMillis: 2s (fail fast on connection issues)
 */
export function createPool(connectionString: string | undefined): Pool {
    const pool = new Pool({
        connectionString,
        max: 10,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
    });

    pool.on('error', (err) => {
        console.error('[db] unexpected error on idle client', err);
    });

    return pool;
}
