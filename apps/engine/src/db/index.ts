/**
 * Connection management for the durable state backends.
 * The engine talks to Postgres through the narrow SqlDatabase interface so
 * the state store can run against a pg Pool or an in-process fake.
 */
import Redis from 'ioredis';
import { Pool, PoolConfig } from 'pg';

const TAG = '[db]';

export interface SqlQueryResult {
    rows: unknown[];
    rowCount: number | null;
}

export interface SqlClient {
    query(text: string, params?: unknown[]): Promise<SqlQueryResult>;
}

export interface SqlTransactionClient extends SqlClient {
    release(): void;
}

export interface SqlDatabase extends SqlClient {
    connect(): Promise<SqlTransactionClient>;
    end(): Promise<void>;
}

/**
 * Postgres pool with the engine's defaults:
 * - max: 20 connections
 * - idleTimeoutMillis: 30s
 * - connectionTimeoutMillis: 2s (fail fast on connection issues)
 */
export function createPool(connectionString: string, overrides: PoolConfig = {}): Pool {
    const pool = new Pool({
        connectionString,
        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
        ...overrides,
    });

    // idle client errors would otherwise crash the process as unhandled
    pool.on('error', err => {
        console.error(`${TAG} unexpected error on idle client`, err);
    });
    return pool;
}

export function createPgDatabase(pool: Pool): SqlDatabase {
    return {
        query: (text, params) => pool.query(text, params),
        connect: async () => {
            const client = await pool.connect();
            return {
                query: (text, params) => client.query(text, params),
                release: () => client.release(),
            };
        },
        end: () => pool.end(),
    };
}

export function createRedis(url: string): Redis {
    return new Redis(url, { maxRetriesPerRequest: 3 });
}
