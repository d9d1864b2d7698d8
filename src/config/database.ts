import { Pool, PoolClient, PoolConfig, QueryResultRow } from 'pg';
import { errorMessage, log, logError } from '../utils/logger';

export interface PostgresSettings {
    databaseUrl: string | null;
    host: string;
    port: number;
    database: string;
    user: string;
    password: string;
}

export const getDatabaseConfig = (settings: PostgresSettings): PoolConfig => {
    if (settings.databaseUrl) {
        return {
            connectionString: settings.databaseUrl,
            ssl: false
        };
    } else {
        return {
            host: settings.host,
            port: settings.port,
            database: settings.database,
            user: settings.user,
            password: settings.password
        };
    }
};

export function createPool(config: PoolConfig): Pool {
    const pool = new Pool(config);

    pool.on('connect', () => {
        log('[DB] Database connection established');
    });

    pool.on('error', (err: Error) => {
        logError('[DB] Unexpected database error:', err.message);
    });

    return pool;
}

function errorCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

function isRetryableError(error: unknown): { retry: boolean; starting: boolean } {
    const code = errorCode(error);
    const isConnectionError = code === 'ETIMEDOUT' ||
                             code === 'ECONNREFUSED' ||
                             code === 'ECONNRESET';

    const message = errorMessage(error);
    const isDatabaseStarting = message.includes('starting up') ||
                              message.includes('not accept connections') ||
                              message.includes('shutting down');

    return { retry: isConnectionError || isDatabaseStarting, starting: isDatabaseStarting };
}

const RETRY_DELAY_MS = 2000;

async function queryWithRetry<T extends QueryResultRow>(
    pool: Pool,
    text: string,
    params: unknown[] = [],
    retries = 3
): Promise<T[]> {
    for (let attempt = 1; attempt <= retries; attempt++) {
        let client: PoolClient | undefined;
        let broken = false;
        try {
            client = await pool.connect();
            const result = await client.query<T>(text, params);
            return result.rows;
        } catch (error) {
            const { retry, starting } = isRetryableError(error);
            // only a connection-level failure takes the client out of the pool
            broken = retry;

            if (retry && attempt < retries) {
                log(`[DB] ${starting ? 'Database restarting' : 'Connection error'}, retrying (${attempt}/${retries})...`);
                await new Promise(resolve => setTimeout(resolve, RETRY_DELAY_MS * attempt));
                continue;
            }

            throw error;
        } finally {
            client?.release(broken);
        }
    }
    throw new Error('Max retries reached');
}

export async function query<T extends QueryResultRow>(pool: Pool, text: string, params?: unknown[]): Promise<T[]> {
    return queryWithRetry<T>(pool, text, params);
}

export async function queryOne<T extends QueryResultRow>(pool: Pool, text: string, params?: unknown[]): Promise<T | null> {
    const rows = await query<T>(pool, text, params);
    return rows.length > 0 ? rows[0] : null;
}

/** Runs `work` inside BEGIN/COMMIT on one client; rolls back and rethrows on failure. */
export async function withTransaction<T>(pool: Pool, work: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await pool.connect();
    try {
        await client.query('BEGIN');
        const result = await work(client);
        await client.query('COMMIT');
        return result;
    } catch (error) {
        try {
            await client.query('ROLLBACK');
        } catch (rollbackError) {
            logError('[DB] Rollback failed:', errorMessage(rollbackError));
        }
        throw error;
    } finally {
        client.release();
    }
}

export async function closePool(pool: Pool): Promise<void> {
    await pool.end();
}
