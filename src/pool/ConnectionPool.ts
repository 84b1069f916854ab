/**
 * pg-maint - Connection Pool Manager
 *
 * Wraps pg connection pooling. One session serves the statistics snapshot
 * and backend cancellation; each maintenance operation checks out its own
 * session for the duration of its statement.
 */

import pg from 'pg';
import type { PoolClient, QueryResult, QueryResultRow } from 'pg';
import type { DatabaseConfig, PoolConfig } from '../types/index.js';
import { PoolError, ConnectionError } from '../types/index.js';
import { logger } from '../utils/logger.js';

const log = logger.forModule('POOL');

/**
 * Connection pool configuration with defaults
 */
export interface ConnectionPoolConfig {
    database: DatabaseConfig;
    pool?: PoolConfig | undefined;
}

/**
 * Connection pool wrapper with an initialization probe and graceful shutdown
 */
export class ConnectionPool {
    private pool: pg.Pool | null = null;
    private config: ConnectionPoolConfig;
    private shuttingDown = false;

    constructor(config: ConnectionPoolConfig) {
        this.config = config;
    }

    /**
     * Initialize the connection pool and verify the server is reachable
     *
     * @throws ConnectionError when the probe query fails
     */
    async initialize(): Promise<void> {
        if (this.pool !== null) {
            log.warn('Connection pool already initialized');
            return;
        }

        const db = this.config.database;
        log.info('Initializing PostgreSQL connection pool', {
            host: db.host,
            port: db.port,
            database: db.database
        });

        try {
            const poolConfig: pg.PoolConfig = {
                max: this.config.pool?.max ?? 2,
                idleTimeoutMillis: this.config.pool?.idleTimeoutMillis ?? 10000,
                connectionTimeoutMillis: this.config.pool?.connectionTimeoutMillis ?? 10000,
                allowExitOnIdle: true,
                application_name: 'pg-maint'
            };

            if (db.connectionString !== undefined) {
                poolConfig.connectionString = db.connectionString;
            } else {
                poolConfig.host = db.host;
                poolConfig.port = db.port;
                poolConfig.user = db.username;
                poolConfig.password = db.password;
                poolConfig.database = db.database;
            }

            if (db.ssl) {
                poolConfig.ssl = { rejectUnauthorized: false };
            }

            this.pool = new pg.Pool(poolConfig);

            this.pool.on('error', (err) => {
                log.error('Pool error', { error: err.message });
            });

            const client = await this.pool.connect();
            const result = await client.query<{ version: string }>('SELECT version()');
            client.release();

            log.info('PostgreSQL connection pool initialized', {
                version: result.rows[0]?.version ?? 'unknown'
            });

        } catch (error) {
            if (this.pool !== null) {
                const failed = this.pool;
                this.pool = null;
                await failed.end().catch((endError: unknown) => {
                    log.debug('Error closing pool after failed initialization', {
                        error: endError instanceof Error ? endError.message : String(endError)
                    });
                });
            }
            const message = error instanceof Error ? error.message : 'Unknown error';
            log.error('Failed to initialize connection pool', { code: 'PG_CONNECT_FAILED', error: message });
            throw new ConnectionError(`Failed to connect to PostgreSQL: ${message}`, {
                host: db.host,
                port: db.port
            });
        }
    }

    /**
     * Get a dedicated session from the pool
     */
    async getConnection(): Promise<PoolClient> {
        if (this.pool === null) {
            throw new PoolError('Connection pool not initialized');
        }

        if (this.shuttingDown) {
            throw new PoolError('Connection pool is shutting down');
        }

        try {
            return await this.pool.connect();
        } catch (error) {
            const message = error instanceof Error ? error.message : 'Unknown error';
            throw new PoolError(`Failed to acquire connection: ${message}`);
        }
    }

    /**
     * Release a connection back to the pool
     */
    releaseConnection(client: PoolClient): void {
        try {
            client.release();
        } catch (error) {
            log.warn('Error releasing connection', {
                error: error instanceof Error ? error.message : 'Unknown error'
            });
        }
    }

    /**
     * Execute a query using a pooled connection
     */
    async query<R extends QueryResultRow = QueryResultRow>(
        sql: string,
        params?: unknown[]
    ): Promise<QueryResult<R>> {
        if (this.pool === null) {
            throw new PoolError('Connection pool not initialized');
        }

        const startTime = Date.now();

        try {
            const result = await this.pool.query<R>(sql, params);

            log.debug('Query executed', {
                sql: sql.substring(0, 100),
                rowCount: result.rowCount,
                durationMs: Date.now() - startTime
            });

            return result;
        } catch (error) {
            const message = error instanceof Error ? error.message : 'Unknown error';
            log.error('Query failed', { sql: sql.substring(0, 100), error: message });
            throw error;
        }
    }

    /**
     * Ask the server to cancel the statement running in another session
     *
     * @returns whether the signal was delivered
     */
    async cancelBackend(pid: number): Promise<boolean> {
        const result = await this.query<{ cancelled: boolean }>(
            'SELECT pg_cancel_backend($1) AS cancelled',
            [pid]
        );
        return result.rows[0]?.cancelled === true;
    }

    /**
     * Gracefully shutdown the pool
     */
    async shutdown(): Promise<void> {
        if (this.pool === null) {
            return;
        }

        log.info('Shutting down connection pool...');
        this.shuttingDown = true;

        try {
            await this.pool.end();
            this.pool = null;
            log.info('Connection pool shut down successfully');
        } catch (error) {
            log.error('Error during pool shutdown', {
                error: error instanceof Error ? error.message : 'Unknown error'
            });
            throw error;
        }
    }
}
