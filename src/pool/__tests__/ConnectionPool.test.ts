/**
 * Unit tests for Connection Pool
 *
 * Tests the initialization probe, session checkout, backend cancellation and
 * graceful shutdown. Uses manually constructed mock to test behavior without
 * a real database.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ConnectionError, PoolError } from '../../types/index.js';

// Create mock functions that we can reference
const mockClientQuery = vi.fn();
const mockClientRelease = vi.fn();

const mockPoolConnect = vi.fn();
const mockPoolQuery = vi.fn();
const mockPoolEnd = vi.fn();
const mockPoolOn = vi.fn();

// Configs passed to the pg.Pool constructor
const poolConfigs: unknown[] = [];

// Mock pg module before importing ConnectionPool
vi.mock('pg', () => {
    const MockPool = function (config: unknown) {
        poolConfigs.push(config);
        return {
            connect: mockPoolConnect,
            query: mockPoolQuery,
            end: mockPoolEnd,
            on: mockPoolOn
        };
    };
    return {
        default: { Pool: MockPool }
    };
});

// Mock the logger to avoid console output
vi.mock('../../utils/logger.js', async (importOriginal) => {
    const { withMockLogger } = await import('../../__tests__/mocks/logger.js');
    return withMockLogger(await importOriginal());
});

// Import after mocking
import { ConnectionPool } from '../ConnectionPool.js';

describe('ConnectionPool', () => {
    let pool: ConnectionPool;

    beforeEach(() => {
        vi.clearAllMocks();
        poolConfigs.length = 0;

        // Setup default mock implementations
        mockClientQuery.mockResolvedValue({ rows: [{ version: 'PostgreSQL 16.0' }] });
        mockClientRelease.mockReturnValue(undefined);
        mockPoolConnect.mockResolvedValue({
            query: mockClientQuery,
            release: mockClientRelease
        });
        mockPoolQuery.mockResolvedValue({ rows: [], rowCount: 0 });
        mockPoolEnd.mockResolvedValue(undefined);

        pool = new ConnectionPool({
            database: {
                host: 'localhost',
                port: 5432,
                username: 'test',
                password: 'test-secret',
                database: 'testdb',
                ssl: false
            },
            pool: { max: 3 }
        });
    });

    describe('Initialization', () => {
        it('should initialize successfully', async () => {
            await pool.initialize();
            await expect(pool.getConnection()).resolves.toBeDefined();
        });

        it('should not reinitialize if already initialized', async () => {
            await pool.initialize();
            await pool.initialize(); // Should warn but not throw

            expect(poolConfigs).toHaveLength(1);
            expect(mockPoolConnect).toHaveBeenCalledTimes(1);
        });

        it('should probe the server with SELECT version()', async () => {
            await pool.initialize();

            expect(mockPoolConnect).toHaveBeenCalledTimes(1);
            expect(mockClientQuery).toHaveBeenCalledWith('SELECT version()');
            expect(mockClientRelease).toHaveBeenCalledTimes(1);
        });

        it('should pass individual connection fields and pool size', async () => {
            await pool.initialize();

            expect(poolConfigs[0]).toMatchObject({
                host: 'localhost',
                port: 5432,
                user: 'test',
                password: 'test-secret',
                database: 'testdb',
                max: 3,
                application_name: 'pg-maint'
            });
        });

        it('should prefer a connection string and enable SSL', async () => {
            const urlPool = new ConnectionPool({
                database: {
                    connectionString: 'postgres://maint@db.internal:5433/app',
                    host: 'db.internal',
                    port: 5433,
                    username: 'maint',
                    password: '',
                    database: 'app',
                    ssl: true
                }
            });

            await urlPool.initialize();

            expect(poolConfigs[0]).toMatchObject({
                connectionString: 'postgres://maint@db.internal:5433/app',
                ssl: { rejectUnauthorized: false },
                max: 2
            });
            expect(poolConfigs[0]).not.toHaveProperty('host');
        });
    });

    describe('Initialization Errors', () => {
        it('should throw ConnectionError when initial connection fails', async () => {
            mockPoolConnect.mockRejectedValueOnce(new Error('Connection refused'));

            await expect(pool.initialize()).rejects.toThrow(ConnectionError);
        });

        it('should include the cause in the message', async () => {
            mockPoolConnect.mockRejectedValueOnce(new Error('password authentication failed'));

            await expect(pool.initialize()).rejects.toThrow(
                'Failed to connect to PostgreSQL: password authentication failed'
            );
        });

        it('should clean up on initialization failure', async () => {
            mockPoolConnect.mockRejectedValueOnce(new Error('Auth failure'));

            await expect(pool.initialize()).rejects.toThrow();

            expect(mockPoolEnd).toHaveBeenCalledTimes(1);
            await expect(pool.getConnection()).rejects.toThrow('not initialized');
        });
    });

    describe('Connection Management', () => {
        it('should throw when getting connection from uninitialized pool', async () => {
            await expect(pool.getConnection()).rejects.toThrow(PoolError);
            await expect(pool.getConnection()).rejects.toThrow('not initialized');
        });

        it('should throw when querying uninitialized pool', async () => {
            await expect(pool.query('SELECT 1')).rejects.toThrow(PoolError);
        });

        it('should release connections properly', async () => {
            await pool.initialize();

            const client = await pool.getConnection();
            pool.releaseConnection(client);

            expect(mockClientRelease).toHaveBeenCalledTimes(2); // probe + this one
        });

        it('should throw PoolError when connection acquire fails', async () => {
            await pool.initialize();

            mockPoolConnect.mockRejectedValueOnce(new Error('No available connections'));

            await expect(pool.getConnection()).rejects.toThrow(
                'Failed to acquire connection: No available connections'
            );
        });

        it('should pass parameters through query()', async () => {
            await pool.initialize();
            mockPoolQuery.mockResolvedValueOnce({ rows: [{ n: 1 }], rowCount: 1 });

            const result = await pool.query('SELECT $1::int AS n', [1]);

            expect(mockPoolQuery).toHaveBeenCalledWith('SELECT $1::int AS n', [1]);
            expect(result.rows).toEqual([{ n: 1 }]);
        });

        it('should rethrow query failures', async () => {
            await pool.initialize();
            mockPoolQuery.mockRejectedValueOnce(new Error('relation does not exist'));

            await expect(pool.query('SELECT * FROM missing')).rejects.toThrow('relation does not exist');
        });
    });

    describe('Backend Cancellation', () => {
        it('should call pg_cancel_backend with the pid', async () => {
            await pool.initialize();
            mockPoolQuery.mockResolvedValueOnce({ rows: [{ cancelled: true }], rowCount: 1 });

            await expect(pool.cancelBackend(4242)).resolves.toBe(true);
            expect(mockPoolQuery).toHaveBeenCalledWith(
                'SELECT pg_cancel_backend($1) AS cancelled',
                [4242]
            );
        });

        it('should report false when nothing was cancelled', async () => {
            await pool.initialize();
            mockPoolQuery.mockResolvedValueOnce({ rows: [{ cancelled: false }], rowCount: 1 });

            await expect(pool.cancelBackend(4242)).resolves.toBe(false);
        });
    });

    describe('Graceful Shutdown', () => {
        it('should call pool.end() on shutdown', async () => {
            await pool.initialize();
            await pool.shutdown();

            expect(mockPoolEnd).toHaveBeenCalledTimes(1);
            await expect(pool.getConnection()).rejects.toThrow('not initialized');
        });

        it('should reject new connections after shutdown', async () => {
            await pool.initialize();
            await pool.shutdown();

            // After shutdown, pool is null so 'not initialized' is the correct error
            await expect(pool.getConnection()).rejects.toThrow('not initialized');
        });

        it('should throw PoolError when acquiring during shutdown', async () => {
            await pool.initialize();

            // Start shutdown but don't await to keep pool in shuttingDown state
            const shutdownPromise = pool.shutdown();

            await expect(pool.getConnection()).rejects.toThrow('shutting down');

            await shutdownPromise;
        });

        it('should handle shutdown when not initialized', async () => {
            await expect(pool.shutdown()).resolves.toBeUndefined();
        });
    });
});
