import { Pool, PoolClient, PoolConfig } from 'pg';
import { logger } from '../utils/logger';

const isTest = process.env.NODE_ENV === 'test';

function intFromEnv(name: string, fallback: number): number {
     const parsed = parseInt(process.env[name] || '', 10);
     return Number.isNaN(parsed) ? fallback : parsed;
}

const config: PoolConfig = {
     connectionString: process.env.DATABASE_URL,
     application_name: process.env.SERVICE_NAME || 'stockroom',
     // In test mode, use minimal connections and short timeouts
     min: isTest ? 0 : intFromEnv('DB_POOL_MIN', 2),
     max: isTest ? 2 : intFromEnv('DB_POOL_MAX', 10),
     idleTimeoutMillis: isTest ? 100 : intFromEnv('DB_IDLE_TIMEOUT_MS', 10000),
     connectionTimeoutMillis: intFromEnv('DB_CONNECTION_TIMEOUT_MS', 5000),
     statement_timeout: intFromEnv('DB_STATEMENT_TIMEOUT_MS', 15000),
};
export const pool = new Pool(config);

pool.on('error', (err) => {
     logger.error({ err }, 'Unexpected PostgreSQL pool error');
});

export async function checkConnection(): Promise<boolean> {
     try {
          const client = await pool.connect();
          await client.query('SELECT 1');
          client.release();
          return true;
     } catch (error) {
          logger.error({ error }, 'Database connection check failed');
          return false;
     }
}

// Transaction helper
export async function withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
     const client = await pool.connect();
     try {
          await client.query('BEGIN');
          const result = await fn(client);
          await client.query('COMMIT');
          return result;
     } catch (err) {
          await client.query('ROLLBACK');
          throw err;
     } finally {
          client.release();
     }
}

// Read-committed reads (summaries, line listings) take no locks.
export async function withConnection<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
     const client = await pool.connect();
     try {
          return await fn(client);
     } finally {
          client.release();
     }
}

export async function closePool(): Promise<void> {
     await pool.end();
     logger.info('Database pool closed');
}

// Handle shutdown signals (disabled in test mode)
if (!isTest) {
     process.on('SIGINT', async () => {
          await closePool();
          process.exit(0);
     });

     process.on('SIGTERM', async () => {
          await closePool();
          process.exit(0);
     });
}
