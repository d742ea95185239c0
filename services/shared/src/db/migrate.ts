import { promises as fs } from 'fs';
import { join } from 'path';
import { pool, withTransaction } from './client';
import { logger } from '../utils/logger';

const MIGRATIONS_DIR = join(__dirname, 'migrations');

export async function pendingMigrations(applied: Set<string>): Promise<string[]> {
     const files = await fs.readdir(MIGRATIONS_DIR);
     return files
          .filter((f) => f.endsWith('.sql'))
          .sort()
          .filter((f) => !applied.has(f));
}

async function runMigrations() {
     try {
          await pool.query(`
      CREATE TABLE IF NOT EXISTS schema_migration (
        name TEXT PRIMARY KEY,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
          const { rows } = await pool.query<{ name: string }>(`SELECT name FROM schema_migration`);
          const pending = await pendingMigrations(new Set(rows.map((r) => r.name)));

          logger.info({ count: pending.length }, 'Running database migrations');

          for (const file of pending) {
               const sql = await fs.readFile(join(MIGRATIONS_DIR, file), 'utf-8');

               logger.info({ file }, 'Executing migration');
               await withTransaction(async (client) => {
                    await client.query(sql);
                    await client.query(`INSERT INTO schema_migration (name) VALUES ($1)`, [file]);
               });
               logger.info({ file }, 'Migration completed');
          }

          logger.info('All migrations completed successfully');
     } catch (error) {
          logger.error({ error }, 'Migration failed');
          throw error;
     } finally {
          await pool.end();
     }
}

// Run if executed directly
if (require.main === module) {
     runMigrations().catch(() => {
          process.exit(1);
     });
}

export { runMigrations };
