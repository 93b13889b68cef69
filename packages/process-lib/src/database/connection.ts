import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import pg from 'pg';

export type Database = NodePgDatabase;

/** The query surface shared by a database handle and an open transaction. */
export type DbExecutor = Pick<Database, 'select' | 'insert' | 'update' | 'delete'>;

let pool: pg.Pool | null = null;
let dbInstance: Database | null = null;

export function createDatabase(connectionString?: string): Database {
  if (!dbInstance) {
    const url = connectionString ?? process.env.DATABASE_URL;
    if (!url) {
      throw new Error('DATABASE_URL is not configured');
    }
    pool = new pg.Pool({ connectionString: url, max: 10 });
    dbInstance = drizzle(pool);
  }
  return dbInstance;
}

export async function closeDatabase(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    dbInstance = null;
  }
}
