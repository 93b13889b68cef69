import type { Database, DbExecutor } from './connection.js';

export async function withTransaction<T>(
  db: Database,
  fn: (tx: DbExecutor) => Promise<T>,
): Promise<T> {
  return db.transaction(async (tx) => fn(tx));
}
