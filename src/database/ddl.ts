/** The slice of a TypeORM DataSource that DDL needs */
export interface DdlConnection {
  transaction<T>(
    work: (manager: { query(sql: string, parameters?: unknown[]): Promise<unknown> }) => Promise<T>,
  ): Promise<T>;
}

const DDL_LOCK_KEY = 123456789;

/**
 * Runs trigger/function DDL under a transaction-scoped advisory lock, so
 * processes booting together apply it one at a time.
 */
export async function runLockedDdl(connection: DdlConnection, sql: string): Promise<void> {
  await connection.transaction(async (manager) => {
    await manager.query('SELECT pg_advisory_xact_lock($1)', [DDL_LOCK_KEY]);
    await manager.query(sql);
  });
}
