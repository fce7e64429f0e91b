import { Pool, type PoolClient, type QueryResult, type QueryResultRow } from 'pg';
import { getStorageConfig } from './config/storage';

let pool: Pool | null = null;

export function getPool(): Pool {
  if (!pool) {
    const { databaseUrl } = getStorageConfig();
    if (!databaseUrl) {
      throw new Error('DATABASE_URL must be set when STOCK_STORAGE=postgres');
    }
    pool = new Pool({ connectionString: databaseUrl });
    pool.on('error', (err) => {
      console.error('Unexpected DB pool error', err);
    });
  }
  return pool;
}

export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<QueryResult<T>> {
  return getPool().query<T>(text, params);
}

export async function withTransaction<T>(handler: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await getPool().connect();
  try {
    await client.query('BEGIN');
    const result = await handler(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}

export async function closePool(): Promise<void> {
  if (!pool) return;
  const current = pool;
  pool = null;
  await current.end();
}
