import pg from 'pg';
import type { Pool, QueryResult } from 'pg';
import { roleForAudience, type Audience } from '@fmops/rls';

export interface RequestDbContext {
  tenantId: string | null;
  userId: string | null;
  aud: Audience;
}

export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<QueryResult>;
}

export interface TxClient extends SqlClient {
  release(): void;
}

export interface TxPool {
  connect(): Promise<TxClient>;
}

export const createPool = (url: string, max = 10): Pool => {
  return new pg.Pool({ connectionString: url, max });
};

const normalizeConfigValue = (value: string | null | undefined): string => value ?? '';

export const setRlsContext = async (tx: SqlClient, context: RequestDbContext): Promise<void> => {
  const role = roleForAudience(context.aud);
  await tx.query(`SET LOCAL ROLE ${role}`);
  await tx.query(`SELECT set_config('app.tenant_id', $1, true)`, [normalizeConfigValue(context.tenantId)]);
  await tx.query(`SELECT set_config('app.user_id', $1, true)`, [normalizeConfigValue(context.userId)]);
  await tx.query(`SELECT set_config('app.aud', $1, true)`, [context.aud]);
};

export const withTxContext = async <T>(
  pool: TxPool,
  context: RequestDbContext,
  fn: (tx: SqlClient) => Promise<T>
): Promise<T> => {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await setRlsContext(client, context);
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
};
