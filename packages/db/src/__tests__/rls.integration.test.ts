import { randomUUID } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import pg, { type Client, type Pool } from 'pg';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { PgWorkOrderStore, createPool, withTxContext, type RequestDbContext } from '../index.js';

const cfg = {
  url: process.env.TEST_DATABASE_URL,
  tenantA: process.env.TEST_TENANT_A_UUID ?? '11111111-1111-1111-1111-111111111111',
  tenantB: process.env.TEST_TENANT_B_UUID ?? '22222222-2222-2222-2222-222222222222'
};

const ready = Boolean(cfg.url);

const webContext = (tenantId: string | null): RequestDbContext => ({ tenantId, userId: null, aud: 'web' });

const insertWorkOrder = async (client: Client, tenantId: string, title: string): Promise<string> => {
  const id = randomUUID();
  await client.query(
    `INSERT INTO work_orders (id, tenant_id, work_order_number, title, priority, status)
     VALUES ($1, $2, $3, $4, 'medium', 'pending')`,
    [id, tenantId, `IT-${id.slice(0, 8)}`, title]
  );
  return id;
};

describe('RLS integration', () => {
  let pool: Pool | null = null;
  let orderA = '';
  let orderB = '';

  beforeAll(async () => {
    if (!ready || !cfg.url) return;
    const root = new pg.Client({ connectionString: cfg.url });
    await root.connect();
    const migration = await readFile(new URL('../../migrations/001_work_orders.sql', import.meta.url), 'utf8');
    await root.query(migration);
    orderA = await insertWorkOrder(root, cfg.tenantA, 'Tenant A boiler');
    orderB = await insertWorkOrder(root, cfg.tenantB, 'Tenant B roof');
    await root.end();
    pool = createPool(cfg.url, 2);
  });

  afterAll(async () => {
    await pool?.end();
  });

  it.skipIf(!ready)('enforces tenant isolation for fm_web', async () => {
    if (!pool) return;
    const rows = await withTxContext(pool, webContext(cfg.tenantA), async (tx) => {
      const result = await tx.query('SELECT tenant_id FROM work_orders');
      return result.rows;
    });

    expect(rows.length).toBeGreaterThan(0);
    expect(rows.every((row) => row.tenant_id === cfg.tenantA)).toBe(true);
  });

  it.skipIf(!ready)('returns zero rows when tenant context is missing', async () => {
    if (!pool) return;
    const rows = await withTxContext(pool, webContext(null), async (tx) => {
      const result = await tx.query('SELECT id FROM work_orders');
      return result.rows;
    });

    expect(rows).toEqual([]);
  });

  it.skipIf(!ready)('hides work orders of other tenants from the store', async () => {
    if (!pool) return;
    const store = new PgWorkOrderStore(pool, webContext(cfg.tenantA));

    expect(await store.load(cfg.tenantA, orderB)).toBeNull();
    expect((await store.load(cfg.tenantA, orderA))?.workOrder.title).toBe('Tenant A boiler');
  });
});
