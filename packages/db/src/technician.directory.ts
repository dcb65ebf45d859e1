import type { Technician, TechnicianDirectory } from '@fmops/work-orders';
import { withTxContext, type RequestDbContext, type TxPool } from './tx.js';
import { bool, nullableNumber, nullableText, oneOf, text, type Row } from './rows.js';

const TECHNICIAN_ROLES = ['technician', 'supervisor', 'admin', 'viewer'] as const;

export const rowToTechnician = (row: Row): Technician => ({
  id: text(row, 'id'),
  name: nullableText(row, 'name'),
  role: oneOf(row, 'role', TECHNICIAN_ROLES),
  active: oneOf(row, 'status', ['active', 'inactive', 'suspended'] as const) === 'active',
  available: bool(row, 'available'),
  hourlyRate: nullableNumber(row, 'hourly_rate')
});

export class PgTechnicianDirectory implements TechnicianDirectory {
  constructor(
    private readonly pool: TxPool,
    private readonly context: RequestDbContext
  ) {}

  async findAvailableTechnicians(tenantId: string): Promise<Technician[]> {
    return withTxContext(this.pool, this.context, async (tx) => {
      const result = await tx.query(
        `SELECT id, name, role, status, available, hourly_rate FROM users
         WHERE tenant_id = $1 AND role = 'technician' AND status = 'active' AND available = true AND deleted_at IS NULL
         ORDER BY created_at, id`,
        [tenantId]
      );
      return result.rows.map(rowToTechnician);
    });
  }

  async getTechnician(tenantId: string, technicianId: string): Promise<Technician | null> {
    return withTxContext(this.pool, this.context, async (tx) => {
      const result = await tx.query(
        `SELECT id, name, role, status, available, hourly_rate FROM users
         WHERE tenant_id = $1 AND id = $2 AND deleted_at IS NULL`,
        [tenantId, technicianId]
      );
      const row = result.rows[0];
      return row ? rowToTechnician(row) : null;
    });
  }
}
