import type { Report, ReportLookup } from '@fmops/work-orders';
import { withTxContext, type RequestDbContext, type TxPool } from './tx.js';
import { nullableText, oneOf, text, type Row } from './rows.js';

const REPORT_PRIORITIES = ['critical', 'urgent', 'high', 'medium', 'low'] as const;

export const rowToReport = (row: Row): Report => ({
  id: text(row, 'id'),
  tenantId: text(row, 'tenant_id'),
  title: text(row, 'title'),
  description: nullableText(row, 'description'),
  schoolId: nullableText(row, 'school_id'),
  priority: row.priority === null ? null : oneOf(row, 'priority', REPORT_PRIORITIES),
  scheduledDate: nullableText(row, 'scheduled_date')
});

export class PgReportLookup implements ReportLookup {
  constructor(
    private readonly pool: TxPool,
    private readonly context: RequestDbContext
  ) {}

  async getReport(tenantId: string, reportId: string): Promise<Report | null> {
    return withTxContext(this.pool, this.context, async (tx) => {
      const result = await tx.query(
        `SELECT id, tenant_id, title, description, school_id, priority,
                to_char(scheduled_date, 'YYYY-MM-DD') AS scheduled_date
         FROM maintenance_reports
         WHERE tenant_id = $1 AND id = $2 AND deleted_at IS NULL`,
        [tenantId, reportId]
      );
      const row = result.rows[0];
      return row ? rowToReport(row) : null;
    });
  }
}
