import type { SqlExecutor } from '../../database/sql-executor';
import { numeric } from '../../database/pg-values';

export interface CustomerCreditInfo {
  id: string;
  totalPaid: number;
}

export interface CustomerCreditUpdate {
  totalPaid: number;
}

export interface CustomerStore {
  findById(id: string): Promise<CustomerCreditInfo | null>;
  updateCreditInfo(id: string, update: CustomerCreditUpdate): Promise<void>;
}

export class PgCustomerRepository implements CustomerStore {
  constructor(private readonly client: SqlExecutor) {}

  async findById(id: string): Promise<CustomerCreditInfo | null> {
    const result = await this.client.query<{ id: string; total_paid: string }>(
      'SELECT id, total_paid FROM customers WHERE id = $1 AND deleted_at IS NULL FOR UPDATE',
      [id],
    );
    const row = result.rows[0];
    return row ? { id: row.id, totalPaid: numeric(row.total_paid) } : null;
  }

  async updateCreditInfo(id: string, update: CustomerCreditUpdate): Promise<void> {
    await this.client.query(
      'UPDATE customers SET total_paid = $2, updated_at = NOW() WHERE id = $1',
      [id, update.totalPaid],
    );
  }
}
