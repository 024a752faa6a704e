import type { SqlExecutor } from '../../database/sql-executor';
import { ItemStatusType } from '../../common/utils/constants/status.constants';

export interface ItemStore {
  updateStatus(itemId: string, status: ItemStatusType): Promise<void>;
}

export class PgItemRepository implements ItemStore {
  constructor(private readonly client: SqlExecutor) {}

  async updateStatus(itemId: string, status: ItemStatusType): Promise<void> {
    const result = await this.client.query(
      'UPDATE items SET status = $2, updated_at = NOW() WHERE id = $1',
      [itemId, status],
    );
    if (result.rowCount === 0) {
      throw new Error(`Item ${itemId} not found`);
    }
  }
}
