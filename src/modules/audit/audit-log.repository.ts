import type { SqlExecutor } from '../../database/sql-executor';

export interface AuditLogEntry {
  id: string;
  transactionId: string;
  operation: string;
  loanId: string | null;
  userId: string;
  metadata: Record<string, unknown>;
  createdAt: Date;
}

export type NewAuditLogEntry = Omit<AuditLogEntry, 'id' | 'createdAt'>;

export interface AuditLogStore {
  create(entry: NewAuditLogEntry): Promise<void>;
  listByLoan(loanId: string): Promise<AuditLogEntry[]>;
  listByTransaction(transactionId: string): Promise<AuditLogEntry[]>;
}

type AuditLogRow = {
  id: string;
  transaction_id: string;
  operation: string;
  loan_id: string | null;
  user_id: string;
  metadata: Record<string, unknown> | null;
  created_at: Date;
};

function toEntry(row: AuditLogRow): AuditLogEntry {
  return {
    id: row.id,
    transactionId: row.transaction_id,
    operation: row.operation,
    loanId: row.loan_id,
    userId: row.user_id,
    metadata: row.metadata ?? {},
    createdAt: row.created_at,
  };
}

export class PgAuditLogRepository implements AuditLogStore {
  constructor(private readonly client: SqlExecutor) {}

  async create(entry: NewAuditLogEntry): Promise<void> {
    await this.client.query(
      `INSERT INTO audit_logs (transaction_id, operation, loan_id, user_id, metadata)
       VALUES ($1, $2, $3, $4, $5)`,
      [entry.transactionId, entry.operation, entry.loanId, entry.userId, JSON.stringify(entry.metadata)],
    );
  }

  async listByLoan(loanId: string): Promise<AuditLogEntry[]> {
    const result = await this.client.query<AuditLogRow>(
      `SELECT id, transaction_id, operation, loan_id, user_id, metadata, created_at
         FROM audit_logs WHERE loan_id = $1 ORDER BY created_at ASC, id ASC`,
      [loanId],
    );
    return result.rows.map(toEntry);
  }

  async listByTransaction(transactionId: string): Promise<AuditLogEntry[]> {
    const result = await this.client.query<AuditLogRow>(
      `SELECT id, transaction_id, operation, loan_id, user_id, metadata, created_at
         FROM audit_logs WHERE transaction_id = $1 ORDER BY created_at ASC, id ASC`,
      [transactionId],
    );
    return result.rows.map(toEntry);
  }
}
