import type { SqlExecutor } from '../../database/sql-executor';
import { Loan } from './interfaces/loan.interface';
import { ConcurrencyConflictException } from '../../common/errors/settlement.errors';
import { LoanStatusType, PaymentPlanTypeType } from '../../common/utils/constants/status.constants';
import { dateOnly, nullableDate, nullableNumeric, numeric } from '../../database/pg-values';

export interface LoanStore {
  findById(id: string): Promise<Loan | null>;
  /** Reads the loan and holds its row lock until the surrounding transaction ends. */
  findByIdForUpdate(id: string): Promise<Loan | null>;
  /**
   * Persists balances and status. Fails with ConcurrencyConflictException when
   * `loan.version` no longer matches the stored row; returns the loan with its new version.
   */
  update(loan: Loan): Promise<Loan>;
}

type LoanRow = {
  id: string;
  loan_number: string;
  branch_id: string;
  customer_id: string;
  item_id: string;
  loan_amount: string;
  principal_remaining: string;
  interest_remaining: string;
  late_fee_amount: string;
  amount_paid: string;
  status: LoanStatusType;
  due_date: string;
  grace_period_days: number;
  paid_date: Date | null;
  payment_plan_type: PaymentPlanTypeType;
  requires_minimum_payment: boolean;
  minimum_payment_amount: string | null;
  version: number;
  updated_by: string | null;
  created_at: Date;
  updated_at: Date;
};

const LOAN_COLUMNS = `
  id, loan_number, branch_id, customer_id, item_id,
  loan_amount, principal_remaining, interest_remaining, late_fee_amount, amount_paid,
  status, due_date, grace_period_days, paid_date,
  payment_plan_type, requires_minimum_payment, minimum_payment_amount,
  version, updated_by, created_at, updated_at`;

function toLoan(row: LoanRow): Loan {
  return {
    id: row.id,
    loanNumber: row.loan_number,
    branchId: row.branch_id,
    customerId: row.customer_id,
    itemId: row.item_id,
    loanAmount: numeric(row.loan_amount),
    principalRemaining: numeric(row.principal_remaining),
    interestRemaining: numeric(row.interest_remaining),
    lateFeeRemaining: numeric(row.late_fee_amount),
    amountPaid: numeric(row.amount_paid),
    status: row.status,
    dueDate: dateOnly(row.due_date),
    gracePeriodDays: row.grace_period_days,
    paidDate: nullableDate(row.paid_date),
    paymentPlanType: row.payment_plan_type,
    requiresMinimumPayment: row.requires_minimum_payment,
    minimumPaymentAmount: nullableNumeric(row.minimum_payment_amount),
    version: row.version,
    updatedBy: row.updated_by,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class PgLoanRepository implements LoanStore {
  constructor(private readonly client: SqlExecutor) {}

  async findById(id: string): Promise<Loan | null> {
    const result = await this.client.query<LoanRow>(
      `SELECT ${LOAN_COLUMNS} FROM loans WHERE id = $1 AND deleted_at IS NULL`,
      [id],
    );
    return result.rows[0] ? toLoan(result.rows[0]) : null;
  }

  async findByIdForUpdate(id: string): Promise<Loan | null> {
    const result = await this.client.query<LoanRow>(
      `SELECT ${LOAN_COLUMNS} FROM loans WHERE id = $1 AND deleted_at IS NULL FOR UPDATE`,
      [id],
    );
    return result.rows[0] ? toLoan(result.rows[0]) : null;
  }

  async update(loan: Loan): Promise<Loan> {
    const result = await this.client.query<LoanRow>(
      `UPDATE loans SET
         principal_remaining = $3,
         interest_remaining = $4,
         late_fee_amount = $5,
         amount_paid = $6,
         status = $7,
         paid_date = $8,
         updated_by = $9,
         version = version + 1,
         updated_at = NOW()
       WHERE id = $1 AND version = $2
       RETURNING ${LOAN_COLUMNS}`,
      [
        loan.id,
        loan.version,
        loan.principalRemaining,
        loan.interestRemaining,
        loan.lateFeeRemaining,
        loan.amountPaid,
        loan.status,
        loan.paidDate,
        loan.updatedBy,
      ],
    );

    if (!result.rows[0]) {
      throw new ConcurrencyConflictException(`Loan ${loan.id} was modified concurrently (version ${loan.version})`);
    }
    return toLoan(result.rows[0]);
  }
}
