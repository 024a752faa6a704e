import { StructuredLogService } from '../../../common/logging/structured-logger.service';

/** Carried through AsyncLocalStorage for the duration of one audited operation. */
export interface AuditContext {
  transactionId: string;
  operation: string;
  service: StructuredLogService;
  userId?: string;
  loanId?: string;
}

export interface AuditRunOptions {
  service: StructuredLogService;
  /** Stamped on the START/SUCCESS rows so they show up in the loan's trail. */
  loanId?: string;
}
