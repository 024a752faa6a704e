import { OutboxEventTypeType } from '../../../common/utils/constants/status.constants';

export interface CustomerTotalPaidAdjusted {
  customerId: string;
  /** Positive for a settlement, negative for a reversal. */
  delta: number;
  paymentId: string;
  loanId: string;
}

export interface OutboxPayloads {
  'customer.total_paid.adjusted': CustomerTotalPaidAdjusted;
}

export interface NewOutboxMessage<E extends OutboxEventTypeType = OutboxEventTypeType> {
  aggregateType: string;
  aggregateId: string;
  eventType: E;
  payload: OutboxPayloads[E];
}

export interface OutboxMessage {
  id: string;
  aggregateType: string;
  aggregateId: string;
  eventType: string;
  payload: unknown;
  attemptCount: number;
  lastError: string | null;
  createdAt: Date;
  processedAt: Date | null;
}
