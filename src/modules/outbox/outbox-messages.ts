import { OutboxEventType } from '../../common/utils/constants/status.constants';
import { NewOutboxMessage } from './interfaces/outbox.interface';

export function customerTotalPaidAdjusted(params: {
  customerId: string;
  delta: number;
  paymentId: string;
  loanId: string;
}): NewOutboxMessage<typeof OutboxEventType.CUSTOMER_TOTAL_PAID_ADJUSTED> {
  return {
    aggregateType: 'customer',
    aggregateId: params.customerId,
    eventType: OutboxEventType.CUSTOMER_TOTAL_PAID_ADJUSTED,
    payload: { ...params },
  };
}
