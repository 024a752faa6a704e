import { Injectable } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { CustomerTotalPaidAdjustedDto } from './dto/customer-total-paid-adjusted.dto';
import { OutboxHandler } from '../outbox/interfaces/outbox-handler.interface';
import { OutboxMessage } from '../outbox/interfaces/outbox.interface';
import { RepositoryScope } from '../../database/repository-scope';
import { OutboxEventType } from '../../common/utils/constants/status.constants';
import { StructuredLoggerService } from '../../common/logging/structured-logger.service';
import { addMoney } from '../../common/utils/money';

/**
 * Keeps `customers.total_paid` in step with settlements and reversals.
 * The total never goes below zero.
 */
@Injectable()
export class CustomerStatsHandler implements OutboxHandler {
  readonly eventType = OutboxEventType.CUSTOMER_TOTAL_PAID_ADJUSTED;

  constructor(private readonly logger: StructuredLoggerService) {}

  async handle(message: OutboxMessage, scope: RepositoryScope): Promise<void> {
    const event = this.parse(message);

    const customer = await scope.customers.findById(event.customerId);
    if (!customer) {
      this.logger.warn({
        service: 'outbox',
        operation: 'CUSTOMER_STATS_SKIPPED',
        metadata: { messageId: message.id, customerId: event.customerId, reason: 'customer not found' },
      });
      return;
    }

    const adjusted = addMoney(customer.totalPaid, event.delta);
    const totalPaid = adjusted < 0 ? 0 : adjusted;
    await scope.customers.updateCreditInfo(customer.id, { totalPaid });

    this.logger.debug({
      service: 'outbox',
      operation: 'CUSTOMER_STATS_UPDATED',
      metadata: { customerId: customer.id, paymentId: event.paymentId, delta: event.delta, totalPaid },
    });
  }

  private parse(message: OutboxMessage): CustomerTotalPaidAdjustedDto {
    const { payload } = message;
    if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
      throw new Error(`Outbox message ${message.id} has a non-object payload`);
    }

    const event = plainToInstance(CustomerTotalPaidAdjustedDto, payload);
    const errors = validateSync(event);
    if (errors.length > 0) {
      const fields = errors.map((error) => error.property).join(', ');
      throw new Error(`Outbox message ${message.id} has an invalid payload (${fields})`);
    }
    return event;
  }
}
