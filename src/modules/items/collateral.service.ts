import { Injectable } from '@nestjs/common';
import { UnitOfWork } from '../../database/unit-of-work';
import { ItemStatus, ItemStatusType } from '../../common/utils/constants/status.constants';
import { describeError, StructuredLoggerService } from '../../common/logging/structured-logger.service';

/**
 * Moves a pawned item in or out of collateral once the loan's transaction has
 * committed. Failures are logged and reported as `false`, never thrown.
 */
export interface CollateralSignalContext {
  loanId: string;
  transactionId: string;
  userId: string;
}

@Injectable()
export class CollateralService {
  constructor(
    private readonly unitOfWork: UnitOfWork,
    private readonly logger: StructuredLoggerService,
  ) {}

  release(itemId: string, context: CollateralSignalContext): Promise<boolean> {
    return this.signal(itemId, ItemStatus.AVAILABLE, context);
  }

  repledge(itemId: string, context: CollateralSignalContext): Promise<boolean> {
    return this.signal(itemId, ItemStatus.COLLATERAL, context);
  }

  private async signal(
    itemId: string,
    status: ItemStatusType,
    context: CollateralSignalContext,
  ): Promise<boolean> {
    try {
      await this.unitOfWork.session((scope) => scope.items.updateStatus(itemId, status));
      this.logger.info({
        service: 'collateral',
        operation: 'ITEM_STATUS_UPDATED',
        transactionId: context.transactionId,
        userId: context.userId,
        metadata: { itemId, loanId: context.loanId, status },
      });
      return true;
    } catch (error) {
      this.logger.error({
        service: 'collateral',
        operation: 'ITEM_STATUS_UPDATE_FAILED',
        transactionId: context.transactionId,
        userId: context.userId,
        metadata: { itemId, loanId: context.loanId, status },
        error: describeError(error),
      });
      return false;
    }
  }
}
