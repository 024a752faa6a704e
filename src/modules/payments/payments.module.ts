import { Module } from '@nestjs/common';
import { PaymentsController } from './payments.controller';
import { SettlementService } from './settlement.service';
import { PaymentQueryService } from './payment-query.service';
import { AllocationWaterfallService } from './services/allocation-waterfall.service';
import { AuditModule } from '../audit/audit.module';
import { ItemsModule } from '../items/items.module';
import { LoansModule } from '../loans/loans.module';
import { ReversalsModule } from '../reversals/reversals.module';
import { AuthModule } from '../../common/guards/auth.module';
import { LoggingInterceptor } from '../../common/interceptors/logging.interceptor';

@Module({
  imports: [AuthModule, AuditModule, ItemsModule, LoansModule, ReversalsModule],
  controllers: [PaymentsController],
  providers: [SettlementService, PaymentQueryService, AllocationWaterfallService, LoggingInterceptor],
})
export class PaymentsModule {}
