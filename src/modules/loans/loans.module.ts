import { Module } from '@nestjs/common';
import { LoansController } from './loans.controller';
import { LoanService } from './loans.service';
import { OverdueCalculatorService } from './services/overdue-calculator.service';
import { InstallmentLedgerService } from './services/installment-ledger.service';
import { AuditModule } from '../audit/audit.module';
import { LoggingInterceptor } from '../../common/interceptors/logging.interceptor';
import { AuthModule } from '../../common/guards/auth.module';

@Module({
  imports: [AuthModule, AuditModule],
  controllers: [LoansController],
  providers: [LoanService, OverdueCalculatorService, InstallmentLedgerService, LoggingInterceptor],
  exports: [InstallmentLedgerService],
})
export class LoansModule {}
