import { Test, TestingModule } from '@nestjs/testing';
import { SettlementService } from '../../src/modules/payments/settlement.service';
import { PaymentQueryService } from '../../src/modules/payments/payment-query.service';
import { AllocationWaterfallService } from '../../src/modules/payments/services/allocation-waterfall.service';
import { ReversalService } from '../../src/modules/reversals/reversal.service';
import { LoanService } from '../../src/modules/loans/loans.service';
import { InstallmentLedgerService } from '../../src/modules/loans/services/installment-ledger.service';
import { OverdueCalculatorService } from '../../src/modules/loans/services/overdue-calculator.service';
import { CollateralService } from '../../src/modules/items/collateral.service';
import { AuditService } from '../../src/modules/audit/audit.service';
import { AuditContextService } from '../../src/modules/audit/audit-context.service';
import { StructuredLoggerService } from '../../src/common/logging/structured-logger.service';
import { UnitOfWork } from '../../src/database/unit-of-work';
import { APP_CONFIG, loadAppConfig } from '../../src/config/app.config';
import { InMemoryUnitOfWork } from './in-memory-unit-of-work';
import { silentLogger } from './silent-logger';

/** The settlement services wired together over an in-memory unit of work. */
export function createSettlementTestingModule(
  unitOfWork: InMemoryUnitOfWork,
  env: Record<string, string> = {},
): Promise<TestingModule> {
  return Test.createTestingModule({
    providers: [
      SettlementService,
      PaymentQueryService,
      AllocationWaterfallService,
      ReversalService,
      LoanService,
      InstallmentLedgerService,
      OverdueCalculatorService,
      CollateralService,
      AuditService,
      AuditContextService,
      { provide: StructuredLoggerService, useValue: silentLogger() },
      { provide: UnitOfWork, useValue: unitOfWork },
      { provide: APP_CONFIG, useValue: loadAppConfig(env) },
    ],
  }).compile();
}
