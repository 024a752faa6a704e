import { Module } from '@nestjs/common';
import { ReversalService } from './reversal.service';
import { AuditModule } from '../audit/audit.module';
import { ItemsModule } from '../items/items.module';
import { LoansModule } from '../loans/loans.module';

@Module({
  imports: [AuditModule, ItemsModule, LoansModule],
  providers: [ReversalService],
  exports: [ReversalService],
})
export class ReversalsModule {}
