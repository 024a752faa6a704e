import { Module } from '@nestjs/common';
import { CustomerStatsHandler } from './customer-stats.handler';

@Module({
  providers: [CustomerStatsHandler],
  exports: [CustomerStatsHandler],
})
export class CustomersModule {}
