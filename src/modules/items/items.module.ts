import { Module } from '@nestjs/common';
import { CollateralService } from './collateral.service';

@Module({
  providers: [CollateralService],
  exports: [CollateralService],
})
export class ItemsModule {}
