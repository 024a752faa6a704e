import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsDateString, IsNotEmpty, IsOptional, IsString } from 'class-validator';

export class PaymentHistoryQueryDto {
  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  loanId!: string;

  @ApiPropertyOptional({ description: 'Inclusive lower bound on payment date (ISO 8601)' })
  @IsOptional()
  @IsDateString()
  from?: string;

  @ApiPropertyOptional({ description: 'Inclusive upper bound on payment date (ISO 8601)' })
  @IsOptional()
  @IsDateString()
  to?: string;
}
