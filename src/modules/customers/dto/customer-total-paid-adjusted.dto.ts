import { IsNotEmpty, IsNumber, IsString } from 'class-validator';

export class CustomerTotalPaidAdjustedDto {
  @IsString()
  @IsNotEmpty()
  customerId!: string;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  delta!: number;

  @IsString()
  @IsNotEmpty()
  paymentId!: string;

  @IsString()
  @IsNotEmpty()
  loanId!: string;
}
