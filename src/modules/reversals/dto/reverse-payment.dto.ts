import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class ReversePaymentDto {
  @ApiProperty({ example: 'Entered against the wrong loan' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(500)
  reason!: string;
}
