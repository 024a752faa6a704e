// src/modules/payments/payments.controller.ts
import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Query,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { SettlementService } from './settlement.service';
import { PaymentQueryService } from './payment-query.service';
import { ReversalService } from '../reversals/reversal.service';
import { CreatePaymentDto } from './dto/create-payment.dto';
import { PaymentHistoryQueryDto } from './dto/payment-history-query.dto';
import { ReversePaymentDto } from '../reversals/dto/reverse-payment.dto';
import { JwtAuthGuard } from '../../common/guards/jwt-auth.guard';
import { LoggingInterceptor } from '../../common/interceptors/logging.interceptor';
import { CurrentUserId } from '../../common/decorators/current-user.decorator';

@ApiTags('payments')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard)
@UseInterceptors(LoggingInterceptor)
@Controller('api/payments')
export class PaymentsController {
  constructor(
    private readonly settlementService: SettlementService,
    private readonly reversalService: ReversalService,
    private readonly paymentQueryService: PaymentQueryService,
  ) {}

  // POST /api/payments → settle a payment against a loan
  @Post()
  async create(@Body() dto: CreatePaymentDto, @CurrentUserId() userId: string) {
    return this.settlementService.settle(dto, userId);
  }

  // GET /api/payments?loanId=&from=&to= → payment history for a loan
  @Get()
  async history(@Query() query: PaymentHistoryQueryDto) {
    return this.paymentQueryService.listForLoan(query.loanId, {
      from: query.from ? new Date(query.from) : undefined,
      to: query.to ? new Date(query.to) : undefined,
    });
  }

  @Get(':id')
  async findOne(@Param('id') id: string) {
    return this.paymentQueryService.getPayment(id);
  }

  // POST /api/payments/:id/reverse → undo a completed payment
  @Post(':id/reverse')
  @HttpCode(HttpStatus.OK)
  async reverse(@Param('id') id: string, @Body() dto: ReversePaymentDto, @CurrentUserId() userId: string) {
    return this.reversalService.reverse(id, dto, userId);
  }
}
