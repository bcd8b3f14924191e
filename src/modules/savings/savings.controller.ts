// src/modules/savings/savings.controller.ts
import { Body, Controller, Get, Param, Post, UseInterceptors } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { LoggingInterceptor } from '../../common/interceptors/logging.interceptor';
import { parsePositiveAmount } from '../../common/money/parse-money';
import { SavingsTransactionKinds } from '../../common/utils/constants/transaction-kinds.constants';
import { resolveAsOfDate } from '../../common/utils/dates.util';
import { RecordSavingsPaymentDto } from './dto/record-savings-payment.dto';
import { SavingsService } from './savings.service';

@ApiTags('savings')
@UseInterceptors(LoggingInterceptor)
@Controller('api/members/:memberId/savings')
export class SavingsController {
  constructor(private readonly service: SavingsService) {}

  @Post()
  async record(@Param('memberId') memberId: string, @Body() dto: RecordSavingsPaymentDto) {
    const amount =
      dto.amount === undefined
        ? this.service.monthlySubscription
        : parsePositiveAmount(dto.amount, 'Savings amount');

    return this.service.recordSavingsPayment(
      memberId,
      amount,
      resolveAsOfDate(dto.asOfDate),
      SavingsTransactionKinds.SUBSCRIPTION,
      dto.note,
    );
  }

  @Get()
  async history(@Param('memberId') memberId: string) {
    return this.service.getSavingsHistory(memberId);
  }
}
