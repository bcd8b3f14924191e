// src/modules/repayments/repayments.controller.ts
import { Body, Controller, Get, Param, Post, Query, UseInterceptors } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { LoggingInterceptor } from '../../common/interceptors/logging.interceptor';
import { parsePositiveAmount } from '../../common/money/parse-money';
import { resolveAsOfDate } from '../../common/utils/dates.util';
import { CreateRepaymentDto } from './dto/create-repayment.dto';
import { RepaymentHistoryQueryDto } from './dto/repayment-history-query.dto';
import { RepaymentsService } from './repayments.service';

@ApiTags('repayments')
@UseInterceptors(LoggingInterceptor)
@Controller('api/repayments')
export class RepaymentsController {
  constructor(private readonly service: RepaymentsService) {}

  @Post()
  async create(@Body() dto: CreateRepaymentDto) {
    return this.service.repayLoan(
      dto.loanId,
      parsePositiveAmount(dto.amount, 'Payment amount'),
      resolveAsOfDate(dto.asOfDate),
    );
  }

  @Get(':loanId')
  async history(@Param('loanId') loanId: string, @Query() query: RepaymentHistoryQueryDto) {
    return this.service.getRepaymentHistory(loanId, query);
  }
}
