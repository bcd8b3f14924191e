// src/modules/overdue/overdue.controller.ts
import { Body, Controller, HttpCode, Param, Post, UseInterceptors } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { AsOfDateDto } from '../../common/dto/as-of.dto';
import { LoggingInterceptor } from '../../common/interceptors/logging.interceptor';
import { resolveAsOfDate } from '../../common/utils/dates.util';
import { OverdueService } from './overdue.service';

@ApiTags('overdue')
@UseInterceptors(LoggingInterceptor)
@Controller('api/overdue')
export class OverdueController {
  constructor(private readonly service: OverdueService) {}

  @Post('process')
  @HttpCode(200)
  async processAll(@Body() dto: AsOfDateDto) {
    return this.service.processAllOverdue(resolveAsOfDate(dto.asOfDate));
  }

  @Post('loans/:loanId')
  @HttpCode(200)
  async applyToLoan(@Param('loanId') loanId: string, @Body() dto: AsOfDateDto) {
    return this.service.applyOverdueInterest(loanId, resolveAsOfDate(dto.asOfDate));
  }
}
