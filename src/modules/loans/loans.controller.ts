// src/modules/loans/loans.controller.ts
import { Body, Controller, Get, Param, Post, Query, UseInterceptors } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { LoggingInterceptor } from '../../common/interceptors/logging.interceptor';
import { parsePositiveAmount } from '../../common/money/parse-money';
import { resolveAsOfDate } from '../../common/utils/dates.util';
import { IssueLoanDto } from './dto/issue-loan.dto';
import { ListLoansQueryDto } from './dto/list-loans-query.dto';
import { LoanService } from './loans.service';

@ApiTags('loans')
@UseInterceptors(LoggingInterceptor)
@Controller('api/loans')
export class LoansController {
  constructor(private readonly service: LoanService) {}

  // POST /api/loans → issue a loan to a member
  @Post()
  async issue(@Body() dto: IssueLoanDto) {
    return this.service.issueLoan(
      dto.memberId,
      parsePositiveAmount(dto.principal, 'Loan principal'),
      resolveAsOfDate(dto.asOfDate),
    );
  }

  @Get()
  async list(@Query() query: ListLoansQueryDto) {
    return this.service.listLoans(query.memberId);
  }

  // GET /api/loans/:id → current loan state
  @Get(':id')
  async findOne(@Param('id') id: string) {
    return this.service.getLoan(id);
  }

  // GET /api/loans/:id/transactions → ledger, oldest first
  @Get(':id/transactions')
  async transactions(@Param('id') id: string) {
    return this.service.getLoanLedger(id);
  }

  @Get(':id/audit-trail')
  async getAuditTrail(@Param('id') id: string) {
    return this.service.getAuditTrail(id);
  }
}
