// src/modules/reports/reports.controller.ts
import { Controller, Get, Query, UseInterceptors } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { AsOfQueryDto } from '../../common/dto/as-of.dto';
import { LoggingInterceptor } from '../../common/interceptors/logging.interceptor';
import { resolveAsOfDate } from '../../common/utils/dates.util';
import { ReportsService } from './reports.service';

@ApiTags('reports')
@UseInterceptors(LoggingInterceptor)
@Controller('api/reports')
export class ReportsController {
  constructor(private readonly service: ReportsService) {}

  @Get('dashboard')
  async dashboard(@Query() query: AsOfQueryDto) {
    return this.service.getDashboard(resolveAsOfDate(query.asOf));
  }
}
