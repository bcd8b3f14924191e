// src/modules/members/members.controller.ts
import { Body, Controller, Get, Param, Post, Query, UseInterceptors } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { AsOfQueryDto } from '../../common/dto/as-of.dto';
import { LoggingInterceptor } from '../../common/interceptors/logging.interceptor';
import { resolveAsOfDate } from '../../common/utils/dates.util';
import { RegisterMemberDto } from './dto/register-member.dto';
import { MembersService } from './members.service';

@ApiTags('members')
@UseInterceptors(LoggingInterceptor)
@Controller('api/members')
export class MembersController {
  constructor(private readonly service: MembersService) {}

  @Post()
  async register(@Body() dto: RegisterMemberDto) {
    return this.service.registerMember(dto.fullName, dto.memberNumber, resolveAsOfDate(dto.asOfDate));
  }

  @Get()
  async list() {
    return this.service.listMembers();
  }

  @Get(':id')
  async findOne(@Param('id') id: string) {
    return this.service.getMember(id);
  }

  // GET /api/members/:id/summary?asOf=yyyy-MM-dd
  @Get(':id/summary')
  async summary(@Param('id') id: string, @Query() query: AsOfQueryDto) {
    return this.service.getMemberSummary(id, resolveAsOfDate(query.asOf));
  }

  @Get(':id/audit-trail')
  async getAuditTrail(@Param('id') id: string) {
    return this.service.getAuditTrail(id);
  }
}
