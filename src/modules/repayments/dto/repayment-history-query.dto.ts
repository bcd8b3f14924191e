import { IsOptional } from 'class-validator';
import { IsCalendarDate } from '../../../common/dto/validators';

export class RepaymentHistoryQueryDto {
  @IsOptional()
  @IsCalendarDate()
  from?: string;

  @IsOptional()
  @IsCalendarDate()
  to?: string;
}
