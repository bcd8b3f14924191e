import { IsOptional } from 'class-validator';
import { IsCalendarDate } from './validators';

export class AsOfQueryDto {
  @IsOptional()
  @IsCalendarDate()
  asOf?: string;
}

export class AsOfDateDto {
  @IsOptional()
  @IsCalendarDate()
  asOfDate?: string;
}
