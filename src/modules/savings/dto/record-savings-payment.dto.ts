import { IsOptional, IsString, MaxLength } from 'class-validator';
import { IsCalendarDate, IsMoneyAmount } from '../../../common/dto/validators';

export class RecordSavingsPaymentDto {
  /** Defaults to the monthly subscription when omitted. */
  @IsOptional()
  @IsMoneyAmount()
  amount?: string;

  @IsOptional()
  @IsCalendarDate()
  asOfDate?: string;

  @IsOptional()
  @IsString()
  @MaxLength(500)
  note?: string;
}
