import { IsNotEmpty, IsOptional, IsString } from 'class-validator';
import { IsCalendarDate, IsMoneyAmount } from '../../../common/dto/validators';

export class IssueLoanDto {
  @IsString()
  @IsNotEmpty()
  memberId!: string;

  @IsMoneyAmount()
  principal!: string;

  @IsOptional()
  @IsCalendarDate()
  asOfDate?: string;
}
