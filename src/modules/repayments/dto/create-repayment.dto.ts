import { IsNotEmpty, IsOptional, IsString } from 'class-validator';
import { IsCalendarDate, IsMoneyAmount } from '../../../common/dto/validators';

export class CreateRepaymentDto {
  @IsString()
  @IsNotEmpty()
  loanId!: string;

  @IsMoneyAmount()
  amount!: string;

  @IsOptional()
  @IsCalendarDate()
  asOfDate?: string;
}
