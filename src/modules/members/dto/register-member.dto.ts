import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { IsCalendarDate } from '../../../common/dto/validators';

export class RegisterMemberDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  fullName!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(50)
  memberNumber!: string;

  @IsOptional()
  @IsCalendarDate()
  asOfDate?: string;
}
