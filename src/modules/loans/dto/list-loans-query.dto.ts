import { IsOptional, IsString } from 'class-validator';

export class ListLoansQueryDto {
  @IsOptional()
  @IsString()
  memberId?: string;
}
