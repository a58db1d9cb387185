import { IsNotEmpty, IsString, Matches } from 'class-validator';

export class AmountDto {
  @IsString()
  @IsNotEmpty()
  @Matches(/^\d+$/, { message: 'amount must be a non-negative integer in base units' })
  amount!: string;
}
