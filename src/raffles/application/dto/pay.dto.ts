import { IsString, Matches } from 'class-validator';

export class PayDto {
  @IsString()
  @Matches(/^\d+$/, { message: 'value must be a non-negative integer in base units' })
  value!: string;
}
