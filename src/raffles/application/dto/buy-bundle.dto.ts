import { IsEthereumAddress, IsOptional, IsString, Matches } from 'class-validator';

export class BuyBundleDto {
  /** Attached value in base units; native raffles only */
  @IsOptional()
  @IsString()
  @Matches(/^\d+$/, { message: 'value must be a non-negative integer in base units' })
  value?: string;

  @IsOptional()
  @IsEthereumAddress()
  referral?: string;
}
