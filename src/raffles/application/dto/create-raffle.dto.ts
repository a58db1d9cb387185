import { IsEthereumAddress, IsInt, IsOptional, IsString, Matches, Max, Min } from 'class-validator';

const DECIMAL_AMOUNT = /^\d+(\.\d+)?$/;

export class CreateRaffleDto {
  /** Price of one small bundle, in whole currency units ("0.005") */
  @IsString()
  @Matches(DECIMAL_AMOUNT, { message: 'ticketPrice must be a decimal amount' })
  ticketPrice!: string;

  @IsInt()
  @Min(1)
  @Max(255)
  durationDays!: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(36)
  decimals?: number;

  /** Token the raffle is paid in; the native coin when absent */
  @IsOptional()
  @IsEthereumAddress()
  token?: string;

  @IsOptional()
  @IsString()
  @Matches(DECIMAL_AMOUNT, { message: 'fixedPrize must be a decimal amount' })
  fixedPrize?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(99)
  donationPercent?: number;
}
