import { IsEthereumAddress } from 'class-validator';

export class FinishRaffleDto {
  @IsEthereumAddress()
  donationAddress!: string;
}
