import { IsEthereumAddress } from 'class-validator';
import { AmountDto } from './amount.dto';

export class TransferDto extends AmountDto {
  @IsEthereumAddress()
  to!: string;
}
