import { IsEthereumAddress } from 'class-validator';
import { AmountDto } from './amount.dto';

export class ApproveDto extends AmountDto {
  @IsEthereumAddress()
  spender!: string;
}
