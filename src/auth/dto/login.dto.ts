import { IsDateString, IsEthereumAddress, IsString, Matches } from 'class-validator';

export class LoginDto {
  @IsEthereumAddress()
  address!: string;

  @IsDateString()
  issuedAt!: string;

  @IsString()
  @Matches(/^0x[0-9a-fA-F]{130}$/, { message: 'signature must be a 65-byte hex string' })
  signature!: string;
}
