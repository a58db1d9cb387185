import { Inject, Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { verifyMessage } from 'ethers';
import { toChecksumAddress } from '../common/address';
import { Clock, CLOCK } from '../common/clock';
import { ConfigService } from '../database/config.service';
import { LoginDto } from './dto/login.dto';
import { LoginResponseDto } from './dto/login-response.dto';
import { JwtPayload } from './strategies/jwt.strategy';

/**
 * The personal message a caller signs to log in. `address` is checksummed
 * and `issuedAt` is echoed exactly as sent.
 */
export function buildLoginMessage(address: string, issuedAt: string): string {
  return `Sign in to Raffle Ledger\nAddress: ${address}\nIssued at: ${issuedAt}`;
}

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly jwtService: JwtService,
    private readonly configService: ConfigService,
    @Inject(CLOCK)
    private readonly clock: Clock,
  ) {}

  async login(loginDto: LoginDto): Promise<LoginResponseDto> {
    const address = toChecksumAddress(loginDto.address);
    if (!address) {
      throw new UnauthorizedException('Invalid address');
    }

    const issuedAt = new Date(loginDto.issuedAt);
    const maxAgeMs = this.configService.loginMaxAgeSeconds * 1000;
    const age = this.clock.now().getTime() - issuedAt.getTime();
    if (Number.isNaN(age) || Math.abs(age) > maxAgeMs) {
      throw new UnauthorizedException('Login message expired');
    }

    let signer: string;
    try {
      signer = verifyMessage(buildLoginMessage(address, loginDto.issuedAt), loginDto.signature);
    } catch (error) {
      throw new UnauthorizedException('Invalid signature');
    }

    if (signer !== address) {
      this.logger.warn(`Login for ${address} was signed by ${signer}`);
      throw new UnauthorizedException('Invalid signature');
    }

    const payload: JwtPayload = { sub: address };
    return {
      accessToken: this.jwtService.sign(payload),
      address,
    };
  }
}
