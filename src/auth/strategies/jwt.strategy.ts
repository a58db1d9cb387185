import { Injectable, UnauthorizedException } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { toChecksumAddress } from '../../common/address';
import { ConfigService } from '../../database/config.service';
import { AuthenticatedCaller } from '../decorators/caller.decorator';

export interface JwtPayload {
  sub: string;
}

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(configService: ConfigService) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: configService.jwtSecret,
    });
  }

  validate(payload: JwtPayload): AuthenticatedCaller {
    const address = toChecksumAddress(payload.sub);
    if (!address) {
      throw new UnauthorizedException('Invalid token subject');
    }
    return { address };
  }
}
