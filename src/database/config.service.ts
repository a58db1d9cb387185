import { Injectable } from '@nestjs/common';
import * as dotenv from 'dotenv';

dotenv.config();

@Injectable()
export class ConfigService {
  get mongoUri(): string {
    return process.env.MONGODB_URI || 'mongodb://localhost:27017/raffle-ledger';
  }

  get port(): number {
    return parseInt(process.env.PORT || '3001', 10);
  }

  get nodeEnv(): string {
    return process.env.NODE_ENV || 'development';
  }

  get redisUrl(): string | undefined {
    return process.env.REDIS_URL;
  }

  get jwtSecret(): string {
    return process.env.JWT_SECRET || 'change-me';
  }

  get jwtExpiresIn(): string {
    return process.env.JWT_EXPIRES_IN || '1d';
  }

  /**
   * How old a signed login message may be before it is rejected
   */
  get loginMaxAgeSeconds(): number {
    return parseInt(process.env.LOGIN_MAX_AGE_SECONDS || '300', 10);
  }

  get lockTtlMs(): number {
    return parseInt(process.env.LOCK_TTL_MS || '10000', 10);
  }

  get lockWaitMs(): number {
    return parseInt(process.env.LOCK_WAIT_MS || '5000', 10);
  }

  /**
   * Enables the deposit endpoint that credits the caller's wallet.
   * Never turn this on in production.
   */
  get allowDeposits(): boolean {
    return process.env.ALLOW_DEPOSITS === 'true';
  }

  get defaultDonationPercent(): number {
    return parseInt(process.env.DEFAULT_DONATION_PERCENT || '75', 10);
  }
}
