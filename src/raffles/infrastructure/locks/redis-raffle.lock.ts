import { Injectable, Logger, ServiceUnavailableException } from '@nestjs/common';
import { hexlify, randomBytes } from 'ethers';
import { setTimeout as sleep } from 'timers/promises';
import { ConfigService } from '../../../database/config.service';
import { RedisService } from '../../../redis/redis.service';
import { RaffleLock } from '../../domain/raffle-lock';

const KEY_LOCK = 'lock:raffle:';

@Injectable()
export class RedisRaffleLock implements RaffleLock {
  private readonly logger = new Logger(RedisRaffleLock.name);

  constructor(
    private readonly redisService: RedisService,
    private readonly configService: ConfigService,
  ) {}

  async runExclusive<T>(key: string, work: () => Promise<T>): Promise<T> {
    const lockKey = `${KEY_LOCK}${key}`;
    const token = hexlify(randomBytes(16));
    const deadline = Date.now() + this.configService.lockWaitMs;
    let delay = 25;

    while (!(await this.redisService.setIfAbsent(lockKey, token, this.configService.lockTtlMs))) {
      if (Date.now() >= deadline) {
        this.logger.warn(`Gave up waiting for ${lockKey}`);
        throw new ServiceUnavailableException(`Raffle ${key} is busy, try again`);
      }
      await sleep(delay);
      delay = Math.min(delay * 2, 250);
    }

    try {
      return await work();
    } finally {
      await this.release(lockKey, token);
    }
  }

  private async release(lockKey: string, token: string): Promise<void> {
    try {
      const released = await this.redisService.deleteIfEquals(lockKey, token);
      if (!released) {
        this.logger.warn(`${lockKey} expired before it was released`);
      }
    } catch (error) {
      // The key still expires after its TTL
      this.logger.error(`Failed to release ${lockKey}:`, error);
    }
  }
}
