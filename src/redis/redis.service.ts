import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import Redis from 'ioredis';
import { ConfigService } from '../database/config.service';

/** Deletes the key only while it still holds the caller's token */
const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
else
  return 0
end
`;

@Injectable()
export class RedisService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(RedisService.name);
  private client?: Redis;

  constructor(private readonly configService: ConfigService) {}

  onModuleInit() {
    const url = this.configService.redisUrl;

    if (!url) {
      throw new Error('REDIS_URL environment variable is not set');
    }

    this.client = new Redis(url, {
      lazyConnect: true,
      retryStrategy: (times) => Math.min(times * 500, 5000),
      maxRetriesPerRequest: 3,
      enableReadyCheck: true,
      keepAlive: 30000,
      connectTimeout: 10000,
      reconnectOnError: (err) => {
        const targetErrors = ['ECONNRESET', 'ETIMEDOUT', 'EPIPE', 'ECONNREFUSED'];
        return targetErrors.some((e) => err.message.includes(e));
      },
    });

    this.client.on('connect', () => this.logger.log('Redis connected'));
    this.client.on('reconnecting', (ms: number) =>
      this.logger.warn(`Redis reconnecting in ${ms}ms`),
    );
    this.client.on('error', (err) => {
      if (err.message?.includes('ECONNRESET')) {
        this.logger.warn('Redis ECONNRESET — will reconnect automatically');
      } else {
        this.logger.error('Redis error:', err);
      }
    });
  }

  onModuleDestroy() {
    this.client?.disconnect();
  }

  private get redis(): Redis {
    if (!this.client) {
      throw new Error('Redis client used before module initialisation');
    }
    return this.client;
  }

  /**
   * Set `key` to `token` only if it is absent, expiring after `ttlMs`.
   * Returns whether the key was taken.
   */
  async setIfAbsent(key: string, token: string, ttlMs: number): Promise<boolean> {
    const result = await this.redis.set(key, token, 'PX', ttlMs, 'NX');
    return result === 'OK';
  }

  /**
   * Delete `key` if it still holds `token`
   */
  async deleteIfEquals(key: string, token: string): Promise<boolean> {
    const removed = await this.redis.eval(RELEASE_SCRIPT, 1, key, token);
    return removed === 1;
  }
}
