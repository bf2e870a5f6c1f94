import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { createRedisConnection } from './redis.connection';

@Injectable()
export class RedisService extends Redis implements OnModuleDestroy {
  private readonly redisLogger = new Logger(RedisService.name);

  constructor(configService: ConfigService) {
    super(createRedisConnection(configService));
    this.on('error', (error: Error) => {
      this.redisLogger.error(JSON.stringify({ event: 'redis_error', message: error.message }));
    });
  }

  async onModuleDestroy(): Promise<void> {
    await this.quit();
  }
}
