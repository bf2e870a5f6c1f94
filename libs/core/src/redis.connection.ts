import { ConfigService } from '@nestjs/config';
import { RedisOptions } from 'ioredis';

const DEFAULT_REDIS_PORT = 6379;

export const parseRedisUrl = (redisUrl: string): RedisOptions => {
  const url = new URL(redisUrl);
  const options: RedisOptions = {
    host: url.hostname,
    port: url.port ? Number(url.port) : DEFAULT_REDIS_PORT,
  };

  if (url.username) {
    options.username = decodeURIComponent(url.username);
  }
  if (url.password) {
    options.password = decodeURIComponent(url.password);
  }

  const db = Number(url.pathname.replace('/', ''));
  if (url.pathname.length > 1 && Number.isInteger(db)) {
    options.db = db;
  }

  if (url.protocol === 'rediss:') {
    options.tls = {};
  }

  return options;
};

/**
 * Shared by the trade-record store and BullMQ; BullMQ workers require
 * `maxRetriesPerRequest: null`.
 */
export const createRedisConnection = (configService: ConfigService): RedisOptions => {
  const redisUrl = configService.get<string>('REDIS_URL');
  const base: RedisOptions = redisUrl
    ? parseRedisUrl(redisUrl)
    : {
        host: configService.get<string>('REDIS_HOST', 'localhost'),
        port: configService.get<number>('REDIS_PORT', DEFAULT_REDIS_PORT),
        password: configService.get<string>('REDIS_PASSWORD') || undefined,
      };

  return {
    ...base,
    connectionName: configService.get<string>('APP_NAME', 'macd-volume-trader'),
    maxRetriesPerRequest: null,
  };
};
