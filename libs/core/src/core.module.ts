import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { RedisService } from './redis.service';
import { envSchemaWithRefinements } from './env.schema';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate:
        process.env.NODE_ENV === 'test'
          ? undefined
          : (config) => envSchemaWithRefinements.parse(config),
    }),
  ],
  providers: [RedisService],
  exports: [ConfigModule, RedisService],
})
export class CoreModule {}
