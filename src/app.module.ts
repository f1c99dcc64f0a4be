import { Module } from '@nestjs/common';
import { appConfigModule } from './config/app-config';
import { InstagramModule } from './instagram/instagram.module';
import { RedisModule } from './redis/redis.module';

@Module({
  imports: [appConfigModule(), RedisModule, InstagramModule],
})
export class AppModule {}
