import { Global, Module } from '@nestjs/common';
import { HttpClientService } from './http/http-client.service';
import { RedisModule } from './redis/redis.module';
import { InstrumentLockService } from './lock/instrument-lock.service';

@Global()
@Module({
  imports: [RedisModule],
  providers: [HttpClientService, InstrumentLockService],
  exports: [HttpClientService, InstrumentLockService, RedisModule],
})
export class InfraModule {}
