import { Module } from '@nestjs/common';

import { MongoModule } from '@/infra/mongo/mongo.module';
import { AlertStoreModule } from '@/alerts/store/alert-store.module';
import { PriceCacheModule } from '@/price-cache/price-cache.module';
import { InstrumentsService } from './instruments.service';
import { InstrumentsController } from './instruments.controller';

@Module({
  imports: [MongoModule, AlertStoreModule, PriceCacheModule],
  controllers: [InstrumentsController],
  providers: [InstrumentsService],
  exports: [InstrumentsService],
})
export class InstrumentsModule {}
