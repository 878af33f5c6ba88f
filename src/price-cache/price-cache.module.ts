import { Module } from '@nestjs/common';

import { MongoModule } from '@/infra/mongo/mongo.module';
import { MarketDataModule } from '@/market-data/market-data.module';
import { PriceBarRepository } from './writer/price-bar.repository';
import { PriceCacheService } from './price-cache.service';

@Module({
  imports: [MongoModule, MarketDataModule],
  providers: [PriceBarRepository, PriceCacheService],
  exports: [PriceCacheService],
})
export class PriceCacheModule {}
