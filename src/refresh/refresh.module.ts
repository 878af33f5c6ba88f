import { Module } from '@nestjs/common';

import { MarketDataModule } from '@/market-data/market-data.module';
import { PriceCacheModule } from '@/price-cache/price-cache.module';
import { IndicatorsModule } from '@/indicators/indicators.module';
import { SignalModule } from '@/signal/signal.module';
import { AlertsModule } from '@/alerts/alerts.module';
import { InstrumentsModule } from '@/instruments/instruments.module';
import { RefreshService } from './refresh.service';
import { RefreshListener } from './refresh.listener';
import { RefreshProgressListener } from './refresh-progress.listener';
import { RefreshScheduler } from './refresh.scheduler';
import { RefreshController } from './refresh.controller';

@Module({
  imports: [
    MarketDataModule,
    PriceCacheModule,
    IndicatorsModule,
    SignalModule,
    AlertsModule,
    InstrumentsModule,
  ],
  controllers: [RefreshController],
  providers: [
    RefreshService,
    RefreshListener,
    RefreshProgressListener,
    RefreshScheduler,
  ],
  exports: [RefreshService],
})
export class RefreshModule {}
