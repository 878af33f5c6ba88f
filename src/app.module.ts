import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { EventEmitterModule } from '@nestjs/event-emitter';

import { ConfigModule } from './config/config.module';
import { InfraModule } from './infra/infra.module';
import { MarketDataModule } from './market-data/market-data.module';
import { InstrumentsModule } from './instruments/instruments.module';
import { AlertsModule } from './alerts/alerts.module';
import { RefreshModule } from './refresh/refresh.module';
import { HealthController } from './health/health.controller';

@Module({
  imports: [
    ConfigModule,
    EventEmitterModule.forRoot(),
    ScheduleModule.forRoot(),
    InfraModule,
    MarketDataModule,
    InstrumentsModule,
    AlertsModule,
    RefreshModule,
  ],
  controllers: [HealthController],
})
export class AppModule {}
