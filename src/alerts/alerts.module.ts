import { Module } from '@nestjs/common';

import { InstrumentsModule } from '@/instruments/instruments.module';
import { AlertStoreModule } from './store/alert-store.module';
import { AlertDeduplicator } from './alert-deduplicator';
import { AlertsController } from './alerts.controller';

@Module({
  imports: [AlertStoreModule, InstrumentsModule],
  controllers: [AlertsController],
  providers: [AlertDeduplicator],
  exports: [AlertDeduplicator, AlertStoreModule],
})
export class AlertsModule {}
