import { Module } from '@nestjs/common';

import { MongoModule } from '@/infra/mongo/mongo.module';
import { AlertsRepository } from './alerts.repository';

@Module({
  imports: [MongoModule],
  providers: [AlertsRepository],
  exports: [AlertsRepository],
})
export class AlertStoreModule {}
