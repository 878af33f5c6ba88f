import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { ConfigService, ConfigModule } from '@nestjs/config';

import { PriceBar, PriceBarSchema } from './schemas/price-bar.schema';
import {
  CacheCoverage,
  CacheCoverageSchema,
} from './schemas/cache-coverage.schema';
import { AlertSet, AlertSetSchema } from './schemas/alert-set.schema';
import { Instrument, InstrumentSchema } from './schemas/instrument.schema';

@Module({
  imports: [
    ConfigModule,
    MongooseModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (cfg: ConfigService) => {
        // 只认 MONGO_URL，不回退到 localhost
        const uri = cfg.get<string>('MONGO_URL') ?? process.env.MONGO_URL ?? '';
        if (!uri) {
          throw new Error(
            'MONGO_URL is not set. Refusing to fallback to localhost.',
          );
        }

        const dbName =
          cfg.get<string>('MONGO_DB') ?? process.env.MONGO_DB ?? 'signal_alerts';

        return {
          uri,
          dbName,
          serverSelectionTimeoutMS: 30_000,
        };
      },
    }),

    MongooseModule.forFeature([
      { name: PriceBar.name, schema: PriceBarSchema },
      { name: CacheCoverage.name, schema: CacheCoverageSchema },
      { name: AlertSet.name, schema: AlertSetSchema },
      { name: Instrument.name, schema: InstrumentSchema },
    ]),
  ],
  exports: [MongooseModule],
})
export class MongoModule {}
