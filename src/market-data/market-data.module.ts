import { Module } from '@nestjs/common';

import { MarketDataFetcher } from './fetcher/market-data.fetcher';
import { MarketDataParser } from './parser/market-data.parser';
import { MarketCalendar } from './calendar/market-calendar';

@Module({
  providers: [MarketDataParser, MarketDataFetcher, MarketCalendar],
  exports: [MarketDataFetcher, MarketCalendar],
})
export class MarketDataModule {}
