import { Controller, Get } from '@nestjs/common';

import { MarketDataFetcher } from '@/market-data/fetcher/market-data.fetcher';

@Controller('v1')
export class HealthController {
  constructor(private readonly fetcher: MarketDataFetcher) {}

  @Get('health')
  health() {
    return {
      ok: true,
      service: 'signal-alert-engine',
      providerCalls: this.fetcher.callCount(),
      ts: new Date().toISOString(),
    };
  }
}
