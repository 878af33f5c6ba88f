import { Injectable, Logger } from '@nestjs/common';

import { HttpClientService } from '@/infra/http/http-client.service';
import type { IsoDate, RawBar } from '@/infra/types/market.types';
import { MarketDataParser } from '../parser/market-data.parser';
import { addDays, toEpochSec } from '../calendar/trading-days';

@Injectable()
export class MarketDataFetcher {
  private readonly logger = new Logger(MarketDataFetcher.name);
  private calls = 0;

  constructor(
    private readonly http: HttpClientService,
    private readonly parser: MarketDataParser,
  ) {}

  /**
   * 拉取 [from, to] 的日线：一次 provider 调用。
   * 失败时抛 ProviderError（HttpClientService 已做退避重试）。
   */
  async fetchRange(symbol: string, from: IsoDate, to: IsoDate): Promise<RawBar[]> {
    this.calls++;
    const t0 = Date.now();
    const payload = await this.http.get<unknown>(
      `/v8/finance/chart/${encodeURIComponent(symbol)}`,
      {
        // 东半球交易所的日线时间戳落在前一个 UTC 日，period1 往前多取一天
        period1: toEpochSec(addDays(from, -1)),
        // period2 为开区间，多给一天覆盖 `to` 当天
        period2: toEpochSec(addDays(to, 1)),
        interval: '1d',
        events: 'history',
        includePrePost: false,
      },
    );

    const bars = this.parser
      .parseChart(payload, symbol)
      .filter((b) => b.date >= from && b.date <= to);

    this.logger.log(
      `[chart] ${symbol} ${from}..${to} ✓ rows=${bars.length} in ${Date.now() - t0}ms`,
    );
    return bars;
  }

  /** 本进程累计 provider 调用次数 */
  callCount(): number {
    return this.calls;
  }
}
