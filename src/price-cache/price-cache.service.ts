import { Injectable, Logger } from '@nestjs/common';

import { MarketDataFetcher } from '@/market-data/fetcher/market-data.fetcher';
import { MarketCalendar } from '@/market-data/calendar/market-calendar';
import type {
  InstrumentRef,
  IsoDate,
  RawBar,
} from '@/infra/types/market.types';
import { PriceBarRepository } from './writer/price-bar.repository';
import { computeMissingRanges, historicalPart } from './ranges/missing-ranges';

@Injectable()
export class PriceCacheService {
  private readonly logger = new Logger(PriceCacheService.name);

  constructor(
    private readonly repo: PriceBarRepository,
    private readonly fetcher: MarketDataFetcher,
    private readonly calendar: MarketCalendar,
  ) {}

  /**
   * 取 [start, end] 的日线：
   * - today 之前且已缓存(final) 的直接返回，不访问 provider
   * - today 及之后每次都重拉并覆盖
   * - 其余缺口按连续区间各拉一次并落库
   * provider 失败直接抛出；已拉到并写入的区间保持有效，旧缓存不受影响。
   */
  async getRange(
    instrument: InstrumentRef,
    start: IsoDate,
    end: IsoDate,
  ): Promise<RawBar[]> {
    const today = this.calendar.today();
    const stored = await this.repo.findRange(instrument.id, start, end);
    const covered = await this.repo.getCoverage(instrument.id);

    const cachedDates = new Set(
      stored.filter((b) => b.final && b.date < today).map((b) => b.date),
    );
    const missing = computeMissingRanges({
      start,
      end,
      today,
      cachedDates,
      covered,
    });

    const byDate = new Map<IsoDate, RawBar>();
    for (const b of stored) {
      byDate.set(b.date, {
        date: b.date,
        open: b.open,
        high: b.high,
        low: b.low,
        close: b.close,
        volume: b.volume,
      });
    }

    if (missing.length === 0) {
      this.logger.debug(
        `[cache] ${instrument.symbol} ${start}..${end} hit (${stored.length} bars)`,
      );
    }

    for (const range of missing) {
      const fetched = await this.fetcher.fetchRange(
        instrument.symbol,
        range.from,
        range.to,
      );
      await this.repo.upsertMany(instrument.id, fetched, today);

      const hist = historicalPart(range, today);
      if (hist) await this.repo.addCoverage(instrument.id, hist);

      for (const b of fetched) byDate.set(b.date, b);
    }

    if (missing.length > 0) {
      this.logger.log(
        `[cache] ${instrument.symbol} ${start}..${end} fetched ${missing.length} range(s): ${missing
          .map((r) => `${r.from}..${r.to}`)
          .join(', ')}`,
      );
    }

    return [...byDate.values()]
      .filter((b) => b.date >= start && b.date <= end)
      .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
  }

  async purge(instrumentId: string) {
    return this.repo.deleteForInstrument(instrumentId);
  }
}
