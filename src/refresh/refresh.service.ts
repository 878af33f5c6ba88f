import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';

import {
  PersistenceError,
  ProviderError,
  RefreshInProgressError,
} from '@/infra/errors';
import { InstrumentLockService } from '@/infra/lock/instrument-lock.service';
import {
  REFRESH_COMPLETED,
  REFRESH_PROGRESS,
  RefreshCompletedEvent,
  RefreshFailure,
  RefreshProgressEvent,
  RefreshSummary,
} from '@/infra/types/events.types';
import type { InstrumentRef } from '@/infra/types/market.types';
import { MarketCalendar } from '@/market-data/calendar/market-calendar';
import { addDays } from '@/market-data/calendar/trading-days';
import { PriceCacheService } from '@/price-cache/price-cache.service';
import { IndicatorService } from '@/indicators/indicator.service';
import { SignalGeneratorService } from '@/signal/signal-generator.service';
import { AlertDeduplicator } from '@/alerts/alert-deduplicator';
import { AlertsRepository } from '@/alerts/store/alerts.repository';
import { InstrumentsService } from '@/instruments/instruments.service';

export type ProgressSink = (index: number, total: number, symbol: string) => void;

export interface RefreshOneResult {
  instrument: InstrumentRef;
  bars: number;
  events: number;
  alerts: number;
  /** instrument 在排队期间已被删除 */
  skipped: boolean;
}

function describeFailure(instrument: InstrumentRef, err: unknown): RefreshFailure {
  let kind = 'unknown';
  if (err instanceof ProviderError) kind = err.reason;
  else if (err instanceof PersistenceError) kind = 'persistence';

  return {
    instrumentId: instrument.id,
    symbol: instrument.symbol,
    reason: err instanceof Error ? err.message : String(err),
    kind,
  };
}

@Injectable()
export class RefreshService {
  private readonly logger = new Logger(RefreshService.name);
  private running = false;
  private batchSeq = 0;

  private readonly lookbackDays: number;
  private readonly rateLimitMs: number;

  constructor(
    private readonly priceCache: PriceCacheService,
    private readonly indicators: IndicatorService,
    private readonly signals: SignalGeneratorService,
    private readonly dedup: AlertDeduplicator,
    private readonly alerts: AlertsRepository,
    private readonly instruments: InstrumentsService,
    private readonly lock: InstrumentLockService,
    private readonly calendar: MarketCalendar,
    private readonly events: EventEmitter2,
    config: ConfigService,
  ) {
    this.lookbackDays = Number(config.get<number>('app.historyLookbackDays') ?? 730);
    this.rateLimitMs = Number(config.get<number>('app.refreshRateLimitMs') ?? 500);
  }

  isRunning() {
    return this.running;
  }

  /**
   * fetch → indicators → evaluate → reconcile → replace，整条链在 instrument 锁内。
   * 同一 instrument 的两次刷新（新增触发 / 批量）不会交错。
   */
  async refreshOne(instrument: InstrumentRef): Promise<RefreshOneResult> {
    return this.lock.runExclusive(instrument.id, async () => {
      if (!(await this.instruments.findById(instrument.id))) {
        this.logger.log(`[refresh] ${instrument.symbol} removed, skip`);
        return { instrument, bars: 0, events: 0, alerts: 0, skipped: true };
      }

      const today = this.calendar.today();
      const raw = await this.priceCache.getRange(
        instrument,
        addDays(today, -this.lookbackDays),
        today,
      );
      const bars = this.indicators.compute(raw);
      const events = this.signals.evaluate(instrument.id, bars);

      const previous = await this.alerts.findByInstrument(instrument.id);
      const next = this.dedup.reconcile(instrument, events, previous);
      await this.alerts.replaceForInstrument(instrument, next);
      await this.instruments.markRefreshed(instrument.id, new Date());

      this.logger.log(
        `[refresh] ${instrument.symbol} bars=${bars.length} events=${events.length} alerts=${next.length}`,
      );
      return {
        instrument,
        bars: bars.length,
        events: events.length,
        alerts: next.length,
        skipped: false,
      };
    });
  }

  /**
   * 顺序刷新，单个失败只记录不中断；每个 instrument 之后上报进度，
   * 两个 instrument 之间停顿 rateLimitDelay（最后一个之后不停）。
   * 同一时间只允许一个批次。
   */
  refreshAll(
    instruments: readonly InstrumentRef[],
    rateLimitDelay: number = this.rateLimitMs,
    progressSink?: ProgressSink,
  ): Promise<RefreshSummary> {
    return this.exclusive(() =>
      this.runBatch(instruments, rateLimitDelay, progressSink),
    );
  }

  /** 刷新全部 active instrument（cron / HTTP 入口） */
  refreshActive(): Promise<RefreshSummary> {
    return this.exclusive(async () => {
      const list = await this.instruments.listActive();
      return this.runBatch(list, this.rateLimitMs);
    });
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    if (this.running) return Promise.reject(new RefreshInProgressError());
    this.running = true;
    return task().finally(() => {
      this.running = false;
    });
  }

  private async runBatch(
    instruments: readonly InstrumentRef[],
    rateLimitDelay: number,
    progressSink?: ProgressSink,
  ): Promise<RefreshSummary> {
    const batchId = String(++this.batchSeq);
    const startedAt = new Date().toISOString();
    const total = instruments.length;
    const sink = progressSink ?? this.emitProgress(batchId);

    this.logger.log(`[refresh] batch #${batchId} start: ${total} instrument(s)`);

    let succeeded = 0;
    let totalAlerts = 0;
    const failed: RefreshFailure[] = [];

    for (let i = 0; i < total; i++) {
      const instrument = instruments[i];
      try {
        const r = await this.refreshOne(instrument);
        succeeded++;
        totalAlerts += r.alerts;
      } catch (err: unknown) {
        const f = describeFailure(instrument, err);
        failed.push(f);
        this.logger.warn(`[refresh] ${f.symbol} failed (${f.kind}): ${f.reason}`);
      }

      try {
        sink(i + 1, total, instrument.symbol);
      } catch (err: unknown) {
        this.logger.warn(`[refresh] progress sink error: ${String(err)}`);
      }

      if (i < total - 1 && rateLimitDelay > 0) await this.sleep(rateLimitDelay);
    }

    const summary: RefreshSummary = { total, succeeded, failed, totalAlerts };
    const completed: RefreshCompletedEvent = {
      ...summary,
      batchId,
      startedAt,
      finishedAt: new Date().toISOString(),
    };
    this.events.emit(REFRESH_COMPLETED, completed);

    this.logger.log(
      `[refresh] batch #${batchId} done: ok=${succeeded}/${total} failed=${failed.length} alerts=${totalAlerts}`,
    );
    return summary;
  }

  private emitProgress(batchId: string): ProgressSink {
    return (index, total, symbol) => {
      const payload: RefreshProgressEvent = { batchId, index, total, symbol };
      this.events.emit(REFRESH_PROGRESS, payload);
    };
  }

  private sleep(ms: number) {
    return new Promise((r) => setTimeout(r, ms));
  }
}
