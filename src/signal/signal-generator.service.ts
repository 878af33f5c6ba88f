import { Injectable } from '@nestjs/common';

import type {
  Bar,
  IndicatorSnapshot,
  SignalEvent,
  SignalKind,
} from '@/infra/types/market.types';

type Complete = { [K in keyof IndicatorSnapshot]: number };

/** 快照任一字段为 null → 该 bar 不产生任何信号 */
function complete(s: IndicatorSnapshot): Complete | null {
  const {
    macd,
    macdSignal,
    gannHilo,
    rsi,
    rsiMa,
    supertrend,
    cloudA,
    cloudB,
  } = s;
  if (
    macd === null ||
    macdSignal === null ||
    gannHilo === null ||
    rsi === null ||
    rsiMa === null ||
    supertrend === null ||
    cloudA === null ||
    cloudB === null
  ) {
    return null;
  }
  return { macd, macdSignal, gannHilo, rsi, rsiMa, supertrend, cloudA, cloudB };
}

function inCloud(close: number, s: Complete) {
  return (
    (close < s.cloudA && close > s.cloudB) ||
    (close > s.cloudA && close < s.cloudB)
  );
}

/**
 * 逐 bar 独立判断四类信号，同一根 bar 可同时命中多类；
 * 不维护持仓状态，配对交给 AlertDeduplicator。
 */
@Injectable()
export class SignalGeneratorService {
  evaluate(instrumentId: string, bars: readonly Bar[]): SignalEvent[] {
    const events: SignalEvent[] = [];

    for (let t = 0; t < bars.length; t++) {
      const bar = bars[t];
      const s = complete(bar.indicators);
      if (!s) continue;

      const kinds: SignalKind[] = [];
      const close = bar.close;
      const cloud = inCloud(close, s);

      const prev = t > 0 ? bars[t - 1] : undefined;
      if (prev) {
        if (
          s.macd > s.macdSignal &&
          close > s.gannHilo &&
          s.rsi > s.rsiMa &&
          close > s.supertrend &&
          close > prev.high
        ) {
          kinds.push('OPEN_LONG');
        }

        const prevMacd = prev.indicators.macd;
        if (
          prevMacd !== null &&
          s.macd < s.macdSignal &&
          s.macd < prevMacd &&
          close < s.gannHilo &&
          s.rsi < s.rsiMa &&
          close < s.supertrend &&
          close < prev.low
        ) {
          kinds.push('OPEN_SHORT');
        }
      }

      if (close < s.gannHilo || s.macd < s.macdSignal || cloud) {
        kinds.push('CLOSE_LONG');
      }
      if (close > s.gannHilo || s.macd > s.macdSignal || cloud) {
        kinds.push('CLOSE_SHORT');
      }

      for (const kind of kinds) {
        events.push({ instrumentId, date: bar.date, kind, price: close });
      }
    }
    return events;
  }
}
