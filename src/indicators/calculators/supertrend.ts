import { ATR } from 'technicalindicators';

import type { RawBar } from '@/infra/types/market.types';
import { SUPERTREND_SETTINGS } from '../indicator.settings';
import { alignTail } from './series';
import type { TrendDirection } from './gann-hilo';

export interface SupertrendPoint {
  value: number;
  direction: TrendDirection;
}

/**
 * Supertrend(period, multiplier)：hl2 ± multiplier × ATR。
 * 多头时下轨只升不降，空头时上轨只降不升；收盘穿越上一根的对侧轨道即翻转。
 * ATR 未定义的 bar 返回 null。
 */
export function supertrend(
  bars: readonly RawBar[],
  period: number = SUPERTREND_SETTINGS.period,
  multiplier: number = SUPERTREND_SETTINGS.multiplier,
): Array<SupertrendPoint | null> {
  const n = bars.length;
  const atr = alignTail(
    n,
    ATR.calculate({
      period,
      high: bars.map((b) => b.high),
      low: bars.map((b) => b.low),
      close: bars.map((b) => b.close),
    }),
  );

  const out: Array<SupertrendPoint | null> = [];
  let upper = NaN;
  let lower = NaN;
  let direction: TrendDirection = 1;
  let started = false;

  for (let i = 0; i < n; i++) {
    const a = atr[i];
    if (a === null) {
      out.push(null);
      continue;
    }
    const hl2 = (bars[i].high + bars[i].low) / 2;
    let nextUpper = hl2 + multiplier * a;
    let nextLower = hl2 - multiplier * a;

    if (started) {
      const close = bars[i].close;
      if (close > upper) direction = 1;
      else if (close < lower) direction = -1;

      if (direction === 1 && nextLower < lower) nextLower = lower;
      if (direction === -1 && nextUpper > upper) nextUpper = upper;
    }

    upper = nextUpper;
    lower = nextLower;
    started = true;
    out.push({ value: direction === 1 ? lower : upper, direction });
  }
  return out;
}
