import { SMA } from 'technicalindicators';

import type { RawBar } from '@/infra/types/market.types';
import { GANN_HILO_SETTINGS } from '../indicator.settings';
import { alignTail } from './series';

export type TrendDirection = 1 | -1;

export interface GannHiloPoint {
  value: number;
  direction: TrendDirection;
}

/**
 * Gann HiLo Activator
 * - 收盘上破前一根的 SMA(high, fast) → 转多，线取 SMA(low, slow) 作支撑
 * - 收盘跌破前一根的 SMA(low, slow) → 转空，线取 SMA(high, fast) 作阻力
 * - 否则沿用上一根方向；SMA 尚未定义时沿用上一根的线
 * 第一根以收盘价起步、方向为多。
 */
export function gannHilo(
  bars: readonly RawBar[],
  fast: number = GANN_HILO_SETTINGS.fast,
  slow: number = GANN_HILO_SETTINGS.slow,
): GannHiloPoint[] {
  if (!bars.length) return [];

  const n = bars.length;
  const smaHigh = alignTail(
    n,
    SMA.calculate({ period: fast, values: bars.map((b) => b.high) }),
  );
  const smaLow = alignTail(
    n,
    SMA.calculate({ period: slow, values: bars.map((b) => b.low) }),
  );

  const out: GannHiloPoint[] = [{ value: bars[0].close, direction: 1 }];
  for (let i = 1; i < n; i++) {
    const prev = out[i - 1];
    const close = bars[i].close;
    const prevHigh = smaHigh[i - 1];
    const prevLow = smaLow[i - 1];

    let direction: TrendDirection = prev.direction;
    if (prevHigh !== null && close > prevHigh) direction = 1;
    else if (prevLow !== null && close < prevLow) direction = -1;

    const line = direction === 1 ? smaLow[i] : smaHigh[i];
    out.push({ value: line ?? prev.value, direction });
  }
  return out;
}
