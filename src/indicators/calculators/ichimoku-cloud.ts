import type { RawBar } from '@/infra/types/market.types';
import { ICHIMOKU_SETTINGS } from '../indicator.settings';
import { rollingMidpoint, shiftForward } from './series';

export interface CloudBand {
  spanA: Array<number | null>;
  spanB: Array<number | null>;
}

/** 一目均衡表云带：spanA/spanB 已整体前移 displacement 根 */
export function ichimokuCloud(
  bars: readonly RawBar[],
  settings: {
    conversion: number;
    base: number;
    spanB: number;
    displacement: number;
  } = ICHIMOKU_SETTINGS,
): CloudBand {
  const highs = bars.map((b) => b.high);
  const lows = bars.map((b) => b.low);

  const tenkan = rollingMidpoint(highs, lows, settings.conversion);
  const kijun = rollingMidpoint(highs, lows, settings.base);
  const spanA = tenkan.map((t, i) => {
    const k = kijun[i];
    return t === null || k === null ? null : (t + k) / 2;
  });
  const spanB = rollingMidpoint(highs, lows, settings.spanB);

  return {
    spanA: shiftForward(spanA, settings.displacement),
    spanB: shiftForward(spanB, settings.displacement),
  };
}
