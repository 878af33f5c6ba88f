import { Injectable, Logger } from '@nestjs/common';
import { MACD, RSI, SMA } from 'technicalindicators';

import type {
  Bar,
  IndicatorSnapshot,
  RawBar,
} from '@/infra/types/market.types';
import { MACD_SETTINGS, RSI_SETTINGS } from './indicator.settings';
import { alignTail } from './calculators/series';
import { gannHilo } from './calculators/gann-hilo';
import { supertrend } from './calculators/supertrend';
import { ichimokuCloud } from './calculators/ichimoku-cloud';

/**
 * 给日线挂上 IndicatorSnapshot。
 * 输入须按日期升序；输出与输入一一对应，历史不足的字段为 null。
 */
@Injectable()
export class IndicatorService {
  private readonly logger = new Logger(IndicatorService.name);

  compute(bars: readonly RawBar[]): Bar[] {
    const n = bars.length;
    if (!n) return [];

    const closes = bars.map((b) => b.close);

    const macdOut = MACD.calculate({
      values: closes,
      fastPeriod: MACD_SETTINGS.fast,
      slowPeriod: MACD_SETTINGS.slow,
      signalPeriod: MACD_SETTINGS.signal,
      SimpleMAOscillator: false,
      SimpleMASignal: false,
    });
    const macd = alignTail(
      n,
      macdOut.map((m) => m.MACD),
    );
    const macdSignal = alignTail(
      n,
      macdOut.map((m) => m.signal),
    );

    const rsiRaw = RSI.calculate({ values: closes, period: RSI_SETTINGS.period });
    const rsi = alignTail(n, rsiRaw);
    const rsiMa = alignTail(
      n,
      SMA.calculate({ values: rsiRaw, period: RSI_SETTINGS.maPeriod }),
    );

    const gann = gannHilo(bars);
    const trend = supertrend(bars);
    const cloud = ichimokuCloud(bars);

    const out = bars.map((b, i): Bar => {
      const indicators: IndicatorSnapshot = {
        macd: macd[i],
        macdSignal: macdSignal[i],
        gannHilo: gann[i].value,
        rsi: rsi[i],
        rsiMa: rsiMa[i],
        supertrend: trend[i]?.value ?? null,
        cloudA: cloud.spanA[i],
        cloudB: cloud.spanB[i],
      };
      return { ...b, indicators };
    });

    this.logger.debug(`computed indicators for ${n} bars`);
    return out;
  }
}
