import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';

import { ProviderError } from '@/infra/errors';
import type { RawBar } from '@/infra/types/market.types';
import { exchangeDate } from '../calendar/trading-days';

const series = z.array(z.number().nullable()).optional();

const chartSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          meta: z.object({
            symbol: z.string().optional(),
            gmtoffset: z.number().default(0),
          }),
          timestamp: z.array(z.number()).optional(),
          indicators: z.object({
            quote: z
              .array(
                z.object({
                  open: series,
                  high: series,
                  low: series,
                  close: series,
                  volume: series,
                }),
              )
              .default([]),
          }),
        }),
      )
      .nullable()
      .optional(),
    error: z
      .object({ code: z.string().optional(), description: z.string().optional() })
      .nullable()
      .optional(),
  }),
});

@Injectable()
export class MarketDataParser {
  private readonly logger = new Logger(MarketDataParser.name);

  /** chart 日线 → RawBar[]（按日期升序，同日取最后一条） */
  parseChart(payload: unknown, symbol: string): RawBar[] {
    const parsed = chartSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ProviderError(
        'bad_response',
        `${symbol}: unexpected chart payload (${parsed.error.issues[0]?.message ?? 'invalid'})`,
      );
    }

    const { result, error } = parsed.data.chart;
    if (error) {
      throw new ProviderError(
        'not_found',
        `${symbol}: ${error.code ?? 'error'} ${error.description ?? ''}`.trim(),
      );
    }
    const r = result?.[0];
    if (!r) {
      throw new ProviderError('bad_response', `${symbol}: empty chart result`);
    }

    const ts = r.timestamp ?? [];
    const q = r.indicators.quote[0];
    if (!q || ts.length === 0) return [];

    const byDate = new Map<string, RawBar>();
    let dropped = 0;
    for (let i = 0; i < ts.length; i++) {
      const open = q.open?.[i];
      const high = q.high?.[i];
      const low = q.low?.[i];
      const close = q.close?.[i];
      if (open == null || high == null || low == null || close == null) {
        dropped++;
        continue;
      }
      const date = exchangeDate(ts[i], r.meta.gmtoffset);
      byDate.set(date, {
        date,
        open,
        high,
        low,
        close,
        volume: q.volume?.[i] ?? 0,
      });
    }

    if (dropped > 0) {
      this.logger.debug(`${symbol}: dropped ${dropped} incomplete rows`);
    }
    return [...byDate.values()].sort((a, b) =>
      a.date < b.date ? -1 : a.date > b.date ? 1 : 0,
    );
  }
}
