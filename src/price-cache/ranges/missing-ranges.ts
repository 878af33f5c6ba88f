import type { DateRange, IsoDate } from '@/infra/types/market.types';
import {
  addDays,
  eachDate,
  inRange,
  isWeekday,
} from '@/market-data/calendar/trading-days';

export interface MissingRangeInput {
  start: IsoDate;
  end: IsoDate;
  today: IsoDate;
  /** 已缓存且 final 的 today 之前的日期 */
  cachedDates: ReadonlySet<IsoDate>;
  /** 已请求过的历史区间（休市日在其中不会再被视为缺失） */
  covered: readonly DateRange[];
}

/**
 * 计算 [start, end] 内需要向 provider 请求的最少连续区间：
 * - today 之前：只看工作日，已缓存或已覆盖的跳过
 * - today 及之后：永远需要（当天数据可变）
 * 相邻的缺失日期合并成一段，一段对应一次 provider 调用。
 */
export function computeMissingRanges(input: MissingRangeInput): DateRange[] {
  const { start, end, today, cachedDates, covered } = input;
  const runs: DateRange[] = [];
  let open: DateRange | undefined;

  for (const d of eachDate(start, end)) {
    if (d < today && !isWeekday(d)) continue;

    const missing =
      d >= today ||
      (!cachedDates.has(d) && !covered.some((r) => inRange(d, r)));

    if (missing) {
      if (open) open.to = d;
      else open = { from: d, to: d };
    } else if (open) {
      runs.push(open);
      open = undefined;
    }
  }
  if (open) runs.push(open);
  return runs;
}

/** 区间中 today 之前的部分（可以记入 coverage 的部分） */
export function historicalPart(range: DateRange, today: IsoDate): DateRange | null {
  if (range.from >= today) return null;
  const yesterday = addDays(today, -1);
  return { from: range.from, to: range.to < yesterday ? range.to : yesterday };
}
