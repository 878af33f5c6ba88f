import type { DateRange, IsoDate } from '@/infra/types/market.types';

const DAY_MS = 86_400_000;

function toUtcMs(date: IsoDate): number {
  return Date.parse(`${date}T00:00:00Z`);
}

function fromUtcMs(ms: number): IsoDate {
  return new Date(ms).toISOString().slice(0, 10);
}

export function addDays(date: IsoDate, days: number): IsoDate {
  return fromUtcMs(toUtcMs(date) + days * DAY_MS);
}

/** 周一 ~ 周五（节假日不在这里处理，交给 coverage） */
export function isWeekday(date: IsoDate): boolean {
  const dow = new Date(toUtcMs(date)).getUTCDay();
  return dow !== 0 && dow !== 6;
}

/** [from, to] 闭区间逐日 */
export function eachDate(from: IsoDate, to: IsoDate): IsoDate[] {
  const out: IsoDate[] = [];
  for (let d = from; d <= to; d = addDays(d, 1)) out.push(d);
  return out;
}

export function inRange(date: IsoDate, range: DateRange): boolean {
  return date >= range.from && date <= range.to;
}

/** 合并重叠或首尾相接的区间，输出按 from 升序 */
export function mergeRanges(ranges: DateRange[]): DateRange[] {
  const sorted = [...ranges]
    .filter((r) => r.from <= r.to)
    .sort((a, b) => (a.from < b.from ? -1 : a.from > b.from ? 1 : 0));

  const out: DateRange[] = [];
  for (const r of sorted) {
    const last = out[out.length - 1];
    if (last && r.from <= addDays(last.to, 1)) {
      if (r.to > last.to) last.to = r.to;
    } else {
      out.push({ from: r.from, to: r.to });
    }
  }
  return out;
}

/** epoch 秒 + 交易所 gmtoffset（秒）→ 交易所本地日期 */
export function exchangeDate(epochSec: number, gmtOffsetSec: number): IsoDate {
  return fromUtcMs((epochSec + gmtOffsetSec) * 1000);
}

/** 日期在指定时区的 `YYYY-MM-DD` */
export function zonedDate(ms: number, timeZone: string): IsoDate {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(new Date(ms));

  const map: Record<string, string> = {};
  for (const p of parts) {
    if (p.type !== 'literal') map[p.type] = p.value;
  }
  return `${map.year}-${map.month}-${map.day}`;
}

export function toEpochSec(date: IsoDate): number {
  return Math.floor(toUtcMs(date) / 1000);
}
