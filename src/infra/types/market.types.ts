/**
 * @file market.types.ts
 * @description 日线 / 指标快照 / 信号 / 告警的统一结构，供 price-cache、signal、alerts、refresh 模块共用
 */

/** `YYYY-MM-DD`，按交易所时区 */
export type IsoDate = string;

export interface DateRange {
  from: IsoDate;
  to: IsoDate;
}

export interface InstrumentRef {
  id: string;
  symbol: string;
}

/** 原始 OHLCV（provider / cache 层） */
export interface RawBar {
  date: IsoDate;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/**
 * 每根 bar 的指标值。
 * null = 历史不足，该指标在这根 bar 上尚未定义。
 */
export interface IndicatorSnapshot {
  macd: number | null;
  macdSignal: number | null;
  /** Gann HiLo：动态支撑/阻力线 */
  gannHilo: number | null;
  rsi: number | null;
  rsiMa: number | null;
  supertrend: number | null;
  /** Ichimoku 云带两条边（已前移 displacement） */
  cloudA: number | null;
  cloudB: number | null;
}

export interface Bar extends RawBar {
  indicators: IndicatorSnapshot;
}

export type PositionSide = 'LONG' | 'SHORT';

export type SignalKind = 'OPEN_LONG' | 'CLOSE_LONG' | 'OPEN_SHORT' | 'CLOSE_SHORT';

export interface SignalEvent {
  instrumentId: string;
  date: IsoDate;
  kind: SignalKind;
  price: number;
}

export interface AlertRecord {
  id: string;
  instrumentId: string;
  instrumentSymbol: string;
  kind: SignalKind;
  signalDate: IsoDate;
  price: number;
  createdAt: Date;
}

export type SortDir = 'asc' | 'desc';
