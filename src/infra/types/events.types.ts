import type { InstrumentRef } from './market.types';

export const INSTRUMENT_ADDED = 'instrument.added';
export const REFRESH_PROGRESS = 'refresh.progress';
export const REFRESH_COMPLETED = 'refresh.completed';

export type InstrumentAddedEvent = InstrumentRef;

export interface RefreshProgressEvent {
  batchId: string;
  index: number;
  total: number;
  symbol: string;
}

export interface RefreshFailure {
  instrumentId: string;
  symbol: string;
  reason: string;
  /** ProviderError.reason / 'persistence' / 'unknown' */
  kind: string;
}

export interface RefreshSummary {
  total: number;
  succeeded: number;
  failed: RefreshFailure[];
  totalAlerts: number;
}

export interface RefreshCompletedEvent extends RefreshSummary {
  batchId: string;
  startedAt: string;
  finishedAt: string;
}
