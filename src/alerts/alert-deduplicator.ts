import { Injectable } from '@nestjs/common';
import { Types } from 'mongoose';

import type {
  AlertRecord,
  InstrumentRef,
  IsoDate,
  PositionSide,
  SignalEvent,
  SignalKind,
} from '@/infra/types/market.types';

const newObjectId = () => new Types.ObjectId().toHexString();

function latest(events: readonly SignalEvent[], kind: SignalKind, after?: IsoDate) {
  let best: SignalEvent | undefined;
  for (const e of events) {
    if (e.kind !== kind) continue;
    if (after !== undefined && e.date <= after) continue;
    if (!best || e.date > best.date) best = e;
  }
  return best;
}

/**
 * 从完整信号历史推导当前持仓的告警集合（0~2 条）：
 * 最近的 OPEN（多空取较晚者，同一天时多头优先）+ 其后同方向最近的 CLOSE。
 * 结果整组替换旧集合；未变化的告警沿用旧的 id / createdAt。
 */
@Injectable()
export class AlertDeduplicator {
  reconcile(
    instrument: InstrumentRef,
    events: readonly SignalEvent[],
    previous: readonly AlertRecord[] = [],
    now: Date = new Date(),
    newId: () => string = newObjectId,
  ): AlertRecord[] {
    const openLong = latest(events, 'OPEN_LONG');
    const openShort = latest(events, 'OPEN_SHORT');
    if (!openLong && !openShort) return [];

    let side: PositionSide;
    if (openLong && openShort) {
      side = openShort.date > openLong.date ? 'SHORT' : 'LONG';
    } else {
      side = openLong ? 'LONG' : 'SHORT';
    }

    const open = side === 'LONG' ? openLong : openShort;
    if (!open) return [];
    const close = latest(
      events,
      side === 'LONG' ? 'CLOSE_LONG' : 'CLOSE_SHORT',
      open.date,
    );

    const picked = close ? [close, open] : [open];
    return picked.map((e) => {
      const same = previous.find(
        (p) =>
          p.kind === e.kind && p.signalDate === e.date && p.price === e.price,
      );
      return {
        id: same?.id ?? newId(),
        instrumentId: instrument.id,
        instrumentSymbol: instrument.symbol,
        kind: e.kind,
        signalDate: e.date,
        price: e.price,
        createdAt: same?.createdAt ?? now,
      };
    });
  }
}
