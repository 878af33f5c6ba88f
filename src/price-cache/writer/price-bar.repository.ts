import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { AnyBulkWriteOperation, Model } from 'mongoose';

import {
  PriceBar,
  PriceBarDocument,
} from '@/infra/mongo/schemas/price-bar.schema';
import {
  CacheCoverage,
  CacheCoverageDocument,
} from '@/infra/mongo/schemas/cache-coverage.schema';
import { PersistenceError } from '@/infra/errors';
import type {
  DateRange,
  IsoDate,
  RawBar,
} from '@/infra/types/market.types';
import { mergeRanges } from '@/market-data/calendar/trading-days';

export interface StoredBar extends RawBar {
  final: boolean;
}

@Injectable()
export class PriceBarRepository {
  private readonly logger = new Logger(PriceBarRepository.name);

  constructor(
    @InjectModel(PriceBar.name)
    private readonly barModel: Model<PriceBarDocument>,
    @InjectModel(CacheCoverage.name)
    private readonly coverageModel: Model<CacheCoverageDocument>,
  ) {}

  async findRange(
    instrumentId: string,
    from: IsoDate,
    to: IsoDate,
  ): Promise<StoredBar[]> {
    const rows = await this.barModel
      .find({ instrumentId, date: { $gte: from, $lte: to } })
      .sort({ date: 1 })
      .lean<PriceBar[]>()
      .exec();

    return rows.map((r) => ({
      date: r.date,
      open: r.open,
      high: r.high,
      low: r.low,
      close: r.close,
      volume: r.volume,
      final: r.final,
    }));
  }

  /**
   * 幂等批量写入
   * 唯一键: _id = `${instrumentId}|${date}`
   * 值未变化时 Mongo 不产生修改（modifiedCount 不计）
   */
  async upsertMany(instrumentId: string, bars: RawBar[], today: IsoDate) {
    if (bars.length === 0) return { written: 0, skippedDup: 0 };

    const ops: AnyBulkWriteOperation<PriceBar>[] = bars.map((b) => ({
      updateOne: {
        filter: { _id: `${instrumentId}|${b.date}` },
        update: {
          $set: {
            instrumentId,
            date: b.date,
            open: b.open,
            high: b.high,
            low: b.low,
            close: b.close,
            volume: b.volume,
            final: b.date < today,
          },
          $setOnInsert: { createdAt: new Date() },
        },
        upsert: true,
      },
    }));

    try {
      const res = await this.barModel.bulkWrite(ops, { ordered: false });
      const written = res.upsertedCount + res.modifiedCount;
      const skippedDup = bars.length - written;
      this.logger.log(
        `Mongo bars ${instrumentId} written=${written}, skippedDup=${skippedDup}`,
      );
      return { written, skippedDup };
    } catch (e: unknown) {
      throw new PersistenceError(`upsert bars for ${instrumentId}`, e);
    }
  }

  async getCoverage(instrumentId: string): Promise<DateRange[]> {
    const doc = await this.coverageModel
      .findById(instrumentId)
      .lean<CacheCoverage>()
      .exec();
    return doc?.ranges ?? [];
  }

  async addCoverage(instrumentId: string, range: DateRange): Promise<void> {
    const ranges = mergeRanges([
      ...(await this.getCoverage(instrumentId)),
      range,
    ]);
    try {
      await this.coverageModel.updateOne(
        { _id: instrumentId },
        { $set: { ranges, updatedAt: new Date() } },
        { upsert: true },
      );
    } catch (e: unknown) {
      throw new PersistenceError(`update coverage for ${instrumentId}`, e);
    }
  }

  async deleteForInstrument(instrumentId: string) {
    const bars = await this.barModel.deleteMany({ instrumentId }).exec();
    await this.coverageModel.deleteOne({ _id: instrumentId }).exec();
    return { bars: bars.deletedCount };
  }
}
