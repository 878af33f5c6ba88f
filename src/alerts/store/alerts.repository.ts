import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model, PipelineStage } from 'mongoose';

import {
  AlertEntry,
  AlertSet,
  AlertSetDocument,
} from '@/infra/mongo/schemas/alert-set.schema';
import { PersistenceError } from '@/infra/errors';
import type {
  AlertRecord,
  InstrumentRef,
  SortDir,
} from '@/infra/types/market.types';

export interface AlertPage {
  items: AlertRecord[];
  total: number;
}

const toRecord = (e: AlertEntry): AlertRecord => ({
  id: e.id,
  instrumentId: e.instrumentId,
  instrumentSymbol: e.instrumentSymbol,
  kind: e.kind,
  signalDate: e.signalDate,
  price: e.price,
  createdAt: e.createdAt,
});

@Injectable()
export class AlertsRepository {
  private readonly logger = new Logger(AlertsRepository.name);

  constructor(
    @InjectModel(AlertSet.name)
    private readonly alertSetModel: Model<AlertSetDocument>,
  ) {}

  /** 单文档整组覆盖：要么新集合全部可见，要么旧集合原样保留 */
  async replaceForInstrument(
    instrument: InstrumentRef,
    alerts: AlertRecord[],
  ): Promise<void> {
    try {
      await this.alertSetModel
        .updateOne(
          { _id: instrument.id },
          {
            $set: {
              symbol: instrument.symbol,
              alerts,
              updatedAt: new Date(),
            },
          },
          { upsert: true },
        )
        .exec();
    } catch (err: unknown) {
      throw new PersistenceError(`replace alerts for ${instrument.symbol}`, err);
    }
    this.logger.log(
      `[alerts] ${instrument.symbol} replaced → ${alerts.length} alert(s)`,
    );
  }

  async findByInstrument(instrumentId: string): Promise<AlertRecord[]> {
    const doc = await this.alertSetModel
      .findById(instrumentId)
      .lean<AlertSet>()
      .exec();
    return (doc?.alerts ?? []).map(toRecord);
  }

  async deleteForInstrument(instrumentId: string) {
    try {
      const res = await this.alertSetModel.deleteOne({ _id: instrumentId }).exec();
      return { deleted: res.deletedCount };
    } catch (err: unknown) {
      throw new PersistenceError(`delete alerts for ${instrumentId}`, err);
    }
  }

  /** 所有 instrument 的告警摊平后分页；同日期按 createdAt、id 决定次序 */
  async getPage(offset: number, limit: number, sortDir: SortDir): Promise<AlertPage> {
    const dir = sortDir === 'asc' ? 1 : -1;
    const pipeline: PipelineStage[] = [
      { $unwind: '$alerts' },
      { $replaceRoot: { newRoot: '$alerts' } },
      { $sort: { signalDate: dir, createdAt: dir, id: dir } },
      {
        $facet: {
          items: [{ $skip: offset }, { $limit: limit }],
          total: [{ $count: 'n' }],
        },
      },
    ];

    const [res] = await this.alertSetModel
      .aggregate<{ items: AlertEntry[]; total: Array<{ n: number }> }>(pipeline)
      .exec();

    return {
      items: (res?.items ?? []).map(toRecord),
      total: res?.total[0]?.n ?? 0,
    };
  }
}
