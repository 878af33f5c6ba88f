import {
  BadRequestException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { Model, isValidObjectId, mongo } from 'mongoose';

import {
  Instrument,
  InstrumentDocument,
} from '@/infra/mongo/schemas/instrument.schema';
import { PersistenceError } from '@/infra/errors';
import { InstrumentLockService } from '@/infra/lock/instrument-lock.service';
import {
  INSTRUMENT_ADDED,
  InstrumentAddedEvent,
} from '@/infra/types/events.types';
import type { InstrumentRef } from '@/infra/types/market.types';
import { AlertsRepository } from '@/alerts/store/alerts.repository';
import { PriceCacheService } from '@/price-cache/price-cache.service';
import { checkSymbol, parseSymbols } from './symbol';

export interface AddResult {
  instrument: InstrumentRef;
  created: boolean;
}

export interface InstrumentView extends InstrumentRef {
  addedAt: Date;
  lastRefreshedAt: Date | null;
}

export interface BulkRemoveResult {
  removed: InstrumentRef[];
  notFound: string[];
}

export interface BulkAddResult {
  added: InstrumentRef[];
  existing: InstrumentRef[];
  invalid: Array<{ symbol: string; reason: string }>;
}

const toRef = (doc: Instrument): InstrumentRef => ({
  id: doc._id.toHexString(),
  symbol: doc.symbol,
});

const toView = (doc: Instrument): InstrumentView => ({
  ...toRef(doc),
  addedAt: doc.addedAt,
  lastRefreshedAt: doc.lastRefreshedAt ?? null,
});

const escapeRegex = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

@Injectable()
export class InstrumentsService {
  private readonly logger = new Logger(InstrumentsService.name);

  constructor(
    @InjectModel(Instrument.name)
    private readonly instrumentModel: Model<InstrumentDocument>,
    private readonly alerts: AlertsRepository,
    private readonly priceCache: PriceCacheService,
    private readonly lock: InstrumentLockService,
    private readonly events: EventEmitter2,
  ) {}

  /** 新建时发出 instrument.added（后台刷新），已存在则原样返回 */
  async add(raw: string): Promise<AddResult> {
    const check = checkSymbol(raw);
    if (!check.ok) throw new BadRequestException(check.reason);

    const found = await this.findBySymbol(check.symbol);
    if (found) return { instrument: found, created: false };

    let doc: InstrumentDocument;
    try {
      doc = await this.instrumentModel.create({ symbol: check.symbol });
    } catch (err: unknown) {
      // 并发添加同一 symbol：唯一索引兜底
      if (err instanceof mongo.MongoServerError && err.code === 11000) {
        const winner = await this.findBySymbol(check.symbol);
        if (winner) return { instrument: winner, created: false };
      }
      throw err;
    }

    const instrument = toRef(doc);
    this.logger.log(`[instruments] added ${instrument.symbol} (${instrument.id})`);
    const payload: InstrumentAddedEvent = instrument;
    this.events.emit(INSTRUMENT_ADDED, payload);
    return { instrument, created: true };
  }

  async addMany(input: string | readonly string[]): Promise<BulkAddResult> {
    const out: BulkAddResult = { added: [], existing: [], invalid: [] };

    for (const symbol of parseSymbols(input)) {
      const check = checkSymbol(symbol);
      if (!check.ok) {
        out.invalid.push({ symbol: check.symbol, reason: check.reason });
        continue;
      }
      const r = await this.add(check.symbol);
      (r.created ? out.added : out.existing).push(r.instrument);
    }

    this.logger.log(
      `[instruments] bulk add: added=${out.added.length} existing=${out.existing.length} invalid=${out.invalid.length}`,
    );
    return out;
  }

  /**
   * 与刷新共用同一把 instrument 锁：删除期间不会有替换告警在途。
   * 先删告警和日线，instrument 本身最后删；中途失败时可以重试 DELETE。
   */
  async remove(id: string): Promise<InstrumentRef> {
    const instrument = await this.findById(id);
    if (!instrument) throw new NotFoundException(`instrument ${id} not found`);

    return this.lock.runExclusive(instrument.id, async () => {
      await this.alerts.deleteForInstrument(instrument.id);
      const { bars } = await this.priceCache.purge(instrument.id);
      await this.instrumentModel.deleteOne({ _id: instrument.id }).exec();
      this.logger.log(
        `[instruments] removed ${instrument.symbol} (bars=${bars})`,
      );
      return instrument;
    });
  }

  /** 逐个 remove（各自持锁）；不存在的 id 单独列出，不影响其余 */
  async removeMany(ids: readonly string[]): Promise<BulkRemoveResult> {
    const out: BulkRemoveResult = { removed: [], notFound: [] };
    for (const id of new Set(ids)) {
      try {
        out.removed.push(await this.remove(id));
      } catch (err: unknown) {
        if (!(err instanceof NotFoundException)) throw err;
        out.notFound.push(id);
      }
    }
    this.logger.log(
      `[instruments] bulk remove: removed=${out.removed.length} notFound=${out.notFound.length}`,
    );
    return out;
  }

  async listActive(): Promise<InstrumentView[]> {
    const rows = await this.instrumentModel
      .find({ active: true })
      .sort({ symbol: 1 })
      .lean<Instrument[]>()
      .exec();
    return rows.map(toView);
  }

  /** symbol 子串匹配，不区分大小写 */
  async search(query: string): Promise<InstrumentView[]> {
    const q = query.trim();
    if (!q) return this.listActive();
    const rows = await this.instrumentModel
      .find({ active: true, symbol: { $regex: escapeRegex(q), $options: 'i' } })
      .sort({ symbol: 1 })
      .lean<Instrument[]>()
      .exec();
    return rows.map(toView);
  }

  async markRefreshed(id: string, at: Date): Promise<void> {
    try {
      await this.instrumentModel
        .updateOne({ _id: id }, { $set: { lastRefreshedAt: at } })
        .exec();
    } catch (err: unknown) {
      throw new PersistenceError(`mark ${id} refreshed`, err);
    }
  }

  async findById(id: string): Promise<InstrumentRef | null> {
    if (!isValidObjectId(id)) return null;
    const doc = await this.instrumentModel.findById(id).lean<Instrument>().exec();
    return doc ? toRef(doc) : null;
  }

  private async findBySymbol(symbol: string): Promise<InstrumentRef | null> {
    const doc = await this.instrumentModel
      .findOne({ symbol })
      .lean<Instrument>()
      .exec();
    return doc ? toRef(doc) : null;
  }
}
