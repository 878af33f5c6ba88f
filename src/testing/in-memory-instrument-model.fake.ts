import { Types } from 'mongoose';

import type { Instrument } from '@/infra/mongo/schemas/instrument.schema';

class FakeQuery<T> {
  constructor(private readonly run: () => T) {}

  // find() 已按 symbol 升序返回
  sort(_spec: Record<string, 1 | -1>) {
    return this;
  }

  lean<_R>() {
    return this;
  }

  exec(): Promise<T> {
    return Promise.resolve(this.run());
  }
}

/** Model<InstrumentDocument> 中 InstrumentsService 用到的那部分 */
export class InMemoryInstrumentModel {
  readonly rows = new Map<string, Instrument>();

  async create(input: { symbol: string }): Promise<Instrument> {
    const doc: Instrument = {
      _id: new Types.ObjectId(),
      symbol: input.symbol,
      active: true,
      addedAt: new Date(),
      lastRefreshedAt: null,
    };
    this.rows.set(doc._id.toHexString(), doc);
    return doc;
  }

  find(filter: { active?: boolean; symbol?: { $regex: string; $options: string } }) {
    const pattern = filter.symbol
      ? new RegExp(filter.symbol.$regex, filter.symbol.$options)
      : null;
    return new FakeQuery(() =>
      [...this.rows.values()]
        .filter((r) => filter.active === undefined || r.active === filter.active)
        .filter((r) => !pattern || pattern.test(r.symbol))
        .sort((a, b) => a.symbol.localeCompare(b.symbol)),
    );
  }

  updateOne(filter: { _id: string }, update: { $set: { lastRefreshedAt: Date } }) {
    return new FakeQuery(() => {
      const row = this.rows.get(filter._id);
      if (row) row.lastRefreshedAt = update.$set.lastRefreshedAt;
      return { matchedCount: row ? 1 : 0 };
    });
  }

  findOne(filter: { symbol: string }) {
    return new FakeQuery(
      () => [...this.rows.values()].find((r) => r.symbol === filter.symbol) ?? null,
    );
  }

  findById(id: string) {
    return new FakeQuery(() => this.rows.get(id) ?? null);
  }

  deleteOne(filter: { _id: string }) {
    return new FakeQuery(() => ({
      deletedCount: this.rows.delete(filter._id) ? 1 : 0,
    }));
  }

  seed(symbol: string, active = true): string {
    const doc: Instrument = {
      _id: new Types.ObjectId(),
      symbol,
      active,
      addedAt: new Date(),
      lastRefreshedAt: null,
    };
    this.rows.set(doc._id.toHexString(), doc);
    return doc._id.toHexString();
  }
}
