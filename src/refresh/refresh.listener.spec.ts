import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2, EventEmitterModule } from '@nestjs/event-emitter';

import { INSTRUMENT_ADDED } from '@/infra/types/events.types';
import type { InstrumentRef } from '@/infra/types/market.types';
import { RefreshService, RefreshOneResult } from './refresh.service';
import { RefreshListener } from './refresh.listener';

const inst = (n: number): InstrumentRef => ({ id: `inst-${n}`, symbol: `SYM${n}` });
const done = (instrument: InstrumentRef): RefreshOneResult => ({
  instrument,
  bars: 10,
  events: 1,
  alerts: 1,
  skipped: false,
});

async function until(cond: () => boolean) {
  while (!cond()) await new Promise((r) => setImmediate(r));
}

describe('RefreshListener', () => {
  let moduleRef: TestingModule;
  let listener: RefreshListener;
  let emitter: EventEmitter2;
  let refreshOne: jest.Mock<Promise<RefreshOneResult>, [InstrumentRef]>;

  beforeEach(async () => {
    refreshOne = jest.fn(async (i: InstrumentRef) => done(i));
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);

    moduleRef = await Test.createTestingModule({
      imports: [EventEmitterModule.forRoot()],
      providers: [
        RefreshListener,
        { provide: RefreshService, useValue: { refreshOne } },
        {
          provide: ConfigService,
          useValue: new ConfigService({ app: { refreshRateLimitMs: 0 } }),
        },
      ],
    }).compile();
    await moduleRef.init();
    listener = moduleRef.get(RefreshListener);
    emitter = moduleRef.get(EventEmitter2);
  });

  afterEach(async () => {
    await moduleRef.close();
    jest.restoreAllMocks();
  });

  it('runs background refreshes one at a time', async () => {
    let inFlight = 0;
    let peak = 0;
    const seen: string[] = [];
    refreshOne.mockImplementation(async (i) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((r) => setImmediate(r));
      seen.push(i.id);
      inFlight--;
      return done(i);
    });

    for (let n = 1; n <= 20; n++) emitter.emit(INSTRUMENT_ADDED, inst(n));
    await until(() => seen.length === 20);

    expect(peak).toBe(1);
    expect(seen).toEqual(Array.from({ length: 20 }, (_, k) => `inst-${k + 1}`));
  });

  it('logs a failed refresh and resolves', async () => {
    const error = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    refreshOne.mockRejectedValueOnce(new Error('SYM1: Not Found'));

    await expect(listener.onInstrumentAdded(inst(1))).resolves.toBeUndefined();
    expect(error).toHaveBeenCalledWith(
      '[refresh] initial refresh SYM1 failed: SYM1: Not Found',
    );
  });

  it('does not hold up whoever emitted the event', async () => {
    let release = () => {};
    let settled = false;
    refreshOne.mockImplementation(async (i) => {
      await new Promise<void>((r) => (release = () => r()));
      settled = true;
      return done(i);
    });

    expect(emitter.emit(INSTRUMENT_ADDED, inst(1))).toBe(true);
    expect(refreshOne).not.toHaveBeenCalled();

    await until(() => refreshOne.mock.calls.length === 1);
    expect(settled).toBe(false);

    release();
    await until(() => settled);
  });
});
