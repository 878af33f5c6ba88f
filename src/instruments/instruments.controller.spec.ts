import { BadRequestException } from '@nestjs/common';
import { Test } from '@nestjs/testing';

import { InstrumentsService } from './instruments.service';
import { InstrumentsController } from './instruments.controller';

describe('InstrumentsController', () => {
  let controller: InstrumentsController;
  const view = {
    id: 'inst-1',
    symbol: 'AAPL',
    addedAt: new Date('2025-11-20T00:00:00Z'),
    lastRefreshedAt: null,
  };
  const instruments = {
    listActive: jest.fn(async () => [view]),
    search: jest.fn(async (_q: string) => [view]),
    removeMany: jest.fn(async (ids: string[]) => ({ removed: [], notFound: ids })),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    const moduleRef = await Test.createTestingModule({
      controllers: [InstrumentsController],
      providers: [{ provide: InstrumentsService, useValue: instruments }],
    }).compile();
    controller = moduleRef.get(InstrumentsController);
  });

  it('lists everything without a query', async () => {
    await expect(controller.list({})).resolves.toEqual({ items: [view], total: 1 });
    expect(instruments.search).not.toHaveBeenCalled();
  });

  it('searches when q is given', async () => {
    await controller.list({ q: 'ap' });
    expect(instruments.search).toHaveBeenCalledWith('ap');
    expect(instruments.listActive).not.toHaveBeenCalled();
  });

  it('removes a list of ids', async () => {
    await expect(controller.removeMany({ ids: ['a', 'b'] })).resolves.toEqual({
      removed: [],
      notFound: ['a', 'b'],
    });
  });

  it('rejects an empty id list', () => {
    expect(() => controller.removeMany({ ids: [] })).toThrow(BadRequestException);
  });
});
