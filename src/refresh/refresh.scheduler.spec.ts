import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';

import { RefreshService } from './refresh.service';
import { RefreshScheduler } from './refresh.scheduler';

describe('RefreshScheduler', () => {
  const refreshActive = jest.fn(async () => ({
    total: 1,
    succeeded: 1,
    failed: [],
    totalAlerts: 1,
  }));
  let running: boolean;

  const build = async (enableRefreshCron: boolean) => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        RefreshScheduler,
        {
          provide: RefreshService,
          useValue: { isRunning: () => running, refreshActive },
        },
        {
          provide: ConfigService,
          useValue: new ConfigService({ app: { enableRefreshCron } }),
        },
      ],
    }).compile();
    return moduleRef.get(RefreshScheduler);
  };

  beforeEach(() => {
    running = false;
    refreshActive.mockClear();
  });

  it('runs a batch on tick', async () => {
    await (await build(true)).tick();

    expect(refreshActive).toHaveBeenCalledTimes(1);
  });

  it('skips a tick while a batch is running', async () => {
    running = true;

    await (await build(true)).tick();

    expect(refreshActive).not.toHaveBeenCalled();
  });

  it('does nothing when disabled', async () => {
    await (await build(false)).tick();

    expect(refreshActive).not.toHaveBeenCalled();
  });

  it('logs instead of throwing when the batch fails', async () => {
    refreshActive.mockRejectedValueOnce(new Error('mongo down'));

    await expect((await build(true)).tick()).resolves.toBeUndefined();
  });
});
