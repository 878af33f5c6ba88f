import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OnEvent } from '@nestjs/event-emitter';
import Bottleneck from 'bottleneck';

import {
  INSTRUMENT_ADDED,
  InstrumentAddedEvent,
} from '@/infra/types/events.types';
import { RefreshService } from './refresh.service';

/**
 * 新增 instrument 后在后台补一次刷新；添加方不等待结果。
 * 所有后台刷新走同一个队列：一次一个，相邻两次启动间隔 refreshRateLimitMs。
 */
@Injectable()
export class RefreshListener implements OnModuleDestroy {
  private readonly logger = new Logger(RefreshListener.name);
  private readonly queue: Bottleneck;

  constructor(
    private readonly refresh: RefreshService,
    config: ConfigService,
  ) {
    this.queue = new Bottleneck({
      maxConcurrent: 1,
      minTime: Number(config.get<number>('app.refreshRateLimitMs') ?? 500),
    });
  }

  @OnEvent(INSTRUMENT_ADDED, { async: true })
  async onInstrumentAdded(payload: InstrumentAddedEvent) {
    try {
      const r = await this.queue.schedule(() => this.refresh.refreshOne(payload));
      this.logger.log(
        `[refresh] initial refresh ${payload.symbol}: alerts=${r.alerts}`,
      );
    } catch (err: unknown) {
      this.logger.error(
        `[refresh] initial refresh ${payload.symbol} failed: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }

  async onModuleDestroy() {
    await this.queue.stop({ dropWaitingJobs: true });
  }
}
