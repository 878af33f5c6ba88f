import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';

import { RedisService } from '@/infra/redis/redis.service';
import {
  REFRESH_COMPLETED,
  REFRESH_PROGRESS,
  RefreshCompletedEvent,
  RefreshProgressEvent,
} from '@/infra/types/events.types';

export const REFRESH_STATUS_KEY = 'refresh:status';

export type RefreshStatus =
  | ({ state: 'running'; updatedAt: string } & RefreshProgressEvent)
  | ({ state: 'completed'; updatedAt: string } & RefreshCompletedEvent);

/** 最新进度 / 最后一次批次结果写入 Redis，供状态接口读取 */
@Injectable()
export class RefreshProgressListener {
  private readonly logger = new Logger(RefreshProgressListener.name);

  constructor(private readonly redis: RedisService) {}

  @OnEvent(REFRESH_PROGRESS, { async: true })
  async onProgress(e: RefreshProgressEvent) {
    await this.save({ state: 'running', updatedAt: new Date().toISOString(), ...e });
  }

  @OnEvent(REFRESH_COMPLETED, { async: true })
  async onCompleted(e: RefreshCompletedEvent) {
    await this.save({ state: 'completed', updatedAt: new Date().toISOString(), ...e });
  }

  private async save(status: RefreshStatus) {
    try {
      await this.redis.setJson(REFRESH_STATUS_KEY, status);
    } catch (err: unknown) {
      this.logger.warn(
        `[redis] ${REFRESH_STATUS_KEY} write failed: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }
}
